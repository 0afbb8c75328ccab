import {mkdir, readFile, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {DirectoryResultPublisher, MemoryResultPublisher} from '../result-publisher.js'
import {RunStore} from '../run-store.js'
import {createTmpDir} from './helpers.js'

test('MemoryResultPublisher keeps published artifacts', async t => {
  const publisher = new MemoryResultPublisher()
  await publisher.publish({runId: 'run-1', jobId: 'Build', stepId: 'publish', format: 'JUnit', filePath: '/tmp/TEST-a.xml'})
  t.deepEqual(publisher.artifacts, [{runId: 'run-1', jobId: 'Build', stepId: 'publish', format: 'JUnit', filePath: '/tmp/TEST-a.xml'}])
})

test('DirectoryResultPublisher copies files and indexes them per job', async t => {
  const root = await createTmpDir()
  const reports = join(root, 'reports')
  await mkdir(reports)
  await writeFile(join(reports, 'TEST-a.xml'), '<testsuite name="a"/>')
  await writeFile(join(reports, 'TEST-b.xml'), '<testsuite name="b"/>')

  const store = new RunStore(join(root, 'store'))
  const publisher = new DirectoryResultPublisher(store)
  await Promise.all([
    publisher.publish({runId: 'run-1', jobId: 'Test.Python37', stepId: 'publish', format: 'JUnit', filePath: join(reports, 'TEST-a.xml'), title: 'Python 3.7'}),
    publisher.publish({runId: 'run-1', jobId: 'Test.Python37', stepId: 'publish', format: 'JUnit', filePath: join(reports, 'TEST-b.xml')})
  ])

  const entries = await publisher.list('run-1', 'Test.Python37')
  t.deepEqual(entries.map(({publishedAt, ...entry}) => entry), [
    {stepId: 'publish', format: 'JUnit', title: 'Python 3.7', source: join(reports, 'TEST-a.xml'), file: '1-TEST-a.xml'},
    {stepId: 'publish', format: 'JUnit', source: join(reports, 'TEST-b.xml'), file: '2-TEST-b.xml'}
  ])

  const copy = await readFile(join(store.testResultsDir('run-1', 'Test.Python37'), '2-TEST-b.xml'), 'utf8')
  t.is(copy, '<testsuite name="b"/>')
})

test('DirectoryResultPublisher lists nothing for jobs without results', async t => {
  const publisher = new DirectoryResultPublisher(new RunStore(await createTmpDir()))
  t.deepEqual(await publisher.list('run-1', 'Build'), [])
})

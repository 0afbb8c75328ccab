import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {StoreError} from '../errors.js'
import {RunStore} from '../run-store.js'
import type {PipelineRunResult} from '../types.js'
import {createTmpDir} from './helpers.js'

function runResult(runId: string, startedAt: string): PipelineRunResult {
  return {
    runId,
    pipeline: 'ci',
    trigger: {type: 'manual'},
    status: 'Succeeded',
    startedAt,
    finishedAt: startedAt,
    jobs: {
      Build: {
        jobId: 'Build',
        displayName: 'Build',
        status: 'Succeeded',
        startedAt,
        finishedAt: startedAt,
        steps: [{stepId: 's1', displayName: 'make', status: 'Succeeded', exitCode: 0, output: 'ok', startedAt, finishedAt: startedAt, timedOut: false}]
      }
    }
  }
}

test('generateRunId combines a timestamp and a random suffix', t => {
  t.regex(RunStore.generateRunId(), /^\d+-[\da-f]{8}$/)
})

test('create makes the job log directory', async t => {
  const store = new RunStore(await createTmpDir())
  const runId = await store.create('run-1')
  t.is(runId, 'run-1')
  t.is(store.jobLogDir(runId), join(store.root, 'runs', 'run-1', 'jobs'))
})

test('saveResult and loadResult round-trip a run', async t => {
  const store = new RunStore(await createTmpDir())
  const result = runResult('run-1', '2024-09-09T03:00:00.000Z')
  await store.saveResult(result)
  t.deepEqual(await store.loadResult('run-1'), result)
})

test('loadResult fails with RUN_NOT_FOUND for unknown runs', async t => {
  const store = new RunStore(await createTmpDir())
  const error = await t.throwsAsync(store.loadResult('missing'), {instanceOf: StoreError})
  t.is(error?.code, 'RUN_NOT_FOUND')
  t.is(error?.message, 'Run not found: missing')
})

test('path helpers reject ids that escape the store', t => {
  const store = new RunStore('/tmp/store')
  const error = t.throws(() => store.runPath('../etc'), {instanceOf: StoreError})
  t.is(error?.code, 'INVALID_ID')
  t.is(error?.message, 'Invalid run id: \'../etc\'')
  t.throws(() => store.jobLogPath('run-1', 'a/b'), {message: 'Invalid job id: \'a/b\''})
  t.throws(() => store.runPath(''), {instanceOf: StoreError})
})

test('list returns completed runs, most recent first', async t => {
  const store = new RunStore(await createTmpDir())
  await store.saveResult(runResult('old', '2024-09-01T00:00:00.000Z'))
  await store.saveResult(runResult('new', '2024-09-02T00:00:00.000Z'))
  await store.create('in-progress')

  t.deepEqual((await store.list()).map(run => run.runId), ['new', 'old'])
})

test('list returns nothing for an empty store', async t => {
  const store = new RunStore(join(await createTmpDir(), 'missing'))
  t.deepEqual(await store.list(), [])
})

test('readJobLog returns the log content', async t => {
  const store = new RunStore(await createTmpDir())
  await mkdir(store.jobLogDir('run-1'), {recursive: true})
  await writeFile(store.jobLogPath('run-1', 'Test.Python37'), 'hello\n')
  t.is(await store.readJobLog('run-1', 'Test.Python37'), 'hello\n')
})

test('readJobLog fails with LOG_NOT_FOUND for unknown jobs', async t => {
  const store = new RunStore(await createTmpDir())
  const error = await t.throwsAsync(store.readJobLog('run-1', 'Build'), {instanceOf: StoreError})
  t.is(error?.code, 'LOG_NOT_FOUND')
  t.is(error?.message, 'No log for job Build in run run-1')
})

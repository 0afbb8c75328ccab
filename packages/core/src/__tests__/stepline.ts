import {join} from 'node:path'
import test from 'ava'
import {DirectoryResultPublisher} from '../result-publisher.js'
import {Stepline} from '../stepline.js'
import type {TaskHandler} from '../types.js'
import {createTmpDir, fixturesDir, noopReporter} from './helpers.js'

const pipelineYaml = `
jobs:
  - job: Test
    strategy:
      matrix:
        Python37:
          python.version: '3.7'
    steps:
      - script: |
          mkdir -p reports
          echo '<testsuite/>' > reports/TEST-$(python.version).xml
        displayName: Run tests
      - task: PublishTestResults@2
        inputs:
          testRunTitle: Python $(python.version)
`

async function createStepline(extra: TaskHandler[] = []): Promise<{stepline: Stepline; root: string}> {
  const root = await createTmpDir()
  const stepline = new Stepline({
    reporter: noopReporter,
    shell: 'sh',
    workdir: join(root, '.stepline'),
    cwd: root,
    toolCache: join(root, 'tools'),
    tasks: extra
  })
  return {stepline, root}
}

test('run records the result, job log and published test results', async t => {
  const {stepline} = await createStepline()
  const result = await stepline.run(stepline.loader.parse(pipelineYaml, 'ci.yml'))

  t.is(result.status, 'Succeeded')
  t.is(result.pipeline, 'ci')
  t.deepEqual(await stepline.store.loadResult(result.runId), result)
  t.is(await stepline.store.readJobLog(result.runId, 'Test.Python37'), [
    '##[section]Starting: Run tests',
    '##[section]Starting: PublishTestResults@2',
    'Published JUnit results: reports/TEST-3.7.xml',
    ''
  ].join('\n'))

  const published = await new DirectoryResultPublisher(stepline.store).list(result.runId, 'Test.Python37')
  t.deepEqual(published.map(entry => [entry.file, entry.title]), [['1-TEST-3.7.xml', 'Python 3.7']])
})

test('run records failed runs too', async t => {
  const {stepline} = await createStepline()
  const pipeline = stepline.loader.fromObject({name: 'broken', jobs: [{job: 'Build', steps: [{script: 'exit 5'}]}]})
  const result = await stepline.run(pipeline)

  t.is(result.status, 'Failed')
  t.is(result.jobs.Build.steps[0].exitCode, 5)
  t.deepEqual((await stepline.store.list()).map(run => run.runId), [result.runId])
})

test('run uses extra task handlers', async t => {
  const handler: TaskHandler = {
    id: 'Greet@1',
    async run(_step, context) {
      context.log(`hello from ${context.job.id}`)
      return {}
    }
  }

  const {stepline} = await createStepline([handler])
  const result = await stepline.run(stepline.loader.fromObject({jobs: [{job: 'Build', steps: [{task: 'Greet@1'}]}]}))

  t.is(result.status, 'Succeeded')
  t.is(result.jobs.Build.steps[0].output, 'hello from Build')
  t.true(stepline.tasks.has('greet@1'))
})

test('load reads a pipeline file', async t => {
  const {stepline} = await createStepline()
  const pipeline = await stepline.load(join(fixturesDir, 'azure-pipelines.yml'))
  t.is(pipeline.jobs.length, 2)
})

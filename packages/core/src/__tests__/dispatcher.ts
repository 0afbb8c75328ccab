import test from 'ava'
import {Dispatcher} from '../dispatcher.js'
import {ShellExecutor} from '../engine/index.js'
import {DispatchError} from '../errors.js'
import {JobRunner} from '../job-runner.js'
import type {Reporter} from '../reporter.js'
import {StepExecutor} from '../step-executor.js'
import {TaskRegistry} from '../task-registry.js'
import type {JobDefinition, PipelineDefinition} from '../types.js'
import {job, noopReporter, recordingReporter, scriptStep} from './helpers.js'

function createDispatcher(reporter: Reporter = noopReporter): Dispatcher {
  const executor = new StepExecutor(new ShellExecutor('sh'), new TaskRegistry(), {toolCache: '/nonexistent-tool-cache'})
  return new Dispatcher(new JobRunner(executor, reporter), reporter)
}

function pipeline(jobs: JobDefinition[], variables: Record<string, string> = {}): PipelineDefinition {
  return {name: 'ci', variables, jobs, schedules: []}
}

const manual = {type: 'manual'} as const

test('dispatch runs sibling jobs past a failing one', async t => {
  const result = await createDispatcher().dispatch(pipeline([
    job('A', [scriptStep('s1', 'exit 1')]),
    job('B', [scriptStep('s1', 'echo ok')])
  ]), manual, {runId: 'run-1'})

  t.is(result.status, 'Failed')
  t.is(result.runId, 'run-1')
  t.is(result.pipeline, 'ci')
  t.deepEqual(Object.keys(result.jobs), ['A', 'B'])
  t.is(result.jobs.A.status, 'Failed')
  t.is(result.jobs.B.status, 'Succeeded')
  t.is(result.jobs.B.steps[0].output, 'ok')
})

test('dispatch fails a job at an unknown task while its sibling succeeds', async t => {
  const result = await createDispatcher().dispatch(pipeline([
    job('A', [{id: 'bogus-1', kind: 'task', task: 'Bogus@1', inputs: {}}, scriptStep('s1', 'echo after')]),
    job('B', [scriptStep('s1', 'echo ok')])
  ]), manual, {runId: 'run-1'})

  t.is(result.status, 'Failed')
  t.is(result.jobs.A.status, 'Failed')
  t.deepEqual(result.jobs.A.steps.map(step => [step.status, step.error?.code]), [['Failed', 'UNKNOWN_TASK'], ['Skipped', undefined]])
  t.is(result.jobs.A.steps[1].output, '')
  t.is(result.jobs.B.status, 'Succeeded')
})

test('dispatch reports PIPELINE_FINISHED when every job succeeds', async t => {
  const {reporter, events} = recordingReporter()
  const result = await createDispatcher(reporter).dispatch(pipeline([job('A', [scriptStep('s1', 'true')])]), manual)

  t.is(result.status, 'Succeeded')
  t.is(events[0].event, 'PIPELINE_START')
  t.is(events.at(-1)?.event, 'PIPELINE_FINISHED')
})

test('dispatch lists failed and cancelled jobs in PIPELINE_FAILED', async t => {
  const {reporter, events} = recordingReporter()
  await createDispatcher(reporter).dispatch(pipeline([
    job('A', [scriptStep('s1', 'exit 2')]),
    job('B', [scriptStep('s1', 'true')])
  ]), manual)

  const last = events.at(-1)
  t.is(last?.event, 'PIPELINE_FAILED')
  t.deepEqual(last?.event === 'PIPELINE_FAILED' ? last.failedJobs : [], ['A'])
})

test('dispatch expands matrix jobs into instances', async t => {
  const result = await createDispatcher().dispatch(pipeline([
    job('Test', [scriptStep('s1', 'echo $PYTHON_VERSION')], {
      matrix: {
        axes: [],
        legs: [
          {name: 'Python37', variables: {'python.version': '3.7'}},
          {name: 'Python38', variables: {'python.version': '3.8'}}
        ]
      }
    })
  ]), manual)

  t.deepEqual(Object.keys(result.jobs), ['Test.Python37', 'Test.Python38'])
  t.is(result.jobs['Test.Python37'].displayName, 'Test (Python37)')
  t.is(result.jobs['Test.Python37'].steps[0].output, '3.7')
  t.is(result.jobs['Test.Python38'].steps[0].output, '3.8')
})

test('dispatch passes pipeline variables to every job', async t => {
  const result = await createDispatcher().dispatch(pipeline([
    job('A', [scriptStep('s1', 'echo $(package)')]),
    job('B', [scriptStep('s1', 'echo $PACKAGE')])
  ], {package: 'sample'}), manual)

  t.is(result.jobs.A.steps[0].output, 'sample')
  t.is(result.jobs.B.steps[0].output, 'sample')
})

test('dispatch runs one job at a time with concurrency 1', async t => {
  const {reporter, events} = recordingReporter()
  await createDispatcher(reporter).dispatch(pipeline([
    job('A', [scriptStep('s1', 'true')]),
    job('B', [scriptStep('s1', 'true')])
  ]), manual, {concurrency: 1})

  const jobEvents = events.flatMap(event => event.event === 'JOB_STARTING' || event.event === 'JOB_FINISHED' ? [`${event.event} ${event.job.id}`] : [])
  t.deepEqual(jobEvents, ['JOB_STARTING A', 'JOB_FINISHED A', 'JOB_STARTING B', 'JOB_FINISHED B'])
})

test('dispatch assigns agents from the pool', async t => {
  const {reporter, events} = recordingReporter()
  await createDispatcher(reporter).dispatch(pipeline([
    job('A', [scriptStep('s1', 'true')]),
    job('B', [scriptStep('s1', 'true')])
  ]), manual)

  const agents = events.flatMap(event => event.event === 'JOB_STARTING' ? [event.agent] : [])
  t.deepEqual(agents, ['agent-1', 'agent-2'])
})

test('dispatch filters by job name and matrix value', async t => {
  const result = await createDispatcher().dispatch(pipeline([
    job('Lint', [scriptStep('s1', 'true')]),
    job('Test', [scriptStep('s1', 'true')], {matrix: {axes: [{name: 'python.version', values: ['3.7', '3.8']}], legs: []}})
  ]), manual, {jobs: ['Test'], matrix: [['python.version', '3.8']]})

  t.deepEqual(Object.keys(result.jobs), ['Test.Python38'])
})

test('dispatch rejects filters that match nothing', async t => {
  const error = await t.throwsAsync(createDispatcher().dispatch(pipeline([job('A', [scriptStep('s1', 'true')])]), manual, {jobs: ['Missing']}), {
    instanceOf: DispatchError
  })
  t.is(error?.code, 'NO_MATCHING_JOBS')
  t.is(error?.message, 'No job of pipeline "ci" matches the given filters')
})

test('dispatch rejects an invalid concurrency', async t => {
  const error = await t.throwsAsync(createDispatcher().dispatch(pipeline([job('A', [scriptStep('s1', 'true')])]), manual, {concurrency: 0}), {
    instanceOf: DispatchError
  })
  t.is(error?.code, 'INVALID_CONCURRENCY')
})

test('dispatch cancels running and waiting jobs when the signal aborts', async t => {
  const controller = new AbortController()
  const {reporter, events} = recordingReporter()
  setTimeout(() => {
    controller.abort()
  }, 100)

  const result = await createDispatcher(reporter).dispatch(pipeline([
    job('A', [scriptStep('s1', 'sleep 2')]),
    job('B', [scriptStep('s1', 'echo b')])
  ]), manual, {concurrency: 1, signal: controller.signal})

  t.is(result.status, 'Failed')
  t.is(result.jobs.A.status, 'Cancelled')
  t.is(result.jobs.B.status, 'Cancelled')
  t.deepEqual(result.jobs.B.steps.map(step => step.status), ['Cancelled'])
  t.deepEqual(events.flatMap(event => event.event === 'JOB_STARTING' ? [event.job.id] : []), ['A'])
})

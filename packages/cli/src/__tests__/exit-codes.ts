import test from 'ava'
import {CommanderError} from 'commander'
import {
  CancellationError,
  DispatchError,
  ParseError,
  StoreError,
  UnknownTaskError,
  type JobResult,
  type PipelineRunResult,
  type StepResult
} from '@stepline/core'
import {UsageError} from '../errors.js'
import {exitCodeForError, exitCodeForRun, exitCodes} from '../exit-codes.js'

const at = '2024-09-09T03:00:00.000Z'

function step(status: StepResult['status'], error?: StepResult['error']): StepResult {
  return {stepId: 's1', displayName: 's1', status, output: '', startedAt: at, finishedAt: at, timedOut: false, ...(error ? {error} : {})}
}

function jobResult(jobId: string, status: JobResult['status'], steps: StepResult[]): JobResult {
  return {jobId, displayName: jobId, status, steps, startedAt: at, finishedAt: at}
}

function run(jobs: JobResult[]): PipelineRunResult {
  return {
    runId: 'run-1',
    pipeline: 'ci',
    trigger: {type: 'manual'},
    status: jobs.every(job => job.status === 'Succeeded') ? 'Succeeded' : 'Failed',
    startedAt: at,
    finishedAt: at,
    jobs: Object.fromEntries(jobs.map(job => [job.jobId, job]))
  }
}

test('exitCodeForRun is 0 for successful runs', t => {
  t.is(exitCodeForRun(run([jobResult('A', 'Succeeded', [step('Succeeded')])])), exitCodes.success)
})

test('exitCodeForRun is 1 when a step failed', t => {
  t.is(exitCodeForRun(run([
    jobResult('A', 'Failed', [step('Failed', {code: 'STEP_FAILED', message: 'Step s1 failed with exit code 1'})]),
    jobResult('B', 'Cancelled', [step('Cancelled')])
  ])), 1)
})

test('exitCodeForRun is 3 when a step used an unknown task', t => {
  t.is(exitCodeForRun(run([
    jobResult('A', 'Failed', [step('Failed', {code: 'STEP_FAILED', message: 'failed'})]),
    jobResult('B', 'Failed', [step('Failed', {code: 'UNKNOWN_TASK', message: 'Unknown task: "Npm@1"'})])
  ])), 3)
})

test('exitCodeForRun is 4 when jobs were only cancelled', t => {
  t.is(exitCodeForRun(run([
    jobResult('A', 'Succeeded', [step('Succeeded')]),
    jobResult('B', 'Cancelled', [step('Cancelled')])
  ])), 4)
})

test('exitCodeForError maps errors to exit codes', t => {
  t.is(exitCodeForError(new CommanderError(0, 'commander.helpDisplayed', '')), 0)
  t.is(exitCodeForError(new CommanderError(1, 'commander.unknownOption', 'unknown option')), 2)
  t.is(exitCodeForError(new UnknownTaskError('Npm@1', [])), 3)
  t.is(exitCodeForError(new CancellationError()), 4)
  t.is(exitCodeForError(new ParseError('bad')), 2)
  t.is(exitCodeForError(new DispatchError('NO_MATCHING_JOBS', 'none')), 2)
  t.is(exitCodeForError(new StoreError('RUN_NOT_FOUND', 'Run not found: x')), 2)
  t.is(exitCodeForError(new UsageError('bad option')), 2)
  t.is(exitCodeForError(new Error('boom')), 1)
})

import process from 'node:process'
import {createWriteStream, type WriteStream} from 'node:fs'
import {mkdir} from 'node:fs/promises'
import {join} from 'node:path'
import type {JobRef, Reporter, StepRef} from './reporter.js'
import {stepDisplayName, type StepExecutor} from './step-executor.js'
import type {ErrorInfo, JobInstance, JobResult, JobStatus, StepDefinition, StepResult, Trigger, Variables} from './types.js'
import {elapsedMs} from './utils.js'
import {JobEnvironment} from './variables.js'
import type {Agent} from './worker-pool.js'

export type JobRunOptions = {
  runId: string;
  trigger: Trigger;
  pipelineVariables?: Variables;
  /** Base process environment; defaults to the current process environment */
  env?: Record<string, string>;
  workingDirectory?: string;
  /** Directory receiving `<instance>.log` */
  logDir?: string;
  agent?: Agent;
  signal?: AbortSignal;
}

export function processEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(process.env)) {
    if (value !== undefined) {
      env[key] = value
    }
  }

  return env
}

/**
 * Runs the steps of one job instance in order.
 *
 * The first failing step stops the job: later steps are recorded as
 * `Skipped` and never executed. When the signal aborts, the running step is
 * killed and it and every later step are recorded as `Cancelled`.
 */
export class JobRunner {
  constructor(
    private readonly executor: StepExecutor,
    private readonly reporter: Reporter
  ) {}

  async run(instance: JobInstance, options: JobRunOptions): Promise<JobResult> {
    const {runId, signal} = options
    const job: JobRef = {id: instance.id, displayName: instance.displayName}
    const workingDirectory = options.workingDirectory ?? process.cwd()
    const startedAt = new Date().toISOString()

    this.reporter.emit({
      event: 'JOB_STARTING',
      runId,
      job,
      agent: options.agent?.id,
      vmImage: instance.job.vmImage,
      steps: instance.job.steps.map(step => toStepRef(step))
    })

    const environment = new JobEnvironment(options.env ?? processEnv())
    for (const layer of [
      systemVariables(instance, options, workingDirectory),
      options.pipelineVariables ?? {},
      instance.job.variables,
      instance.assignment
    ]) {
      environment.setVariables(layer)
    }

    let log: WriteStream | undefined
    const logState: {error?: ErrorInfo} = {}
    if (options.logDir) {
      await mkdir(options.logDir, {recursive: true})
      log = createWriteStream(join(options.logDir, `${instance.id}.log`))
      log.on('error', (error: Error) => {
        logState.error ??= {code: 'LOG_WRITE_FAILED', message: `Cannot write job log: ${error.message}`}
      })
    }

    const writeLog = (text: string) => {
      if (log && logState.error === undefined) {
        log.write(text)
      }
    }

    const steps: StepResult[] = []
    let status: JobStatus = 'Succeeded'

    try {
      for (const step of instance.job.steps) {
        const stepRef = toStepRef(step)

        if (status === 'Failed') {
          steps.push(placeholderResult(step, 'Skipped'))
          this.reporter.emit({event: 'STEP_SKIPPED', runId, job, step: stepRef, reason: 'previous-failure'})
          continue
        }

        if (status === 'Cancelled' || signal?.aborted) {
          status = 'Cancelled'
          steps.push(placeholderResult(step, 'Cancelled'))
          this.reporter.emit({event: 'STEP_CANCELLED', runId, job, step: stepRef})
          continue
        }

        this.reporter.emit({event: 'STEP_STARTING', runId, job, step: stepRef})
        writeLog(`##[section]Starting: ${stepRef.displayName}\n`)

        const timeoutInMinutes = step.timeoutInMinutes ?? instance.job.timeoutInMinutes
        const result = await this.executor.execute(step, {
          runId,
          job,
          environment,
          workingDirectory,
          timeoutMs: timeoutInMinutes === undefined ? undefined : Math.round(timeoutInMinutes * 60_000),
          signal,
          onLogLine: ({stream, line}) => {
            writeLog(`${line}\n`)
            this.reporter.emit({event: 'STEP_LOG', runId, job, step: stepRef, stream, line})
          },
          onOutcome(outcome) {
            environment.apply(outcome)
          }
        })
        steps.push(result)

        switch (result.status) {
          case 'Succeeded': {
            this.reporter.emit({event: 'STEP_FINISHED', runId, job, step: stepRef, durationMs: elapsedMs(result.startedAt, result.finishedAt)})
            break
          }

          case 'Failed': {
            status = 'Failed'
            writeLog(`##[error]${result.error?.message ?? 'Step failed'}\n`)
            this.reporter.emit({
              event: 'STEP_FAILED',
              runId,
              job,
              step: stepRef,
              exitCode: result.exitCode,
              timedOut: result.timedOut,
              error: result.error
            })
            break
          }

          case 'Cancelled':
          case 'Skipped': {
            status = 'Cancelled'
            this.reporter.emit({event: 'STEP_CANCELLED', runId, job, step: stepRef})
            break
          }
        }
      }
    } finally {
      if (log) {
        await closeStream(log)
      }
    }

    const result = this.finish(instance, runId, status, steps, startedAt)
    if (logState.error) {
      result.logError = logState.error
    }

    return result
  }

  /** Result of an instance that never started because the run was cancelled first. */
  cancelled(instance: JobInstance, runId: string): JobResult {
    const startedAt = new Date().toISOString()
    const steps = instance.job.steps.map(step => placeholderResult(step, 'Cancelled'))
    return this.finish(instance, runId, 'Cancelled', steps, startedAt)
  }

  private finish(instance: JobInstance, runId: string, status: JobStatus, steps: StepResult[], startedAt: string): JobResult {
    const finishedAt = new Date().toISOString()
    const job: JobRef = {id: instance.id, displayName: instance.displayName}
    this.reporter.emit({event: 'JOB_FINISHED', runId, job, status, durationMs: elapsedMs(startedAt, finishedAt)})

    const result: JobResult = {jobId: instance.id, displayName: instance.displayName, status, steps, startedAt, finishedAt}
    if (instance.job.vmImage !== undefined) {
      result.vmImage = instance.job.vmImage
    }

    return result
  }
}

function toStepRef(step: StepDefinition): StepRef {
  return {id: step.id, displayName: stepDisplayName(step)}
}

function placeholderResult(step: StepDefinition, status: 'Skipped' | 'Cancelled'): StepResult {
  const now = new Date().toISOString()
  return {
    stepId: step.id,
    displayName: stepDisplayName(step),
    status,
    output: '',
    startedAt: now,
    finishedAt: now,
    timedOut: false
  }
}

function systemVariables(instance: JobInstance, options: JobRunOptions, workingDirectory: string): Variables {
  const variables: Variables = {
    'Build.BuildId': options.runId,
    'Build.Reason': options.trigger.type === 'schedule' ? 'Schedule' : 'Manual',
    'Build.SourcesDirectory': workingDirectory,
    'System.JobId': instance.id,
    'Agent.JobName': instance.displayName
  }

  if (options.agent) {
    variables['Agent.Name'] = options.agent.id
  }

  if (options.trigger.type === 'schedule' && options.trigger.branch !== undefined) {
    variables['Build.SourceBranchName'] = options.trigger.branch
  }

  return variables
}

/** Resolves once the stream has closed; write errors surface through its own `error` listener. */
async function closeStream(stream: WriteStream): Promise<void> {
  if (stream.closed) {
    return
  }

  return new Promise(resolve => {
    stream.once('close', () => {
      resolve()
    })
    if (!stream.destroyed) {
      stream.end()
    }
  })
}

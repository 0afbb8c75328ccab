import {CancellationError, DispatchError} from './errors.js'
import type {JobRunner} from './job-runner.js'
import {expandPipeline, filterInstances} from './matrix.js'
import type {Reporter} from './reporter.js'
import {RunStore} from './run-store.js'
import type {JobInstance, JobResult, PipelineDefinition, PipelineRunResult, Trigger} from './types.js'
import {elapsedMs} from './utils.js'
import {WorkerPool, type Agent} from './worker-pool.js'

export type DispatchOptions = {
  runId?: string;
  /** Only run these jobs (by job name) */
  jobs?: string[];
  /** Only run instances whose assignment matches every `[variable, value]` pair */
  matrix?: Array<[string, string]>;
  /** Maximum number of concurrently running job instances; defaults to all of them */
  concurrency?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
  workingDirectory?: string;
  logDir?: string;
}

/**
 * Expands a pipeline into job instances and runs them on a bounded pool of
 * agents. Jobs are independent: a failing job never stops its siblings.
 */
export class Dispatcher {
  constructor(
    private readonly runner: JobRunner,
    private readonly reporter: Reporter
  ) {}

  async dispatch(pipeline: PipelineDefinition, trigger: Trigger, options: DispatchOptions = {}): Promise<PipelineRunResult> {
    const instances = filterInstances(expandPipeline(pipeline), {jobs: options.jobs, matrix: options.matrix})
    if (instances.length === 0) {
      throw new DispatchError('NO_MATCHING_JOBS', `No job of pipeline "${pipeline.name}" matches the given filters`)
    }

    const runId = options.runId ?? RunStore.generateRunId()
    const pool = new WorkerPool(options.concurrency ?? instances.length)
    const startedAt = new Date().toISOString()

    this.reporter.emit({
      event: 'PIPELINE_START',
      runId,
      pipelineName: pipeline.name,
      trigger,
      jobs: instances.map(instance => ({id: instance.id, displayName: instance.displayName}))
    })

    const settled = await Promise.allSettled(instances.map(async instance => this.runInstance(pool, instance, pipeline, trigger, runId, options)))

    const jobs: Record<string, JobResult> = {}
    for (const outcome of settled) {
      if (outcome.status === 'rejected') {
        throw outcome.reason
      }

      jobs[outcome.value.jobId] = outcome.value
    }

    const failedJobs = Object.values(jobs).filter(job => job.status !== 'Succeeded').map(job => job.jobId)
    const finishedAt = new Date().toISOString()
    const durationMs = elapsedMs(startedAt, finishedAt)

    if (failedJobs.length > 0) {
      this.reporter.emit({event: 'PIPELINE_FAILED', runId, failedJobs, durationMs})
    } else {
      this.reporter.emit({event: 'PIPELINE_FINISHED', runId, durationMs})
    }

    return {
      runId,
      pipeline: pipeline.name,
      trigger,
      status: failedJobs.length > 0 ? 'Failed' : 'Succeeded',
      startedAt,
      finishedAt,
      jobs
    }
  }

  private async runInstance(
    pool: WorkerPool,
    instance: JobInstance,
    pipeline: PipelineDefinition,
    trigger: Trigger,
    runId: string,
    options: DispatchOptions
  ): Promise<JobResult> {
    let agent: Agent
    try {
      agent = await pool.checkout(options.signal)
    } catch (error) {
      if (error instanceof CancellationError) {
        return this.runner.cancelled(instance, runId)
      }

      throw error
    }

    try {
      return await this.runner.run(instance, {
        runId,
        trigger,
        pipelineVariables: pipeline.variables,
        env: options.env,
        workingDirectory: options.workingDirectory,
        logDir: options.logDir,
        agent,
        signal: options.signal
      })
    } finally {
      pool.release(agent)
    }
  }
}

import process from 'node:process'
import {homedir} from 'node:os'
import {join, resolve} from 'node:path'
import type {OnLogLine, ScriptExecutor} from './engine/index.js'
import {CancellationError, StepExecutionError, SteplineError} from './errors.js'
import {MemoryResultPublisher, type ResultPublisher} from './result-publisher.js'
import type {JobRef} from './reporter.js'
import type {TaskRegistry} from './task-registry.js'
import type {ErrorInfo, ScriptStep, StepDefinition, StepResult, TaskContext, TaskOutcome, TaskStep} from './types.js'
import type {JobEnvironment} from './variables.js'

export type StepExecutorOptions = {
  publisher?: ResultPublisher;
  /** Root of the tool cache searched by version-selection tasks */
  toolCache?: string;
}

export type StepRunContext = {
  runId: string;
  job: JobRef;
  environment: JobEnvironment;
  workingDirectory: string;
  timeoutMs?: number;
  signal?: AbortSignal;
  onLogLine?: OnLogLine;
  /** Receives what a successful task contributes to the job environment */
  onOutcome?: (outcome: TaskOutcome) => void;
}

export function stepDisplayName(step: StepDefinition): string {
  return step.displayName ?? step.name ?? (step.kind === 'script' ? step.script.trim().split('\n')[0] : step.task)
}

export function defaultToolCache(): string {
  return process.env.AGENT_TOOLSDIRECTORY ?? join(homedir(), '.stepline', 'tools')
}

/**
 * Runs a single step and describes the outcome as a {@link StepResult}.
 *
 * Failures (non-zero exit, timeout, task errors, unknown tasks) are returned
 * as data, never thrown.
 */
export class StepExecutor {
  private readonly publisher: ResultPublisher
  private readonly toolCache: string

  constructor(
    private readonly scripts: ScriptExecutor,
    private readonly tasks: TaskRegistry,
    options: StepExecutorOptions = {}
  ) {
    this.publisher = options.publisher ?? new MemoryResultPublisher()
    this.toolCache = options.toolCache ?? defaultToolCache()
  }

  async execute(step: StepDefinition, context: StepRunContext): Promise<StepResult> {
    const output: string[] = []
    const onLogLine: OnLogLine = log => {
      output.push(log.line)
      context.onLogLine?.(log)
    }

    const startedAt = new Date().toISOString()
    const partial = step.kind === 'script'
      ? await this.runScript(step, context, onLogLine)
      : await this.runTask(step, context, onLogLine)

    return {
      stepId: step.id,
      displayName: stepDisplayName(step),
      output: output.join('\n'),
      startedAt,
      finishedAt: new Date().toISOString(),
      timedOut: false,
      ...partial
    }
  }

  private async runScript(step: ScriptStep, context: StepRunContext, onLogLine: OnLogLine): Promise<Outcome> {
    const {environment} = context
    const cwd = step.workingDirectory === undefined
      ? context.workingDirectory
      : resolve(context.workingDirectory, environment.expand(step.workingDirectory))

    const result = await this.scripts.run({
      script: environment.expand(step.script),
      env: environment.forStep(step.env),
      cwd,
      timeoutMs: context.timeoutMs,
      signal: context.signal
    }, onLogLine)

    if (result.cancelled) {
      return {status: 'Cancelled', error: toErrorInfo(new CancellationError())}
    }

    if (result.timedOut) {
      return {
        status: 'Failed',
        timedOut: true,
        error: toErrorInfo(new StepExecutionError(step.id, result.exitCode, true, {timeoutMs: context.timeoutMs}))
      }
    }

    if (result.exitCode === 0) {
      return {status: 'Succeeded', exitCode: 0}
    }

    const error = new StepExecutionError(step.id, result.exitCode, false)
    return {
      status: 'Failed',
      ...(result.exitCode === undefined ? {} : {exitCode: result.exitCode}),
      error: {code: error.code, message: result.error ?? error.message}
    }
  }

  private async runTask(step: TaskStep, context: StepRunContext, onLogLine: OnLogLine): Promise<Outcome> {
    const controller = new AbortController()
    const onAbort = () => {
      controller.abort(new CancellationError())
    }

    context.signal?.addEventListener('abort', onAbort, {once: true})
    const timer = context.timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
        controller.abort(new StepExecutionError(step.id, undefined, true, {timeoutMs: context.timeoutMs}))
      }, context.timeoutMs)

    const {environment} = context
    const taskContext: TaskContext = {
      runId: context.runId,
      job: context.job,
      step: {id: step.id, displayName: stepDisplayName(step)},
      variables: environment.variables,
      env: environment.forStep(step.env),
      workingDirectory: context.workingDirectory,
      toolCache: this.toolCache,
      publisher: this.publisher,
      signal: controller.signal,
      expand: text => environment.expand(text),
      log(line) {
        onLogLine({stream: 'stdout', line})
      }
    }

    try {
      if (context.signal?.aborted) {
        throw new CancellationError()
      }

      const handler = this.tasks.get(step.task)
      const outcome = await untilAborted(handler.run(step, taskContext), controller.signal)
      context.onOutcome?.(outcome)
      return {status: 'Succeeded'}
    } catch (error) {
      const info = toErrorInfo(error)
      onLogLine({stream: 'stderr', line: info.message})

      if (error instanceof CancellationError) {
        return {status: 'Cancelled', error: info}
      }

      return {status: 'Failed', timedOut: error instanceof StepExecutionError && error.timedOut, error: info}
    } finally {
      clearTimeout(timer)
      context.signal?.removeEventListener('abort', onAbort)
    }
  }
}

type Outcome = Pick<StepResult, 'status'> & Partial<Pick<StepResult, 'exitCode' | 'timedOut' | 'error'>>

function toErrorInfo(error: unknown): ErrorInfo {
  if (error instanceof SteplineError) {
    return {code: error.code, message: error.message}
  }

  return {code: 'TASK_FAILED', message: error instanceof Error ? error.message : String(error)}
}

async function untilAborted<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason)
      return
    }

    signal.addEventListener('abort', () => {
      reject(signal.reason)
    }, {once: true})
    promise.then(resolve, reject)
  })
}

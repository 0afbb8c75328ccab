import process from 'node:process'
import {Dispatcher} from './dispatcher.js'
import {ShellExecutor, type ScriptExecutor} from './engine/index.js'
import {JobRunner} from './job-runner.js'
import {PipelineLoader} from './pipeline-loader.js'
import {ConsoleReporter, type Reporter} from './reporter.js'
import {DirectoryResultPublisher} from './result-publisher.js'
import {RunStore} from './run-store.js'
import {StepExecutor} from './step-executor.js'
import {TaskRegistry} from './task-registry.js'
import {defaultTasks} from './tasks/index.js'
import type {PipelineDefinition, PipelineRunResult, TaskHandler, Trigger} from './types.js'

export type SteplineOptions = {
  executor?: ScriptExecutor;
  /** Shell used by the default executor */
  shell?: string;
  reporter?: Reporter;
  /** Root of the run store */
  workdir?: string;
  /** Handlers registered on top of the built-in tasks */
  tasks?: TaskHandler[];
  toolCache?: string;
  /** Working directory of every job */
  cwd?: string;
}

export type RunOptions = {
  trigger?: Trigger;
  jobs?: string[];
  matrix?: Array<[string, string]>;
  concurrency?: number;
  signal?: AbortSignal;
  env?: Record<string, string>;
}

/**
 * Wires loader, executor, task registry, dispatcher and run store together.
 * Every run is recorded in the store, along with job logs and published test results.
 */
export class Stepline {
  readonly loader = new PipelineLoader()
  readonly store: RunStore
  readonly tasks: TaskRegistry
  private readonly dispatcher: Dispatcher
  private readonly cwd: string

  constructor(options: SteplineOptions = {}) {
    const reporter = options.reporter ?? new ConsoleReporter()
    this.store = new RunStore(options.workdir ?? './.stepline')
    this.tasks = new TaskRegistry([...defaultTasks, ...(options.tasks ?? [])])
    this.cwd = options.cwd ?? process.cwd()

    const executor = new StepExecutor(options.executor ?? new ShellExecutor(options.shell), this.tasks, {
      publisher: new DirectoryResultPublisher(this.store),
      toolCache: options.toolCache
    })
    this.dispatcher = new Dispatcher(new JobRunner(executor, reporter), reporter)
  }

  async load(filePath: string): Promise<PipelineDefinition> {
    return this.loader.load(filePath)
  }

  async run(pipeline: PipelineDefinition, options: RunOptions = {}): Promise<PipelineRunResult> {
    const runId = await this.store.create()
    const result = await this.dispatcher.dispatch(pipeline, options.trigger ?? {type: 'manual'}, {
      runId,
      jobs: options.jobs,
      matrix: options.matrix,
      concurrency: options.concurrency,
      signal: options.signal,
      env: options.env,
      workingDirectory: this.cwd,
      logDir: this.store.jobLogDir(runId)
    })

    await this.store.saveResult(result)
    return result
  }
}

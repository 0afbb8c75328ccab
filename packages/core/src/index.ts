// Engine layer
export {ScriptExecutor, ShellExecutor} from './engine/index.js'
export type {LogLine, OnLogLine, RunScriptRequest, RunScriptResult} from './engine/index.js'

// Facade
export {Stepline, type SteplineOptions, type RunOptions} from './stepline.js'

// Definition model
export {PipelineLoader, slugify, parsePipelineFile, serializePipeline, taskInputs} from './pipeline-loader.js'
export {toEnvName, expandMacros, JobEnvironment} from './variables.js'

// Matrix expansion
export {axisLabel, expandJob, expandPipeline, filterInstances, type InstanceFilter} from './matrix.js'

// Execution
export {StepExecutor, stepDisplayName, defaultToolCache, type StepExecutorOptions, type StepRunContext} from './step-executor.js'
export {JobRunner, processEnv, type JobRunOptions} from './job-runner.js'
export {WorkerPool, type Agent} from './worker-pool.js'
export {Dispatcher, type DispatchOptions} from './dispatcher.js'

// Tasks
export {TaskRegistry, loadExternalTask} from './task-registry.js'
export {defaultTasks, publishTestResultsTask, usePythonVersionTask, matchVersion} from './tasks/index.js'

// Schedules
export {parseCron, matchesCron, nextMatch, type CronSchedule} from './cron.js'
export {TriggerEngine, scheduleBranches, scheduledTrigger, type ScheduledRun, type EnqueueRun} from './trigger-engine.js'

// Results and history
export {MemoryResultPublisher, DirectoryResultPublisher} from './result-publisher.js'
export type {ResultPublisher, TestResultArtifact, PublishedResult} from './result-publisher.js'
export {RunStore} from './run-store.js'

// Env file loading
export {loadEnvFiles} from './env-file.js'

// Reporting
export {ConsoleReporter} from './reporter.js'
export type {
  Reporter,
  StepRef,
  JobRef,
  PipelineEvent,
  PipelineStartEvent,
  JobStartingEvent,
  JobFinishedEvent,
  StepStartingEvent,
  StepFinishedEvent,
  StepFailedEvent,
  StepSkippedEvent,
  StepCancelledEvent,
  StepLogEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent
} from './reporter.js'

// Utilities
export {formatDuration, isNotFound} from './utils.js'

// Domain types
export {testResultsFormats, pythonArchitectures} from './types.js'
export type {
  Variables,
  MatrixAxis,
  MatrixLeg,
  MatrixSpec,
  ScriptStep,
  TestResultsFormat,
  PublishTestResultsInputs,
  PublishTestResultsStep,
  PythonArchitecture,
  UsePythonVersionInputs,
  UsePythonVersionStep,
  GenericTaskStep,
  TaskStep,
  StepDefinition,
  JobDefinition,
  BranchFilter,
  ScheduleDefinition,
  PipelineDefinition,
  JobInstance,
  Trigger,
  StepStatus,
  JobStatus,
  JobState,
  PipelineStatus,
  ErrorInfo,
  StepResult,
  JobResult,
  PipelineRunResult,
  TaskContext,
  TaskOutcome,
  TaskHandler
} from './types.js'

// Errors
export {
  SteplineError,
  ParseError,
  DispatchError,
  TaskError,
  UnknownTaskError,
  ArtifactNotFoundError,
  StepExecutionError,
  CancellationError,
  StoreError
} from './errors.js'

// ---------------------------------------------------------------------------
// Pipeline domain types.
//
// Definitions are produced once by the loader and never mutated afterwards.
// Instances and results only live for the duration of one pipeline run.
// ---------------------------------------------------------------------------

import type {ResultPublisher} from './result-publisher.js'

/** Named string values, addressable from scripts and inputs as `$(name)`. */
export type Variables = Record<string, string>

// -- Matrix ------------------------------------------------------------------

/** One parameter axis: every value yields a separate instance. */
export type MatrixAxis = {
  name: string;
  values: string[];
}

/** An explicitly named matrix entry carrying its own set of variables. */
export type MatrixLeg = {
  name: string;
  variables: Variables;
}

/**
 * Axes are multiplied together (cartesian product), legs are appended as-is.
 * Both empty means a single instance.
 */
export type MatrixSpec = {
  axes: MatrixAxis[];
  legs: MatrixLeg[];
}

// -- Steps -------------------------------------------------------------------

type StepBase = {
  /** Identifier unique within the job, derived from `name` or the display name. */
  id: string;
  /** Reference name as written in the definition. */
  name?: string;
  displayName?: string;
  /** Step-local environment bindings, not visible to later steps. */
  env?: Record<string, string>;
  timeoutInMinutes?: number;
}

export type ScriptStep = StepBase & {
  kind: 'script';
  script: string;
  workingDirectory?: string;
}

export const testResultsFormats = ['JUnit', 'NUnit', 'VSTest', 'XUnit', 'CTest'] as const
export type TestResultsFormat = typeof testResultsFormats[number]

export type PublishTestResultsInputs = {
  testResultsFormat: TestResultsFormat;
  /** Newline or comma separated glob patterns. */
  testResultsFiles: string;
  searchFolder?: string;
  testRunTitle?: string;
}

export type PublishTestResultsStep = StepBase & {
  kind: 'publishTestResults';
  task: string;
  inputs: PublishTestResultsInputs;
}

export const pythonArchitectures = ['x64', 'x86', 'arm64'] as const
export type PythonArchitecture = typeof pythonArchitectures[number]

export type UsePythonVersionInputs = {
  versionSpec: string;
  addToPath: boolean;
  architecture: PythonArchitecture;
}

export type UsePythonVersionStep = StepBase & {
  kind: 'usePythonVersion';
  task: string;
  inputs: UsePythonVersionInputs;
}

/** Any task the loader has no typed model for; inputs pass through untouched. */
export type GenericTaskStep = StepBase & {
  kind: 'task';
  task: string;
  inputs: Record<string, string>;
}

export type TaskStep = PublishTestResultsStep | UsePythonVersionStep | GenericTaskStep

export type StepDefinition = ScriptStep | TaskStep

// -- Jobs, schedules, pipelines ----------------------------------------------

export type JobDefinition = {
  name: string;
  displayName?: string;
  /** Target environment image (recorded, never provisioned). */
  vmImage?: string;
  variables: Variables;
  matrix: MatrixSpec;
  /** Default step timeout for steps that declare none. */
  timeoutInMinutes?: number;
  steps: StepDefinition[];
}

export type BranchFilter = {
  include: string[];
  exclude: string[];
}

export type ScheduleDefinition = {
  cron: string;
  displayName: string;
  branches: BranchFilter;
}

export type PipelineDefinition = {
  name: string;
  variables: Variables;
  jobs: JobDefinition[];
  schedules: ScheduleDefinition[];
}

// -- Run-time entities -------------------------------------------------------

/** A job definition bound to one concrete matrix assignment. */
export type JobInstance = {
  id: string;
  displayName: string;
  job: JobDefinition;
  /** Matrix label (e.g. `Python37`), absent when the job has no matrix. */
  label?: string;
  assignment: Variables;
}

export type Trigger =
  | {type: 'manual'}
  | {type: 'schedule'; schedule: string; branch?: string; scheduledAt: string}

export type StepStatus = 'Succeeded' | 'Failed' | 'Cancelled' | 'Skipped'

export type JobStatus = 'Succeeded' | 'Failed' | 'Cancelled'

/** Job lifecycle: Pending → Running → one of the terminal statuses. */
export type JobState = 'Pending' | 'Running' | JobStatus

export type PipelineStatus = 'Succeeded' | 'Failed'

export type ErrorInfo = {
  code: string;
  message: string;
}

export type StepResult = {
  stepId: string;
  displayName: string;
  status: StepStatus;
  exitCode?: number;
  /** Captured stdout/stderr lines, in arrival order. */
  output: string;
  startedAt: string;
  finishedAt: string;
  timedOut: boolean;
  error?: ErrorInfo;
}

export type JobResult = {
  jobId: string;
  displayName: string;
  vmImage?: string;
  status: JobStatus;
  steps: StepResult[];
  startedAt: string;
  finishedAt: string;
  /** Set when the job log could not be written */
  logError?: ErrorInfo;
}

export type PipelineRunResult = {
  runId: string;
  pipeline: string;
  trigger: Trigger;
  status: PipelineStatus;
  startedAt: string;
  finishedAt: string;
  /** Keyed by job instance id, in expansion order. */
  jobs: Record<string, JobResult>;
}

// -- Tasks -------------------------------------------------------------------

/** Read-only view of the job a task runs in, plus the collaborators it may use. */
export type TaskContext = {
  runId: string;
  job: {id: string; displayName: string};
  step: {id: string; displayName: string};
  variables: Readonly<Variables>;
  env: Readonly<Record<string, string>>;
  workingDirectory: string;
  toolCache: string;
  publisher: ResultPublisher;
  signal?: AbortSignal;
  /** Expands `$(name)` macros against the job variables. */
  expand(text: string): string;
  log(line: string): void;
}

/**
 * What a task contributes to the job environment.
 * Applied only when the task succeeds, and visible to later steps of the same job.
 */
export type TaskOutcome = {
  variables?: Variables;
  env?: Record<string, string>;
}

export type TaskHandler = {
  /** Task identifier including its major version, e.g. `PublishTestResults@2`. */
  id: string;
  run(step: TaskStep, context: TaskContext): Promise<TaskOutcome>;
}

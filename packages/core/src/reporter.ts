import pino from 'pino'
import type {ErrorInfo, JobStatus, Trigger} from './types.js'

/** Reference to a step for display and keying purposes. */
export type StepRef = {
  id: string;
  displayName: string;
}

/** Reference to a job instance for display and keying purposes. */
export type JobRef = {
  id: string;
  displayName: string;
}

/**
 * Discriminated union of pipeline execution events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - Run begins, all selected job instances are known
 * 2. For each job instance (concurrently):
 *    a. JOB_STARTING - An agent picked up the job
 *    b. For each step:
 *       STEP_STARTING, then STEP_LOG lines, then
 *       STEP_FINISHED OR STEP_FAILED OR STEP_CANCELLED
 *       OR STEP_SKIPPED - A previous step of the job failed
 *    c. JOB_FINISHED - Terminal job status
 * 3. PIPELINE_FINISHED - Every job succeeded
 *    OR PIPELINE_FAILED - At least one job failed or was cancelled
 */
export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  runId: string;
  pipelineName: string;
  trigger: Trigger;
  jobs: JobRef[];
}

export type JobStartingEvent = {
  event: 'JOB_STARTING';
  runId: string;
  job: JobRef;
  agent?: string;
  vmImage?: string;
  steps: StepRef[];
}

export type JobFinishedEvent = {
  event: 'JOB_FINISHED';
  runId: string;
  job: JobRef;
  status: JobStatus;
  durationMs: number;
}

export type StepStartingEvent = {
  event: 'STEP_STARTING';
  runId: string;
  job: JobRef;
  step: StepRef;
}

export type StepFinishedEvent = {
  event: 'STEP_FINISHED';
  runId: string;
  job: JobRef;
  step: StepRef;
  durationMs: number;
}

export type StepFailedEvent = {
  event: 'STEP_FAILED';
  runId: string;
  job: JobRef;
  step: StepRef;
  exitCode?: number;
  timedOut: boolean;
  error?: ErrorInfo;
}

export type StepSkippedEvent = {
  event: 'STEP_SKIPPED';
  runId: string;
  job: JobRef;
  step: StepRef;
  reason: 'previous-failure';
}

export type StepCancelledEvent = {
  event: 'STEP_CANCELLED';
  runId: string;
  job: JobRef;
  step: StepRef;
}

export type StepLogEvent = {
  event: 'STEP_LOG';
  runId: string;
  job: JobRef;
  step: StepRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  runId: string;
  durationMs: number;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  runId: string;
  failedJobs: string[];
  durationMs: number;
}

export type PipelineEvent =
  | PipelineStartEvent
  | JobStartingEvent
  | JobFinishedEvent
  | StepStartingEvent
  | StepFinishedEvent
  | StepFailedEvent
  | StepSkippedEvent
  | StepCancelledEvent
  | StepLogEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent

/**
 * Interface for reporting pipeline execution events.
 */
export type Reporter = {
  /** Reports run, job and step state transitions */
  emit(event: PipelineEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  constructor(private readonly logger = pino({level: 'info'})) {}

  emit(event: PipelineEvent): void {
    if (event.event === 'STEP_FAILED' || event.event === 'PIPELINE_FAILED') {
      this.logger.error(event)
      return
    }

    this.logger.info(event)
  }
}

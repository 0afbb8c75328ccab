export class SteplineError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'SteplineError'
  }
}

// -- Definition errors -------------------------------------------------------

export class ParseError extends SteplineError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('PARSE_ERROR', message, options)
    this.name = 'ParseError'
  }
}

export class DispatchError extends SteplineError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'DispatchError'
  }
}

// -- Task errors -------------------------------------------------------------

export class TaskError extends SteplineError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'TaskError'
  }
}

export class UnknownTaskError extends TaskError {
  constructor(
    readonly taskId: string,
    available: string[],
    options?: {cause?: unknown}
  ) {
    super('UNKNOWN_TASK', `Unknown task: "${taskId}". Available tasks: ${available.join(', ')}`, options)
    this.name = 'UnknownTaskError'
  }
}

export class ArtifactNotFoundError extends TaskError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('ARTIFACT_NOT_FOUND', message, options)
    this.name = 'ArtifactNotFoundError'
  }
}

// -- Execution errors --------------------------------------------------------

export class StepExecutionError extends SteplineError {
  constructor(
    readonly stepId: string,
    readonly exitCode: number | undefined,
    readonly timedOut: boolean,
    options?: {cause?: unknown; timeoutMs?: number}
  ) {
    super(
      timedOut ? 'STEP_TIMEOUT' : 'STEP_FAILED',
      timedOut
        ? `Step ${stepId} exceeded timeout of ${options?.timeoutMs ?? 0}ms`
        : `Step ${stepId} failed with exit code ${exitCode ?? 'unknown'}`,
      options
    )
    this.name = 'StepExecutionError'
  }
}

export class CancellationError extends SteplineError {
  constructor(message = 'Pipeline run was cancelled', options?: {cause?: unknown}) {
    super('CANCELLED', message, options)
    this.name = 'CancellationError'
  }
}

// -- Store errors ------------------------------------------------------------

export class StoreError extends SteplineError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'StoreError'
  }
}

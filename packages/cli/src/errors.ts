import {SteplineError} from '@stepline/core'

/** Bad command-line input: missing files, malformed option values. */
export class UsageError extends SteplineError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('USAGE', message, options)
    this.name = 'UsageError'
  }
}

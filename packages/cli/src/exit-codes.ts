import {CommanderError} from 'commander'
import {CancellationError, DispatchError, ParseError, StoreError, UnknownTaskError, type PipelineRunResult} from '@stepline/core'
import {UsageError} from './errors.js'

export const exitCodes = {
  success: 0,
  stepFailure: 1,
  usage: 2,
  unknownTask: 3,
  cancelled: 4
} as const

export function exitCodeForRun(result: PipelineRunResult): number {
  if (result.status === 'Succeeded') {
    return exitCodes.success
  }

  const jobs = Object.values(result.jobs)
  if (jobs.some(job => job.steps.some(step => step.error?.code === 'UNKNOWN_TASK'))) {
    return exitCodes.unknownTask
  }

  if (jobs.some(job => job.status === 'Failed')) {
    return exitCodes.stepFailure
  }

  return exitCodes.cancelled
}

export function exitCodeForError(error: unknown): number {
  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? exitCodes.success : exitCodes.usage
  }

  if (error instanceof UnknownTaskError) {
    return exitCodes.unknownTask
  }

  if (error instanceof CancellationError) {
    return exitCodes.cancelled
  }

  if (error instanceof ParseError || error instanceof DispatchError || error instanceof StoreError || error instanceof UsageError) {
    return exitCodes.usage
  }

  return exitCodes.stepFailure
}

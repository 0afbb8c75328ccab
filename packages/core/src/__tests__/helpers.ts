import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {fileURLToPath} from 'node:url'
import type {Reporter, PipelineEvent} from '../reporter.js'
import type {JobDefinition, JobInstance, ScriptStep, StepDefinition} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stepline-test-'))
}

export const fixturesDir = fileURLToPath(new URL('fixtures', import.meta.url))

/**
 * Silent reporter — all methods are no-ops.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]} {
  const events: PipelineEvent[] = []
  const reporter: Reporter = {
    emit(event: PipelineEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

export function scriptStep(id: string, script: string, extra: Partial<Omit<ScriptStep, 'kind' | 'id' | 'script'>> = {}): ScriptStep {
  return {id, kind: 'script', script, ...extra}
}

export function job(name: string, steps: StepDefinition[], extra: Partial<JobDefinition> = {}): JobDefinition {
  return {name, variables: {}, matrix: {axes: [], legs: []}, steps, ...extra}
}

export function instanceOf(definition: JobDefinition, assignment: Record<string, string> = {}): JobInstance {
  return {id: definition.name, displayName: definition.name, job: definition, assignment}
}

import {createRequire} from 'node:module'
import {join, resolve} from 'node:path'
import {pathToFileURL} from 'node:url'
import {TaskError, UnknownTaskError} from './errors.js'
import {taskInputs} from './pipeline-loader.js'
import {defaultTasks} from './tasks/index.js'
import type {TaskContext, TaskHandler, TaskOutcome} from './types.js'

/**
 * Task handlers keyed by identifier (`Name@major`), compared case-insensitively.
 */
export class TaskRegistry {
  private readonly handlers = new Map<string, TaskHandler>()

  constructor(handlers: Iterable<TaskHandler> = defaultTasks) {
    for (const handler of handlers) {
      this.register(handler)
    }
  }

  /** Registers a handler, replacing any handler with the same identifier. */
  register(handler: TaskHandler): void {
    this.handlers.set(handler.id.toLowerCase(), handler)
  }

  has(id: string): boolean {
    return this.handlers.has(id.toLowerCase())
  }

  get(id: string): TaskHandler {
    const handler = this.handlers.get(id.toLowerCase())
    if (!handler) {
      throw new UnknownTaskError(id, this.ids())
    }

    return handler
  }

  ids(): string[] {
    return [...this.handlers.values()].map(handler => handler.id)
  }
}

/**
 * Loads a task handler from a file path or npm module specifier.
 * Relative paths (./  ../) are resolved relative to basedir.
 *
 * The module's default export is called with the step inputs (macros
 * expanded) and the task context, and may return a {@link TaskOutcome}.
 */
export async function loadExternalTask(id: string, specifier: string, basedir: string): Promise<TaskHandler> {
  let mod: unknown
  try {
    if (specifier.startsWith('./') || specifier.startsWith('../') || specifier.startsWith('/')) {
      const absolutePath = specifier.startsWith('/') ? specifier : resolve(basedir, specifier)
      mod = await import(pathToFileURL(absolutePath).href) as unknown
    } else {
      const require = createRequire(join(basedir, 'package.json'))
      mod = await import(pathToFileURL(require.resolve(specifier)).href) as unknown
    }
  } catch (error) {
    throw new TaskError('TASK_LOAD_FAILED', `Failed to load task "${id}" from "${specifier}"`, {cause: error})
  }

  const runFn: unknown = typeof mod === 'object' && mod !== null && 'default' in mod ? mod.default : undefined
  if (typeof runFn !== 'function') {
    throw new TaskError('TASK_INVALID_EXPORT', `Task "${id}" must export a default function, got ${typeof runFn}`)
  }

  return {
    id,
    async run(step, context: TaskContext) {
      const inputs: Record<string, string> = {}
      for (const [name, value] of Object.entries(taskInputs(step))) {
        inputs[name] = context.expand(String(value))
      }

      const result: unknown = await runFn(inputs, context)
      return toOutcome(id, result)
    }
  }
}

function toOutcome(id: string, value: unknown): TaskOutcome {
  if (value === undefined || value === null) {
    return {}
  }

  if (typeof value !== 'object') {
    throw new TaskError('TASK_INVALID_OUTCOME', `Task "${id}" returned ${typeof value}, expected an object or nothing`)
  }

  const outcome: TaskOutcome = {}
  if ('variables' in value && value.variables !== undefined) {
    outcome.variables = toStringRecord(id, 'variables', value.variables)
  }

  if ('env' in value && value.env !== undefined) {
    outcome.env = toStringRecord(id, 'env', value.env)
  }

  return outcome
}

function toStringRecord(id: string, field: string, value: unknown): Record<string, string> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new TaskError('TASK_INVALID_OUTCOME', `Task "${id}" returned invalid ${field}: expected a mapping`)
  }

  const record: Record<string, string> = {}
  for (const [name, entry] of Object.entries(value)) {
    if (typeof entry !== 'string') {
      throw new TaskError('TASK_INVALID_OUTCOME', `Task "${id}" returned invalid ${field}.${name}: expected a string`)
    }

    record[name] = entry
  }

  return record
}

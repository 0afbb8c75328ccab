import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ParseError, isNotFound, loadExternalTask, type TaskHandler} from '@stepline/core'

export const configFileName = '.stepline.yml'

/** Project-level settings read from `.stepline.yml`. */
export type SteplineConfig = {
  shell?: string;
  concurrency?: number;
  toolCache?: string;
  /** Task identifier → module specifier (relative path or npm package) */
  tasks?: Record<string, string>;
}

/**
 * Loads the project-level `.stepline.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<SteplineConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if (isNotFound(error)) {
      return {}
    }

    throw error
  }

  let parsed: unknown
  try {
    parsed = parseYaml(content)
  } catch (error) {
    throw new ParseError(`Cannot parse ${configFileName}: ${error instanceof Error ? error.message : String(error)}`, {cause: error})
  }

  if (parsed === null || parsed === undefined) {
    return {}
  }

  return validateConfig(parsed)
}

export function validateConfig(value: unknown): SteplineConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ParseError(`Invalid ${configFileName}: expected a mapping`)
  }

  const config: SteplineConfig = {}

  if ('shell' in value && value.shell !== undefined) {
    if (typeof value.shell !== 'string' || value.shell === '') {
      throw new ParseError(`Invalid ${configFileName}: shell must be a non-empty string`)
    }

    config.shell = value.shell
  }

  if ('concurrency' in value && value.concurrency !== undefined) {
    if (typeof value.concurrency !== 'number' || !Number.isInteger(value.concurrency) || value.concurrency < 1) {
      throw new ParseError(`Invalid ${configFileName}: concurrency must be a positive integer`)
    }

    config.concurrency = value.concurrency
  }

  if ('toolCache' in value && value.toolCache !== undefined) {
    if (typeof value.toolCache !== 'string') {
      throw new ParseError(`Invalid ${configFileName}: toolCache must be a path`)
    }

    config.toolCache = value.toolCache
  }

  if ('tasks' in value && value.tasks !== undefined) {
    const {tasks} = value
    if (typeof tasks !== 'object' || tasks === null || Array.isArray(tasks)) {
      throw new ParseError(`Invalid ${configFileName}: tasks must map task identifiers to modules`)
    }

    config.tasks = {}
    for (const [id, specifier] of Object.entries(tasks)) {
      if (typeof specifier !== 'string') {
        throw new ParseError(`Invalid ${configFileName}: module of task "${id}" must be a string`)
      }

      config.tasks[id] = specifier
    }
  }

  return config
}

/** Loads the task modules listed under `tasks:`, resolving relative paths against `dir`. */
export async function loadConfiguredTasks(config: SteplineConfig, dir: string): Promise<TaskHandler[]> {
  const handlers: TaskHandler[] = []
  for (const [id, specifier] of Object.entries(config.tasks ?? {})) {
    handlers.push(await loadExternalTask(id, specifier, dir))
  }

  return handlers
}

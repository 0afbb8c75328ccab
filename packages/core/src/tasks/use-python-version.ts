import {access, readdir} from 'node:fs/promises'
import {delimiter, join} from 'node:path'
import {TaskError} from '../errors.js'
import type {TaskHandler, TaskOutcome} from '../types.js'
import {isNotFound} from '../utils.js'

type Segment = number | 'x'

function parseSpec(versionSpec: string): Segment[] | undefined {
  const segments = versionSpec.trim().split('.')
  const parsed: Segment[] = []
  for (const segment of segments) {
    if (segment === 'x' || segment === 'X' || segment === '*') {
      parsed.push('x')
    } else if (/^\d+$/.test(segment)) {
      parsed.push(Number(segment))
    } else {
      return undefined
    }
  }

  return parsed
}

function parseVersion(name: string): number[] | undefined {
  if (!/^\d+(\.\d+)*$/.test(name)) {
    return undefined
  }

  return name.split('.').map(Number)
}

function compareVersions(a: number[], b: number[]): number {
  for (let i = 0; i < Math.max(a.length, b.length); i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0)
    if (diff !== 0) {
      return diff
    }
  }

  return 0
}

/**
 * Picks the highest version matching `versionSpec`.
 *
 * The spec is a prefix of the version (`3.7` matches `3.7.17`); any segment
 * may be `x` (`3.x`). Names that are not dotted numbers never match.
 */
export function matchVersion(versions: string[], versionSpec: string): string | undefined {
  const spec = parseSpec(versionSpec)
  if (!spec) {
    throw new TaskError('INVALID_VERSION_SPEC', `Invalid versionSpec '${versionSpec}'`)
  }

  let best: {name: string; version: number[]} | undefined
  for (const name of versions) {
    const version = parseVersion(name)
    if (!version || version.length < spec.length) {
      continue
    }

    const matches = spec.every((segment, i) => segment === 'x' || segment === version[i])
    if (matches && (!best || compareVersions(version, best.version) > 0)) {
      best = {name, version}
    }
  }

  return best?.name
}

async function listDirectories(path: string): Promise<string[]> {
  try {
    const entries = await readdir(path, {withFileTypes: true})
    return entries.filter(entry => entry.isDirectory()).map(entry => entry.name)
  } catch (error) {
    if (isNotFound(error)) {
      return []
    }

    throw error
  }
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch (error) {
    if (isNotFound(error)) {
      return false
    }

    throw error
  }
}

/**
 * Selects an interpreter from `<toolCache>/Python/<version>/<arch>`.
 * The selection is visible to later steps of the job through `pythonLocation`
 * and, with `addToPath`, through `PATH`.
 */
export const usePythonVersionTask: TaskHandler = {
  id: 'UsePythonVersion@0',

  async run(step, context) {
    if (step.kind !== 'usePythonVersion') {
      throw new TaskError('INVALID_TASK_STEP', `Task "UsePythonVersion@0" cannot run step ${step.id}`)
    }

    const {addToPath, architecture} = step.inputs
    const versionSpec = context.expand(step.inputs.versionSpec)
    const root = join(context.toolCache, 'Python')

    const available: string[] = []
    for (const name of await listDirectories(root)) {
      if (await exists(join(root, name, architecture))) {
        available.push(name)
      }
    }

    const version = matchVersion(available, versionSpec)
    if (!version) {
      throw new TaskError('VERSION_NOT_FOUND', `Version spec ${versionSpec} for architecture ${architecture} did not match any version in ${root}`)
    }

    const location = join(root, version, architecture)
    context.log(`Found tool in cache: Python ${version} ${architecture}`)

    const outcome: TaskOutcome = {
      variables: {pythonLocation: location},
      env: {pythonLocation: location}
    }

    if (addToPath) {
      const path = [join(location, 'bin'), location, context.env.PATH].filter(Boolean).join(delimiter)
      outcome.env = {...outcome.env, PATH: path}
      context.log(`Prepended ${location} to PATH`)
    }

    return outcome
  }
}

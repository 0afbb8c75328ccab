import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {UsageError} from './errors.js'

export type GlobalOptions = {
  workdir: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

const pipelineFilenames = ['azure-pipelines.yml', 'pipeline.yml', 'pipeline.yaml', 'pipeline.json']

export async function resolvePipelineFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new UsageError(`Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of pipelineFilenames) {
    const candidate = join(target, filename)
    try {
      await access(candidate)
      return candidate
    } catch {
      // Try the next candidate
    }
  }

  throw new UsageError(
    `No pipeline file found in ${target}. Expected one of: ${pipelineFilenames.join(', ')}`
  )
}

/** Commander accumulator for repeatable options. */
export function collect(value: string, previous: string[]): string[] {
  return [...previous, value]
}

/** Commander accumulator for `--matrix-filter name=value`. */
export function collectMatrixFilter(value: string, previous: Array<[string, string]>): Array<[string, string]> {
  const index = value.indexOf('=')
  if (index <= 0) {
    throw new UsageError(`Invalid matrix filter '${value}': expected <variable>=<value>`)
  }

  return [...previous, [value.slice(0, index), value.slice(index + 1)]]
}

export function parsePositiveInt(value: string): number {
  const number = Number(value)
  if (!Number.isInteger(number) || number < 1) {
    throw new UsageError(`Expected a positive integer, got '${value}'`)
  }

  return number
}

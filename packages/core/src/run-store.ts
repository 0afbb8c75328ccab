import {randomUUID} from 'node:crypto'
import {mkdir, readFile, readdir, rename, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {StoreError} from './errors.js'
import type {PipelineRunResult} from './types.js'
import {isNotFound} from './utils.js'

const resultFileName = 'result.json'

/**
 * On-disk history of pipeline runs.
 *
 * Layout under the store root:
 * ```
 * runs/<runId>/result.json
 * runs/<runId>/jobs/<instanceId>.log
 * runs/<runId>/test-results/<instanceId>/...
 * ```
 */
export class RunStore {
  static generateRunId(): string {
    return `${Date.now()}-${randomUUID().slice(0, 8)}`
  }

  constructor(readonly root: string) {}

  runPath(runId: string): string {
    assertId(runId, 'run')
    return join(this.root, 'runs', runId)
  }

  jobLogDir(runId: string): string {
    return join(this.runPath(runId), 'jobs')
  }

  jobLogPath(runId: string, jobId: string): string {
    assertId(jobId, 'job')
    return join(this.jobLogDir(runId), `${jobId}.log`)
  }

  testResultsDir(runId: string, jobId: string): string {
    assertId(jobId, 'job')
    return join(this.runPath(runId), 'test-results', jobId)
  }

  /** Creates the run directory and returns the run id. */
  async create(runId = RunStore.generateRunId()): Promise<string> {
    await mkdir(this.jobLogDir(runId), {recursive: true})
    return runId
  }

  async saveResult(result: PipelineRunResult): Promise<void> {
    const runPath = this.runPath(result.runId)
    await mkdir(runPath, {recursive: true})
    const tmpPath = join(runPath, `${resultFileName}.${randomUUID()}.tmp`)
    await writeFile(tmpPath, JSON.stringify(result, null, 2), 'utf8')
    await rename(tmpPath, join(runPath, resultFileName))
  }

  async loadResult(runId: string): Promise<PipelineRunResult> {
    let content: string
    try {
      content = await readFile(join(this.runPath(runId), resultFileName), 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        throw new StoreError('RUN_NOT_FOUND', `Run not found: ${runId}`, {cause: error})
      }

      throw error
    }

    return JSON.parse(content) as PipelineRunResult
  }

  /** Completed runs, most recent first. Runs still in progress have no result yet and are left out. */
  async list(): Promise<PipelineRunResult[]> {
    let runIds: string[]
    try {
      const entries = await readdir(join(this.root, 'runs'), {withFileTypes: true})
      runIds = entries.filter(entry => entry.isDirectory()).map(entry => entry.name)
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }

      throw error
    }

    const results: PipelineRunResult[] = []
    for (const runId of runIds) {
      try {
        results.push(await this.loadResult(runId))
      } catch (error) {
        if (!(error instanceof StoreError)) {
          throw error
        }
      }
    }

    return results.sort((a, b) => b.startedAt.localeCompare(a.startedAt))
  }

  async readJobLog(runId: string, jobId: string): Promise<string> {
    try {
      return await readFile(this.jobLogPath(runId, jobId), 'utf8')
    } catch (error) {
      if (isNotFound(error)) {
        throw new StoreError('LOG_NOT_FOUND', `No log for job ${jobId} in run ${runId}`, {cause: error})
      }

      throw error
    }
  }
}

function assertId(id: string, kind: string): void {
  if (id === '' || id.includes('/') || id.includes('\\') || id.includes('..')) {
    throw new StoreError('INVALID_ID', `Invalid ${kind} id: '${id}'`)
  }
}

import {copyFile, mkdir, readFile, writeFile} from 'node:fs/promises'
import {basename, join} from 'node:path'
import type {RunStore} from './run-store.js'
import type {TestResultsFormat} from './types.js'
import {isNotFound} from './utils.js'
import {WorkerPool} from './worker-pool.js'

/** A test-result file produced by a step, tagged with its format. */
export type TestResultArtifact = {
  runId: string;
  jobId: string;
  stepId: string;
  format: TestResultsFormat;
  filePath: string;
  title?: string;
}

/** Entry of a job's `index.json` in the run directory. */
export type PublishedResult = {
  stepId: string;
  format: TestResultsFormat;
  title?: string;
  source: string;
  file: string;
  publishedAt: string;
}

export type ResultPublisher = {
  publish(artifact: TestResultArtifact): Promise<void>;
}

/** Keeps artifacts in memory; used by tests and embedders that consume results directly. */
export class MemoryResultPublisher implements ResultPublisher {
  readonly artifacts: TestResultArtifact[] = []

  async publish(artifact: TestResultArtifact): Promise<void> {
    this.artifacts.push({...artifact})
  }
}

/**
 * Copies result files into `<run>/test-results/<job>/` and records them in
 * an `index.json` next to the copies. Writes are serialized so that
 * concurrent jobs never interleave index updates.
 */
export class DirectoryResultPublisher implements ResultPublisher {
  private readonly lock = new WorkerPool(1)

  constructor(private readonly store: RunStore) {}

  async publish(artifact: TestResultArtifact): Promise<void> {
    await this.lock.use(async () => this.write(artifact))
  }

  async list(runId: string, jobId: string): Promise<PublishedResult[]> {
    return this.readIndex(join(this.store.testResultsDir(runId, jobId), 'index.json'))
  }

  private async write(artifact: TestResultArtifact): Promise<void> {
    const dir = this.store.testResultsDir(artifact.runId, artifact.jobId)
    await mkdir(dir, {recursive: true})

    const indexPath = join(dir, 'index.json')
    const index = await this.readIndex(indexPath)
    const file = `${index.length + 1}-${basename(artifact.filePath)}`
    await copyFile(artifact.filePath, join(dir, file))

    const entry: PublishedResult = {
      stepId: artifact.stepId,
      format: artifact.format,
      source: artifact.filePath,
      file,
      publishedAt: new Date().toISOString()
    }
    if (artifact.title !== undefined) {
      entry.title = artifact.title
    }

    index.push(entry)
    await writeFile(indexPath, JSON.stringify(index, null, 2), 'utf8')
  }

  private async readIndex(indexPath: string): Promise<PublishedResult[]> {
    try {
      return JSON.parse(await readFile(indexPath, 'utf8')) as PublishedResult[]
    } catch (error) {
      if (isNotFound(error)) {
        return []
      }

      throw error
    }
  }
}

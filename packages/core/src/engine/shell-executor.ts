import {execa} from 'execa'
import {ScriptExecutor, type OnLogLine, type RunScriptRequest, type RunScriptResult} from './executor.js'

/**
 * Runs scripts through a POSIX shell on the host.
 */
export class ShellExecutor extends ScriptExecutor {
  constructor(private readonly shell = 'bash') {
    super()
  }

  async run(request: RunScriptRequest, onLogLine: OnLogLine): Promise<RunScriptResult> {
    const startedAt = new Date()

    const proc = execa(this.shell, ['-c', request.script], {
      cwd: request.cwd,
      env: request.env,
      extendEnv: false,
      reject: false,
      stdin: 'ignore',
      timeout: request.timeoutMs,
      cancelSignal: request.signal
    })

    let streamError: string | undefined
    try {
      await Promise.all([
        (async () => {
          for await (const line of proc.iterable({from: 'stdout'})) {
            onLogLine({stream: 'stdout', line: String(line)})
          }
        })(),
        (async () => {
          for await (const line of proc.iterable({from: 'stderr'})) {
            onLogLine({stream: 'stderr', line: String(line)})
          }
        })()
      ])
    } catch (error) {
      streamError = error instanceof Error ? error.message : String(error)
    }

    const result = await proc
    const finishedAt = new Date()

    if (result.timedOut || result.isCanceled) {
      return {exitCode: result.exitCode, startedAt, finishedAt, timedOut: result.timedOut, cancelled: result.isCanceled}
    }

    if (result.exitCode === undefined) {
      return {
        exitCode: undefined,
        startedAt,
        finishedAt,
        timedOut: false,
        cancelled: false,
        error: streamError ?? `${this.shell} terminated${result.signal ? ` by ${result.signal}` : ''}`
      }
    }

    return {exitCode: result.exitCode, startedAt, finishedAt, timedOut: false, cancelled: false}
  }
}

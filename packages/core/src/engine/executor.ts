/**
 * Output line from a running script.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Line content, without the trailing newline */
  line: string;
}

/**
 * Callback for receiving real-time logs during script execution.
 */
export type OnLogLine = (log: LogLine) => void

export type RunScriptRequest = {
  /** Script body, passed as a single argument to the shell */
  script: string;
  /** Complete environment of the child process (nothing is inherited) */
  env: Record<string, string>;
  cwd: string;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export type RunScriptResult = {
  /** Undefined when the process was killed by a signal or never started */
  exitCode: number | undefined;
  startedAt: Date;
  finishedAt: Date;
  timedOut: boolean;
  cancelled: boolean;
  /** Set when the process could not be started or ended abnormally */
  error?: string;
}

/**
 * Abstract interface for running step scripts.
 *
 * Implementations:
 * - `ShellExecutor`: spawns `<shell> -c <script>` on the host
 *
 * The executor never throws for a failing script: exit codes, timeouts and
 * cancellation are reported through {@link RunScriptResult}.
 */
export abstract class ScriptExecutor {
  /**
   * Runs a script to completion.
   * @param request - Script body, environment and limits
   * @param onLogLine - Callback for real-time stdout/stderr lines
   */
  abstract run(request: RunScriptRequest, onLogLine: OnLogLine): Promise<RunScriptResult>
}

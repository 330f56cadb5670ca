/**
 * Playhost Kernel — Adapter Interfaces
 *
 * Side effects the pipeline needs are expressed here as interfaces and
 * injected. Concrete implementations are platform-specific and live in
 * @playhost/runtime-host; the kernel never spawns a process itself.
 */

// ---------------------------------------------------------------------------
// Exec
// ---------------------------------------------------------------------------

export interface ExecOptions {
  /** Working directory of the child process. */
  readonly cwd: string;
  readonly env?: Record<string, string> | undefined;
  /**
   * Upper bound on the wait. When exceeded the child is killed and the
   * result reports `timedOut: true`.
   */
  readonly timeoutMs?: number | undefined;
}

export interface ExecResult {
  /** Exit status; `null` when the process was terminated by a signal. */
  readonly exitCode: number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;
  readonly durationMs: number;
}

/**
 * Runs an external command to completion.
 *
 * Implementations resolve with the exit status, including non-zero ones.
 * They reject only when the process could not be started at all.
 */
export interface ExecAdapter {
  run(command: string, args: ReadonlyArray<string>, options: ExecOptions): Promise<ExecResult>;
}

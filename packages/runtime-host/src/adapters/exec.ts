/**
 * Playhost Runtime Host — Subprocess Execution Adapter
 *
 * Implements the ExecAdapter interface from @playhost/kernel.
 * Uses node:child_process.spawn for all subprocess execution.
 *
 * BOUNDED WAIT:
 * When `timeoutMs` is given, a timer kills the child's whole process group
 * (SIGTERM, then SIGKILL after a grace period) and the result reports
 * `timedOut: true`. `npm run build` runs the compiler as a grandchild, so
 * the child leads its own group (POSIX) and the signal reaches every
 * descendant. After a timeout the promise settles on the child's exit,
 * SIGKILLs what is left of the group and drops the pipes, which a surviving
 * descendant could otherwise hold open.
 *
 * Non-zero exit codes resolve normally. The promise rejects only when the
 * process cannot be started (e.g. ENOENT for an unknown command).
 */

import { spawn, type ChildProcess } from 'node:child_process';
import type { ExecAdapter, ExecOptions, ExecResult } from '@playhost/kernel';
import { isNodeError } from '../state/state-io.js';

/** Time between SIGTERM and SIGKILL for a child that ignores the first. */
const KILL_GRACE_MS = 2_000;

/** Output kept per stream; builds can be chatty. */
const MAX_CAPTURE_BYTES = 256 * 1024;

// ---------------------------------------------------------------------------
// NodeExecAdapter
// ---------------------------------------------------------------------------

export class NodeExecAdapter implements ExecAdapter {
  async run(
    command: string,
    args: ReadonlyArray<string>,
    options: ExecOptions,
  ): Promise<ExecResult> {
    const startedAt = Date.now();

    return new Promise((resolve, reject) => {
      const child = spawn(command, [...args], {
        cwd: options.cwd,
        // Use caller env if provided; otherwise inherit parent process env.
        env: options.env ?? process.env,
        stdio: ['ignore', 'pipe', 'pipe'],
        // Windows resolves npm/npx through .cmd shims only via a shell.
        shell: process.platform === 'win32',
        detached: process.platform !== 'win32',
      });

      const stdout = new CappedBuffer(MAX_CAPTURE_BYTES);
      const stderr = new CappedBuffer(MAX_CAPTURE_BYTES);
      let timedOut = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      const timeoutTimer =
        options.timeoutMs !== undefined
          ? setTimeout(() => {
              timedOut = true;
              killTree(child, 'SIGTERM');
              killTimer = setTimeout(() => { killTree(child, 'SIGKILL'); }, KILL_GRACE_MS);
            }, options.timeoutMs)
          : undefined;

      const clearTimers = (): void => {
        if (timeoutTimer !== undefined) clearTimeout(timeoutTimer);
        if (killTimer !== undefined) clearTimeout(killTimer);
      };

      const settle = (exitCode: number | null): void => {
        if (settled) return;
        settled = true;
        clearTimers();
        resolve({
          exitCode,
          stdout: stdout.toString(),
          stderr: stderr.toString(),
          timedOut,
          durationMs: Date.now() - startedAt,
        });
      };

      child.stdout.on('data', (chunk: Buffer) => { stdout.push(chunk); });
      child.stderr.on('data', (chunk: Buffer) => { stderr.push(chunk); });

      child.on('exit', (exitCode: number | null) => {
        if (!timedOut) return;
        // Descendants may outlive the leader; do not wait on their pipes.
        killTree(child, 'SIGKILL');
        child.stdout.destroy();
        child.stderr.destroy();
        settle(exitCode);
      });

      child.on('close', (exitCode: number | null) => { settle(exitCode); });

      child.on('error', (err: Error) => {
        if (settled) return;
        settled = true;
        clearTimers();
        reject(err);
      });
    });
  }
}

/** Signals the child's process group, or the child alone where there is none. */
function killTree(child: ChildProcess, signal: NodeJS.Signals): void {
  if (child.pid !== undefined && process.platform !== 'win32') {
    try {
      process.kill(-child.pid, signal);
      return;
    } catch (err: unknown) {
      // ESRCH: the group is already gone.
      if (isNodeError(err, 'ESRCH')) return;
    }
  }
  child.kill(signal);
}

// ---------------------------------------------------------------------------
// Output capture
// ---------------------------------------------------------------------------

/** Keeps the last `limit` bytes written to it. */
class CappedBuffer {
  private chunks: Buffer[] = [];
  private size = 0;

  constructor(private readonly limit: number) {}

  push(chunk: Buffer): void {
    this.chunks.push(chunk);
    this.size += chunk.length;
    while (this.size > this.limit && this.chunks.length > 1) {
      const dropped = this.chunks.shift();
      this.size -= dropped?.length ?? 0;
    }
  }

  toString(): string {
    const joined = Buffer.concat(this.chunks);
    const tail = joined.length > this.limit ? joined.subarray(joined.length - this.limit) : joined;
    return tail.toString('utf-8');
  }
}

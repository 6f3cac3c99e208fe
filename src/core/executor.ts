import { spawn } from 'node:child_process';
import type { ChildProcess } from 'node:child_process';

import { ExecutorError } from '../utils/errors.js';
import { logger } from '../ui/logger.js';

/** The per-cell handle a command runs against. */
export interface ExecutionEnvironment {
  readonly cwd: string;
  readonly env: Readonly<Record<string, string>>;
}

export interface ExecOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
}

export interface ExecResult {
  /** null when the process was terminated by a signal. */
  exitCode: number | null;
  /** stdout and stderr, interleaved in arrival order. */
  output: string;
  timedOut: boolean;
  aborted: boolean;
  /** The shell ran but the command itself was missing or not executable. */
  notRunnable?: boolean;
  durationMs: number;
}

export interface CommandExecutor {
  /**
   * Runs one command. Resolves for any exit status; rejects with
   * ExecutorError only when the command could not be started.
   */
  execute(command: string, environment: ExecutionEnvironment, options?: ExecOptions): Promise<ExecResult>;
}

export interface ShellExecutorOptions {
  /** Shell used to interpret commands. `true` picks the platform default. */
  shell?: string | boolean;
  /** Delay between SIGTERM and SIGKILL when stopping a command. */
  killGraceMs?: number;
}

const DEFAULT_KILL_GRACE_MS = 5_000;

// POSIX shells exit 127 for a command not found and 126 for one that cannot be executed.
const NOT_RUNNABLE_EXIT_CODES: ReadonlySet<number> = new Set([126, 127]);

export class ShellExecutor implements CommandExecutor {
  private readonly options: ShellExecutorOptions;

  constructor(options: ShellExecutorOptions = {}) {
    this.options = options;
  }

  execute(command: string, environment: ExecutionEnvironment, options: ExecOptions = {}): Promise<ExecResult> {
    const started = Date.now();
    const graceMs = this.options.killGraceMs ?? DEFAULT_KILL_GRACE_MS;
    const shell = this.options.shell ?? true;

    return new Promise((resolve, reject) => {
      let child: ChildProcess;
      try {
        child = spawn(command, {
          cwd: environment.cwd,
          env: { ...environment.env },
          shell,
          stdio: ['ignore', 'pipe', 'pipe'],
          // Own process group so a timeout can stop everything the shell started.
          detached: process.platform !== 'win32',
        });
      } catch (error) {
        reject(new ExecutorError(command, error instanceof Error ? error.message : String(error)));
        return;
      }

      let output = '';
      let timedOut = false;
      let aborted = false;
      let settled = false;
      let killTimer: NodeJS.Timeout | undefined;

      // False when the process had already exited and nothing was signalled.
      const stop = (): boolean => {
        if (!terminate(child, 'SIGTERM')) return false;
        killTimer = setTimeout(() => terminate(child, 'SIGKILL'), graceMs);
        killTimer.unref();
        return true;
      };

      const timeoutTimer =
        options.timeoutMs != null && options.timeoutMs > 0
          ? setTimeout(() => {
              timedOut = stop();
              if (timedOut) logger.debug(`Timed out after ${options.timeoutMs}ms: ${command}`);
            }, options.timeoutMs)
          : undefined;

      const onAbort = () => {
        aborted = stop();
      };
      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = () => {
        settled = true;
        if (timeoutTimer) clearTimeout(timeoutTimer);
        if (killTimer) clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      child.stdout?.on('data', (chunk: Buffer) => {
        output += chunk.toString();
      });
      child.stderr?.on('data', (chunk: Buffer) => {
        output += chunk.toString();
      });

      child.on('close', (code) => {
        if (settled) return;
        cleanup();
        resolve({
          exitCode: code,
          output,
          timedOut,
          aborted,
          notRunnable: shell !== false && code !== null && NOT_RUNNABLE_EXIT_CODES.has(code),
          durationMs: Date.now() - started,
        });
      });

      child.on('error', (err) => {
        if (settled) return;
        cleanup();
        reject(new ExecutorError(command, err.message));
      });
    });
  }
}

function terminate(child: ChildProcess, signal: NodeJS.Signals): boolean {
  if (child.exitCode !== null || child.signalCode !== null) return false;
  try {
    if (child.pid != null && process.platform !== 'win32') {
      return process.kill(-child.pid, signal);
    }
    return child.kill(signal);
  } catch {
    // Group already gone; fall back to the direct child.
    return child.kill(signal);
  }
}

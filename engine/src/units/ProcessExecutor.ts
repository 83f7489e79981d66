/**
 * Process Executor
 *
 * Spawns a command (no shell) and collects its output. Aborting the signal
 * sends SIGTERM, then SIGKILL after a grace period.
 */

import { spawn } from 'node:child_process';

export interface ProcessExecutionOptions {
  command: string;
  args: readonly string[];
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  /** Delay between SIGTERM and SIGKILL on abort (default 5s) */
  killGraceMs?: number;
  /** Output kept per stream, in characters (default 1 MiB) */
  maxOutputChars?: number;
}

export interface ProcessExecutionResult {
  stdout: string;
  stderr: string;
  exitCode: number;
  durationMs: number;
  /** Signal that terminated the process (if any) */
  signal?: string;
}

export class ProcessExecutor {
  static execute(options: ProcessExecutionOptions): Promise<ProcessExecutionResult> {
    const startTime = Date.now();
    const maxOutput = options.maxOutputChars ?? 1024 * 1024;

    return new Promise((resolve, reject) => {
      const proc = spawn(options.command, [...options.args], {
        cwd: options.cwd,
        env: { ...process.env, ...options.env },
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      let stdout = '';
      let stderr = '';
      let killTimer: NodeJS.Timeout | undefined;

      // Stream decoding keeps multibyte characters split across chunks intact
      proc.stdout.setEncoding('utf8');
      proc.stderr.setEncoding('utf8');

      proc.stdout.on('data', (data: string) => {
        if (stdout.length < maxOutput) stdout += data;
      });

      proc.stderr.on('data', (data: string) => {
        if (stderr.length < maxOutput) stderr += data;
      });

      const onAbort = () => {
        proc.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (proc.exitCode === null && proc.signalCode === null) {
            proc.kill('SIGKILL');
          }
        }, options.killGraceMs ?? 5000);
        killTimer.unref();
      };

      if (options.signal?.aborted) {
        onAbort();
      } else {
        options.signal?.addEventListener('abort', onAbort, { once: true });
      }

      const cleanup = () => {
        clearTimeout(killTimer);
        options.signal?.removeEventListener('abort', onAbort);
      };

      proc.on('close', (exitCode, signal) => {
        cleanup();
        resolve({
          stdout: stdout.slice(0, maxOutput),
          stderr: stderr.slice(0, maxOutput),
          exitCode: exitCode ?? -1,
          durationMs: Date.now() - startTime,
          signal: signal ?? undefined,
        });
      });

      proc.on('error', (error) => {
        cleanup();
        reject(new Error(`Failed to start "${options.command}": ${error.message}`));
      });
    });
  }
}

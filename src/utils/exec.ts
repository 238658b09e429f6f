/**
 * Child process execution helper
 *
 * Resolves with the exit code for any process that ran to completion,
 * including non-zero exits. Rejects only when the process could not be
 * started (e.g. ENOENT) or when it exceeded its timeout, in which case the
 * child is terminated before the promise settles.
 */

import { spawn } from 'node:child_process';
import { ProcessTimeoutError } from './errors.js';
import { logger } from './logger.js';

export interface ExecOptions {
  env?: Record<string, string | undefined>;
  /** Wall-clock limit in milliseconds; 0 or undefined disables it */
  timeout?: number;
  shell?: boolean;
}

export interface ExecResult {
  code: number;
  stdout: string;
  stderr: string;
}

/**
 * Grace period between SIGTERM and SIGKILL for a timed-out child
 */
export const KILL_GRACE_MS = 2000;

export async function exec(
  command: string,
  args: string[] = [],
  options: ExecOptions = {}
): Promise<ExecResult> {
  const { env, timeout, shell = false } = options;
  const commandLine = [command, ...args].join(' ');

  logger.debug(`exec: ${commandLine}`, { timeout: timeout ?? null });

  return new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(command, args, {
      env: env ? { ...process.env, ...env } : process.env,
      shell,
      windowsHide: true,
      stdio: ['ignore', 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;
    let timedOut = false;
    let timer: NodeJS.Timeout | undefined;
    let killTimer: NodeJS.Timeout | undefined;

    const finish = (fn: () => void): void => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      fn();
    };

    child.stdout.setEncoding('utf-8');
    child.stderr.setEncoding('utf-8');
    child.stdout.on('data', (chunk: string) => {
      stdout += chunk;
    });
    child.stderr.on('data', (chunk: string) => {
      stderr += chunk;
    });

    if (timeout && timeout > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        logger.debug(`exec: timed out after ${timeout}ms, terminating`, { command: commandLine, pid: child.pid });
        child.kill('SIGTERM');
        killTimer = setTimeout(() => {
          if (child.exitCode === null && child.signalCode === null) {
            child.kill('SIGKILL');
          }
        }, KILL_GRACE_MS);
        killTimer.unref();
        finish(() => reject(new ProcessTimeoutError(commandLine, timeout)));
      }, timeout);
    }

    child.on('error', (error) => {
      finish(() => reject(error));
    });

    child.on('close', (code, signal) => {
      if (killTimer) clearTimeout(killTimer);
      if (timedOut) return;
      finish(() =>
        resolve({
          code: code ?? (signal ? 128 : 1),
          stdout: stdout.trim(),
          stderr: stderr.trim(),
        })
      );
    });
  });
}

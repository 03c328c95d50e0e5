import { spawn, StdioOptions } from 'child_process';
import { closeSync, openSync } from 'fs';
import os from 'os';
import type { Logger } from 'winston';
import { ConfigurationError } from '../errors/ErrorHandling.js';
import { ProcessRunner, RunOptions, RunOutcome } from './types.js';

const SIGNAL_NUMBERS = new Map<string, number>(Object.entries(os.constants.signals));

/**
 * Exit status a shell would report for a process killed by `signal`
 */
export function signalExitCode(signal: NodeJS.Signals | null): number {
  if (!signal) return 1;
  return 128 + (SIGNAL_NUMBERS.get(signal) ?? 0);
}

export function isSuccess(outcome: RunOutcome): boolean {
  return outcome.kind === 'completed' && outcome.exitCode === 0;
}

export function describeOutcome(outcome: RunOutcome): string {
  switch (outcome.kind) {
    case 'completed':
      return outcome.signal
        ? `killed by ${outcome.signal} (exit code ${outcome.exitCode})`
        : `exit code ${outcome.exitCode}`;
    case 'timedOut':
      return `timed out after ${outcome.timeoutMs}ms`;
    case 'failedToStart':
      return `failed to start: ${outcome.error.message}`;
  }
}

/**
 * Runs one external command under a wall-clock timeout.
 *
 * On timeout the child gets a single SIGTERM and the runner then waits for it
 * to exit, with no second deadline and no SIGKILL.
 */
export class BoundedProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  async run(executable: string, args: string[], options: RunOptions): Promise<RunOutcome> {
    const { timeoutMs, stderrPath } = options;
    if (!Number.isFinite(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`Timeout must be a positive duration (got ${timeoutMs}ms)`);
    }
    const commandLine = [executable, ...args].join(' ');

    // Logged before spawning so the harness log shows what was attempted
    this.logger.info(commandLine);

    const stderrFd = stderrPath !== undefined ? openSync(stderrPath, 'w') : undefined;
    const stdio: StdioOptions = ['ignore', 'inherit', stderrFd ?? 'inherit'];

    try {
      return await new Promise<RunOutcome>((resolve) => {
        let timedOut = false;
        let settled = false;
        let timeoutHandle: NodeJS.Timeout | null = null;

        const settle = (outcome: RunOutcome) => {
          if (settled) return;
          settled = true;
          if (timeoutHandle) {
            clearTimeout(timeoutHandle);
          }
          resolve(outcome);
        };

        const child = spawn(executable, args, {
          stdio,
          env: { ...process.env },
        });

        timeoutHandle = setTimeout(() => {
          timedOut = true;
          this.logger.error(`Timeout ${commandLine}`);
          child.kill('SIGTERM');
        }, timeoutMs);

        child.on('error', (error: Error) => {
          if (child.pid === undefined) {
            this.logger.verbose('Process failed to start', { error: error.message });
            settle({ kind: 'failedToStart', error });
            return;
          }
          // The process is running; its exit is still reported through 'close'
          this.logger.warn(`Error from ${executable}: ${error.message}`);
        });

        child.on('close', (code: number | null, signal: NodeJS.Signals | null) => {
          // A failed spawn is followed by a close carrying a negative errno
          if (settled) return;
          const exitCode = code ?? signalExitCode(signal);
          this.logger.verbose(`Exit code ${exitCode}`);
          if (timedOut) {
            settle({ kind: 'timedOut', timeoutMs, signal });
            return;
          }
          settle({ kind: 'completed', exitCode, signal: code === null ? signal : null });
        });
      });
    } finally {
      if (stderrFd !== undefined) {
        closeSync(stderrFd);
      }
    }
  }
}

/**
 * Result of one bounded run. Timeout and start failure are distinct variants
 * rather than a shared sentinel exit code.
 */
export type RunOutcome =
  | {
      kind: 'completed';
      exitCode: number;
      /** Set when the process died from a signal the runner did not send */
      signal: NodeJS.Signals | null;
    }
  | {
      kind: 'timedOut';
      timeoutMs: number;
      signal: NodeJS.Signals | null;
    }
  | {
      kind: 'failedToStart';
      error: Error;
    };

export interface RunOptions {
  /** Wall-clock budget in milliseconds; must be positive */
  timeoutMs: number;
  /** When set, the child's stderr is written to this file instead of ours */
  stderrPath?: string;
}

/**
 * Seam between the driver and process supervision
 */
export interface ProcessRunner {
  run(executable: string, args: string[], options: RunOptions): Promise<RunOutcome>;
}

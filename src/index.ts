/**
 * p4test-runner
 * Compiles one test program under a timeout and reports pass/fail to the
 * calling harness through the exit status.
 *
 * Settings (p4test.config.json, overridden by env):
 * - P4TEST_COMPILER: compiler to invoke (default ./p4c-of)
 * - P4TEST_TIMEOUT_MS: wall-clock budget per run (default ten minutes)
 * - P4TEST_SCRATCH: stage outputs in a temporary directory (adds -b)
 * - P4TEST_SCRATCH_DIR: where temporary directories are created
 */

import type { Logger } from 'winston';
import { parseCommandLine, usageText } from './cli/args.js';
import { loadRunnerConfig, RunnerConfig } from './config/RunnerConfig.js';
import { FAILURE, TestDriver } from './driver/TestDriver.js';
import { isUsageRelated, toRunnerError } from './errors/ErrorHandling.js';
import { BoundedProcessRunner } from './runner/BoundedProcessRunner.js';
import type { ProcessRunner } from './runner/types.js';
import { createLogger } from './utils/Logger.js';

export { VERSION } from './version.js';

export const PROGRAM_NAME = 'p4test-run';

export interface MainOptions {
  env?: Record<string, string | undefined>;
  cwd?: string;
  logger?: Logger;
  runner?: ProcessRunner;
  /** Receives the usage text; defaults to stdout */
  printUsage?: (text: string) => void;
}

/**
 * Runs one test and resolves to the process exit status (0 pass, 1 fail).
 * `argv` excludes the node binary and the script path.
 */
export async function main(argv: string[], options: MainOptions = {}): Promise<number> {
  const env = options.env ?? process.env;
  const logger = options.logger ?? createLogger({ env });
  const printUsage = options.printUsage ?? ((text: string) => console.log(text));

  let settings: RunnerConfig | undefined;
  try {
    settings = loadRunnerConfig(env, options.cwd);
    const configuration = parseCommandLine(argv, {
      scratch: settings.scratch,
      fileExtension: settings.fileExtension,
    });
    if (configuration.verbose) {
      logger.level = 'verbose';
    }

    const runner = options.runner ?? new BoundedProcessRunner(logger);
    const driver = new TestDriver(settings, runner, logger);
    return await driver.processFile(configuration);
  } catch (error) {
    const runnerError = toRunnerError(error);
    logger.error(runnerError.message, { code: runnerError.code });
    if (isUsageRelated(error)) {
      printUsage(usageText(PROGRAM_NAME, { scratch: settings?.scratch ?? false }));
    }
    return FAILURE;
  }
}

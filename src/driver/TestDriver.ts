import { promises as fs } from 'fs';
import path from 'path';
import type { Logger } from 'winston';
import type { Configuration } from '../cli/args.js';
import type { RunnerConfig } from '../config/RunnerConfig.js';
import { MissingInputError } from '../errors/ErrorHandling.js';
import { describeOutcome, isSuccess } from '../runner/BoundedProcessRunner.js';
import { ScratchDirectory } from '../runner/ScratchDirectory.js';
import { ProcessRunner, RunOutcome } from '../runner/types.js';

export const SUCCESS = 0;
export const FAILURE = 1;

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

async function isFile(candidate: string): Promise<boolean> {
  try {
    return (await fs.stat(candidate)).isFile();
  } catch {
    return false;
  }
}

/**
 * Compiles one test program and turns the outcome into the harness's exit
 * status. In scratch mode the compiler's outputs are staged in a fresh
 * directory that is removed afterwards unless the user asked to keep it.
 */
export class TestDriver {
  constructor(
    private readonly settings: RunnerConfig,
    private readonly runner: ProcessRunner,
    private readonly logger: Logger,
  ) {}

  async processFile(configuration: Configuration): Promise<number> {
    if (!(await isDirectory(configuration.rootDir))) {
      throw new MissingInputError(`${configuration.rootDir} is not a folder`);
    }
    if (!(await isFile(configuration.inputFile))) {
      throw new MissingInputError(`No such file ${configuration.inputFile}`);
    }

    if (configuration.testName !== undefined) {
      this.logger.verbose(`Running test ${configuration.testName}`);
    }

    const outcome = this.settings.scratch
      ? await this.runInScratch(configuration)
      : await this.runner.run(this.settings.compiler, this.compilerArgs(configuration), {
          timeoutMs: this.settings.timeoutMs,
        });

    return this.report(outcome);
  }

  private compilerArgs(configuration: Configuration, scratch?: ScratchDirectory): string[] {
    const args: string[] = [];
    if (scratch) {
      args.push('-o', scratch.outputFile, '--p4runtime-files', scratch.infoFile);
    }
    args.push(...configuration.compilerOptions, ...configuration.forwardedArgs);
    return args;
  }

  private async runInScratch(configuration: Configuration): Promise<RunOutcome> {
    const baseName = path.basename(configuration.inputFile, this.settings.fileExtension);
    const scratch = await ScratchDirectory.create(this.settings.scratchParent, baseName);
    this.logger.verbose(`Writing temporary files into ${scratch.dir}`);

    try {
      const outcome = await this.runner.run(
        this.settings.compiler,
        this.compilerArgs(configuration, scratch),
        { timeoutMs: this.settings.timeoutMs, stderrPath: scratch.stderrFile },
      );

      if (!isSuccess(outcome)) {
        const captured = (await scratch.readCapturedStderr()).trimEnd();
        if (captured) {
          this.logger.error(captured);
        }
      }
      return outcome;
    } finally {
      if (configuration.keepScratch) {
        this.logger.info(`Keeping temporary files in ${scratch.dir}`);
      } else {
        await scratch.remove();
      }
    }
  }

  private report(outcome: RunOutcome): number {
    if (isSuccess(outcome)) {
      return SUCCESS;
    }
    this.logger.error('Error compiling', { outcome: describeOutcome(outcome) });
    return FAILURE;
  }
}

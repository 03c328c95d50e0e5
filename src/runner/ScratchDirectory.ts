import { promises as fs } from 'fs';
import path from 'path';

export const SCRATCH_PREFIX = 'p4test-';

/**
 * A uniquely named directory owned by a single run, holding the compiler's
 * captured stderr, its P4Runtime info file and its primary output.
 */
export class ScratchDirectory {
  readonly stderrFile: string;
  readonly infoFile: string;
  readonly outputFile: string;
  private removed = false;

  private constructor(
    readonly dir: string,
    baseName: string,
  ) {
    this.stderrFile = path.join(dir, `${baseName}-stderr`);
    this.infoFile = path.join(dir, `${baseName}.p4info.txt`);
    this.outputFile = path.join(dir, `${baseName}.json`);
  }

  static async create(parent: string, baseName: string): Promise<ScratchDirectory> {
    await fs.mkdir(parent, { recursive: true });
    const dir = await fs.mkdtemp(path.join(parent, SCRATCH_PREFIX));
    return new ScratchDirectory(dir, baseName);
  }

  async remove(): Promise<void> {
    if (this.removed) return;
    await fs.rm(this.dir, { recursive: true, force: true });
    this.removed = true;
  }

  /** Captured stderr, or an empty string when nothing was written */
  async readCapturedStderr(): Promise<string> {
    try {
      return await fs.readFile(this.stderrFile, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return '';
      }
      throw error;
    }
  }
}

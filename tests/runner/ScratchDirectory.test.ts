import fs from 'fs';
import os from 'os';
import path from 'path';
import { SCRATCH_PREFIX, ScratchDirectory } from '../../src/runner/ScratchDirectory.js';

describe('ScratchDirectory', () => {
  let parent: string;

  beforeEach(() => {
    parent = fs.mkdtempSync(path.join(os.tmpdir(), 'scratch-test-'));
  });

  afterEach(() => {
    fs.rmSync(parent, { recursive: true, force: true });
  });

  it('creates a uniquely named directory with derived file paths', async () => {
    const scratch = await ScratchDirectory.create(parent, 'wire');

    expect(fs.statSync(scratch.dir).isDirectory()).toBe(true);
    expect(path.dirname(scratch.dir)).toBe(parent);
    expect(path.basename(scratch.dir).startsWith(SCRATCH_PREFIX)).toBe(true);
    expect(scratch.stderrFile).toBe(path.join(scratch.dir, 'wire-stderr'));
    expect(scratch.infoFile).toBe(path.join(scratch.dir, 'wire.p4info.txt'));
    expect(scratch.outputFile).toBe(path.join(scratch.dir, 'wire.json'));
  });

  it('never reuses a directory', async () => {
    const first = await ScratchDirectory.create(parent, 'wire');
    const second = await ScratchDirectory.create(parent, 'wire');

    expect(first.dir).not.toBe(second.dir);
  });

  it('creates a missing parent directory', async () => {
    const nested = path.join(parent, 'deeper', 'still');
    const scratch = await ScratchDirectory.create(nested, 'wire');

    expect(path.dirname(scratch.dir)).toBe(nested);
  });

  it('removes the directory and its contents', async () => {
    const scratch = await ScratchDirectory.create(parent, 'wire');
    fs.writeFileSync(scratch.outputFile, '{}');

    await scratch.remove();

    expect(fs.existsSync(scratch.dir)).toBe(false);
  });

  it('tolerates a second remove', async () => {
    const scratch = await ScratchDirectory.create(parent, 'wire');

    await scratch.remove();
    await expect(scratch.remove()).resolves.toBeUndefined();
  });

  it('reads captured stderr', async () => {
    const scratch = await ScratchDirectory.create(parent, 'wire');

    await expect(scratch.readCapturedStderr()).resolves.toBe('');

    fs.writeFileSync(scratch.stderrFile, 'error: unknown header\n');
    await expect(scratch.readCapturedStderr()).resolves.toBe('error: unknown header\n');
  });
});

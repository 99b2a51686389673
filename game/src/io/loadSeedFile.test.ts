import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ERR } from '@life/shared';
import { loadSeedFile } from './loadSeedFile';

describe('loadSeedFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'life-seed-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('parses the file contents', async () => {
    const path = join(dir, 'blinker.txt');
    await writeFile(path, '(2, 1)\n(2, 2)\nnot a cell\n(2, 3)\n');

    expect(await loadSeedFile(path)).toEqual({
      seeds: [
        { r: 2, c: 1 },
        { r: 2, c: 2 },
        { r: 2, c: 3 }
      ],
      skipped: [3]
    });
  });

  it('loads an empty file', async () => {
    const path = join(dir, 'empty.txt');
    await writeFile(path, '');
    expect(await loadSeedFile(path)).toEqual({ seeds: [], skipped: [] });
  });

  it('fails on a missing file', async () => {
    await expect(loadSeedFile(join(dir, 'missing.txt'))).rejects.toMatchObject({
      code: ERR.SEED_FILE_UNREADABLE
    });
  });
});

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, dirname, join } from 'node:path';
import { withTempFile } from './tempFile.js';

describe('withTempFile', () => {
  let parentDir: string;

  beforeEach(async () => {
    parentDir = await mkdtemp(join(tmpdir(), 'temp-file-test-'));
  });

  afterEach(async () => {
    await rm(parentDir, { recursive: true, force: true });
  });

  it('writes the data under the given name and removes it afterwards', async () => {
    const seen = await withTempFile(
      'hello',
      async (path) => ({ name: basename(path), text: await readFile(path, 'utf-8'), dir: dirname(path) }),
      { parentDir, fileName: 'scan.txt' }
    );
    expect(seen.name).toBe('scan.txt');
    expect(seen.text).toBe('hello');
    expect(dirname(seen.dir)).toBe(parentDir);
    expect(await readdir(parentDir)).toEqual([]);
  });

  it('removes the directory when the callback throws', async () => {
    await expect(
      withTempFile(new Uint8Array([104, 105]), async () => {
        throw new Error('boom');
      }, { parentDir })
    ).rejects.toThrow('boom');
    expect(await readdir(parentDir)).toEqual([]);
  });

  it('keeps the file inside its temp directory', async () => {
    const names = await Promise.all(
      ['../../escape.txt', '..', ''].map((fileName) =>
        withTempFile('x', async (path) => basename(path), { parentDir, fileName })
      )
    );
    expect(names).toEqual(['escape.txt', 'upload.txt', 'upload.txt']);
  });
});

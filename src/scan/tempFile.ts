import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { basename, join } from 'node:path';

export interface TempFileOptions {
  /** Parent directory for the temp directory (default: OS temp dir) */
  parentDir?: string;
  /** File name inside the temp directory */
  fileName?: string;
}

function entryName(fileName: string | undefined): string {
  const name = basename(fileName ?? '');
  return name && name !== '.' && name !== '..' ? name : 'upload.txt';
}

/**
 * Write `data` to a fresh temp directory, run `use` with the file path, then
 * remove the directory whether `use` resolved or threw.
 */
export async function withTempFile<T>(
  data: Uint8Array | string,
  use: (path: string) => Promise<T>,
  options: TempFileOptions = {}
): Promise<T> {
  const dir = await mkdtemp(join(options.parentDir ?? tmpdir(), 'scan-upload-'));
  try {
    // always a single path segment inside `dir`
    const path = join(dir, entryName(options.fileName));
    await writeFile(path, data);
    return await use(path);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

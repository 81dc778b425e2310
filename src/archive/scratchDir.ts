import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export type ScratchDirOptions = {
  /** Directory the scratch directory is created in (default: the OS temp dir). */
  parentDir?: string;
  prefix?: string;
};

/**
 * Run `fn` with a fresh scratch directory that is removed recursively afterwards,
 * whether `fn` resolves or throws.
 */
export async function withScratchDir<T>(fn: (dir: string) => Promise<T>, opts: ScratchDirOptions = {}): Promise<T> {
  const parent = opts.parentDir ?? os.tmpdir();
  const dir = await fs.mkdtemp(path.join(parent, opts.prefix ?? 'yang-primary-keys-'));
  try {
    return await fn(dir);
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}

/**
 * Scoped scratch directories.
 */

import { mkdir, mkdtemp, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

export interface WorkspaceOptions {
  /** Parent directory; the OS temp dir when omitted. */
  rootDir?: string;
}

/**
 * Runs `fn` in a fresh, uniquely named directory that is removed afterwards,
 * whether `fn` succeeds or throws.
 */
export async function withWorkspace<T>(
  prefix: string,
  fn: (dir: string) => Promise<T>,
  options: WorkspaceOptions = {}
): Promise<T> {
  const parent = options.rootDir ?? tmpdir();
  await mkdir(parent, { recursive: true });
  const dir = await mkdtemp(path.join(parent, `${prefix}-`));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Empties `dir` except for the names in `keep`.
 */
export async function clearDirectory(dir: string, keep: readonly string[] = []): Promise<void> {
  for (const name of await readdir(dir)) {
    if (keep.includes(name)) continue;
    await rm(path.join(dir, name), { recursive: true, force: true });
  }
}

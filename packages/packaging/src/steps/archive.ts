/**
 * Archive Extraction
 *
 * Zip archives go through `unzip`, which keeps the executable bits Ghidra's
 * launch scripts need; gzip tarballs go through the tar package.
 */

import { readdir, rename, rmdir } from 'node:fs/promises';
import { join } from 'node:path';
import * as tar from 'tar';
import { ensureDir, isTarball } from '@ghidra-dmg/utils';
import type { StepContext } from './context.js';

/**
 * Extract a `.zip`, `.tar.gz` or `.tgz` archive into `destination`
 */
export async function extractArchive(
  archivePath: string,
  destination: string,
  ctx: StepContext
): Promise<void> {
  await ensureDir(destination);

  if (isTarball(archivePath)) {
    await tar.x({ file: archivePath, cwd: destination, preservePaths: false });
    return;
  }

  await ctx.runner.run('unzip', ['-q', '-o', archivePath, '-d', destination], { signal: ctx.signal });
}

/**
 * Top-level directories of an extraction, ignoring macOS resource forks
 */
export async function listRootDirectories(dir: string): Promise<string[]> {
  const entries = await readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isDirectory() && entry.name !== '__MACOSX')
    .map((entry) => entry.name)
    .sort();
}

/**
 * When `dir` holds nothing but one directory, move that directory's
 * contents up into `dir`
 */
export async function hoistSingleRoot(dir: string): Promise<void> {
  const entries = (await readdir(dir)).filter((name) => name !== '__MACOSX');
  const roots = await listRootDirectories(dir);

  if (entries.length !== 1 || roots.length !== 1) {
    return;
  }

  const [root] = roots;
  if (root === undefined) return;

  // Move aside first: the root may contain an entry with its own name
  const rootPath = join(dir, `.hoist-${root}`);
  await rename(join(dir, root), rootPath);
  for (const name of await readdir(rootPath)) {
    await rename(join(rootPath, name), join(dir, name));
  }
  await rmdir(rootPath);
}

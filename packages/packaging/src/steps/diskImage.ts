/**
 * Disk Image
 *
 * Compresses the staging tree with hdiutil. The image is written under a
 * temporary name next to the artifact and renamed into place only once
 * hdiutil has succeeded, so an interrupted build never leaves a truncated
 * image at the output path.
 */

import { rename } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { ConfigurationError, PackagingError, errorMessage } from '@ghidra-dmg/core';
import { removePath, retry, statOrNull } from '@ghidra-dmg/utils';
import { APP_NAME } from '../staging.js';
import type { StepContext } from './context.js';

export interface DiskImageOptions {
  volumeName?: string;
  /** Delay before the single retry; hdiutil fails spuriously when a volume is busy */
  retryDelayMs?: number;
}

/**
 * Where the image goes: an output path ending in .dmg names the file, any
 * other path is a directory that receives Ghidra.dmg. Fails before anything
 * is staged when the destination directory is missing.
 */
export async function resolveArtifactPath(outputPath: string): Promise<string> {
  const absolute = resolve(outputPath);

  if (absolute.toLowerCase().endsWith('.dmg')) {
    const parent = dirname(absolute);
    if (!(await statOrNull(parent))?.isDirectory()) {
      throw new ConfigurationError('output path', `directory does not exist: ${parent}`);
    }
    if ((await statOrNull(absolute))?.isDirectory()) {
      throw new ConfigurationError('output path', `${absolute} is a directory`);
    }
    return absolute;
  }

  const stats = await statOrNull(absolute);
  if (!stats) {
    throw new ConfigurationError('output path', `directory does not exist: ${absolute}`);
  }
  if (!stats.isDirectory()) {
    throw new ConfigurationError('output path', `${absolute} is neither a directory nor a .dmg path`);
  }
  return join(absolute, `${APP_NAME}.dmg`);
}

export function partialImagePath(artifactPath: string): string {
  const name = basename(artifactPath, '.dmg');
  return join(dirname(artifactPath), `.${name}.${process.pid}.partial.dmg`);
}

export async function createDiskImage(
  sourceFolder: string,
  artifactPath: string,
  ctx: StepContext,
  options: DiskImageOptions = {}
): Promise<void> {
  const volumeName = options.volumeName ?? APP_NAME;
  const partialPath = partialImagePath(artifactPath);

  ctx.logger.info({ artifactPath }, 'Building dmg');

  try {
    await retry(
      async () => {
        await removePath(partialPath);
        await ctx.runner.run(
          'hdiutil',
          [
            'create',
            '-volname', volumeName,
            '-fs', 'HFS+',
            '-srcfolder', sourceFolder,
            '-ov',
            '-format', 'UDZO',
            partialPath,
          ],
          { signal: ctx.signal }
        );
      },
      {
        maxAttempts: 2,
        initialDelay: options.retryDelayMs ?? 2000,
        signal: ctx.signal,
        onRetry: (error) => {
          ctx.logger.warn({ error: errorMessage(error) }, 'hdiutil failed, retrying');
        },
      }
    );

    const written = await statOrNull(partialPath);
    if (!written?.isFile()) {
      throw new PackagingError(`hdiutil reported success but wrote no image at ${partialPath}`);
    }

    await rename(partialPath, artifactPath);
  } catch (error) {
    await removePath(partialPath);
    if (error instanceof PackagingError) throw error;
    throw new PackagingError(`Disk image creation failed: ${errorMessage(error)}`, { cause: error });
  }
}

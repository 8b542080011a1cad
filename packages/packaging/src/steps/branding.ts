/**
 * macOS Integration Patches
 *
 * Optional tweaks inside the release: the screen menu bar setting in
 * launch.properties, and the dock icon baked into Generic.jar.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { PatchError, errorMessage } from '@ghidra-dmg/core';
import { ensureDir, pathExists } from '@ghidra-dmg/utils';
import type { StepContext } from './context.js';

export const DOCK_ICON_SIZES = [16, 32, 40, 48, 64, 128, 256] as const;

const GENERIC_JAR = join('Ghidra', 'Framework', 'Generic', 'lib', 'Generic.jar');

/**
 * Flip `useScreenMenuBar` to true in support/launch.properties
 */
export async function enableScreenMenuBar(releasePath: string, ctx: StepContext): Promise<void> {
  const propertiesPath = join(releasePath, 'support', 'launch.properties');

  let contents: string;
  try {
    contents = await readFile(propertiesPath, 'utf8');
  } catch (error) {
    throw new PatchError('Screen menu bar', `cannot read ${propertiesPath}: ${errorMessage(error)}`, { cause: error });
  }

  if (!contents.includes('useScreenMenuBar=false')) {
    ctx.logger.info('launch.properties already uses the screen menu bar');
    return;
  }

  ctx.logger.info('Patching launch.properties to enable the screen menu bar');
  await writeFile(propertiesPath, contents.replaceAll('useScreenMenuBar=false', 'useScreenMenuBar=true'));
}

/**
 * Render the icon at every dock size and add the images to Generic.jar
 */
export async function patchDockIcon(
  releasePath: string,
  iconSource: string,
  ctx: StepContext
): Promise<void> {
  if (!(await pathExists(iconSource))) {
    throw new PatchError('Dock icon', `icon source not found: ${iconSource}`);
  }
  if (!(await pathExists(join(releasePath, GENERIC_JAR)))) {
    throw new PatchError('Dock icon', `${GENERIC_JAR} not found in release`);
  }

  ctx.logger.info('Patching Generic.jar to show the bundle icon in the dock');

  const imagesDir = join(releasePath, 'images');
  await ensureDir(imagesDir);

  // The jar tool mangles absolute entry names, so entries are added relative to the release
  const entries: string[] = [];
  try {
    for (const size of DOCK_ICON_SIZES) {
      const entry = `images/GhidraIcon${size}.png`;
      await ctx.runner.run(
        'sips',
        ['-s', 'format', 'png', '-z', String(size), String(size), iconSource, '--out', join(releasePath, entry)],
        { signal: ctx.signal }
      );
      entries.push(entry);
    }

    await ctx.runner.run('jar', ['-u', '-f', GENERIC_JAR, ...entries], {
      cwd: releasePath,
      signal: ctx.signal,
    });
  } catch (error) {
    throw new PatchError('Dock icon', errorMessage(error), { cause: error });
  }
}

/**
 * App Bundle Scaffold
 *
 * Writes the parts of Ghidra.app that do not come from the release:
 * Info.plist, the MacOS launcher, the icon and the /Applications link.
 */

import { chmod, readFile, symlink } from 'node:fs/promises';
import { join } from 'node:path';
import plist, { type PlistObject, type PlistValue } from 'plist';
import { PatchError, errorMessage } from '@ghidra-dmg/core';
import { ensureDir, pathExists, safeWriteFile } from '@ghidra-dmg/utils';
import { INFO_PLIST_TEMPLATE, LAUNCHER_TEMPLATE } from '../assets.js';
import { releaseDirName, type StagingTree } from '../staging.js';
import type { StepContext } from './context.js';

export interface ScaffoldOptions {
  version: string;
  releasePath: string;
  /** Image to turn into Ghidra.icns; defaults to the release's support/ghidra.ico */
  iconSource?: string;
}

function isPlistObject(value: PlistValue): value is PlistObject {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date) &&
    !Buffer.isBuffer(value)
  );
}

/**
 * Info.plist contents for a release version
 */
export async function renderInfoPlist(version: string, templatePath = INFO_PLIST_TEMPLATE): Promise<string> {
  const parsed = plist.parse(await readFile(templatePath, 'utf8'));
  if (!isPlistObject(parsed)) {
    throw new PatchError('Info.plist', `template ${templatePath} is not a dictionary`);
  }

  const info: PlistObject = {
    ...parsed,
    CFBundleVersion: version,
    CFBundleShortVersionString: version,
  };
  return plist.build(info);
}

/**
 * Launcher script pointing at the staged release directory
 */
export async function renderLauncher(version: string, templatePath = LAUNCHER_TEMPLATE): Promise<string> {
  const template = await readFile(templatePath, 'utf8');
  return template.replaceAll('@GHIDRA_RELEASE@', releaseDirName(version));
}

export async function scaffoldBundle(
  tree: StagingTree,
  options: ScaffoldOptions,
  ctx: StepContext
): Promise<void> {
  await ensureDir(tree.macosPath);
  await ensureDir(tree.resourcesPath);

  ctx.logger.info({ version: options.version }, 'Setting bundle version');
  await safeWriteFile(tree.infoPlistPath, await renderInfoPlist(options.version));

  await safeWriteFile(tree.launcherPath, await renderLauncher(options.version));
  await chmod(tree.launcherPath, 0o755);

  // Drag-to-install target inside the mounted image
  await symlink('/Applications', tree.applicationsLinkPath);

  const iconSource = options.iconSource ?? join(options.releasePath, 'support', 'ghidra.ico');
  if (!(await pathExists(iconSource))) {
    ctx.logger.warn({ iconSource }, 'No icon source found, bundle will use the default icon');
    return;
  }

  ctx.logger.info({ iconSource }, 'Setting app icon');
  try {
    await ctx.runner.run('sips', ['-s', 'format', 'icns', iconSource, '--out', tree.iconPath], {
      signal: ctx.signal,
    });
  } catch (error) {
    throw new PatchError('App icon', errorMessage(error), { cause: error });
  }
}

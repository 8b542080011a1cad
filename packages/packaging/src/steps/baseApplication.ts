/**
 * Base Application
 *
 * Resolves the Ghidra release a build starts from (a release zip or an
 * unpacked install) and places it at Resources/ghidra_<version>_PUBLIC.
 */

import { access, constants, rename } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { ResolutionError, errorMessage } from '@ghidra-dmg/core';
import { copyDir, ensureDir, removePath, safeReadFile, statOrNull } from '@ghidra-dmg/utils';
import type { StagingTree } from '../staging.js';
import { extractArchive, listRootDirectories } from './archive.js';
import type { StepContext } from './context.js';

export type BaseApplicationKind = 'archive' | 'directory';

export interface BaseApplication {
  path: string;
  kind: BaseApplicationKind;
}

export interface InstalledRelease {
  version: string;
  releasePath: string;
}

const VERSION_PATTERN = /ghidra_(\d[^_/\\]*)_/i;
const APPLICATION_VERSION_PATTERN = /^\s*application\.version\s*[=:]\s*(.+)$/m;

/**
 * Version embedded in a release name, e.g. ghidra_11.0.3_PUBLIC_20240410.zip
 */
export function versionFromName(name: string): string | null {
  const match = VERSION_PATTERN.exec(basename(name));
  return match?.[1] ?? null;
}

/**
 * `application.version` from an unpacked release
 */
export async function readApplicationVersion(releaseDir: string): Promise<string | null> {
  const properties = await safeReadFile(join(releaseDir, 'Ghidra', 'application.properties'));
  if (properties === null) {
    return null;
  }
  const match = APPLICATION_VERSION_PATTERN.exec(properties);
  const version = match?.[1]?.trim();
  return version ? version : null;
}

/**
 * Check that a source path exists, is readable and looks like a release
 */
export async function inspectSource(sourcePath: string): Promise<BaseApplication> {
  const path = resolve(sourcePath);
  const stats = await statOrNull(path);

  if (!stats) {
    throw new ResolutionError(`Ghidra source not found: ${path}`, path);
  }

  try {
    await access(path, constants.R_OK);
  } catch (error) {
    throw new ResolutionError(`Ghidra source is not readable: ${path}`, path, { cause: error });
  }

  if (stats.isDirectory()) {
    if (!(await statOrNull(join(path, 'Ghidra')))?.isDirectory()) {
      throw new ResolutionError(`Not a Ghidra installation (no Ghidra/ directory): ${path}`, path);
    }
    return { path, kind: 'directory' };
  }

  if (stats.isFile() && path.toLowerCase().endsWith('.zip')) {
    return { path, kind: 'archive' };
  }

  throw new ResolutionError(`Ghidra source must be a release .zip or an install directory: ${path}`, path);
}

/**
 * Copy or extract the release into the staging tree
 */
export async function installRelease(
  base: BaseApplication,
  tree: StagingTree,
  ctx: StepContext
): Promise<InstalledRelease> {
  if (base.kind === 'directory') {
    const version = versionFromName(base.path) ?? (await readApplicationVersion(base.path));
    if (!version) {
      throw new ResolutionError(`Cannot determine the Ghidra version of ${base.path}`, base.path);
    }

    const releasePath = tree.releasePath(version);
    ctx.logger.info({ source: base.path, version }, 'Copying Ghidra installation');
    await copyDir(base.path, releasePath);
    return { version, releasePath };
  }

  const extractDir = join(tree.scratchPath, 'release');
  ctx.logger.info({ source: base.path }, 'Extracting Ghidra release');

  try {
    await extractArchive(base.path, extractDir, ctx);
  } catch (error) {
    throw new ResolutionError(`Cannot extract ${base.path}: ${errorMessage(error)}`, base.path, { cause: error });
  }

  const roots = await listRootDirectories(extractDir);
  const [root] = roots;
  if (roots.length !== 1 || root === undefined) {
    throw new ResolutionError(
      `Expected one top-level directory in ${base.path}, found ${roots.length}`,
      base.path
    );
  }

  const extracted = join(extractDir, root);
  const version =
    versionFromName(base.path) ??
    versionFromName(`${root}_`) ??
    (await readApplicationVersion(extracted));
  if (!version) {
    throw new ResolutionError(`Cannot determine the Ghidra version of ${base.path}`, base.path);
  }

  const releasePath = tree.releasePath(version);
  await ensureDir(tree.resourcesPath);
  await rename(extracted, releasePath);
  await removePath(extractDir);
  ctx.logger.info({ version }, 'Ghidra release staged');

  return { version, releasePath };
}

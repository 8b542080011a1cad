/**
 * Runtime Bundling
 *
 * Ships a Java runtime inside the bundle at Resources/jdk: either a JDK the
 * user supplies, or a GraalVM primed with language components plus the
 * Ghidraal extension built against it.
 */

import { copyFile, symlink } from 'node:fs/promises';
import { basename, join, relative, resolve } from 'node:path';
import { PatchError, errorMessage, type BuildConfig } from '@ghidra-dmg/core';
import { detectExtensionSource, type GitClient, type ReleaseFetcher } from '@ghidra-dmg/acquisition';
import { copyDir, isTarball, pathExists, removePath, safeWriteFile, statOrNull } from '@ghidra-dmg/utils';
import { GHIDRAAL_BUILD_GRADLE } from '../assets.js';
import type { StagingTree } from '../staging.js';
import { extractArchive, hoistSingleRoot, listRootDirectories } from './archive.js';
import type { StepContext } from './context.js';
import type { ExtensionInstaller, InstalledExtension } from './extensions.js';

/**
 * Java home inside a runtime directory: the directory itself, or the
 * Contents/Home of a macOS .jdk layout
 */
export async function findJavaHome(runtimeDir: string): Promise<string | null> {
  for (const candidate of [runtimeDir, join(runtimeDir, 'Contents', 'Home')]) {
    if (await pathExists(join(candidate, 'bin', 'java'))) {
      return candidate;
    }
  }
  return null;
}

/**
 * Copy a JDK directory, or extract a JDK archive, into Resources/jdk
 */
export async function bundleJdk(jdkSource: string, tree: StagingTree, ctx: StepContext): Promise<string> {
  const source = resolve(jdkSource);
  const stats = await statOrNull(source);
  if (!stats) {
    throw new PatchError('JDK bundle', `JDK not found: ${source}`);
  }

  try {
    if (stats.isDirectory()) {
      ctx.logger.info({ source }, 'Copying JDK');
      await copyDir(source, tree.jdkPath);
    } else if (source.toLowerCase().endsWith('.zip') || isTarball(source)) {
      ctx.logger.info({ source }, 'Extracting JDK');
      await extractArchive(source, tree.jdkPath, ctx);
      await hoistSingleRoot(tree.jdkPath);
    } else {
      throw new PatchError('JDK bundle', `expected a directory, .zip or .tar.gz: ${source}`);
    }
  } catch (error) {
    if (error instanceof PatchError) throw error;
    throw new PatchError('JDK bundle', errorMessage(error), { cause: error });
  }

  const javaHome = await findJavaHome(tree.jdkPath);
  if (!javaHome) {
    throw new PatchError('JDK bundle', `no bin/java in ${source}`);
  }

  ctx.logger.info({ javaHome }, 'JDK bundled');
  return javaHome;
}

export interface GraalBundleDependencies {
  config: BuildConfig;
  releases: Pick<ReleaseFetcher, 'fetchLatest'>;
  git: GitClient;
  installer: ExtensionInstaller;
}

export interface GraalBundleResult {
  javaHome: string;
  ghidraal: InstalledExtension;
}

const PRIMED_MARKER = '.ghidra-dmg-primed';

/**
 * Download, extract and prime GraalVM in the cache; returns the
 * distribution's root directory
 */
async function primeGraal(deps: GraalBundleDependencies, ctx: StepContext): Promise<string> {
  const { config } = deps;
  const archive = await deps.releases.fetchLatest(
    config.releases.graalApiUrl,
    config.releases.graalAssetFilters,
    ctx.signal
  );

  const extractDir = join(config.cacheDir, archive.assetName.replace(/\.(tar\.gz|tgz|zip)$/i, ''));

  if (!(await pathExists(join(extractDir, PRIMED_MARKER)))) {
    await removePath(extractDir);
    ctx.logger.info({ archive: archive.path }, 'Extracting GraalVM');
    await extractArchive(archive.path, extractDir, ctx);

    const home = await graalHome(extractDir);
    if (config.graal.components.length > 0) {
      ctx.logger.info({ components: config.graal.components }, 'Installing GraalVM components');
      await ctx.runner.runExecutable(join(home, 'bin', 'gu'), ['install', ...config.graal.components], {
        signal: ctx.signal,
      });
    }
    await safeWriteFile(join(extractDir, PRIMED_MARKER), `${archive.assetName}\n`);
  }

  const [root] = await listRootDirectories(extractDir);
  if (root === undefined) {
    throw new Error(`GraalVM archive ${archive.assetName} is empty`);
  }
  return join(extractDir, root);
}

async function graalHome(extractDir: string): Promise<string> {
  for (const root of await listRootDirectories(extractDir)) {
    const home = await findJavaHome(join(extractDir, root));
    if (home) return home;
  }
  throw new Error(`no Java home found in ${extractDir}`);
}

/**
 * Bundle GraalVM at Resources/graal, link Resources/jdk to its home, then
 * build and install Ghidraal against it
 */
export async function bundleGraal(
  tree: StagingTree,
  releasePath: string,
  deps: GraalBundleDependencies,
  ctx: StepContext
): Promise<GraalBundleResult> {
  let javaHome: string;

  try {
    const distribution = await primeGraal(deps, ctx);
    const bundled = join(tree.graalPath, basename(distribution));

    ctx.logger.info({ destination: bundled }, 'Copying GraalVM into the bundle');
    await copyDir(distribution, bundled);

    const home = await findJavaHome(bundled);
    if (!home) {
      throw new Error(`no bin/java in ${bundled}`);
    }

    // Relative, so the link survives the bundle being moved to /Applications
    await symlink(relative(tree.resourcesPath, home), tree.jdkPath);
    javaHome = tree.jdkPath;

    await ctx.runner.runExecutable(join(javaHome, 'bin', 'gu'), ['list'], { signal: ctx.signal });
  } catch (error) {
    throw new PatchError('GraalVM bundle', errorMessage(error), { cause: error });
  }

  ctx.logger.info('Building Ghidraal extension');
  const source = detectExtensionSource(deps.config.repositories.ghidraal);
  const checkout = await deps.git.clone(source.source, join(deps.config.cacheDir, 'ghidraal'), ctx.signal);

  // Upstream's build.gradle does not build against current releases
  await copyFile(GHIDRAAL_BUILD_GRADLE, join(checkout, 'build.gradle'));

  let distribution: string;
  try {
    distribution = await deps.installer.build(checkout, { releasePath, javaHome }, ctx);
  } catch (error) {
    throw new PatchError('Ghidraal build', errorMessage(error), { cause: error });
  }

  const ghidraal = await deps.installer.install(
    { source: distribution, type: 'archive', name: source.name },
    { releasePath },
    ctx
  );

  return { javaHome, ghidraal };
}

/**
 * Extension Installer
 *
 * Installs Ghidra extensions into <release>/Ghidra/Extensions. Sources may
 * be git repositories (cloned and built with gradle), built distribution
 * zips, source directories with a build.gradle, or already-built extension
 * directories.
 */

import { mkdtemp, readdir, rename } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import { FetchError, errorMessage } from '@ghidra-dmg/core';
import type { ExtensionSource, GitClient } from '@ghidra-dmg/acquisition';
import { copyDir, ensureDir, pathExists, removePath, statOrNull } from '@ghidra-dmg/utils';
import { extractArchive, listRootDirectories } from './archive.js';
import type { StepContext } from './context.js';

export interface InstalledExtension {
  source: string;
  name: string;
  path: string;
}

export interface InstallOptions {
  releasePath: string;
  /** JAVA_HOME for the gradle build; the system Java is used otherwise */
  javaHome?: string;
}

export function extensionsDir(releasePath: string): string {
  return join(releasePath, 'Ghidra', 'Extensions');
}

export class ExtensionInstaller {
  constructor(
    private readonly git: GitClient,
    private readonly cacheDir: string
  ) {}

  /**
   * Install one extension; any failure surfaces as a FetchError naming the source
   */
  async install(
    extension: ExtensionSource,
    options: InstallOptions,
    ctx: StepContext
  ): Promise<InstalledExtension> {
    ctx.logger.info({ source: extension.source, type: extension.type }, 'Installing extension');

    try {
      const installed = await this.installFrom(extension, options, ctx);
      ctx.logger.info({ name: installed.name }, 'Extension installed');
      return installed;
    } catch (error) {
      if (error instanceof FetchError && error.source === extension.source) {
        throw error;
      }
      throw new FetchError(extension.source, errorMessage(error), { cause: error });
    }
  }

  private async installFrom(
    extension: ExtensionSource,
    options: InstallOptions,
    ctx: StepContext
  ): Promise<InstalledExtension> {
    switch (extension.type) {
      case 'git': {
        const checkout = await this.git.clone(
          extension.source,
          join(this.cacheDir, 'extensions', extension.name),
          ctx.signal
        );
        const distribution = await this.build(checkout, options, ctx);
        return this.unpack(extension, distribution, options.releasePath, ctx);
      }

      case 'archive': {
        const archive = resolve(extension.source);
        if (!(await pathExists(archive))) {
          throw new FetchError(extension.source, 'archive not found');
        }
        return this.unpack(extension, archive, options.releasePath, ctx);
      }

      case 'directory': {
        const dir = resolve(extension.source);
        const stats = await statOrNull(dir);
        if (!stats?.isDirectory()) {
          throw new FetchError(extension.source, 'not a directory, .zip or git URL');
        }

        if (await pathExists(join(dir, 'extension.properties'))) {
          const destination = join(extensionsDir(options.releasePath), extension.name);
          await removePath(destination);
          await copyDir(dir, destination);
          return { source: extension.source, name: extension.name, path: destination };
        }

        if (await pathExists(join(dir, 'build.gradle'))) {
          const distribution = await this.build(dir, options, ctx);
          return this.unpack(extension, distribution, options.releasePath, ctx);
        }

        throw new FetchError(extension.source, 'directory has neither extension.properties nor build.gradle');
      }
    }
  }

  /**
   * Build a gradle extension project and return its distribution zip
   */
  async build(projectDir: string, options: InstallOptions, ctx: StepContext): Promise<string> {
    const distDir = join(projectDir, 'dist');
    // Zips from builds against other releases must not be picked up
    await removePath(distDir);

    const env: Record<string, string> = { GHIDRA_INSTALL_DIR: options.releasePath };
    if (options.javaHome) {
      env['JAVA_HOME'] = options.javaHome;
      env['PATH'] = `${join(options.javaHome, 'bin')}:${process.env['PATH'] ?? ''}`;
    }

    ctx.logger.info({ projectDir }, 'Building extension with gradle');
    await ctx.runner.run('gradle', ['buildExtension'], { cwd: projectDir, env, signal: ctx.signal });

    const zips = (await pathExists(distDir))
      ? (await readdir(distDir)).filter((name) => name.toLowerCase().endsWith('.zip')).sort()
      : [];
    const [zip] = zips;
    if (zip === undefined) {
      throw new Error(`gradle produced no distribution zip in ${distDir}`);
    }
    return join(distDir, zip);
  }

  /**
   * Extract a distribution zip and move its single top-level directory into
   * the extensions directory, replacing an earlier install of the same name
   */
  private async unpack(
    extension: ExtensionSource,
    archive: string,
    releasePath: string,
    ctx: StepContext
  ): Promise<InstalledExtension> {
    const target = extensionsDir(releasePath);
    await ensureDir(target);
    const unpackDir = await mkdtemp(join(target, '.unpack-'));

    try {
      await extractArchive(archive, unpackDir, ctx);

      const roots = await listRootDirectories(unpackDir);
      const [name] = roots;
      if (roots.length !== 1 || name === undefined) {
        throw new Error(`expected one top-level directory in ${basename(archive)}, found ${roots.length}`);
      }

      const destination = join(target, name);
      await removePath(destination);
      await rename(join(unpackDir, name), destination);
      return { source: extension.source, name, path: destination };
    } finally {
      await removePath(unpackDir);
    }
  }
}

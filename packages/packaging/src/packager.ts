/**
 * Packager
 *
 * Turns a BuildRequest into a Ghidra.dmg: resolve the release, stage the app
 * bundle, apply the requested modifications in order, compress. The staging
 * tree is removed whatever happens, and the artifact only appears at the
 * output path once the image is complete.
 */

import { EventEmitter } from 'node:events';
import { join } from 'node:path';
import {
  PatchError,
  ResolutionError,
  describeRuntime,
  type BuildConfig,
  type BuildRequest,
  type RuntimeBundle,
  type ToolRunner,
} from '@ghidra-dmg/core';
import {
  GitClient,
  detectExtensionSource,
  type ExtensionSource,
  type ReleaseFetcher,
} from '@ghidra-dmg/acquisition';
import { calculateFileHash, createLogger, getFileSizeBytes, removePath, type Logger } from '@ghidra-dmg/utils';
import { withStagingTree, type StagingTree } from './staging.js';
import { inspectSource, installRelease, type BaseApplication } from './steps/baseApplication.js';
import { scaffoldBundle } from './steps/appBundle.js';
import { enableScreenMenuBar, patchDockIcon } from './steps/branding.js';
import { ExtensionInstaller, type InstalledExtension } from './steps/extensions.js';
import { applyDarkMode } from './steps/darkMode.js';
import { bundleGraal, bundleJdk } from './steps/runtime.js';
import { createDiskImage, resolveArtifactPath } from './steps/diskImage.js';
import type { StepContext } from './steps/context.js';

export type BuildStage =
  | 'resolve'
  | 'stage'
  | 'integration'
  | 'extensions'
  | 'dark-mode'
  | 'runtime'
  | 'disk-image';

export interface StageEvent {
  stage: BuildStage;
  message: string;
}

export interface BuildResult {
  artifactPath: string;
  version: string;
  sizeBytes: number;
  sha256: string;
  extensions: InstalledExtension[];
  runtime: RuntimeBundle['kind'];
  darkMode: boolean;
  duration: number;
}

export interface PackagerOptions {
  config: BuildConfig;
  runner: ToolRunner;
  git?: GitClient;
  /** Needed for --graal */
  releases?: Pick<ReleaseFetcher, 'fetchLatest'>;
  /** Supplies a local release archive when the request names no source path */
  fetchBaseApplication?: (signal?: AbortSignal) => Promise<string>;
  logger?: Logger;
  /** Parent of the temporary staging directory; defaults to the OS temp dir */
  stagingDir?: string;
  retryDelayMs?: number;
}

export class Packager extends EventEmitter {
  private readonly config: BuildConfig;
  private readonly runner: ToolRunner;
  private readonly git: GitClient;
  private readonly releases?: Pick<ReleaseFetcher, 'fetchLatest'>;
  private readonly fetchBaseApplication?: (signal?: AbortSignal) => Promise<string>;
  private readonly logger: Logger;
  private readonly installer: ExtensionInstaller;
  private readonly stagingDir?: string;
  private readonly retryDelayMs?: number;

  constructor(options: PackagerOptions) {
    super();
    this.config = options.config;
    this.runner = options.runner;
    this.logger = options.logger ?? createLogger({ component: 'packager' });
    this.git = options.git ?? new GitClient(this.runner, this.logger);
    this.releases = options.releases;
    this.fetchBaseApplication = options.fetchBaseApplication;
    this.installer = new ExtensionInstaller(this.git, this.config.cacheDir);
    this.stagingDir = options.stagingDir;
    this.retryDelayMs = options.retryDelayMs;
  }

  /**
   * Build the disk image described by `request`
   */
  async build(request: BuildRequest, signal?: AbortSignal): Promise<BuildResult> {
    const startTime = Date.now();
    const ctx: StepContext = { runner: this.runner, logger: this.logger, signal };

    this.stage('resolve', 'Resolving inputs');
    const artifactPath = await resolveArtifactPath(request.outputPath);
    const extensions = request.extensions.map((value) => detectExtensionSource(value));
    const base = await this.resolveBase(request, signal);

    this.logger.info(
      {
        source: base.path,
        artifactPath,
        extensions: request.extensions,
        darkMode: request.darkMode,
        runtime: describeRuntime(request.runtime),
      },
      'Starting build'
    );

    const { version, installed } = await withStagingTree(
      (tree) => this.assemble(tree, request, base, extensions, artifactPath, ctx),
      { parentDir: this.stagingDir, logger: this.logger }
    );

    const result: BuildResult = {
      artifactPath,
      version,
      sizeBytes: await getFileSizeBytes(artifactPath),
      sha256: await calculateFileHash(artifactPath, 'sha256'),
      extensions: installed,
      runtime: request.runtime.kind,
      darkMode: request.darkMode,
      duration: Date.now() - startTime,
    };

    this.logger.info({ artifactPath, version, sizeBytes: result.sizeBytes }, 'Build complete');
    return result;
  }

  private async resolveBase(request: BuildRequest, signal?: AbortSignal): Promise<BaseApplication> {
    if (request.sourcePath !== undefined) {
      return inspectSource(request.sourcePath);
    }

    if (!this.fetchBaseApplication) {
      throw new ResolutionError('No Ghidra source path given and no release download configured');
    }

    this.logger.info('No path provided, fetching the latest Ghidra release');
    return inspectSource(await this.fetchBaseApplication(signal));
  }

  private async assemble(
    tree: StagingTree,
    request: BuildRequest,
    base: BaseApplication,
    extensions: ExtensionSource[],
    artifactPath: string,
    ctx: StepContext
  ): Promise<{ version: string; installed: InstalledExtension[] }> {
    this.stage('stage', 'Staging Ghidra.app');
    const { version, releasePath } = await installRelease(base, tree, ctx);
    const iconSource = this.config.iconPath ?? join(releasePath, 'support', 'ghidra.ico');
    await scaffoldBundle(tree, { version, releasePath, iconSource }, ctx);

    if (request.screenMenuBar || request.dockIcon) {
      this.stage('integration', 'Applying macOS integration patches');
      if (request.screenMenuBar) {
        await enableScreenMenuBar(releasePath, ctx);
      }
      if (request.dockIcon) {
        await patchDockIcon(releasePath, iconSource, ctx);
      }
    }

    // The first failing extension aborts the build
    const installed: InstalledExtension[] = [];
    for (const [index, extension] of extensions.entries()) {
      this.stage('extensions', `Installing extension ${index + 1}/${extensions.length}: ${extension.name}`);
      installed.push(await this.installer.install(extension, { releasePath }, ctx));
    }

    if (request.darkMode) {
      this.stage('dark-mode', 'Applying dark mode');
      await applyDarkMode(
        releasePath,
        this.git,
        { repositoryUrl: this.config.repositories.darkMode, cacheDir: this.config.cacheDir },
        ctx
      );
    }

    switch (request.runtime.kind) {
      case 'jdk':
        this.stage('runtime', 'Bundling JDK');
        await bundleJdk(request.runtime.path, tree, ctx);
        break;
      case 'graal': {
        this.stage('runtime', 'Bundling GraalVM and Ghidraal');
        if (!this.releases) {
          throw new PatchError('GraalVM bundle', 'no release source configured');
        }
        const graal = await bundleGraal(
          tree,
          releasePath,
          { config: this.config, releases: this.releases, git: this.git, installer: this.installer },
          ctx
        );
        installed.push(graal.ghidraal);
        break;
      }
      case 'none':
        break;
    }

    this.stage('disk-image', 'Building dmg');
    await removePath(tree.scratchPath);
    await createDiskImage(tree.root, artifactPath, ctx, { retryDelayMs: this.retryDelayMs });

    return { version, installed };
  }

  private stage(stage: BuildStage, message: string): void {
    this.logger.debug({ stage }, message);
    const event: StageEvent = { stage, message };
    this.emit('stage', event);
  }
}

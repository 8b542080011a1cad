/**
 * Build Command
 *
 * Wires the packager to the real tools and release sources, and reports
 * progress with a spinner.
 */

import ora from 'ora';
import { parseBuildRequest, SystemToolRunner, type RawBuildOptions } from '@ghidra-dmg/core';
import { Downloader, GitHubReleaseClient, ReleaseFetcher, type DownloadProgress } from '@ghidra-dmg/acquisition';
import { Packager, type StageEvent } from '@ghidra-dmg/packaging';
import { configureLogger, createLogger, formatBytes } from '@ghidra-dmg/utils';
import { getConfig } from '../config/index.js';
import { printBuildSummary, printJson, summarizeBuild } from '../lib/output.js';

export interface BuildCommandOptions extends RawBuildOptions {
  json?: boolean;
}

export async function buildCommand(options: BuildCommandOptions, signal: AbortSignal): Promise<void> {
  // Validate before touching the environment or the network
  const request = parseBuildRequest(options);
  const config = getConfig();
  configureLogger({ level: config.logLevel, nodeEnv: config.nodeEnv });
  const logger = createLogger({ component: 'cli' });

  const runner = new SystemToolRunner();
  const downloader = new Downloader({ logger: logger.child({ component: 'downloader' }) });
  const releases = new ReleaseFetcher(
    new GitHubReleaseClient({ token: config.releases.githubToken, logger: logger.child({ component: 'releases' }) }),
    downloader,
    config.cacheDir
  );

  const packager = new Packager({
    config,
    runner,
    releases,
    logger: logger.child({ component: 'packager' }),
    fetchBaseApplication: async (abortSignal) => {
      const release = await releases.fetchLatest(config.releases.ghidraApiUrl, [], abortSignal);
      return release.path;
    },
  });

  const spinner = ora({ text: 'Preparing build...', isSilent: options.json === true });

  packager.on('stage', (event: StageEvent) => {
    if (spinner.isSpinning) {
      spinner.succeed();
    }
    spinner.start(event.message);
  });

  downloader.on('progress', (progress: DownloadProgress) => {
    const done = formatBytes(progress.bytesDownloaded);
    spinner.text =
      progress.percentage !== undefined
        ? `Downloading ${progress.url} (${progress.percentage}%)`
        : `Downloading ${progress.url} (${done})`;
  });

  try {
    const result = await packager.build(request, signal);
    spinner.succeed();

    if (options.json) {
      printJson(summarizeBuild(result));
    } else {
      printBuildSummary(result);
    }
  } catch (error) {
    spinner.fail();
    throw error;
  }
}

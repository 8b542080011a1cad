/**
 * Release Fetcher
 *
 * Resolves the latest release asset of a GitHub repository and downloads it
 * into the cache directory under the asset's own file name.
 */

import { join } from 'node:path';
import { sanitizeFilename } from '@ghidra-dmg/utils';
import type { GitHubReleaseClient } from './releases.js';
import type { Downloader } from './downloader.js';

export interface FetchedRelease {
  assetName: string;
  path: string;
  cached: boolean;
}

export class ReleaseFetcher {
  constructor(
    private readonly releases: GitHubReleaseClient,
    private readonly downloader: Downloader,
    private readonly cacheDir: string
  ) {}

  async fetchLatest(
    apiUrl: string,
    filters: readonly string[] = [],
    signal?: AbortSignal
  ): Promise<FetchedRelease> {
    const asset = await this.releases.latestAsset(apiUrl, filters);
    const destination = join(this.cacheDir, sanitizeFilename(asset.name));
    const result = await this.downloader.download(asset.url, destination, signal);

    return {
      assetName: asset.name,
      path: result.path,
      cached: result.cached,
    };
  }
}

/**
 * GitHub Release Client
 *
 * Looks up assets of the latest release of a repository through the GitHub
 * REST API (`/repos/{owner}/{repo}/releases/latest`).
 */

import { request, type Dispatcher } from 'undici';
import { z } from 'zod';
import { FetchError } from '@ghidra-dmg/core';
import { createLogger, type Logger } from '@ghidra-dmg/utils';

const releaseSchema = z.object({
  tag_name: z.string().optional(),
  assets: z.array(
    z.object({
      name: z.string(),
      browser_download_url: z.string().url(),
      size: z.number().optional(),
    })
  ),
});

export interface ReleaseAsset {
  name: string;
  url: string;
  size?: number;
}

export interface GitHubReleaseClientOptions {
  token?: string;
  dispatcher?: Dispatcher;
  logger?: Logger;
}

export class GitHubReleaseClient {
  private readonly token?: string;
  private readonly dispatcher?: Dispatcher;
  private readonly logger: Logger;

  constructor(options: GitHubReleaseClientOptions = {}) {
    this.token = options.token;
    this.dispatcher = options.dispatcher;
    this.logger = options.logger ?? createLogger({ component: 'releases' });
  }

  /**
   * Find the first asset whose name contains every filter. Without filters
   * the release's first asset is returned.
   */
  async latestAsset(apiUrl: string, filters: readonly string[] = []): Promise<ReleaseAsset> {
    const release = await this.fetchRelease(apiUrl);

    const asset = release.assets.find((candidate) =>
      filters.every((filter) => candidate.name.includes(filter))
    );

    if (!asset) {
      const wanted = filters.length > 0 ? ` matching ${filters.join(', ')}` : '';
      throw new FetchError(apiUrl, `latest release has no asset${wanted}`);
    }

    this.logger.debug({ apiUrl, asset: asset.name, tag: release.tag_name }, 'Resolved release asset');

    return {
      name: asset.name,
      url: asset.browser_download_url,
      size: asset.size,
    };
  }

  private async fetchRelease(apiUrl: string): Promise<z.infer<typeof releaseSchema>> {
    const headers: Record<string, string> = {
      accept: 'application/vnd.github+json',
      'user-agent': 'ghidra-dmg',
    };
    if (this.token) {
      headers['authorization'] = `Bearer ${this.token}`;
    }

    let payload: unknown;
    try {
      const response = await request(apiUrl, {
        method: 'GET',
        headers,
        dispatcher: this.dispatcher,
      });
      if (response.statusCode !== 200) {
        await response.body.dump();
        throw new FetchError(apiUrl, `request failed with status code ${response.statusCode}`);
      }
      payload = await response.body.json();
    } catch (error) {
      if (error instanceof FetchError) throw error;
      throw new FetchError(apiUrl, error instanceof Error ? error.message : String(error), { cause: error });
    }

    const parsed = releaseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new FetchError(apiUrl, 'unexpected release payload');
    }
    return parsed.data;
  }
}

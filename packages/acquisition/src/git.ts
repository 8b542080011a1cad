/**
 * Git Client
 *
 * Shallow clones into the download cache; an existing checkout is reused.
 */

import { FetchError, errorMessage, type ToolRunner } from '@ghidra-dmg/core';
import { createLogger, pathExists, removePath, type Logger } from '@ghidra-dmg/utils';

export class GitClient {
  private readonly logger: Logger;

  constructor(
    private readonly runner: ToolRunner,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger({ component: 'git' });
  }

  /**
   * Clone `url` into `destination` and return the checkout path
   */
  async clone(url: string, destination: string, signal?: AbortSignal): Promise<string> {
    if (await pathExists(destination)) {
      this.logger.info({ url, destination }, 'Using cached checkout');
      return destination;
    }

    try {
      await this.runner.run('git', ['clone', '--depth', '1', url, destination], { signal });
    } catch (error) {
      // A failed clone can leave a half-written directory behind
      await removePath(destination);
      throw new FetchError(url, errorMessage(error), { cause: error });
    }

    this.logger.info({ url, destination }, 'Cloned repository');
    return destination;
  }
}

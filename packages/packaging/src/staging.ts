/**
 * Staging Tree
 *
 * A private temporary directory holding the disk image contents while a
 * build modifies them:
 *
 *   <root>/
 *   ├── Applications -> /Applications
 *   └── Ghidra.app/Contents/
 *       ├── Info.plist
 *       ├── MacOS/ghidra
 *       └── Resources/
 *           ├── Ghidra.icns
 *           ├── ghidra_<version>_PUBLIC/
 *           ├── jdk/
 *           └── graal/
 */

import { mkdtemp } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { errorMessage } from '@ghidra-dmg/core';
import { createLogger, removePath, type Logger } from '@ghidra-dmg/utils';

export const APP_NAME = 'Ghidra';

export class StagingTree {
  readonly appPath: string;
  readonly contentsPath: string;
  readonly macosPath: string;
  readonly resourcesPath: string;

  constructor(readonly root: string) {
    this.appPath = join(root, `${APP_NAME}.app`);
    this.contentsPath = join(this.appPath, 'Contents');
    this.macosPath = join(this.contentsPath, 'MacOS');
    this.resourcesPath = join(this.contentsPath, 'Resources');
  }

  get infoPlistPath(): string {
    return join(this.contentsPath, 'Info.plist');
  }

  get launcherPath(): string {
    return join(this.macosPath, 'ghidra');
  }

  get iconPath(): string {
    return join(this.resourcesPath, `${APP_NAME}.icns`);
  }

  get applicationsLinkPath(): string {
    return join(this.root, 'Applications');
  }

  get jdkPath(): string {
    return join(this.resourcesPath, 'jdk');
  }

  get graalPath(): string {
    return join(this.resourcesPath, 'graal');
  }

  /**
   * Scratch space inside the tree, removed with it
   */
  get scratchPath(): string {
    return join(this.root, '.scratch');
  }

  releasePath(version: string): string {
    return join(this.resourcesPath, releaseDirName(version));
  }
}

export function releaseDirName(version: string): string {
  return `ghidra_${version}_PUBLIC`;
}

export interface StagingOptions {
  parentDir?: string;
  logger?: Logger;
}

/**
 * Run `fn` with a fresh StagingTree that is removed afterwards, whether `fn`
 * succeeds or throws
 */
export async function withStagingTree<T>(
  fn: (tree: StagingTree) => Promise<T>,
  options: StagingOptions = {}
): Promise<T> {
  const logger = options.logger ?? createLogger({ component: 'staging' });
  const root = await mkdtemp(join(options.parentDir ?? tmpdir(), 'ghidra-dmg-staging-'));
  logger.debug({ root }, 'Created staging tree');

  try {
    return await fn(new StagingTree(root));
  } finally {
    try {
      await removePath(root);
      logger.debug({ root }, 'Removed staging tree');
    } catch (error) {
      logger.warn({ root, error: errorMessage(error) }, 'Could not remove staging tree');
    }
  }
}

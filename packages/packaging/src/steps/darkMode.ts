/**
 * Dark Mode
 *
 * Applies the ghidra-dark theme by running its installer against the staged
 * release.
 */

import { join } from 'node:path';
import { PatchError, errorMessage } from '@ghidra-dmg/core';
import type { GitClient } from '@ghidra-dmg/acquisition';
import { pathExists } from '@ghidra-dmg/utils';
import type { StepContext } from './context.js';

export interface DarkModeOptions {
  repositoryUrl: string;
  cacheDir: string;
}

export async function applyDarkMode(
  releasePath: string,
  git: GitClient,
  options: DarkModeOptions,
  ctx: StepContext
): Promise<void> {
  ctx.logger.info('Setting dark mode');

  const checkout = await git.clone(options.repositoryUrl, join(options.cacheDir, 'dark-mode'), ctx.signal);
  const installer = join(checkout, 'install.py');

  if (!(await pathExists(installer))) {
    throw new PatchError('Dark mode', `${options.repositoryUrl} has no install.py`);
  }

  try {
    await ctx.runner.run('python3', [installer, '--path', releasePath], { signal: ctx.signal });
  } catch (error) {
    throw new PatchError('Dark mode', errorMessage(error), { cause: error });
  }
}

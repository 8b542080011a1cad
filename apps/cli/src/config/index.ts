/**
 * CLI Configuration
 *
 * `.env` is loaded into the process environment by the entry point before
 * anything else runs; this module validates it once.
 */

import { loadConfig, type BuildConfig } from '@ghidra-dmg/core';

let cached: BuildConfig | undefined;

export function getConfig(): BuildConfig {
  cached ??= loadConfig(process.env);
  return cached;
}

export const CLI_VERSION = '0.1.0';

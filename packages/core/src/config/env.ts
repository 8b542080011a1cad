/**
 * Build Configuration
 *
 * Environment-driven settings shared by every build. Values come from the
 * process environment (the CLI loads `.env` into it first).
 */

import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { z } from 'zod';
import { LOG_LEVELS } from '@ghidra-dmg/utils';
import { ConfigurationError } from '../errors/index.js';

const commaList = z
  .string()
  .transform((value) => value.split(',').map((item) => item.trim()).filter((item) => item.length > 0));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  // Download cache, shared between builds
  GHIDRA_DMG_CACHE_DIR: z.string().min(1).default(join(tmpdir(), 'ghidra_dmg_builder_downloads')),

  // Release sources
  GHIDRA_RELEASE_API_URL: z
    .string()
    .url()
    .default('https://api.github.com/repos/NationalSecurityAgency/ghidra/releases/latest'),
  GRAALVM_RELEASE_API_URL: z
    .string()
    .url()
    .default('https://api.github.com/repos/graalvm/graalvm-ce-builds/releases/latest'),
  GRAALVM_ASSET_FILTERS: commaList.default('tar.gz,graalvm-ce-java11,darwin'),
  GRAALVM_COMPONENTS: commaList.default('llvm-toolchain,native-image,nodejs,python,ruby,R,wasm'),
  GITHUB_TOKEN: z.string().min(1).optional(),

  // Repositories cloned on demand
  DARK_MODE_REPO_URL: z.string().min(1).default('https://github.com/zackelia/ghidra-dark.git'),
  GHIDRAAL_REPO_URL: z.string().min(1).default('https://github.com/jpleasu/ghidraal.git'),

  // Bundle icon source; defaults to the release's support/ghidra.ico
  GHIDRA_DMG_ICON: z.string().min(1).optional(),
});

export type BuildEnv = z.infer<typeof envSchema>;

export interface BuildConfig {
  nodeEnv: BuildEnv['NODE_ENV'];
  logLevel: BuildEnv['LOG_LEVEL'];
  cacheDir: string;
  releases: {
    ghidraApiUrl: string;
    graalApiUrl: string;
    graalAssetFilters: readonly string[];
    githubToken?: string;
  };
  graal: {
    components: readonly string[];
  };
  repositories: {
    darkMode: string;
    ghidraal: string;
  };
  iconPath?: string;
}

/**
 * Parse and validate the environment
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): BuildConfig {
  const parseResult = envSchema.safeParse(env);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError('environment', issues);
  }

  const parsed = parseResult.data;

  return {
    nodeEnv: parsed.NODE_ENV,
    logLevel: parsed.LOG_LEVEL,
    cacheDir: parsed.GHIDRA_DMG_CACHE_DIR,
    releases: {
      ghidraApiUrl: parsed.GHIDRA_RELEASE_API_URL,
      graalApiUrl: parsed.GRAALVM_RELEASE_API_URL,
      graalAssetFilters: parsed.GRAALVM_ASSET_FILTERS,
      githubToken: parsed.GITHUB_TOKEN,
    },
    graal: {
      components: parsed.GRAALVM_COMPONENTS,
    },
    repositories: {
      darkMode: parsed.DARK_MODE_REPO_URL,
      ghidraal: parsed.GHIDRAAL_REPO_URL,
    },
    iconPath: parsed.GHIDRA_DMG_ICON,
  };
}

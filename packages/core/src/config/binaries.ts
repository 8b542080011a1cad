/**
 * Binary Configuration
 *
 * Centralized configuration for the external tools a build shells out to.
 *
 * Priority order:
 * 1. Environment variables (e.g., HDIUTIL_PATH)
 * 2. System PATH
 */

import { existsSync } from 'node:fs';

export const TOOL_NAMES = [
  'hdiutil',
  'unzip',
  'git',
  'gradle',
  'jar',
  'sips',
  'python3',
] as const;

export type ToolName = typeof TOOL_NAMES[number];

export interface BinaryConfig {
  name: ToolName;
  envVar: string;
  resolvedPath: string;
  fromEnv: boolean;
}

export type BinariesConfig = Record<ToolName, BinaryConfig>;

/**
 * Environment variable overriding a tool's location, e.g. python3 -> PYTHON3_PATH
 */
export function binaryEnvVar(name: ToolName): string {
  return `${name.toUpperCase()}_PATH`;
}

function resolveBinaryPath(
  name: ToolName,
  env: NodeJS.ProcessEnv
): BinaryConfig {
  const envVar = binaryEnvVar(name);
  const envPath = env[envVar];

  if (envPath && existsSync(envPath)) {
    return { name, envVar, resolvedPath: envPath, fromEnv: true };
  }

  // Let the system PATH resolve it; a missing tool fails at spawn time
  return { name, envVar, resolvedPath: name, fromEnv: false };
}

/**
 * Resolve every tool against the given environment
 */
export function getBinariesConfig(env: NodeJS.ProcessEnv = process.env): BinariesConfig {
  return {
    hdiutil: resolveBinaryPath('hdiutil', env),
    unzip: resolveBinaryPath('unzip', env),
    git: resolveBinaryPath('git', env),
    gradle: resolveBinaryPath('gradle', env),
    jar: resolveBinaryPath('jar', env),
    sips: resolveBinaryPath('sips', env),
    python3: resolveBinaryPath('python3', env),
  };
}

let _binaries: BinariesConfig | null = null;

/**
 * Get binary configurations (cached)
 */
export function binaries(): BinariesConfig {
  if (!_binaries) {
    _binaries = getBinariesConfig();
  }
  return _binaries;
}

/**
 * Output Formatter
 *
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { formatBytes, formatDuration } from '@ghidra-dmg/utils';
import type { BuildResult } from '@ghidra-dmg/packaging';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printJson(data: unknown): void {
  console.log(JSON.stringify(data, null, 2));
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

/**
 * Plain-data view of a build, as printed by --json
 */
export function summarizeBuild(result: BuildResult): Record<string, unknown> {
  return {
    artifact: result.artifactPath,
    version: result.version,
    sizeBytes: result.sizeBytes,
    sha256: result.sha256,
    extensions: result.extensions.map((extension) => extension.name),
    runtime: result.runtime,
    darkMode: result.darkMode,
    durationMs: result.duration,
  };
}

export function printBuildSummary(result: BuildResult): void {
  printHeader('Build Summary');
  printKeyValue('Artifact', result.artifactPath);
  printKeyValue('Ghidra', result.version);
  printKeyValue('Size', formatBytes(result.sizeBytes));
  printKeyValue('SHA-256', result.sha256);
  printKeyValue(
    'Extensions',
    result.extensions.length > 0 ? result.extensions.map((extension) => extension.name).join(', ') : 'none'
  );
  printKeyValue('Runtime', result.runtime);
  printKeyValue('Dark mode', result.darkMode ? 'yes' : 'no');
  printKeyValue('Took', formatDuration(result.duration));
  console.log();
  printSuccess(`Wrote ${result.artifactPath}`);
}

/**
 * Command-line surface of ghidra-dmg
 */

import { Command, Option } from 'commander';
import { CLI_VERSION } from './config/index.js';
import type { BuildCommandOptions } from './commands/build.js';

export type BuildAction = (options: BuildCommandOptions) => Promise<void>;

export function createProgram(action: BuildAction): Command {
  const program = new Command();

  program
    .name('ghidra-dmg')
    .description('Package Ghidra as a macOS disk image')
    .version(CLI_VERSION)
    .option('-o, --out <path>', 'output .dmg file or directory (required)')
    .addOption(new Option('--output-path <path>', 'alias of --out').hideHelp())
    .option('-e, --extension [sources...]', 'extension git URLs, zips or directories to install (repeatable)')
    .option('-d, --dark-mode', 'apply the ghidra-dark theme')
    .option('-p, --path <path>', 'local Ghidra zip or install directory, instead of downloading the latest release')
    .addOption(new Option('-j, --jdk <path>', 'JDK directory or archive to bundle').conflicts('graal'))
    .addOption(new Option('-g, --graal', 'bundle GraalVM and the Ghidraal extension').conflicts('jdk'))
    .option('-m, --screen-menu-bar', 'use the macOS screen menu bar')
    .option('--dock-icon', 'show the bundle icon in the dock')
    .option('--json', 'print the build summary as JSON')
    .action(async () => {
      await action(program.opts<BuildCommandOptions>());
    });

  return program;
}

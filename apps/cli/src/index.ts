#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Builds a Ghidra.dmg from the command line. Exit codes: 0 on success, 1 on
 * any failure, 130 when interrupted.
 */

import 'dotenv/config';
import chalk from 'chalk';
import { errorMessage } from '@ghidra-dmg/core';
import { buildCommand } from './commands/build.js';
import { printError } from './lib/output.js';
import { createProgram } from './program.js';

const EXIT_INTERRUPTED = 130;

const controller = new AbortController();

// Abort running tools so the staging tree is cleaned up before exiting
process.once('SIGINT', () => {
  console.error(chalk.yellow('\nInterrupted, cleaning up...'));
  controller.abort();
});

const program = createProgram((options) => buildCommand(options, controller.signal));

// Commander prints its own usage errors; only the exit code is ours
program.exitOverride((err) => {
  process.exit(err.exitCode === 0 ? 0 : 1);
});

program.parseAsync(process.argv).then(
  () => {
    process.exit(0);
  },
  (error: unknown) => {
    printError(errorMessage(error));
    process.exit(controller.signal.aborted ? EXIT_INTERRUPTED : 1);
  }
);

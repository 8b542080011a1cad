/**
 * Tool Runner
 *
 * Every external tool a build needs goes through a ToolRunner so the
 * pipeline can be exercised without hdiutil, gradle or git installed.
 */

import { executeCommand, isErrnoException, createLogger, type CommandResult, type Logger } from '@ghidra-dmg/utils';
import { binaries, binaryEnvVar, type BinariesConfig, type ToolName } from '../config/binaries.js';
import { CommandExecutionError } from '../errors/index.js';

export interface ToolRunOptions {
  cwd?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
  timeout?: number;
}

export interface ToolRunner {
  /** Run a known tool; rejects with CommandExecutionError on a non-zero exit */
  run(tool: ToolName, args: string[], options?: ToolRunOptions): Promise<CommandResult>;
  /** Run an executable by path (e.g. GraalVM's `gu`) */
  runExecutable(executable: string, args: string[], options?: ToolRunOptions): Promise<CommandResult>;
}

export class SystemToolRunner implements ToolRunner {
  private readonly config: BinariesConfig;
  private readonly logger: Logger;

  constructor(options: { binaries?: BinariesConfig; logger?: Logger } = {}) {
    this.config = options.binaries ?? binaries();
    this.logger = options.logger ?? createLogger({ component: 'tools' });
  }

  async run(tool: ToolName, args: string[], options: ToolRunOptions = {}): Promise<CommandResult> {
    return this.spawn(this.config[tool].resolvedPath, tool, args, options, binaryEnvVar(tool));
  }

  async runExecutable(executable: string, args: string[], options: ToolRunOptions = {}): Promise<CommandResult> {
    return this.spawn(executable, executable, args, options);
  }

  private async spawn(
    executable: string,
    label: string,
    args: string[],
    options: ToolRunOptions,
    envVar?: string
  ): Promise<CommandResult> {
    this.logger.debug({ tool: label, args, cwd: options.cwd }, 'Running tool');

    let result: CommandResult;
    try {
      result = await executeCommand(executable, args, options);
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        const hint = envVar ? ` (install it or set ${envVar})` : '';
        throw new CommandExecutionError(label, 127, `${executable} not found${hint}`);
      }
      throw error;
    }

    if (result.timedOut) {
      throw new CommandExecutionError(label, result.exitCode, `timed out after ${result.duration}ms`);
    }
    if (result.exitCode !== 0) {
      throw new CommandExecutionError(label, result.exitCode, result.stderr || result.stdout);
    }

    this.logger.debug({ tool: label, duration: result.duration }, 'Tool finished');
    return result;
  }
}

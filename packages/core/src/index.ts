/**
 * @ghidra-dmg/core
 *
 * Core package containing:
 * - Error taxonomy
 * - Build request model and validation
 * - Environment configuration
 * - External tool resolution
 */

// Errors
export {
  GhidraDmgError,
  ConfigurationError,
  ResolutionError,
  FetchError,
  PatchError,
  PackagingError,
  CommandExecutionError,
  errorMessage,
} from './errors/index.js';

// Build request
export type {
  BuildRequest,
  RawBuildOptions,
  RuntimeBundle,
} from './types/buildRequest.js';

export { parseBuildRequest, describeRuntime } from './request.js';

// Configuration
export { loadConfig, type BuildConfig, type BuildEnv } from './config/env.js';

export {
  TOOL_NAMES,
  binaryEnvVar,
  getBinariesConfig,
  binaries,
  type ToolName,
  type BinaryConfig,
  type BinariesConfig,
} from './config/binaries.js';

// External tools
export { SystemToolRunner, type ToolRunner, type ToolRunOptions } from './tools/runner.js';

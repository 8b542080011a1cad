/**
 * @ghidra-dmg/utils
 *
 * Shared utilities package containing:
 * - Command execution wrapper
 * - File operations
 * - Retry logic
 * - Path and formatting helpers
 * - Logger
 */

// Command execution
export { executeCommand, type CommandResult, type CommandOptions } from './command.js';

// File operations
export {
  ensureDir,
  safeWriteFile,
  safeReadFile,
  calculateFileHash,
  getFileSizeBytes,
  statOrNull,
  pathExists,
  moveFile,
  copyDir,
  removePath,
  isErrnoException,
} from './file.js';

// Retry logic
export { retry, type RetryOptions } from './retry.js';

// Path utilities
export {
  sanitizeFilename,
  lastSegment,
  isTarball,
} from './path.js';

// Time utilities
export {
  sleep,
  formatDuration,
  formatBytes,
} from './time.js';

// Logger
export {
  configureLogger,
  createLogger,
  silentLogger,
  resolveLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel,
  type LoggerSettings,
} from './logger.js';

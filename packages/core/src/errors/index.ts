/**
 * Custom Error Classes
 */

/**
 * Base error class for all ghidra-dmg errors
 */
export class GhidraDmgError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'GhidraDmgError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Bad, missing or conflicting options. Raised before any I/O.
 */
export class ConfigurationError extends GhidraDmgError {
  constructor(field: string, message: string) {
    super(
      `Invalid ${field}: ${message}`,
      'CONFIGURATION_ERROR',
      { field }
    );
    this.name = 'ConfigurationError';
  }
}

/**
 * The base Ghidra release could not be found or read
 */
export class ResolutionError extends GhidraDmgError {
  constructor(message: string, path?: string, options?: { cause?: unknown }) {
    super(message, 'RESOLUTION_ERROR', path === undefined ? undefined : { path }, options);
    this.name = 'ResolutionError';
  }
}

/**
 * A download, clone or extension build failed
 */
export class FetchError extends GhidraDmgError {
  public readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`Failed to fetch ${source}: ${message}`, 'FETCH_ERROR', { source }, options);
    this.name = 'FetchError';
    this.source = source;
  }
}

/**
 * A modification step (theme, runtime bundling, branding) failed
 */
export class PatchError extends GhidraDmgError {
  public readonly step: string;

  constructor(step: string, message: string, options?: { cause?: unknown }) {
    super(`${step} failed: ${message}`, 'PATCH_ERROR', { step }, options);
    this.name = 'PatchError';
    this.step = step;
  }
}

/**
 * Disk image creation failed; no artifact was written
 */
export class PackagingError extends GhidraDmgError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PACKAGING_ERROR', undefined, options);
    this.name = 'PackagingError';
  }
}

/**
 * External command error
 */
export class CommandExecutionError extends GhidraDmgError {
  public readonly exitCode: number;
  public readonly stderr: string;

  constructor(
    command: string,
    exitCode: number,
    stderr: string
  ) {
    const excerpt = stderr.trim().split('\n').slice(-5).join('\n');
    super(
      `${command} exited with code ${exitCode}${excerpt ? `: ${excerpt}` : ''}`,
      'COMMAND_EXECUTION_ERROR',
      { command, exitCode, stderr: stderr.substring(0, 1000) }
    );
    this.name = 'CommandExecutionError';
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

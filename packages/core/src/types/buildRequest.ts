/**
 * Build Request Types
 */

/**
 * Which Java runtime, if any, ships inside the bundle
 */
export type RuntimeBundle =
  | { readonly kind: 'none' }
  | { readonly kind: 'jdk'; readonly path: string }
  | { readonly kind: 'graal' };

export interface BuildRequest {
  /** Destination of the disk image: a `.dmg` file path or a directory */
  readonly outputPath: string;
  /** Extension sources in command-line order; duplicates are kept */
  readonly extensions: readonly string[];
  readonly darkMode: boolean;
  /** Local Ghidra zip or install; when absent the latest release is fetched */
  readonly sourcePath?: string;
  readonly runtime: RuntimeBundle;
  /** Patch launch.properties to use the macOS screen menu bar */
  readonly screenMenuBar: boolean;
  /** Patch Generic.jar so the dock shows the bundle icon */
  readonly dockIcon: boolean;
}

/**
 * Options as they arrive from the command line, before validation
 */
export interface RawBuildOptions {
  out?: string;
  outputPath?: string;
  extension?: string[] | boolean;
  darkMode?: boolean;
  path?: string;
  jdk?: string;
  graal?: boolean;
  screenMenuBar?: boolean;
  dockIcon?: boolean;
}

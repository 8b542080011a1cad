/**
 * Build Request Parsing
 *
 * Turns raw command-line options into an immutable BuildRequest. Purely
 * in-memory: nothing here touches the filesystem.
 */

import { z } from 'zod';
import { ConfigurationError } from './errors/index.js';
import type { BuildRequest, RawBuildOptions, RuntimeBundle } from './types/buildRequest.js';

const optionalPath = z.string().trim().min(1).optional();

const rawOptionsSchema = z.object({
  out: optionalPath,
  outputPath: optionalPath,
  // `-e` given without values arrives as `true`
  extension: z
    .union([z.array(z.string().trim().min(1, 'extension source must not be empty')), z.boolean()])
    .optional(),
  darkMode: z.boolean().optional(),
  path: optionalPath,
  jdk: optionalPath,
  graal: z.boolean().optional(),
  screenMenuBar: z.boolean().optional(),
  dockIcon: z.boolean().optional(),
});

function resolveOutputPath(out?: string, outputPath?: string): string {
  if (out !== undefined && outputPath !== undefined && out !== outputPath) {
    throw new ConfigurationError('output path', `--out (${out}) and --output-path (${outputPath}) disagree`);
  }
  const resolved = out ?? outputPath;
  if (resolved === undefined) {
    throw new ConfigurationError('output path', 'an output path is required (-o/--out)');
  }
  return resolved;
}

function resolveRuntime(jdk?: string, graal?: boolean): RuntimeBundle {
  if (jdk !== undefined && graal === true) {
    throw new ConfigurationError('runtime', '--jdk and --graal are mutually exclusive');
  }
  if (jdk !== undefined) {
    return { kind: 'jdk', path: jdk };
  }
  if (graal === true) {
    return { kind: 'graal' };
  }
  return { kind: 'none' };
}

/**
 * Validate raw options and freeze them into a BuildRequest
 */
export function parseBuildRequest(raw: RawBuildOptions): BuildRequest {
  const parsed = rawOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue ? issue.path.join('.') || 'options' : 'options';
    throw new ConfigurationError(field, issue?.message ?? 'invalid options');
  }

  const options = parsed.data;
  const outputPath = resolveOutputPath(options.out, options.outputPath);
  const runtime = resolveRuntime(options.jdk, options.graal);
  const extensions = Array.isArray(options.extension) ? options.extension : [];

  return Object.freeze({
    outputPath,
    extensions: Object.freeze([...extensions]),
    darkMode: options.darkMode ?? false,
    sourcePath: options.path,
    runtime: Object.freeze(runtime),
    screenMenuBar: options.screenMenuBar ?? false,
    dockIcon: options.dockIcon ?? false,
  });
}

/**
 * Short description of the runtime choice, for logs and summaries
 */
export function describeRuntime(runtime: RuntimeBundle): string {
  switch (runtime.kind) {
    case 'none':
      return 'system Java';
    case 'jdk':
      return `bundled JDK (${runtime.path})`;
    case 'graal':
      return 'bundled GraalVM + Ghidraal';
  }
}

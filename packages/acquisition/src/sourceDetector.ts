/**
 * Extension Source Detector
 *
 * Classifies an `--extension` argument and derives the extension's name.
 */

import { ConfigurationError } from '@ghidra-dmg/core';
import { lastSegment, sanitizeFilename } from '@ghidra-dmg/utils';

export type ExtensionSourceType = 'git' | 'archive' | 'directory';

export interface ExtensionSource {
  /** The argument exactly as given */
  source: string;
  type: ExtensionSourceType;
  /** Name used for the cache directory and the installed extension */
  name: string;
}

export class SourceDetector {
  /**
   * Detect source type; returns null for an empty argument
   */
  detect(value: string): ExtensionSource | null {
    const trimmed = value.trim();

    if (!trimmed) {
      return null;
    }

    if (this.isGitUrl(trimmed)) {
      return {
        source: trimmed,
        type: 'git',
        name: this.nameFrom(trimmed, '.git'),
      };
    }

    if (trimmed.toLowerCase().endsWith('.zip')) {
      return {
        source: trimmed,
        type: 'archive',
        name: this.nameFrom(trimmed, '.zip'),
      };
    }

    return {
      source: trimmed,
      type: 'directory',
      name: this.nameFrom(trimmed, ''),
    };
  }

  private isGitUrl(value: string): boolean {
    const lower = value.toLowerCase();
    return (
      lower.startsWith('http://') ||
      lower.startsWith('https://') ||
      lower.startsWith('ssh://') ||
      lower.startsWith('git@') ||
      lower.endsWith('.git')
    );
  }

  private nameFrom(value: string, suffix: string): string {
    let segment = lastSegment(value);
    if (suffix && segment.toLowerCase().endsWith(suffix)) {
      segment = segment.slice(0, -suffix.length);
    }
    return sanitizeFilename(segment) || 'extension';
  }
}

export const sourceDetector = new SourceDetector();

/**
 * Detect an extension source, throwing on an empty argument
 */
export function detectExtensionSource(value: string): ExtensionSource {
  const detected = sourceDetector.detect(value);
  if (!detected) {
    throw new ConfigurationError('extension', 'source must not be empty');
  }
  return detected;
}

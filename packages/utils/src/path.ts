/**
 * Path Utilities
 */

/**
 * Sanitize a filename to be safe for filesystem
 */
export function sanitizeFilename(filename: string): string {
  return filename
    // Remove null bytes
    .replace(/\0/g, '')
    // Replace reserved characters
    .replace(/[<>:"/\\|?*]/g, '_')
    // Replace control characters
    .replace(/[\x00-\x1f\x80-\x9f]/g, '')
    // Trim whitespace and dots
    .trim()
    .replace(/^\.+|\.+$/g, '')
    .substring(0, 200);
}

/**
 * Last segment of a path or URL, ignoring trailing slashes
 */
export function lastSegment(pathOrUrl: string): string {
  const trimmed = pathOrUrl.replace(/[/\\]+$/, '');
  const parts = trimmed.split(/[/\\:]/);
  return parts[parts.length - 1] ?? '';
}

/**
 * Whether the path names a gzip-compressed tarball
 */
export function isTarball(filename: string): boolean {
  const lower = filename.toLowerCase();
  return lower.endsWith('.tar.gz') || lower.endsWith('.tgz');
}

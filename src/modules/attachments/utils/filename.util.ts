/**
 * Reduces a client-supplied filename to its last path component and replaces
 * every character outside `[A-Za-z0-9.-]` with an underscore.
 *
 * Both `/` and `\` count as separators, so Windows paths are handled on any
 * platform. The result may still be `.` or `..`; see `isReservedFilename`.
 */
export function sanitizeFilename(filename: string): string;
export function sanitizeFilename(filename: string | null | undefined): string | null;
export function sanitizeFilename(filename: string | null | undefined): string | null {
  if (filename === null || filename === undefined) {
    return null;
  }

  return filename
    .trim()
    .replace(/^[\s\S]*[\\/]/, '')
    .replace(/[^A-Za-z0-9.-]/gu, '_');
}

/**
 * `.` and `..` survive sanitizing but cannot be used as a path segment.
 */
export function isReservedFilename(filename: string | null): boolean {
  return filename === '.' || filename === '..';
}

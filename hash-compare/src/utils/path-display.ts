import path from 'node:path';

/**
 * Renders a stored absolute path for display
 * @param filePath - Absolute path as recorded during traversal
 * @param root - Root the file was found under
 * @param relative - Show the path relative to `root`
 *
 * @example
 * toDisplayPath('/backups/disk1/photos/a.jpg', '/backups/disk1', true)
 * // Returns: 'photos/a.jpg'
 */
export function toDisplayPath(filePath: string, root: string, relative: boolean): string {
  if (!relative) {
    return filePath;
  }

  const relativePath = path.relative(root, filePath);
  return relativePath === '' ? '.' : relativePath;
}

/**
 * Renders several paths under the same root, optionally sorted
 */
export function toDisplayPaths(
  filePaths: readonly string[],
  root: string,
  relative: boolean,
  sort: boolean
): string[] {
  const displayed = filePaths.map((p) => toDisplayPath(p, root, relative));
  return sort ? displayed.sort(compareStrings) : displayed;
}

/**
 * Code-unit ordering, independent of locale
 */
export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

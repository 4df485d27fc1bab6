/**
 * Path validation and manipulation utilities
 */

import * as path from "node:path";

// System directories never restored into or removed, along with anything below them
export const PROTECTED_ROOTS = ["/bin", "/sbin", "/usr", "/etc", "/sys", "/proc", "/boot"];

/**
 * Check if a file path is within an allowed directory.
 * Prevents path traversal attacks.
 */
export function isPathWithinDir(filePath: string, allowedDir: string): boolean {
  const normalizedPath = path.resolve(filePath);
  const normalizedDir = path.resolve(allowedDir);

  return (
    normalizedPath.startsWith(normalizedDir + path.sep) ||
    normalizedPath === normalizedDir
  );
}

/**
 * Whether a path is the filesystem root or lies under a system directory
 */
export function isProtectedPath(target: string): boolean {
  const resolved = path.resolve(target);
  if (resolved === path.parse(resolved).root) return true;

  return PROTECTED_ROOTS.some((dir) => isPathWithinDir(resolved, dir));
}

/**
 * Path Utilities Module
 *
 * Tracked paths, chunk paths and ignore-list entries are stored as
 * forward-slash paths relative to the working root. These helpers convert
 * between that form and absolute, platform-native paths.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Check whether a path exists (any file type). Never throws.
 */
export async function pathExists(absolutePath: string): Promise<boolean> {
  try {
    await fs.promises.access(absolutePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Normalize a path to absolute form with consistent separators
 *
 * @example
 * ```typescript
 * normalizePath('./data/../data/big.bin')
 * // => '/home/dev/repo/data/big.bin'
 * ```
 */
export function normalizePath(inputPath: string): string {
  let normalized = path.normalize(path.resolve(inputPath));

  if (normalized.length > 1 && normalized.endsWith(path.sep)) {
    normalized = normalized.slice(0, -1);
  }

  return normalized;
}

/**
 * Convert a path to forward-slash form without touching anything else.
 */
export function toPosixPath(inputPath: string): string {
  return inputPath.replace(/\\/g, '/');
}

/**
 * Make `targetPath` relative to `basePath` with forward slashes.
 *
 * Relative inputs are resolved against `basePath` first.
 *
 * @example
 * ```typescript
 * toRelativePath('/repo/data/big.bin', '/repo') // => 'data/big.bin'
 * toRelativePath('./data/big.bin', '/repo')     // => 'data/big.bin'
 * ```
 */
export function toRelativePath(targetPath: string, basePath: string): string {
  const normalizedBase = normalizePath(basePath);
  const normalizedTarget = normalizePath(path.resolve(normalizedBase, targetPath));
  return toPosixPath(path.relative(normalizedBase, normalizedTarget));
}

/**
 * Resolve a stored (forward-slash, possibly relative) path against `basePath`.
 * Absolute stored paths are returned normalized.
 *
 * @example
 * ```typescript
 * toAbsolutePath('data/big.bin', '/repo') // => '/repo/data/big.bin'
 * ```
 */
export function toAbsolutePath(storedPath: string, basePath: string): string {
  const platformPath = storedPath.replace(/\//g, path.sep);
  return normalizePath(path.resolve(basePath, platformPath));
}

/**
 * Check if a path is within a directory (or is the directory itself)
 */
export function isWithinDirectory(targetPath: string, directoryPath: string): boolean {
  const normalizedTarget = normalizePath(targetPath);
  const normalizedDir = normalizePath(directoryPath);

  if (process.platform === 'win32') {
    const lowerTarget = normalizedTarget.toLowerCase();
    const lowerDir = normalizedDir.toLowerCase();
    return lowerTarget === lowerDir || lowerTarget.startsWith(lowerDir + path.sep);
  }

  return normalizedTarget === normalizedDir || normalizedTarget.startsWith(normalizedDir + path.sep);
}

/**
 * Make `targetPath` relative to `root` only if it lies strictly inside it.
 *
 * @returns The forward-slash relative path, or null when the path is the root
 *          itself or escapes it
 */
export function relativeInsideRoot(targetPath: string, root: string): string | null {
  const absolute = normalizePath(path.resolve(root, targetPath));
  if (!isWithinDirectory(absolute, root)) {
    return null;
  }

  const relative = toRelativePath(absolute, root);
  return relative === '' ? null : relative;
}

/**
 * File Scanner
 *
 * Walks the working root and returns files larger than the size limit.
 * Directories whose name starts with "." are not entered; dotfiles in
 * ordinary directories are still considered.
 */

import * as fs from 'node:fs';
import { glob, type IgnoreLike } from 'glob';
import { minimatch } from 'minimatch';
import { getLogger } from '../utils/logger.js';
import { normalizePath, toAbsolutePath, toPosixPath } from '../utils/paths.js';
import { scanFailed, toError } from '../errors/index.js';

/**
 * Do not descend into dot-directories (.git, .venv, ...) below `root`.
 * Dotfiles themselves are still matched.
 */
function pruneDotDirectories(root: string): IgnoreLike {
  return {
    childrenIgnored: (entry) => entry.name.startsWith('.') && entry.fullpath() !== root,
  };
}

export interface ScanOptions {
  /** Extra glob patterns (relative to root) to leave out */
  excludePatterns?: readonly string[];
  /** Absolute paths to leave out (store file, ignore list, config) */
  excludePaths?: readonly string[];
}

export interface LargeFile {
  /** Root-relative, forward-slash path */
  path: string;
  size: number;
}

function isExcluded(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true, matchBase: true }));
}

/**
 * Find files strictly larger than `sizeLimitBytes` under `root`
 *
 * @returns Matches sorted by path
 * @throws SplitKeeperError (SCAN_FAILED) if the traversal itself fails
 */
export async function findLargeFiles(
  root: string,
  sizeLimitBytes: number,
  options: ScanOptions = {}
): Promise<LargeFile[]> {
  const logger = getLogger();
  const normalizedRoot = normalizePath(root);
  const excluded = new Set((options.excludePaths ?? []).map((p) => normalizePath(p)));
  const excludePatterns = options.excludePatterns ?? [];

  logger.info('FileScanner', `Finding files larger than ${sizeLimitBytes} bytes`, {
    root: normalizedRoot,
  });

  let files: string[];
  try {
    files = await glob('**/*', {
      cwd: normalizedRoot,
      nodir: true,
      dot: true,
      absolute: false,
      ignore: pruneDotDirectories(normalizedRoot),
    });
  } catch (error) {
    throw scanFailed(normalizedRoot, toError(error));
  }

  const large: LargeFile[] = [];
  for (const file of files) {
    const relativePath = toPosixPath(file);
    const absolutePath = toAbsolutePath(relativePath, normalizedRoot);
    if (excluded.has(absolutePath) || isExcluded(relativePath, excludePatterns)) {
      continue;
    }

    try {
      const stats = await fs.promises.stat(absolutePath);
      if (stats.size > sizeLimitBytes) {
        large.push({ path: relativePath, size: stats.size });
      }
    } catch (error) {
      // Deleted between listing and stat, or unreadable
      logger.debug('FileScanner', 'Skipping file during scan', {
        path: relativePath,
        error: toError(error).message,
      });
    }
  }

  large.sort((a, b) => (a.path < b.path ? -1 : a.path > b.path ? 1 : 0));

  logger.info('FileScanner', `Found ${large.length} large files`, { scanned: files.length });
  return large;
}

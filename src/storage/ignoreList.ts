/**
 * Ignore List Module
 *
 * Adds original-file paths to a newline-delimited exclusion list (such as
 * .gitignore) so the version-control system skips the oversized originals
 * and only sees their chunks. Entries are only ever added.
 */

import * as fs from 'node:fs';
import { getLogger } from '../utils/logger.js';
import { atomicWriteLines } from '../utils/atomicWrite.js';
import { relativeInsideRoot } from '../utils/paths.js';
import { SplitKeeperError, pathOutsideRoot } from '../errors/index.js';

export interface RejectedIgnorePath {
  path: string;
  error: SplitKeeperError;
}

export interface IgnoreUpdateResult {
  /** Relative entries that were not in the list before */
  added: string[];
  /** Paths that could not be made relative to the root */
  rejected: RejectedIgnorePath[];
  /** Number of entries in the list after the update */
  total: number;
}

/**
 * Read the existing entries: trimmed, blank lines dropped.
 *
 * @returns An empty list if the file does not exist
 */
export async function readIgnoreEntries(ignorePath: string): Promise<string[]> {
  let content: string;
  try {
    content = await fs.promises.readFile(ignorePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Union `paths` (made relative to `root`) into the ignore list
 *
 * The file is rewritten sorted and de-duplicated. A path outside the root is
 * rejected on its own; the others are still written. Nothing is written when
 * no path is given or every path was rejected.
 *
 * @example
 * ```typescript
 * await addIgnoreEntries('/repo/.gitignore', ['data/big.bin'], '/repo');
 * ```
 */
export async function addIgnoreEntries(
  ignorePath: string,
  paths: readonly string[],
  root: string
): Promise<IgnoreUpdateResult> {
  const logger = getLogger();
  const rejected: RejectedIgnorePath[] = [];
  const candidates = new Set<string>();

  for (const filePath of paths) {
    const relative = relativeInsideRoot(filePath, root);
    if (relative === null) {
      const error = pathOutsideRoot(filePath, root);
      logger.warn('IgnoreList', error.developerMessage);
      rejected.push({ path: filePath, error });
      continue;
    }
    candidates.add(relative);
  }

  const existing = await readIgnoreEntries(ignorePath);

  if (candidates.size === 0) {
    return { added: [], rejected, total: new Set(existing).size };
  }

  const existingSet = new Set(existing);
  const added = [...candidates].filter((entry) => !existingSet.has(entry)).sort();
  const entries = [...new Set([...existing, ...candidates])].sort();

  await atomicWriteLines(ignorePath, entries);

  logger.info('IgnoreList', `Added ${added.length} files to ${ignorePath}`);
  return { added, rejected, total: entries.length };
}

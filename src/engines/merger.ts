/**
 * Merger Engine
 *
 * Rebuilds an original file by concatenating its chunk files in order,
 * checks the result against the recorded size, then removes the chunks.
 *
 * The merger never reads or writes the tracker store or the ignore list;
 * those stay as they are so that repeated merge runs only touch the
 * reconstructed files.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileHandle } from 'node:fs/promises';
import { getLogger } from '../utils/logger.js';
import { formatSize } from '../utils/size.js';
import { pathExists, toAbsolutePath } from '../utils/paths.js';
import { COPY_BUFFER_SIZE } from './splitter.js';
import {
  mergeIOFailed,
  missingChunks,
  sizeMismatch,
  toError,
} from '../errors/index.js';
import { missingChunkPaths, removeChunkFiles, type SplitRecord } from '../storage/tracker.js';

// ============================================================================
// Types
// ============================================================================

/**
 * - merged: the target was (re)written from the chunks
 * - already-present: the target already had the recorded size; only the
 *   chunks were removed
 */
export type MergeStatus = 'merged' | 'already-present';

export interface MergeOutcome {
  originalPath: string;
  status: MergeStatus;
  /** Bytes written to the target (0 when already present) */
  bytesWritten: number;
  /** Chunk paths deleted after the merge */
  removedChunks: string[];
}

export interface MergeOptions {
  /** Directory that stored paths resolve against (default: process.cwd()) */
  root?: string;
}

// ============================================================================
// Helpers
// ============================================================================

async function statSize(absolutePath: string): Promise<number | null> {
  try {
    const stats = await fs.promises.stat(absolutePath);
    return stats.size;
  } catch {
    return null;
  }
}

/**
 * True when a previous merge already rebuilt this file: every chunk of a
 * non-empty chunk list is gone and the target has the recorded size.
 */
export async function isAlreadyReconstituted(record: SplitRecord, root: string): Promise<boolean> {
  if (record.chunkPaths.length === 0) {
    return false;
  }

  const missing = await missingChunkPaths(record, root);
  if (missing.length !== record.chunkPaths.length) {
    return false;
  }

  return (await statSize(toAbsolutePath(record.originalPath, root))) === record.originalSize;
}

/**
 * Append the full contents of `sourcePath` to the open `target`.
 */
async function appendFile(
  target: FileHandle,
  sourcePath: string,
  buffer: Buffer
): Promise<number> {
  const source = await fs.promises.open(sourcePath, 'r');
  let copied = 0;
  try {
    for (;;) {
      const { bytesRead } = await source.read(buffer, 0, buffer.length, null);
      if (bytesRead === 0) break;
      await target.write(buffer, 0, bytesRead);
      copied += bytesRead;
    }
  } finally {
    await source.close();
  }
  return copied;
}

// ============================================================================
// Merge
// ============================================================================

/**
 * Rebuild `record.originalPath` from its chunks
 *
 * 1. Any missing chunk -> MISSING_CHUNKS, target untouched.
 * 2. Target exists with the recorded size -> chunks removed, target kept.
 *    Target exists with another size -> overwritten (warning).
 * 3. Chunks are streamed in order into the target.
 * 4. Resulting size differs -> target deleted, SIZE_MISMATCH.
 *    Otherwise the chunks are deleted.
 *
 * @throws SplitKeeperError (MISSING_CHUNKS | SIZE_MISMATCH | MERGE_IO_FAILED)
 */
export async function mergeRecord(
  record: SplitRecord,
  options: MergeOptions = {}
): Promise<MergeOutcome> {
  const logger = getLogger();
  const root = options.root ?? process.cwd();
  const { originalPath, originalSize } = record;
  const targetPath = toAbsolutePath(originalPath, root);

  logger.info('Merger', `Merging ${originalPath}...`);

  const missing = await missingChunkPaths(record, root);
  if (missing.length > 0) {
    throw missingChunks(originalPath, missing);
  }

  const existingSize = await statSize(targetPath);
  if (existingSize !== null) {
    if (existingSize === originalSize) {
      logger.info('Merger', `Original file ${originalPath} already exists with correct size, skipping merge`);
      const removedChunks = await removeChunkFiles(record, root);
      return { originalPath, status: 'already-present', bytesWritten: 0, removedChunks };
    }
    logger.warn(
      'Merger',
      `Original file ${originalPath} exists but size mismatch: expected ${originalSize}, got ${existingSize}. Recreating it from split files`
    );
  }

  let bytesWritten = 0;
  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });

    const target = await fs.promises.open(targetPath, 'w');
    try {
      const buffer = Buffer.alloc(COPY_BUFFER_SIZE);
      for (const chunkPath of record.chunkPaths) {
        bytesWritten += await appendFile(target, toAbsolutePath(chunkPath, root), buffer);
      }
    } finally {
      await target.close();
    }
  } catch (error) {
    await fs.promises.rm(targetPath, { force: true });
    throw mergeIOFailed(originalPath, toError(error));
  }

  const mergedSize = await statSize(targetPath);
  if (mergedSize !== originalSize) {
    await fs.promises.rm(targetPath, { force: true });
    throw sizeMismatch(originalPath, originalSize, mergedSize ?? 0);
  }

  logger.info('Merger', `Successfully merged ${originalPath} (${formatSize(originalSize)})`);

  const removedChunks = await removeChunkFiles(record, root);
  return { originalPath, status: 'merged', bytesWritten, removedChunks };
}

/**
 * Whether the original file of `record` currently exists under `root`.
 */
export async function originalExists(record: SplitRecord, root: string): Promise<boolean> {
  return pathExists(toAbsolutePath(record.originalPath, root));
}

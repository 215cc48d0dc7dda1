/**
 * Splitter Engine
 *
 * Cuts a file into fixed-size byte-range chunk files named
 * `<prefix><NNN>` and returns the split record describing them.
 *
 * Chunk size is the configured limit minus a headroom (1 MiB by default) so
 * that no chunk can reach the external per-file cap. The source is streamed
 * with bounded reads and is never modified or deleted.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileHandle } from 'node:fs/promises';
import { getLogger } from '../utils/logger.js';
import { MIB, formatSize } from '../utils/size.js';
import { toAbsolutePath, toPosixPath } from '../utils/paths.js';
import { chunkLimitTooSmall, splitIOFailed, toError } from '../errors/index.js';
import type { SplitRecord } from '../storage/tracker.js';

// ============================================================================
// Constants
// ============================================================================

/** Default space kept free below the size limit in every chunk */
export const CHUNK_HEADROOM_BYTES = MIB;

/** Marker inserted between the path-derived stem and the chunk index */
export const SPLIT_MARKER = '_split_';

/** Minimum digits in a chunk index */
export const CHUNK_INDEX_DIGITS = 3;

/** Upper bound for a single read/write while copying */
export const COPY_BUFFER_SIZE = MIB;

// ============================================================================
// Types
// ============================================================================

export interface SplitOptions {
  /** Directory that relative paths resolve against (default: process.cwd()) */
  root?: string;
  /** Directory for chunk files, relative to root (default: root itself) */
  chunkDir?: string;
  /** Bytes subtracted from the limit to get the chunk size (default: 1 MiB) */
  headroomBytes?: number;
}

// ============================================================================
// Naming
// ============================================================================

/**
 * Compute the effective chunk size for a limit
 *
 * @throws SplitKeeperError (CONFIG_INVALID) when the result is not positive
 */
export function computeChunkSize(
  chunkLimitBytes: number,
  headroomBytes: number = CHUNK_HEADROOM_BYTES
): number {
  const chunkSize = chunkLimitBytes - headroomBytes;
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw chunkLimitTooSmall(chunkLimitBytes, headroomBytes);
  }
  return chunkSize;
}

/**
 * Derive the chunk prefix for a tracked path
 *
 * Separators become underscores, a leading "./" and leading underscores are
 * dropped, and the last extension is removed.
 *
 * @example
 * ```typescript
 * deriveChunkPrefix('data/big.tar.gz')   // => 'data_big.tar_split_'
 * deriveChunkPrefix('./models/w.bin')    // => 'models_w_split_'
 * deriveChunkPrefix('/abs/dump.sql')     // => 'abs_dump_split_'
 * ```
 */
export function deriveChunkPrefix(filePath: string): string {
  let flattened = toPosixPath(filePath);
  if (flattened.startsWith('./')) {
    flattened = flattened.slice(2);
  }
  flattened = flattened.replace(/\//g, '_').replace(/^_+/, '');

  const stem = path.posix.basename(flattened, path.posix.extname(flattened));
  return `${stem}${SPLIT_MARKER}`;
}

/**
 * Chunk file name for `index` (zero-padded to three digits)
 */
export function chunkFileName(prefix: string, index: number): string {
  return `${prefix}${String(index).padStart(CHUNK_INDEX_DIGITS, '0')}`;
}

/**
 * Stored (root-relative, forward-slash) path of chunk `index`
 */
export function chunkStoredPath(prefix: string, index: number, chunkDir = ''): string {
  const name = chunkFileName(prefix, index);
  const dir = toPosixPath(chunkDir).replace(/^\.\//, '').replace(/\/+$/, '');
  return dir === '' || dir === '.' ? name : `${dir}/${name}`;
}

// ============================================================================
// Split
// ============================================================================

/**
 * Split `filePath` into chunk files
 *
 * A zero-byte file yields a record with no chunks. On any I/O failure every
 * chunk written by this call is deleted before the error is thrown.
 *
 * @param filePath - Tracked path (relative to root, or absolute)
 * @param chunkLimitBytes - Size limit each chunk must stay under
 * @returns Record whose originalSize is the source size measured after the split
 * @throws SplitKeeperError (CONFIG_INVALID | SPLIT_IO_FAILED)
 */
export async function splitFile(
  filePath: string,
  chunkLimitBytes: number,
  options: SplitOptions = {}
): Promise<SplitRecord> {
  const logger = getLogger();
  const root = options.root ?? process.cwd();
  const chunkSize = computeChunkSize(chunkLimitBytes, options.headroomBytes);
  const prefix = deriveChunkPrefix(filePath);
  const sourcePath = toAbsolutePath(filePath, root);
  const chunkPaths: string[] = [];

  logger.info('Splitter', `Splitting ${filePath}...`, { chunkSize });

  try {
    if (options.chunkDir) {
      await fs.promises.mkdir(toAbsolutePath(options.chunkDir, root), { recursive: true });
    }

    const source = await fs.promises.open(sourcePath, 'r');
    try {
      const buffer = Buffer.alloc(Math.min(COPY_BUFFER_SIZE, chunkSize));
      let endOfFile = false;

      while (!endOfFile) {
        let chunk: FileHandle | null = null;
        let written = 0;

        try {
          while (written < chunkSize) {
            const { bytesRead } = await source.read(
              buffer,
              0,
              Math.min(buffer.length, chunkSize - written),
              null
            );
            if (bytesRead === 0) {
              endOfFile = true;
              break;
            }

            if (chunk === null) {
              const storedPath = chunkStoredPath(prefix, chunkPaths.length, options.chunkDir);
              // Recorded before opening so a failed open is still cleaned up
              chunkPaths.push(storedPath);
              chunk = await fs.promises.open(toAbsolutePath(storedPath, root), 'w');
            }

            await chunk.write(buffer, 0, bytesRead);
            written += bytesRead;
          }
        } finally {
          if (chunk !== null) {
            await chunk.close();
          }
        }

        if (written > 0) {
          logger.info('Splitter', `  Created ${chunkPaths[chunkPaths.length - 1]}: ${formatSize(written)}`);
        }
      }
    } finally {
      await source.close();
    }

    const { size: originalSize } = await fs.promises.stat(sourcePath);

    logger.info('Splitter', `Split ${filePath} into ${chunkPaths.length} parts`);

    return {
      originalPath: filePath,
      originalSize,
      chunkPrefix: prefix,
      chunkPaths,
      chunkCount: chunkPaths.length,
    };
  } catch (error) {
    await discardChunks(chunkPaths, root);
    throw splitIOFailed(filePath, toError(error));
  }
}

/**
 * Best-effort removal of chunks written by a failed split
 */
async function discardChunks(chunkPaths: readonly string[], root: string): Promise<void> {
  const logger = getLogger();
  for (const chunkPath of chunkPaths) {
    try {
      await fs.promises.rm(toAbsolutePath(chunkPath, root), { force: true });
    } catch (error) {
      logger.error('Splitter', `Could not remove partial chunk ${chunkPath}`, {
        error: toError(error).message,
      });
    }
  }
}

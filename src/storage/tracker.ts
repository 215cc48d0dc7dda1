/**
 * Tracker Store Module
 *
 * Persists the mapping from original file path to its split record:
 * - Zod schema validation of the on-disk document (unknown fields dropped)
 * - Recovered loading (missing / loaded / corrupt are distinguishable)
 * - Pure key-wise union of new records into an existing store
 * - Atomic persistence (temp file + rename)
 * - Chunk presence checks used by build, merge, clean and verify
 *
 * The store is an explicit value: operations take a TrackerStore and return
 * a new one; only loadStore/readStore/saveStore/mergeRecords touch the disk.
 */

import * as fs from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { atomicWriteJson } from '../utils/atomicWrite.js';
import { pathExists, toAbsolutePath } from '../utils/paths.js';
import {
  SplitKeeperError,
  storeCorrupt,
  storeWriteFailed,
  toError,
} from '../errors/index.js';

// ============================================================================
// Schema
// ============================================================================

/**
 * On-disk shape of a single split record
 */
export const StoredSplitRecordSchema = z.object({
  /** Path of the original file, exactly as seen at split time */
  original_file: z.string().min(1),

  /** Size of the original in bytes, measured after the split */
  original_size: z.number().int().nonnegative(),

  /** Chunk file name prefix, including the trailing "_split_" */
  split_prefix: z.string(),

  /** Chunk file paths in index order */
  split_files: z.array(z.string()),

  /** Number of chunk files */
  split_count: z.number().int().nonnegative(),
});

/**
 * On-disk shape of the whole tracker document
 */
export const StoredTrackerSchema = z.record(z.string(), StoredSplitRecordSchema);

export type StoredSplitRecord = z.infer<typeof StoredSplitRecordSchema>;

// ============================================================================
// Types
// ============================================================================

/**
 * Provenance of one split file. Concatenating the chunk files in
 * `chunkPaths` order reproduces the original as it was when split.
 */
export interface SplitRecord {
  originalPath: string;
  originalSize: number;
  chunkPrefix: string;
  chunkPaths: readonly string[];
  chunkCount: number;
}

/**
 * Original path -> split record
 */
export type TrackerStore = ReadonlyMap<string, SplitRecord>;

/**
 * Where a loaded store came from
 */
export type StoreSource = 'missing' | 'loaded' | 'corrupt';

export interface StoreLoadResult {
  store: TrackerStore;
  source: StoreSource;
  /** Set when source is 'corrupt' */
  error?: SplitKeeperError;
}

/**
 * Result of checking whether a candidate file is already split
 */
export type SplitCheck =
  | { status: 'not-split'; reason: 'untracked' }
  | { status: 'not-split'; reason: 'missing-chunks'; record: SplitRecord; missingChunks: string[] }
  | { status: 'stale'; record: SplitRecord; currentSize: number }
  | { status: 'valid'; record: SplitRecord };

/**
 * Missing chunk files for one tracked path
 */
export interface MissingChunkReport {
  originalPath: string;
  missingChunks: string[];
}

// ============================================================================
// Conversion
// ============================================================================

export function fromStoredRecord(stored: StoredSplitRecord): SplitRecord {
  return {
    originalPath: stored.original_file,
    originalSize: stored.original_size,
    chunkPrefix: stored.split_prefix,
    chunkPaths: [...stored.split_files],
    chunkCount: stored.split_count,
  };
}

export function toStoredRecord(record: SplitRecord): StoredSplitRecord {
  return {
    original_file: record.originalPath,
    original_size: record.originalSize,
    split_prefix: record.chunkPrefix,
    split_files: [...record.chunkPaths],
    split_count: record.chunkCount,
  };
}

/**
 * Create an empty store
 */
export function emptyStore(): TrackerStore {
  return new Map<string, SplitRecord>();
}

// ============================================================================
// Store I/O
// ============================================================================

/**
 * Strictly read the tracker store
 *
 * @returns The store, or null if the file does not exist
 * @throws SplitKeeperError (STORE_CORRUPT) if the file is unreadable, not JSON,
 *         or fails validation
 */
export async function readStore(storePath: string): Promise<TrackerStore | null> {
  const logger = getLogger();

  let content: string;
  try {
    content = await fs.promises.readFile(storePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug('Tracker', 'No tracker store found', { storePath });
      return null;
    }
    throw storeCorrupt(storePath, 'file could not be read', toError(error));
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw storeCorrupt(storePath, 'invalid JSON', toError(error));
  }

  const result = StoredTrackerSchema.safeParse(raw);
  if (!result.success) {
    const errors = result.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw storeCorrupt(storePath, errors);
  }

  const store = new Map<string, SplitRecord>();
  for (const [key, stored] of Object.entries(result.data)) {
    store.set(key, fromStoredRecord(stored));
  }

  logger.debug('Tracker', 'Tracker store loaded', { storePath, records: store.size });
  return store;
}

/**
 * Load the tracker store, recovering from corruption
 *
 * A corrupt store is reported with a warning and treated as empty; the
 * returned `source` tells callers which case applied.
 */
export async function loadStore(storePath: string): Promise<StoreLoadResult> {
  try {
    const store = await readStore(storePath);
    if (store === null) {
      return { store: emptyStore(), source: 'missing' };
    }
    return { store, source: 'loaded' };
  } catch (error) {
    if (error instanceof SplitKeeperError) {
      getLogger().warn('Tracker', 'Tracker store is corrupt, treating it as empty', {
        storePath,
        error: error.developerMessage,
      });
      return { store: emptyStore(), source: 'corrupt', error };
    }
    throw error;
  }
}

/**
 * Atomically persist the whole store
 *
 * @throws SplitKeeperError (STORE_WRITE_FAILED); the previous file is left intact
 */
export async function saveStore(storePath: string, store: TrackerStore): Promise<void> {
  const document: Record<string, StoredSplitRecord> = {};
  for (const [key, record] of store) {
    document[key] = toStoredRecord(record);
  }

  try {
    await atomicWriteJson(storePath, StoredTrackerSchema.parse(document));
  } catch (error) {
    throw storeWriteFailed(storePath, toError(error));
  }

  getLogger().info('Tracker', `Updated split information in ${storePath}`, {
    records: store.size,
  });
}

// ============================================================================
// Store Operations
// ============================================================================

/**
 * Key-wise union: new records replace same-key entries, everything else is kept.
 */
export function unionStores(store: TrackerStore, newRecords: Iterable<SplitRecord>): TrackerStore {
  const merged = new Map(store);
  for (const record of newRecords) {
    merged.set(record.originalPath, record);
  }
  return merged;
}

/**
 * Union `newRecords` into `store` and persist the result atomically.
 *
 * @returns The merged store as written
 */
export async function mergeRecords(
  storePath: string,
  store: TrackerStore,
  newRecords: Iterable<SplitRecord>
): Promise<TrackerStore> {
  const merged = unionStores(store, newRecords);
  await saveStore(storePath, merged);
  return merged;
}

/**
 * List the chunk paths of `record` that do not exist under `root`.
 */
export async function missingChunkPaths(record: SplitRecord, root: string): Promise<string[]> {
  const missing: string[] = [];
  for (const chunkPath of record.chunkPaths) {
    if (!(await pathExists(toAbsolutePath(chunkPath, root)))) {
      missing.push(chunkPath);
    }
  }
  return missing;
}

/**
 * Decide whether `filePath` still needs splitting
 *
 * - untracked                       -> not-split
 * - any chunk missing               -> not-split (record untouched)
 * - chunks present, size changed    -> stale (caller deletes the old chunks)
 * - chunks present, size unchanged  -> valid
 */
export async function checkAlreadySplit(
  store: TrackerStore,
  filePath: string,
  root: string
): Promise<SplitCheck> {
  const logger = getLogger();
  const record = store.get(filePath);

  if (!record) {
    return { status: 'not-split', reason: 'untracked' };
  }

  const missing = await missingChunkPaths(record, root);
  if (missing.length > 0) {
    if (missing.length === record.chunkPaths.length) {
      // Normal after `all`: the merge removed every chunk but kept the entry
      logger.info('Tracker', `No chunk files left for ${filePath}, it will be split again`);
    } else {
      logger.warn('Tracker', `Some split files missing for ${filePath}`, { missing });
    }
    return { status: 'not-split', reason: 'missing-chunks', record, missingChunks: missing };
  }

  const stats = await fs.promises.stat(toAbsolutePath(filePath, root));
  if (stats.size !== record.originalSize) {
    logger.warn(
      'Tracker',
      `${filePath} size changed since last split (was ${record.originalSize}, now ${stats.size})`
    );
    return { status: 'stale', record, currentSize: stats.size };
  }

  return { status: 'valid', record };
}

/**
 * All chunk paths across every record that currently exist on disk.
 */
export async function allChunkPaths(store: TrackerStore, root: string): Promise<string[]> {
  const existing: string[] = [];
  for (const record of store.values()) {
    for (const chunkPath of record.chunkPaths) {
      if (await pathExists(toAbsolutePath(chunkPath, root))) {
        existing.push(chunkPath);
      }
    }
  }
  return existing;
}

/**
 * Per-record list of chunk files that are missing. Records with every chunk
 * present are omitted.
 */
export async function findMissingChunks(
  store: TrackerStore,
  root: string
): Promise<MissingChunkReport[]> {
  const reports: MissingChunkReport[] = [];
  for (const record of store.values()) {
    const missing = await missingChunkPaths(record, root);
    if (missing.length > 0) {
      reports.push({ originalPath: record.originalPath, missingChunks: missing });
    }
  }
  return reports;
}

/**
 * Delete whichever chunk files of `record` still exist.
 *
 * @returns The chunk paths that were removed
 */
export async function removeChunkFiles(record: SplitRecord, root: string): Promise<string[]> {
  const logger = getLogger();
  const removed: string[] = [];

  for (const chunkPath of record.chunkPaths) {
    const absolute = toAbsolutePath(chunkPath, root);
    if (await pathExists(absolute)) {
      await fs.promises.rm(absolute, { force: true });
      removed.push(chunkPath);
      logger.debug('Tracker', `Removed split file: ${chunkPath}`);
    }
  }

  return removed;
}

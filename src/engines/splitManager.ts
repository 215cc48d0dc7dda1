/**
 * Split Manager
 *
 * Orchestrates the commands on top of the engines:
 * - build: scan -> check tracker -> split -> persist store -> update ignore list
 * - mergeAll: rebuild every tracked original (store and ignore list untouched)
 * - clean / rebuild / status / verify
 *
 * Per-file failures are collected and reported; they never stop the batch.
 * Store persistence failures propagate and end the run.
 */

import { getLogger } from '../utils/logger.js';
import { getConfigPath, type ResolvedSettings } from '../storage/config.js';
import {
  checkAlreadySplit,
  findMissingChunks,
  loadStore,
  mergeRecords,
  missingChunkPaths,
  removeChunkFiles,
  type MissingChunkReport,
  type SplitRecord,
  type StoreSource,
} from '../storage/tracker.js';
import { addIgnoreEntries, type IgnoreUpdateResult } from '../storage/ignoreList.js';
import { findLargeFiles } from './fileScanner.js';
import { computeChunkSize, deriveChunkPrefix, splitFile } from './splitter.js';
import { isAlreadyReconstituted, mergeRecord, originalExists } from './merger.js';
import { cleanChunks, type CleanResult } from './cleaner.js';
import {
  SplitKeeperError,
  chunkPrefixConflict,
  mergeIOFailed,
  splitIOFailed,
  wrapError,
} from '../errors/index.js';

// ============================================================================
// Types
// ============================================================================

export type ProgressPhase = 'scanning' | 'checking' | 'splitting' | 'merging';

export interface Progress {
  phase: ProgressPhase;
  current: number;
  total: number;
  currentFile?: string;
}

export type ProgressCallback = (progress: Progress) => void;

/**
 * A file whose split or merge failed; the rest of the batch still ran
 */
export interface FileFailure {
  path: string;
  error: SplitKeeperError;
}

export interface BuildResult {
  /** Files above the size limit */
  candidates: string[];
  /** Records written by this run */
  split: SplitRecord[];
  /** Already split with valid chunks */
  skipped: string[];
  /** Previously tracked files that were split again (stale or missing chunks) */
  resplit: string[];
  failed: FileFailure[];
  /** Null when nothing was split */
  ignore: IgnoreUpdateResult | null;
  storeSource: StoreSource;
}

export type MergeAllStatus = 'merged' | 'already-present' | 'already-merged';

export interface MergeAllEntry {
  originalPath: string;
  status: MergeAllStatus;
  removedChunks: string[];
}

export interface MergeAllResult {
  /** Records found in the store */
  total: number;
  entries: MergeAllEntry[];
  failed: FileFailure[];
  storeSource: StoreSource;
}

export interface StatusEntry {
  originalPath: string;
  originalSize: number;
  chunkCount: number;
  presentChunks: number;
  originalExists: boolean;
}

export interface StatusResult {
  storePath: string;
  storeSource: StoreSource;
  records: StatusEntry[];
}

export interface VerifyResult {
  storeSource: StoreSource;
  checked: number;
  missing: MissingChunkReport[];
  ok: boolean;
}

export interface RebuildResult {
  clean: CleanResult;
  build: BuildResult;
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Run `task` over `items` in sequential batches of `batchSize`
 */
async function runInBatches<T, R>(
  items: readonly T[],
  batchSize: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = [];
  for (let start = 0; start < items.length; start += batchSize) {
    const batch = items.slice(start, start + batchSize);
    const batchResults = await Promise.all(batch.map((item, offset) => task(item, start + offset)));
    results.push(...batchResults);
  }
  return results;
}

type Settled<R> = { ok: true; value: R } | { ok: false; failure: FileFailure };

// ============================================================================
// SplitManager Class
// ============================================================================

/**
 * @example
 * ```typescript
 * const config = await loadConfig(root);
 * const manager = new SplitManager(resolveSettings(config, {}, root));
 * const result = await manager.build();
 * console.log(`${result.split.length} files split`);
 * ```
 */
export class SplitManager {
  private readonly settings: ResolvedSettings;

  constructor(settings: ResolvedSettings) {
    this.settings = settings;
  }

  getSettings(): ResolvedSettings {
    return this.settings;
  }

  /**
   * Split every oversized file that is not already validly split
   *
   * @throws SplitKeeperError (CONFIG_INVALID) before touching any file if the
   *         limit leaves no room for chunk data; (STORE_WRITE_FAILED) if the
   *         store cannot be persisted
   */
  async build(onProgress?: ProgressCallback): Promise<BuildResult> {
    const logger = getLogger();
    const { root, sizeLimitBytes, headroomBytes, storePath, ignorePath, chunkDir } = this.settings;

    computeChunkSize(sizeLimitBytes, headroomBytes);

    onProgress?.({ phase: 'scanning', current: 0, total: 0 });
    const largeFiles = await findLargeFiles(root, sizeLimitBytes, {
      excludePatterns: this.settings.exclude,
      excludePaths: [storePath, ignorePath, getConfigPath(root)],
    });
    const candidates = largeFiles.map((file) => file.path);

    const { store, source: storeSource } = await loadStore(storePath);
    const result: BuildResult = {
      candidates,
      split: [],
      skipped: [],
      resplit: [],
      failed: [],
      ignore: null,
      storeSource,
    };

    if (candidates.length === 0) {
      logger.info('SplitManager', 'No files larger than size limit found');
      return result;
    }

    // Two paths must never write the same chunk names. Tracked paths keep
    // their prefix, so this runs before any stale chunks are removed.
    const prefixOwners = new Map<string, string>();
    for (const [key, record] of store) {
      prefixOwners.set(record.chunkPrefix, key);
    }

    // Decide what needs splitting
    const accepted: string[] = [];
    for (const [index, filePath] of candidates.entries()) {
      onProgress?.({ phase: 'checking', current: index + 1, total: candidates.length, currentFile: filePath });
      const prefix = deriveChunkPrefix(filePath);
      const owner = prefixOwners.get(prefix);
      if (owner !== undefined && owner !== filePath) {
        result.failed.push({ path: filePath, error: chunkPrefixConflict(filePath, prefix, owner) });
        continue;
      }
      try {
        const check = await checkAlreadySplit(store, filePath, root);
        if (check.status === 'valid') {
          logger.info('SplitManager', `File ${filePath} already split into ${check.record.chunkCount} parts, skipping`);
          result.skipped.push(filePath);
          continue;
        }
        if (check.status === 'stale' || check.reason === 'missing-chunks') {
          await removeChunkFiles(check.record, root);
          result.resplit.push(filePath);
        }
        prefixOwners.set(prefix, filePath);
        accepted.push(filePath);
      } catch (error) {
        result.failed.push({
          path: filePath,
          error: wrapError(error, (cause) => splitIOFailed(filePath, cause)),
        });
      }
    }

    if (accepted.length === 0) {
      logger.info('SplitManager', 'No new files need to be split');
      return result;
    }

    logger.info('SplitManager', `Processing ${accepted.length} files for splitting`);

    let completed = 0;
    const settled = await runInBatches(
      accepted,
      this.settings.concurrency,
      async (filePath): Promise<Settled<SplitRecord>> => {
        try {
          const record = await splitFile(filePath, sizeLimitBytes, { root, chunkDir, headroomBytes });
          return { ok: true, value: record };
        } catch (error) {
          return {
            ok: false,
            failure: { path: filePath, error: wrapError(error, (cause) => splitIOFailed(filePath, cause)) },
          };
        } finally {
          completed++;
          onProgress?.({ phase: 'splitting', current: completed, total: accepted.length, currentFile: filePath });
        }
      }
    );

    for (const entry of settled) {
      if (entry.ok) {
        result.split.push(entry.value);
      } else {
        logger.error('SplitManager', entry.failure.error.developerMessage);
        result.failed.push(entry.failure);
      }
    }

    if (result.split.length === 0) {
      logger.info('SplitManager', 'No files were split');
      return result;
    }

    // Single atomic store write once every per-file result is in
    await mergeRecords(storePath, store, result.split);

    result.ignore = await addIgnoreEntries(
      ignorePath,
      result.split.map((record) => record.originalPath),
      root
    );

    logger.info(
      'SplitManager',
      `Build completed. Split ${result.split.length} new files, ${result.ignore.added.length} added to ${ignorePath}`
    );
    return result;
  }

  /**
   * Rebuild every tracked original from its chunks
   *
   * The store and the ignore list are never modified, so the command can be
   * re-run; files rebuilt by an earlier run are reported as already-merged.
   */
  async mergeAll(onProgress?: ProgressCallback): Promise<MergeAllResult> {
    const logger = getLogger();
    const { root, storePath } = this.settings;
    const { store, source: storeSource } = await loadStore(storePath);
    const records = [...store.values()];

    const result: MergeAllResult = { total: records.length, entries: [], failed: [], storeSource };

    if (records.length === 0) {
      logger.info('SplitManager', 'No split file information found');
      return result;
    }

    logger.info('SplitManager', `Found split information for ${records.length} files`);

    let completed = 0;
    const settled = await runInBatches(
      records,
      this.settings.concurrency,
      async (record): Promise<Settled<MergeAllEntry>> => {
        const { originalPath } = record;
        try {
          if (await isAlreadyReconstituted(record, root)) {
            logger.debug('SplitManager', `${originalPath} was already merged`);
            return { ok: true, value: { originalPath, status: 'already-merged', removedChunks: [] } };
          }
          const outcome = await mergeRecord(record, { root });
          return {
            ok: true,
            value: { originalPath, status: outcome.status, removedChunks: outcome.removedChunks },
          };
        } catch (error) {
          return {
            ok: false,
            failure: { path: originalPath, error: wrapError(error, (cause) => mergeIOFailed(originalPath, cause)) },
          };
        } finally {
          completed++;
          onProgress?.({ phase: 'merging', current: completed, total: records.length, currentFile: originalPath });
        }
      }
    );

    for (const entry of settled) {
      if (entry.ok) {
        result.entries.push(entry.value);
      } else {
        logger.error('SplitManager', entry.failure.error.developerMessage);
        result.failed.push(entry.failure);
      }
    }

    logger.info('SplitManager', `Merged ${result.entries.length} of ${records.length} files`);
    return result;
  }

  /**
   * Remove every chunk file and the tracker store
   */
  async clean(): Promise<CleanResult> {
    return cleanChunks({ root: this.settings.root, storePath: this.settings.storePath });
  }

  /**
   * Clean, then build from scratch
   */
  async rebuild(onProgress?: ProgressCallback): Promise<RebuildResult> {
    const clean = await this.clean();
    const build = await this.build(onProgress);
    return { clean, build };
  }

  /**
   * Describe every tracked file: chunk presence and whether the original exists
   */
  async status(): Promise<StatusResult> {
    const { root, storePath } = this.settings;
    const { store, source } = await loadStore(storePath);

    const records: StatusEntry[] = [];
    for (const record of store.values()) {
      const missing = await missingChunkPaths(record, root);
      records.push({
        originalPath: record.originalPath,
        originalSize: record.originalSize,
        chunkCount: record.chunkCount,
        presentChunks: record.chunkPaths.length - missing.length,
        originalExists: await originalExists(record, root),
      });
    }

    return { storePath, storeSource: source, records };
  }

  /**
   * List missing chunk files for every tracked record
   */
  async verify(): Promise<VerifyResult> {
    const { store, source } = await loadStore(this.settings.storePath);
    const missing = await findMissingChunks(store, this.settings.root);
    return { storeSource: source, checked: store.size, missing, ok: missing.length === 0 };
  }
}

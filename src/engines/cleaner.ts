/**
 * Cleaner Engine
 *
 * Removes every chunk file known to the tracker store, then the store itself.
 * Running it with nothing to clean is a no-op.
 */

import * as fs from 'node:fs';
import { getLogger } from '../utils/logger.js';
import { pathExists, toAbsolutePath } from '../utils/paths.js';
import { allChunkPaths, loadStore } from '../storage/tracker.js';

export interface CleanOptions {
  /** Directory that stored paths resolve against */
  root: string;
  /** Absolute path of the tracker store */
  storePath: string;
}

export interface CleanResult {
  removedChunks: string[];
  removedCount: number;
  storeRemoved: boolean;
}

/**
 * Delete all existing chunk files listed in the store, then the store file.
 *
 * A corrupt store contributes no chunk paths but is still removed.
 */
export async function cleanChunks(options: CleanOptions): Promise<CleanResult> {
  const logger = getLogger();
  const { root, storePath } = options;

  const { store } = await loadStore(storePath);
  const chunkPaths = await allChunkPaths(store, root);

  for (const chunkPath of chunkPaths) {
    await fs.promises.rm(toAbsolutePath(chunkPath, root), { force: true });
    logger.info('Cleaner', `Removed split file: ${chunkPath}`);
  }

  if (chunkPaths.length > 0) {
    logger.info('Cleaner', `Cleaned ${chunkPaths.length} split files`);
  } else {
    logger.info('Cleaner', 'No split files to clean');
  }

  let storeRemoved = false;
  if (await pathExists(storePath)) {
    await fs.promises.rm(storePath, { force: true });
    storeRemoved = true;
    logger.info('Cleaner', `Removed ${storePath}`);
  }

  return { removedChunks: chunkPaths, removedCount: chunkPaths.length, storeRemoved };
}

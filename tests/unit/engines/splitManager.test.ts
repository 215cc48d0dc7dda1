import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import { SplitManager, type Progress } from '../../../src/engines/splitManager.js';
import type { ResolvedSettings } from '../../../src/storage/config.js';
import { ErrorCode } from '../../../src/errors/index.js';

vi.mock('../../../src/utils/logger.js', () => ({
  getLogger: () => ({
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  }),
}));

function patternBytes(length: number, seed = 0): Buffer {
  return Buffer.from(Array.from({ length }, (_, i) => (i + seed) % 256));
}

describe('SplitManager', () => {
  let testDir: string;
  let storePath: string;
  let ignorePath: string;

  function settings(overrides: Partial<ResolvedSettings> = {}): ResolvedSettings {
    return {
      root: testDir,
      sizeLimitBytes: 64,
      headroomBytes: 16,
      storePath,
      ignorePath,
      chunkDir: '',
      concurrency: 2,
      exclude: [],
      ...overrides,
    };
  }

  const file = (relativePath: string): string => path.join(testDir, ...relativePath.split('/'));

  async function writeFile(relativePath: string, content: Buffer): Promise<void> {
    await fs.promises.mkdir(path.dirname(file(relativePath)), { recursive: true });
    await fs.promises.writeFile(file(relativePath), content);
  }

  async function readStoreJson(): Promise<Record<string, unknown>> {
    return JSON.parse(await fs.promises.readFile(storePath, 'utf-8'));
  }

  beforeEach(async () => {
    testDir = path.join(os.tmpdir(), `splitkeeper-manager-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    storePath = path.join(testDir, 'split_files_info.json');
    ignorePath = path.join(testDir, '.gitignore');
    await fs.promises.mkdir(testDir, { recursive: true });

    // 100 bytes -> 48 + 48 + 4, 150 bytes -> 48 + 48 + 48 + 6
    await writeFile('big.bin', patternBytes(100));
    await writeFile('data/huge.bin', patternBytes(150, 7));
    await writeFile('small.txt', patternBytes(10));
  });

  afterEach(async () => {
    await fs.promises.rm(testDir, { recursive: true, force: true });
  });

  // ==========================================================================
  // build
  // ==========================================================================

  describe('build', () => {
    it('should split large files, record them and update the ignore list', async () => {
      const manager = new SplitManager(settings());

      const result = await manager.build();

      expect(result.candidates).toEqual(['big.bin', 'data/huge.bin']);
      expect(result.split.map((r) => r.originalPath)).toEqual(['big.bin', 'data/huge.bin']);
      expect(result.skipped).toEqual([]);
      expect(result.resplit).toEqual([]);
      expect(result.failed).toEqual([]);
      expect(result.storeSource).toBe('missing');
      expect(result.ignore).toEqual({ added: ['big.bin', 'data/huge.bin'], rejected: [], total: 2 });

      expect(await readStoreJson()).toEqual({
        'big.bin': {
          original_file: 'big.bin',
          original_size: 100,
          split_prefix: 'big_split_',
          split_files: ['big_split_000', 'big_split_001', 'big_split_002'],
          split_count: 3,
        },
        'data/huge.bin': {
          original_file: 'data/huge.bin',
          original_size: 150,
          split_prefix: 'data_huge_split_',
          split_files: ['data_huge_split_000', 'data_huge_split_001', 'data_huge_split_002', 'data_huge_split_003'],
          split_count: 4,
        },
      });
      expect(await fs.promises.readFile(ignorePath, 'utf-8')).toBe('big.bin\ndata/huge.bin\n');
    });

    it('should leave the store untouched on a second run', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      const before = await fs.promises.readFile(storePath, 'utf-8');
      const mtimeBefore = (await fs.promises.stat(storePath)).mtimeMs;

      const result = await manager.build();

      expect(result.split).toEqual([]);
      expect(result.skipped).toEqual(['big.bin', 'data/huge.bin']);
      expect(result.ignore).toBeNull();
      expect(await fs.promises.readFile(storePath, 'utf-8')).toBe(before);
      expect((await fs.promises.stat(storePath)).mtimeMs).toBe(mtimeBefore);
    });

    it('should re-split a file whose size changed and drop its old chunks', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await writeFile('big.bin', patternBytes(70));

      const result = await manager.build();

      expect(result.resplit).toEqual(['big.bin']);
      expect(result.skipped).toEqual(['data/huge.bin']);
      expect(result.split).toHaveLength(1);
      expect(result.split[0]).toEqual({
        originalPath: 'big.bin',
        originalSize: 70,
        chunkPrefix: 'big_split_',
        chunkPaths: ['big_split_000', 'big_split_001'],
        chunkCount: 2,
      });
      expect(fs.existsSync(file('big_split_002'))).toBe(false);
      expect(result.ignore?.added).toEqual([]);
    });

    it('should re-split a tracked file whose chunks were removed', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await fs.promises.rm(file('big_split_001'));

      const result = await manager.build();

      expect(result.resplit).toEqual(['big.bin']);
      expect(fs.existsSync(file('big_split_001'))).toBe(true);
      expect((await fs.promises.stat(file('big_split_002'))).size).toBe(4);
    });

    it('should refuse a second path that maps to the same chunk names', async () => {
      await writeFile('a/b.bin', patternBytes(80));
      await writeFile('a/b.txt', patternBytes(90));
      const manager = new SplitManager(settings({ exclude: ['big.bin', 'data/**'] }));

      const result = await manager.build();

      expect(result.split.map((r) => r.originalPath)).toEqual(['a/b.bin']);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0].path).toBe('a/b.txt');
      expect(result.failed[0].error.code).toBe(ErrorCode.CHUNK_PREFIX_CONFLICT);
      expect(result.failed[0].error.details).toEqual({
        filePath: 'a/b.txt',
        prefix: 'a_b_split_',
        ownerPath: 'a/b.bin',
      });
    });

    it('should refuse a prefix already owned by a tracked file', async () => {
      await writeFile('a/b.bin', patternBytes(80));
      const first = new SplitManager(settings({ exclude: ['big.bin', 'data/**'] }));
      await first.build();
      await writeFile('a/b.txt', patternBytes(90));

      const result = await first.build();

      expect(result.skipped).toEqual(['a/b.bin']);
      expect(result.failed.map((f) => f.error.code)).toEqual([ErrorCode.CHUNK_PREFIX_CONFLICT]);
    });

    it('should keep the prefix for a tracked file that is being re-split', async () => {
      await writeFile('a/b.txt', patternBytes(90));
      const manager = new SplitManager(settings({ exclude: ['big.bin', 'data/**'], concurrency: 1 }));
      await manager.build();
      await writeFile('a/b.txt', patternBytes(95, 3));
      await writeFile('a/b.bin', patternBytes(80, 5));

      const result = await manager.build();

      expect(result.split.map((r) => r.originalPath)).toEqual(['a/b.txt']);
      expect(result.resplit).toEqual(['a/b.txt']);
      expect(result.failed).toHaveLength(1);
      expect(result.failed[0].path).toBe('a/b.bin');
      expect(result.failed[0].error.code).toBe(ErrorCode.CHUNK_PREFIX_CONFLICT);
      expect(result.failed[0].error.details).toEqual({
        filePath: 'a/b.bin',
        prefix: 'a_b_split_',
        ownerPath: 'a/b.txt',
      });

      await fs.promises.rm(file('a/b.txt'));
      const merged = await manager.mergeAll();

      expect(merged.failed).toEqual([]);
      expect(merged.entries.map((e) => e.status)).toEqual(['merged']);
      expect((await fs.promises.readFile(file('a/b.txt'))).equals(patternBytes(95, 3))).toBe(true);
      expect((await fs.promises.readFile(file('a/b.bin'))).equals(patternBytes(80, 5))).toBe(true);
    });

    it('should not touch the chunks of a tracked file when a newcomer is refused', async () => {
      await writeFile('a/b.txt', patternBytes(90));
      const manager = new SplitManager(settings({ exclude: ['big.bin', 'data/**'] }));
      await manager.build();
      await writeFile('a/b.bin', patternBytes(80, 5));

      const result = await manager.build();

      expect(result.skipped).toEqual(['a/b.txt']);
      expect(result.failed.map((f) => f.path)).toEqual(['a/b.bin']);
      expect(await fs.promises.readFile(file('a_b_split_000'))).toEqual(patternBytes(90).subarray(0, 48));
      expect(await fs.promises.readFile(file('a_b_split_001'))).toEqual(patternBytes(90).subarray(48));
    });

    it('should write nothing when no file exceeds the limit', async () => {
      const manager = new SplitManager(settings({ sizeLimitBytes: 1000 }));

      const result = await manager.build();

      expect(result.candidates).toEqual([]);
      expect(fs.existsSync(storePath)).toBe(false);
      expect(fs.existsSync(ignorePath)).toBe(false);
    });

    it('should reject a limit that leaves no room for data', async () => {
      const manager = new SplitManager(settings({ sizeLimitBytes: 16 }));

      await expect(manager.build()).rejects.toMatchObject({ code: ErrorCode.CONFIG_INVALID });
      expect(fs.existsSync(file('big_split_000'))).toBe(false);
    });

    it('should recover from a corrupt store', async () => {
      await fs.promises.writeFile(storePath, '{ corrupt');
      const manager = new SplitManager(settings());

      const result = await manager.build();

      expect(result.storeSource).toBe('corrupt');
      expect(result.split).toHaveLength(2);
      expect(Object.keys(await readStoreJson())).toEqual(['big.bin', 'data/huge.bin']);
    });

    it('should skip excluded files', async () => {
      const manager = new SplitManager(settings({ exclude: ['data/**'] }));

      const result = await manager.build();

      expect(result.candidates).toEqual(['big.bin']);
    });

    it('should write chunks into the chunk directory', async () => {
      const manager = new SplitManager(settings({ chunkDir: 'chunks' }));

      const result = await manager.build();

      expect(result.split[0].chunkPaths).toEqual(['chunks/big_split_000', 'chunks/big_split_001', 'chunks/big_split_002']);
      expect(fs.existsSync(path.join(testDir, 'chunks', 'data_huge_split_003'))).toBe(true);
    });

    it('should report progress for each phase', async () => {
      const events: Progress[] = [];
      const manager = new SplitManager(settings());

      await manager.build((progress) => events.push(progress));

      expect(events[0]).toEqual({ phase: 'scanning', current: 0, total: 0 });
      const splitting = events.filter((e) => e.phase === 'splitting');
      expect(splitting.map((e) => e.current)).toEqual([1, 2]);
      expect(splitting.every((e) => e.total === 2)).toBe(true);
    });
  });

  // ==========================================================================
  // mergeAll
  // ==========================================================================

  describe('mergeAll', () => {
    it('should rebuild deleted originals without touching the store or ignore list', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      const storeBefore = await fs.promises.readFile(storePath, 'utf-8');
      const ignoreBefore = await fs.promises.readFile(ignorePath, 'utf-8');
      await fs.promises.rm(file('big.bin'));
      await fs.promises.rm(file('data/huge.bin'));

      const result = await manager.mergeAll();

      expect(result.total).toBe(2);
      expect(result.failed).toEqual([]);
      expect(result.entries.map((e) => [e.originalPath, e.status])).toEqual([
        ['big.bin', 'merged'],
        ['data/huge.bin', 'merged'],
      ]);
      expect((await fs.promises.readFile(file('big.bin'))).equals(patternBytes(100))).toBe(true);
      expect((await fs.promises.readFile(file('data/huge.bin'))).equals(patternBytes(150, 7))).toBe(true);
      expect(fs.existsSync(file('big_split_000'))).toBe(false);
      expect(await fs.promises.readFile(storePath, 'utf-8')).toBe(storeBefore);
      expect(await fs.promises.readFile(ignorePath, 'utf-8')).toBe(ignoreBefore);
    });

    it('should report already-merged files on a second run', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await manager.mergeAll();

      const result = await manager.mergeAll();

      expect(result.failed).toEqual([]);
      expect(result.entries.map((e) => e.status)).toEqual(['already-merged', 'already-merged']);
    });

    it('should keep originals that are still present and remove their chunks', async () => {
      const manager = new SplitManager(settings());
      await manager.build();

      const result = await manager.mergeAll();

      expect(result.entries[0]).toEqual({
        originalPath: 'big.bin',
        status: 'already-present',
        removedChunks: ['big_split_000', 'big_split_001', 'big_split_002'],
      });
    });

    it('should isolate a file with missing chunks', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await fs.promises.rm(file('big.bin'));
      await fs.promises.rm(file('data/huge.bin'));
      await fs.promises.rm(file('big_split_001'));

      const result = await manager.mergeAll();

      expect(result.failed).toHaveLength(1);
      expect(result.failed[0].path).toBe('big.bin');
      expect(result.failed[0].error.code).toBe(ErrorCode.MISSING_CHUNKS);
      expect(result.entries).toEqual([
        {
          originalPath: 'data/huge.bin',
          status: 'merged',
          removedChunks: ['data_huge_split_000', 'data_huge_split_001', 'data_huge_split_002', 'data_huge_split_003'],
        },
      ]);
      expect(fs.existsSync(file('big.bin'))).toBe(false);
    });

    it('should do nothing without a store', async () => {
      const result = await new SplitManager(settings()).mergeAll();

      expect(result).toEqual({ total: 0, entries: [], failed: [], storeSource: 'missing' });
    });

    it('should split merged files again on the next build', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await fs.promises.rm(file('big.bin'));
      await manager.mergeAll();

      const result = await manager.build();

      expect(result.resplit).toEqual(['big.bin', 'data/huge.bin']);
      expect(fs.existsSync(file('big_split_002'))).toBe(true);
    });
  });

  // ==========================================================================
  // clean / rebuild
  // ==========================================================================

  describe('clean', () => {
    it('should remove all chunks and the store', async () => {
      const manager = new SplitManager(settings());
      await manager.build();

      const result = await manager.clean();

      expect(result.removedCount).toBe(7);
      expect(result.storeRemoved).toBe(true);
      expect(fs.existsSync(file('big.bin'))).toBe(true);
      expect(fs.existsSync(file('data_huge_split_000'))).toBe(false);
    });
  });

  describe('rebuild', () => {
    it('should clean and then split again', async () => {
      const manager = new SplitManager(settings());
      await manager.build();

      const result = await manager.rebuild();

      expect(result.clean.removedCount).toBe(7);
      expect(result.build.split).toHaveLength(2);
      expect(result.build.skipped).toEqual([]);
      expect(result.build.storeSource).toBe('missing');
    });
  });

  // ==========================================================================
  // status / verify
  // ==========================================================================

  describe('status', () => {
    it('should list chunk presence per tracked file', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await fs.promises.rm(file('big_split_000'));
      await fs.promises.rm(file('data/huge.bin'));

      const result = await manager.status();

      expect(result.storePath).toBe(storePath);
      expect(result.storeSource).toBe('loaded');
      expect(result.records).toEqual([
        { originalPath: 'big.bin', originalSize: 100, chunkCount: 3, presentChunks: 2, originalExists: true },
        { originalPath: 'data/huge.bin', originalSize: 150, chunkCount: 4, presentChunks: 4, originalExists: false },
      ]);
    });
  });

  describe('verify', () => {
    it('should pass when every chunk exists', async () => {
      const manager = new SplitManager(settings());
      await manager.build();

      expect(await manager.verify()).toEqual({ storeSource: 'loaded', checked: 2, missing: [], ok: true });
    });

    it('should list missing chunks', async () => {
      const manager = new SplitManager(settings());
      await manager.build();
      await fs.promises.rm(file('data_huge_split_002'));

      const result = await manager.verify();

      expect(result.ok).toBe(false);
      expect(result.missing).toEqual([{ originalPath: 'data/huge.bin', missingChunks: ['data_huge_split_002'] }]);
    });
  });
});

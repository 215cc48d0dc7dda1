/**
 * Config Manager Module
 *
 * Project-level settings for splitkeeper:
 * - Zod schema validation with defaults for every field
 * - Optional splitkeeper.config.json at the working root
 * - CLI overrides layered on top, sizes parsed into bytes
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { parseSize } from '../utils/size.js';
import { normalizePath } from '../utils/paths.js';
import { invalidConfig } from '../errors/index.js';

// ============================================================================
// Constants
// ============================================================================

/** Name of the optional project config file */
export const CONFIG_FILE_NAME = 'splitkeeper.config.json';

/** Upper bound for parallel split/merge operations */
export const MAX_CONCURRENCY = 32;

const SIZE_REGEX = /^\s*\d+\s*[KMG]?B?\s*$/i;

// ============================================================================
// Config Schema
// ============================================================================

/**
 * Zod schema for configuration validation
 *
 * Underscore-prefixed fields (_comment, ...) are allowed for documentation.
 */
export const ConfigSchema = z
  .object({
    /** Files strictly larger than this are split (e.g. "100M", "1G") */
    sizeLimit: z
      .string()
      .regex(SIZE_REGEX, 'Must be a size like "100M", "1G" or "1048576"')
      .default('100M'),

    /** Tracker store file, relative to the root */
    splitInfo: z.string().min(1).default('split_files_info.json'),

    /** Ignore list that receives the original paths, relative to the root */
    ignoreFile: z.string().min(1).default('.gitignore'),

    /** Directory for chunk files, relative to the root ("" = root) */
    chunkDir: z.string().default(''),

    /** Space kept free below the limit in every chunk */
    headroom: z
      .string()
      .regex(SIZE_REGEX, 'Must be a size like "1M" or "512K"')
      .default('1M'),

    /** Files split or merged in parallel */
    concurrency: z.number().int().min(1).max(MAX_CONCURRENCY).default(4),

    /** Glob patterns (relative to the root) never considered for splitting */
    exclude: z.array(z.string()).default([]),
  })
  .passthrough();

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Default configuration values
 */
export const DEFAULT_CONFIG: Config = {
  sizeLimit: '100M',
  splitInfo: 'split_files_info.json',
  ignoreFile: '.gitignore',
  chunkDir: '',
  headroom: '1M',
  concurrency: 4,
  exclude: [],
};

/**
 * Values given on the command line; each one replaces the config field
 */
export interface ConfigOverrides {
  sizeLimit?: string;
  splitInfo?: string;
  ignoreFile?: string;
  chunkDir?: string;
  headroom?: string;
  concurrency?: number;
}

/**
 * Fully resolved settings consumed by SplitManager
 */
export interface ResolvedSettings {
  /** Absolute working root */
  root: string;
  sizeLimitBytes: number;
  headroomBytes: number;
  /** Absolute path of the tracker store */
  storePath: string;
  /** Absolute path of the ignore list */
  ignorePath: string;
  /** Chunk directory relative to the root ("" = root) */
  chunkDir: string;
  concurrency: number;
  exclude: string[];
}

// ============================================================================
// Config I/O
// ============================================================================

/**
 * Path of the project config file under `root`
 */
export function getConfigPath(root: string): string {
  return path.join(normalizePath(root), CONFIG_FILE_NAME);
}

/**
 * Strip underscore-prefixed documentation fields
 */
function stripDocumentationFields(obj: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(obj)) {
    if (!key.startsWith('_')) {
      result[key] = value;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Load the project config from `root`
 *
 * Falls back to defaults if the file is missing, is not valid JSON, or fails
 * validation (the last two with a warning).
 */
export async function loadConfig(root: string): Promise<Config> {
  const logger = getLogger();
  const configPath = getConfigPath(root);

  if (!fs.existsSync(configPath)) {
    logger.debug('ConfigManager', 'No config file found, using defaults', { configPath });
    return { ...DEFAULT_CONFIG };
  }

  try {
    const raw: unknown = JSON.parse(await fs.promises.readFile(configPath, 'utf-8'));
    if (!isPlainObject(raw)) {
      logger.warn('ConfigManager', 'Config is not a JSON object, using defaults', { configPath });
      return { ...DEFAULT_CONFIG };
    }

    const result = ConfigSchema.safeParse(stripDocumentationFields(raw));
    if (!result.success) {
      const errors = result.error.errors
        .map((e) => `${e.path.join('.')}: ${e.message}`)
        .join('; ');
      logger.warn('ConfigManager', 'Config validation failed, using defaults', {
        configPath,
        errors,
      });
      return { ...DEFAULT_CONFIG };
    }

    logger.debug('ConfigManager', 'Config loaded successfully', { configPath });
    return result.data;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('ConfigManager', 'Failed to load config, using defaults', {
      configPath,
      error: message,
    });
    return { ...DEFAULT_CONFIG };
  }
}

/**
 * Apply CLI overrides to `config` and resolve every path and size
 *
 * @throws SplitKeeperError (CONFIG_INVALID) for an unparseable size or a
 *         concurrency outside 1..MAX_CONCURRENCY
 */
export function resolveSettings(
  config: Config,
  overrides: ConfigOverrides,
  root: string
): ResolvedSettings {
  const normalizedRoot = normalizePath(root);
  const concurrency = overrides.concurrency ?? config.concurrency;

  if (!Number.isInteger(concurrency) || concurrency < 1 || concurrency > MAX_CONCURRENCY) {
    throw invalidConfig('concurrency', `expected an integer from 1 to ${MAX_CONCURRENCY}, got ${concurrency}`);
  }

  return {
    root: normalizedRoot,
    sizeLimitBytes: parseSize(overrides.sizeLimit ?? config.sizeLimit),
    headroomBytes: parseSize(overrides.headroom ?? config.headroom),
    storePath: path.resolve(normalizedRoot, overrides.splitInfo ?? config.splitInfo),
    ignorePath: path.resolve(normalizedRoot, overrides.ignoreFile ?? config.ignoreFile),
    chunkDir: overrides.chunkDir ?? config.chunkDir,
    concurrency,
    exclude: [...config.exclude],
  };
}

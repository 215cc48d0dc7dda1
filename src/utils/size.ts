/**
 * Size Parsing
 *
 * Converts human-readable size strings ("100M", "1G", "512K", "2048") into
 * byte counts. Units are binary: K = 1024, M = 1024^2, G = 1024^3.
 */

import { invalidSize } from '../errors/index.js';

/** One mebibyte */
export const MIB = 1024 * 1024;

const UNIT_MULTIPLIERS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: MIB,
  G: 1024 * MIB,
};

const SIZE_PATTERN = /^(\d+)\s*([KMG]?)B?$/i;

/**
 * Parse a size string to bytes
 *
 * @throws SplitKeeperError (CONFIG_INVALID) if the numeric portion or unit is unparseable
 *
 * @example
 * ```typescript
 * parseSize('100M')  // => 104857600
 * parseSize('1G')    // => 1073741824
 * parseSize('512k')  // => 524288
 * parseSize('2048')  // => 2048
 * ```
 */
export function parseSize(input: string): number {
  const trimmed = input.trim();
  const match = SIZE_PATTERN.exec(trimmed);
  if (!match) {
    throw invalidSize(input, 'expected digits with an optional K, M or G suffix');
  }

  const value = Number.parseInt(match[1], 10);
  const bytes = value * UNIT_MULTIPLIERS[match[2].toUpperCase()];

  if (!Number.isSafeInteger(bytes)) {
    throw invalidSize(input, 'value is too large');
  }

  return bytes;
}

/**
 * Format a byte count for display
 *
 * @example
 * ```typescript
 * formatSize(512)         // => '512 B'
 * formatSize(1536)        // => '1.5 KB'
 * formatSize(103809024)   // => '99.0 MB'
 * ```
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < MIB) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * MIB) return `${(bytes / MIB).toFixed(1)} MB`;
  return `${(bytes / (1024 * MIB)).toFixed(1)} GB`;
}

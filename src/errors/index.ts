/**
 * Error Handling System
 *
 * Every failure the engines raise is a SplitKeeperError carrying:
 * - code: stable identifier for programmatic handling
 * - userMessage: what the CLI shows by default
 * - developerMessage: technical detail (also Error.message)
 *
 * Per-file failures (split, merge, ignore-list path) are isolated by the
 * caller; store persistence failures are fatal to the invocation.
 */

import { getLogger } from '../utils/logger.js';

/**
 * Error codes for all splitkeeper errors
 */
export enum ErrorCode {
  /** Bad size string, threshold or configuration value */
  CONFIG_INVALID = 'CONFIG_INVALID',
  /** Tracker store exists but cannot be parsed or validated */
  STORE_CORRUPT = 'STORE_CORRUPT',
  /** Tracker store could not be persisted */
  STORE_WRITE_FAILED = 'STORE_WRITE_FAILED',
  /** One or more chunk files listed in a record are gone */
  MISSING_CHUNKS = 'MISSING_CHUNKS',
  /** Reassembled file does not match the recorded size */
  SIZE_MISMATCH = 'SIZE_MISMATCH',
  /** I/O failure while writing chunk files */
  SPLIT_IO_FAILED = 'SPLIT_IO_FAILED',
  /** I/O failure while reassembling a file */
  MERGE_IO_FAILED = 'MERGE_IO_FAILED',
  /** Path cannot be expressed relative to the working root */
  PATH_OUTSIDE_ROOT = 'PATH_OUTSIDE_ROOT',
  /** Two tracked files would write to the same chunk names */
  CHUNK_PREFIX_CONFLICT = 'CHUNK_PREFIX_CONFLICT',
  /** Directory traversal failed */
  SCAN_FAILED = 'SCAN_FAILED',
}

export interface SplitKeeperErrorOptions {
  code: ErrorCode;
  userMessage: string;
  developerMessage: string;
  cause?: Error;
  /** Structured context (missing paths, sizes, ...) */
  details?: Record<string, unknown>;
}

/**
 * Error type raised by every splitkeeper module
 */
export class SplitKeeperError extends Error {
  readonly code: ErrorCode;
  readonly userMessage: string;
  readonly developerMessage: string;
  readonly details: Record<string, unknown>;

  constructor(options: SplitKeeperErrorOptions) {
    super(options.developerMessage, options.cause ? { cause: options.cause } : undefined);

    this.code = options.code;
    this.userMessage = options.userMessage;
    this.developerMessage = options.developerMessage;
    this.details = options.details ?? {};

    Object.setPrototypeOf(this, SplitKeeperError.prototype);

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SplitKeeperError);
    }

    this.name = `SplitKeeperError[${this.code}]`;

    this.logRaised();
  }

  private logRaised(): void {
    const meta: Record<string, unknown> = { code: this.code, ...this.details };

    if (this.cause instanceof Error) {
      meta.cause = { name: this.cause.name, message: this.cause.message };
    }

    getLogger().debug('SplitKeeperError', this.developerMessage, meta);
  }

  toJSON(): Record<string, unknown> {
    return {
      code: this.code,
      userMessage: this.userMessage,
      developerMessage: this.developerMessage,
      details: Object.keys(this.details).length > 0 ? this.details : undefined,
      cause:
        this.cause instanceof Error
          ? { name: this.cause.name, message: this.cause.message }
          : undefined,
    };
  }

  toString(): string {
    return `${this.name}: ${this.developerMessage}`;
  }
}

// ============================================================================
// Error Factory Functions
// ============================================================================

/**
 * Create a CONFIG_INVALID error for a size string that cannot be parsed.
 */
export function invalidSize(input: string, detail: string): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.CONFIG_INVALID,
    userMessage: `Invalid size "${input}". Use a number of bytes or a K/M/G suffix, e.g. "100M".`,
    developerMessage: `Cannot parse size "${input}": ${detail}`,
    details: { input },
  });
}

/**
 * Create a CONFIG_INVALID error for a limit that leaves no room for chunk data
 * once the headroom is taken off.
 */
export function chunkLimitTooSmall(limitBytes: number, headroomBytes: number): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.CONFIG_INVALID,
    userMessage: `The size limit must be larger than the ${headroomBytes}-byte chunk headroom.`,
    developerMessage: `Effective chunk size is ${limitBytes - headroomBytes} bytes (limit ${limitBytes}, headroom ${headroomBytes})`,
    details: { limitBytes, headroomBytes },
  });
}

/**
 * Create a CONFIG_INVALID error for any other bad setting.
 */
export function invalidConfig(setting: string, detail: string): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.CONFIG_INVALID,
    userMessage: `Invalid value for ${setting}: ${detail}`,
    developerMessage: `Invalid configuration "${setting}": ${detail}`,
    details: { setting },
  });
}

/**
 * Create a STORE_CORRUPT error.
 */
export function storeCorrupt(storePath: string, detail: string, cause?: Error): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.STORE_CORRUPT,
    userMessage: `The split info file ${storePath} is unreadable and will be treated as empty.`,
    developerMessage: `Tracker store ${storePath} is corrupt: ${detail}`,
    cause,
    details: { storePath },
  });
}

/**
 * Create a STORE_WRITE_FAILED error.
 */
export function storeWriteFailed(storePath: string, cause: Error): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.STORE_WRITE_FAILED,
    userMessage: `Could not save split info to ${storePath}. No changes were recorded.`,
    developerMessage: `Atomic write of tracker store ${storePath} failed: ${cause.message}`,
    cause,
    details: { storePath },
  });
}

/**
 * Create a MISSING_CHUNKS error listing every absent chunk file.
 */
export function missingChunks(originalPath: string, missing: readonly string[]): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.MISSING_CHUNKS,
    userMessage: `Cannot rebuild ${originalPath}: ${missing.length} chunk file(s) are missing.`,
    developerMessage: `Missing chunk files for ${originalPath}: ${missing.join(', ')}`,
    details: { originalPath, missingChunks: [...missing] },
  });
}

/**
 * Create a SIZE_MISMATCH error for a reassembled file.
 */
export function sizeMismatch(
  originalPath: string,
  expectedSize: number,
  actualSize: number
): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.SIZE_MISMATCH,
    userMessage: `Rebuilt ${originalPath} has the wrong size and was removed.`,
    developerMessage: `Size mismatch for ${originalPath}: expected ${expectedSize}, got ${actualSize}`,
    details: { originalPath, expectedSize, actualSize },
  });
}

/**
 * Create a SPLIT_IO_FAILED error.
 */
export function splitIOFailed(filePath: string, cause: Error): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.SPLIT_IO_FAILED,
    userMessage: `Failed to split ${filePath}. No chunk files were kept.`,
    developerMessage: `I/O error while splitting ${filePath}: ${cause.message}`,
    cause,
    details: { filePath },
  });
}

/**
 * Create a MERGE_IO_FAILED error.
 */
export function mergeIOFailed(originalPath: string, cause: Error): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.MERGE_IO_FAILED,
    userMessage: `Failed to rebuild ${originalPath}. Chunk files were left in place.`,
    developerMessage: `I/O error while merging ${originalPath}: ${cause.message}`,
    cause,
    details: { originalPath },
  });
}

/**
 * Create a PATH_OUTSIDE_ROOT error.
 */
export function pathOutsideRoot(filePath: string, root: string): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.PATH_OUTSIDE_ROOT,
    userMessage: `${filePath} is not inside ${root} and cannot be added to the ignore list.`,
    developerMessage: `Path ${filePath} cannot be made relative to root ${root}`,
    details: { filePath, root },
  });
}

/**
 * Create a CHUNK_PREFIX_CONFLICT error.
 */
export function chunkPrefixConflict(
  filePath: string,
  prefix: string,
  ownerPath: string
): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.CHUNK_PREFIX_CONFLICT,
    userMessage: `${filePath} would reuse the chunk names of ${ownerPath} and was not split.`,
    developerMessage: `Chunk prefix "${prefix}" for ${filePath} is already used by ${ownerPath}`,
    details: { filePath, prefix, ownerPath },
  });
}

/**
 * Create a SCAN_FAILED error.
 */
export function scanFailed(root: string, cause: Error): SplitKeeperError {
  return new SplitKeeperError({
    code: ErrorCode.SCAN_FAILED,
    userMessage: `Failed to scan ${root} for large files. Please check permissions.`,
    developerMessage: `Directory scan of ${root} failed: ${cause.message}`,
    cause,
    details: { root },
  });
}

// ============================================================================
// Type Guards and Utilities
// ============================================================================

export function isSplitKeeperError(error: unknown): error is SplitKeeperError {
  return error instanceof SplitKeeperError;
}

/**
 * Narrow an unknown thrown value to an Error.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Wrap an unknown error as a SplitKeeperError if it isn't already
 *
 * @param error - The error to wrap
 * @param wrap - Factory used for non-SplitKeeperError values
 */
export function wrapError(
  error: unknown,
  wrap: (cause: Error) => SplitKeeperError
): SplitKeeperError {
  if (isSplitKeeperError(error)) {
    return error;
  }
  return wrap(toError(error));
}

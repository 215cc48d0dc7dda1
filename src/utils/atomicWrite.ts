/**
 * Atomic Write Utilities
 *
 * The tracker store and the ignore list are rewritten as a whole. Both go
 * through a temp file in the same directory followed by a rename, so readers
 * only ever see the old document or the new one.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

/**
 * Build the temp path used while writing `targetPath`.
 * PID and timestamp keep concurrent writers from sharing a temp file.
 */
export function tempPathFor(targetPath: string): string {
  const dir = path.dirname(targetPath);
  const base = path.basename(targetPath);
  return path.join(dir, `.${base}.tmp.${Date.now()}.${process.pid}`);
}

/**
 * Atomically replace `targetPath` with `content`.
 *
 * Parent directories are created when missing. On any failure the temp file
 * is removed and the original error is rethrown; the target is left as it was.
 *
 * @example
 * ```typescript
 * await atomicWrite('/repo/.gitignore', 'data/big.bin\n');
 * ```
 */
export async function atomicWrite(
  targetPath: string,
  content: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  const tempPath = tempPathFor(targetPath);

  try {
    await fs.promises.mkdir(path.dirname(targetPath), { recursive: true });

    const handle = await fs.promises.open(tempPath, 'w');
    try {
      await handle.writeFile(content, encoding);
      await handle.sync();
    } finally {
      await handle.close();
    }

    await fs.promises.rename(tempPath, targetPath);
  } catch (error) {
    await fs.promises.rm(tempPath, { force: true });
    throw error;
  }
}

/**
 * Atomically write `data` as JSON (two-space indent, trailing newline).
 */
export async function atomicWriteJson(targetPath: string, data: unknown): Promise<void> {
  await atomicWrite(targetPath, JSON.stringify(data, null, 2) + '\n');
}

/**
 * Atomically write `lines` as a newline-terminated text file.
 */
export async function atomicWriteLines(targetPath: string, lines: readonly string[]): Promise<void> {
  await atomicWrite(targetPath, lines.map((line) => `${line}\n`).join(''));
}

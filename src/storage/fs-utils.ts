/**
 * Shared file helpers for the .mind stores.
 */

import fs from 'node:fs';
import path from 'node:path';
import { PlatformIOError, StorageError } from '../errors.js';

// Rename failures that mean "the atomic path does not work here", not "disk is broken".
// Windows reports sharing violations as EPERM/EBUSY; EXDEV shows up on odd mounts.
const RENAME_FALLBACK_CODES = new Set(['EPERM', 'EBUSY', 'EACCES', 'EXDEV']);

function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Write file atomically using write-to-temp-then-rename pattern.
 * Falls back to a direct write when the rename is refused by the platform.
 */
export function writeFileAtomic(filePath: string, content: string): void {
  const dir = path.dirname(filePath);
  fs.mkdirSync(dir, { recursive: true });

  // Create temp file in same directory (required for atomic rename)
  const tempPath = path.join(dir, `.tmp-${process.pid}-${Date.now()}-${path.basename(filePath)}`);

  try {
    fs.writeFileSync(tempPath, content, 'utf-8');
  } catch (err) {
    removeQuietly(tempPath);
    throw new StorageError(`Cannot write ${filePath}: ${String(err)}`, err);
  }

  try {
    fs.renameSync(tempPath, filePath);
  } catch (err) {
    removeQuietly(tempPath);
    const code = errnoCode(err);
    if (!code || !RENAME_FALLBACK_CODES.has(code)) {
      throw new StorageError(`Cannot replace ${filePath}: ${String(err)}`, err);
    }
    try {
      fs.writeFileSync(filePath, content, 'utf-8');
    } catch (directErr) {
      throw new PlatformIOError(
        `Atomic replace of ${filePath} failed (${code}) and direct write failed too`,
        directErr,
      );
    }
  }
}

function removeQuietly(filePath: string): void {
  try {
    fs.unlinkSync(filePath);
  } catch {
    // temp file may never have been created
  }
}

/**
 * Read a UTF-8 file. A missing file reads as the empty string; anything else
 * (permissions, a directory in the way) is a StorageError.
 */
export function readTextFile(filePath: string): string {
  try {
    return fs.readFileSync(filePath, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') return '';
    throw new StorageError(`Cannot read ${filePath}: ${String(err)}`, err);
  }
}

export function fileSize(filePath: string): number {
  try {
    return fs.statSync(filePath).size;
  } catch {
    return 0;
  }
}

/**
 * File primitives for the ledger: atomic replace and an exclusive lock file
 */

import { dirname, basename, join } from 'path';
import { writeFile, rename, mkdir, unlink, open, stat } from 'fs/promises';
import type { Stats } from 'fs';
import { randomUUID } from 'crypto';
import { logger } from '../../utils/logger.js';
import { StorageError, errorMessage } from '../../utils/errors.js';

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/**
 * Write content to a temporary file beside the target, then rename it over
 * the target. Readers see either the old document or the new one.
 */
export async function writeFileAtomic(path: string, content: string): Promise<void> {
  const dir = dirname(path);
  const tempPath = join(dir, `.${basename(path)}.${process.pid}.${randomUUID()}.tmp`);

  try {
    await mkdir(dir, { recursive: true });
    await writeFile(tempPath, content, 'utf-8');
    await rename(tempPath, path);
  } catch (error) {
    try {
      await unlink(tempPath);
    } catch (cleanupError) {
      if (!isErrno(cleanupError, 'ENOENT')) {
        logger.warn(`Could not remove temporary file ${tempPath}`, cleanupError);
      }
    }
    throw new StorageError(`Failed to write ${path}: ${errorMessage(error)}`, path, {
      cause: error,
    });
  }
}

export interface LockOptions {
  timeoutMs: number;
  staleMs: number;
  retryMs?: number | undefined;
}

export interface FileLock {
  path: string;
  release(): Promise<void>;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

async function staleLockStats(lockPath: string, staleMs: number): Promise<Stats | null> {
  try {
    const info = await stat(lockPath);
    return Date.now() - info.mtimeMs > staleMs ? info : null;
  } catch (error) {
    // Lock vanished between attempts; the next attempt will take it
    if (isErrno(error, 'ENOENT')) return null;
    throw error;
  }
}

/**
 * Remove the lock file observed as stale. The lock is first renamed aside; if
 * the renamed file is no longer the one observed, another process took the
 * lock in between and it is put back. Returns whether the stale lock was
 * removed by this call.
 */
export async function reclaimStaleLock(
  lockPath: string,
  observed: Pick<Stats, 'ino' | 'mtimeMs'>
): Promise<boolean> {
  const asidePath = `${lockPath}.${process.pid}.${randomUUID()}.stale`;
  try {
    await rename(lockPath, asidePath);
  } catch (error) {
    // Someone else reclaimed or released it first
    if (isErrno(error, 'ENOENT')) return false;
    throw error;
  }

  const moved = await stat(asidePath);
  if (moved.ino !== observed.ino || moved.mtimeMs !== observed.mtimeMs) {
    await rename(asidePath, lockPath);
    return false;
  }

  await unlink(asidePath);
  return true;
}

/**
 * Acquire `<target>.lock` by exclusive creation, retrying until timeoutMs.
 * Locks older than staleMs are treated as abandoned and removed.
 */
export async function acquireLock(target: string, options: LockOptions): Promise<FileLock> {
  const lockPath = `${target}.lock`;
  const retryMs = options.retryMs ?? 50;
  const deadline = Date.now() + options.timeoutMs;

  await mkdir(dirname(lockPath), { recursive: true }).catch((error: unknown) => {
    throw new StorageError(`Cannot create directory for ${target}: ${errorMessage(error)}`, target, {
      cause: error,
    });
  });

  for (;;) {
    try {
      const handle = await open(lockPath, 'wx');
      try {
        await handle.writeFile(`${process.pid}\n`, 'utf-8');
      } finally {
        await handle.close();
      }
      logger.debug(`Acquired lock ${lockPath}`);
      return {
        path: lockPath,
        release: async () => {
          try {
            await unlink(lockPath);
            logger.debug(`Released lock ${lockPath}`);
          } catch (error) {
            if (!isErrno(error, 'ENOENT')) throw error;
          }
        },
      };
    } catch (error) {
      if (!isErrno(error, 'EEXIST')) {
        throw new StorageError(`Cannot lock ${target}: ${errorMessage(error)}`, target, {
          cause: error,
        });
      }
    }

    const stale = await staleLockStats(lockPath, options.staleMs);
    if (stale) {
      if (await reclaimStaleLock(lockPath, stale)) {
        logger.warn(`Removed stale lock ${lockPath}`);
      }
      continue;
    }

    if (Date.now() >= deadline) {
      throw new StorageError(
        `Timed out waiting for lock ${lockPath}; another timekeep process may be running`,
        target,
        { code: 'LOCK_TIMEOUT' }
      );
    }
    await sleep(retryMs);
  }
}

/**
 * Run fn while holding the lock; the lock is released on every exit path
 */
export async function withFileLock<T>(
  target: string,
  options: LockOptions,
  fn: () => Promise<T>
): Promise<T> {
  const lock = await acquireLock(target, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

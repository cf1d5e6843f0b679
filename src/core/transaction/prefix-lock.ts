/**
 * Advisory Prefix Lock
 *
 * One transaction per prefix at a time. The lock lives beside the prefix as
 * `<prefix>.lpkgm.lock` and is held through proper-lockfile, which keeps its
 * mtime fresh while the holder runs. A lock whose holder died stops being
 * refreshed and is reclaimed once it is older than the stale threshold.
 * Tools that do not take the lock are not kept out.
 */

import { dirname, resolve } from 'path';
import { stat } from 'fs/promises';
import lockfile from 'proper-lockfile';
import { FILE_PATTERNS, PREFIX_LOCK_STALE_MS } from '../../constants/index.js';
import { ensureDir } from '../../utils/fs.js';
import { FileSystemError, PrefixLockedError, describeError, getErrorCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface PrefixLockOptions {
  /** Age in milliseconds after which an unrefreshed lock is taken over */
  stale?: number;
}

export interface PrefixLock {
  readonly path: string;
  release(): Promise<void>;
}

export function getLockPath(prefix: string): string {
  return `${resolve(prefix)}${FILE_PATTERNS.LOCK_SUFFIX}`;
}

async function describeHolder(lockPath: string): Promise<string | undefined> {
  try {
    const stats = await stat(lockPath);
    return `a transaction last seen at ${stats.mtime.toISOString()}`;
  } catch (error) {
    logger.debug(`Could not inspect lock ${lockPath}: ${describeError(error)}`);
    return undefined;
  }
}

/**
 * Take the lock for `prefix`, or fail with PrefixLockedError when a live
 * transaction holds it.
 */
export async function acquirePrefixLock(prefix: string, options: PrefixLockOptions = {}): Promise<PrefixLock> {
  const target = resolve(prefix);
  const lockPath = getLockPath(target);
  const stale = options.stale ?? PREFIX_LOCK_STALE_MS;
  await ensureDir(dirname(lockPath));

  let releaseLock: () => Promise<void>;
  try {
    releaseLock = await lockfile.lock(target, {
      lockfilePath: lockPath,
      realpath: false,
      stale,
      retries: 0,
      onCompromised: (error: Error) => {
        logger.warn(`Prefix lock ${lockPath} was taken over while held: ${error.message}`);
      }
    });
  } catch (error) {
    if (getErrorCode(error) === 'ELOCKED') {
      throw new PrefixLockedError(lockPath, await describeHolder(lockPath));
    }
    throw new FileSystemError(`Failed to create lock: ${lockPath}`, { lockPath, error });
  }
  logger.debug(`Acquired prefix lock: ${lockPath}`);

  let released = false;
  return {
    path: lockPath,
    async release(): Promise<void> {
      if (released) return;
      released = true;
      try {
        await releaseLock();
        logger.debug(`Released prefix lock: ${lockPath}`);
      } catch (error) {
        logger.warn(`Failed to release prefix lock ${lockPath}; it is reclaimed once stale`, { error });
      }
    }
  };
}

/**
 * Run `fn` while holding the lock for `prefix`; the lock is released on
 * every exit path.
 */
export async function withPrefixLock<T>(
  prefix: string,
  fn: () => Promise<T>,
  options: PrefixLockOptions = {}
): Promise<T> {
  const lock = await acquirePrefixLock(prefix, options);
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}

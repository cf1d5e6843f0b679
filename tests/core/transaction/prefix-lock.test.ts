import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { mkdir, stat, utimes } from 'fs/promises';
import { dirname, join } from 'path';
import { acquirePrefixLock, getLockPath, withPrefixLock } from '../../../src/core/transaction/prefix-lock.js';
import { PrefixLockedError } from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { makeTempDir, removeTempDir } from '../../test-helpers.js';

describe('prefix lock', () => {
  let dir: string;
  let prefix: string;

  beforeEach(async () => {
    dir = await makeTempDir('lock');
    prefix = join(dir, 'el9', 'zlib', '1.3');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('is a sibling of the prefix', () => {
    assert.equal(getLockPath('/sw/el9/zlib/1.3/'), '/sw/el9/zlib/1.3.lpkgm.lock');
  });

  it('refuses a second acquisition while held', async () => {
    const lock = await acquirePrefixLock(prefix);
    assert.equal(lock.path, getLockPath(prefix));
    assert.equal(await exists(lock.path), true);
    assert.equal(await exists(prefix), false);

    await assert.rejects(
      acquirePrefixLock(prefix),
      (error: unknown) => error instanceof PrefixLockedError
        && error.exitCode === 6
        && error.message.includes(`(${lock.path}, held by a transaction last seen at `)
    );

    await lock.release();
    await lock.release();
    assert.equal(await exists(lock.path), false);
  });

  it('takes over a lock left behind by a transaction that died', async () => {
    const lockPath = getLockPath(prefix);
    await mkdir(dirname(lockPath), { recursive: true });
    await mkdir(lockPath);
    const longAgo = new Date('2020-01-01T00:00:00.000Z');
    await utimes(lockPath, longAgo, longAgo);

    const lock = await acquirePrefixLock(prefix);
    assert.ok((await stat(lockPath)).mtime.getTime() > longAgo.getTime());
    await lock.release();
    assert.equal(await exists(lockPath), false);
  });

  it('keeps a recently refreshed lock', async () => {
    const lockPath = getLockPath(prefix);
    await mkdir(lockPath, { recursive: true });

    await assert.rejects(acquirePrefixLock(prefix, { stale: 60_000 }), PrefixLockedError);
    assert.equal(await exists(lockPath), true);
  });

  it('releases the lock when the guarded work fails', async () => {
    await assert.rejects(withPrefixLock(prefix, async () => {
      throw new Error('boom');
    }), /boom/);
    assert.equal(await exists(getLockPath(prefix)), false);

    assert.equal(await withPrefixLock(prefix, async () => 'done'), 'done');
  });
});

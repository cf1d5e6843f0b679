import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readdir, readFile } from 'fs/promises';
import { join, relative } from 'path';
import { InstallTransaction, acquirePrefixLock, getLockPath } from '../../../src/core/transaction/index.js';
import type { BuildDriver } from '../../../src/core/build/build-driver.js';
import {
  BuildFailedError,
  CollisionDetectedError,
  IncompleteInstallError,
  PrefixLockedError,
  ProbeCleanupFailedError,
  ValidationError
} from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { FakeBuildDriver, makeTempDir, removeTempDir, writeTree } from '../../test-helpers.js';

const PACKAGE_FILES = {
  'bin/zpipe': 'binary',
  'include/zlib.h': 'header',
  'lib/libz.so': 'library'
};

async function snapshotTree(root: string): Promise<Record<string, string>> {
  const snapshot: Record<string, string> = {};
  const visit = async (dir: string): Promise<void> => {
    for (const entry of await readdir(dir, { withFileTypes: true })) {
      const path = join(dir, entry.name);
      const key = relative(root, path);
      if (entry.isDirectory()) {
        snapshot[`${key}/`] = '';
        await visit(path);
      } else {
        snapshot[key] = await readFile(path, 'utf8');
      }
    }
  };
  await visit(root);
  return snapshot;
}

describe('InstallTransaction', () => {
  let dir: string;
  let prefix: string;
  let probeRoot: string;
  let manifestPath: string;
  let sourceDir: string;

  beforeEach(async () => {
    dir = await makeTempDir('transaction');
    prefix = join(dir, 'el9', 'zlib', '1.3');
    probeRoot = join(dir, 'tmp');
    manifestPath = join(dir, 'el9', '.packages', 'zlib', '1.3.files');
    sourceDir = join(dir, 'src');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  function transaction(driver: BuildDriver): InstallTransaction {
    return new InstallTransaction({ driver, identity: 'zlib-1.3', manifestPath, probeRoot });
  }

  it('installs the footprint and appends it to the manifest', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES);
    const result = await transaction(driver).execute(sourceDir, prefix, { jobs: '4' });

    const expected = ['bin/zpipe', 'include/zlib.h', 'lib/libz.so'].map(p => join(prefix, p));
    assert.deepEqual(result.footprint, ['bin/zpipe', 'include/zlib.h', 'lib/libz.so']);
    assert.deepEqual(result.installed, expected);
    assert.deepEqual(result.warnings, []);
    assert.equal(await readFile(manifestPath, 'utf8'), expected.map(p => `${p}\n`).join(''));
    assert.equal(await readFile(join(prefix, 'lib/libz.so'), 'utf8'), 'library');
  });

  it('runs discovery in a probe directory, then commits into the prefix with the same config', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES);
    await transaction(driver).execute(sourceDir, prefix, { jobs: '4' });

    const [discovery, commit] = driver.invocations;
    assert.equal(driver.invocations.length, 2);
    assert.equal(discovery?.phase, 'discovery');
    assert.ok(discovery?.installRoot.startsWith(join(probeRoot, 'lpkgm-probe-zlib-1.3-')));
    assert.equal(commit?.phase, 'commit');
    assert.equal(commit?.installRoot, prefix);
    assert.equal(discovery?.sourceDir, sourceDir);
    assert.deepEqual(commit?.config, { jobs: '4' });
    assert.equal(discovery?.config, commit?.config);
    assert.ok(Object.isFrozen(commit?.config));

    assert.deepEqual(await readdir(probeRoot), []);
    assert.equal(await exists(getLockPath(prefix)), false);
  });

  it('returns the manifest path from install', async () => {
    assert.equal(await transaction(new FakeBuildDriver(PACKAGE_FILES)).install(sourceDir, prefix, {}), manifestPath);
  });

  it('refuses to overwrite existing files and leaves the prefix untouched', async () => {
    await writeTree(prefix, { 'include/zlib.h': 'foreign', 'lib/libz.so': 'foreign' });
    const driver = new FakeBuildDriver(PACKAGE_FILES);

    await assert.rejects(
      transaction(driver).execute(sourceDir, prefix, {}),
      (error: unknown) => error instanceof CollisionDetectedError
        && error.path === join(prefix, 'include/zlib.h')
        && error.paths.length === 2
        && error.exitCode === 4
    );
    assert.deepEqual(driver.invocations.map(i => i.phase), ['discovery']);
    assert.equal(await exists(join(prefix, 'bin/zpipe')), false);
    assert.equal(await readFile(join(prefix, 'lib/libz.so'), 'utf8'), 'foreign');
    assert.equal(await exists(manifestPath), false);
    assert.equal(await exists(getLockPath(prefix)), false);
  });

  it('leaves the same tree behind after repeated collisions', async () => {
    await writeTree(prefix, { 'include/zlib.h': 'foreign' });
    await writeTree(join(dir, 'el9', '.packages', 'zlib'), { '1.3.files': '/earlier/file\n' });
    const attempt = (): Promise<unknown> =>
      transaction(new FakeBuildDriver(PACKAGE_FILES)).execute(sourceDir, prefix, {});

    await assert.rejects(attempt(), CollisionDetectedError);
    const afterFirst = await snapshotTree(dir);
    await assert.rejects(attempt(), CollisionDetectedError);
    const afterSecond = await snapshotTree(dir);

    assert.deepEqual(afterSecond, afterFirst);
    assert.deepEqual(afterFirst, {
      'el9/': '',
      'el9/.packages/': '',
      'el9/.packages/zlib/': '',
      'el9/.packages/zlib/1.3.files': '/earlier/file\n',
      'el9/zlib/': '',
      'el9/zlib/1.3/': '',
      'el9/zlib/1.3/include/': '',
      'el9/zlib/1.3/include/zlib.h': 'foreign',
      'tmp/': ''
    });
  });

  it('finishes with a warning when the probe cannot be removed', async () => {
    const kept: string[] = [];
    const result = await new InstallTransaction({
      driver: new FakeBuildDriver(PACKAGE_FILES),
      identity: 'zlib-1.3',
      manifestPath,
      probeRoot,
      removeProbe: async probeDir => {
        kept.push(probeDir);
        return new ProbeCleanupFailedError(probeDir, new Error('device busy'));
      }
    }).execute(sourceDir, prefix, {});

    assert.equal(kept.length, 1);
    assert.deepEqual(result.warnings, [`Failed to remove probe directory ${kept[0]}`]);
    assert.equal(result.installed.length, 3);
    assert.equal(await exists(join(prefix, 'bin/zpipe')), true);
    assert.equal(await exists(getLockPath(prefix)), false);
  });

  it('wraps a failing discovery build and cleans up the probe', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES, { failOn: 'discovery' });

    await assert.rejects(
      transaction(driver).execute(sourceDir, prefix, {}),
      (error: unknown) => error instanceof BuildFailedError
        && error.phase === 'discovery'
        && error.message === 'Build failed: fake build failed in discovery'
    );
    assert.deepEqual(await readdir(probeRoot), []);
    assert.equal(await exists(prefix), false);
  });

  it('marks commit failures as possibly partial', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES, { failOn: 'commit' });

    await assert.rejects(
      transaction(driver).execute(sourceDir, prefix, {}),
      (error: unknown) => error instanceof BuildFailedError
        && error.phase === 'commit'
        && error.message.endsWith('(commit phase: the prefix may be partially populated)')
    );
    assert.equal(await exists(manifestPath), false);
  });

  it('fails when the commit build does not reproduce the footprint', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES, { skipOnCommit: ['include/zlib.h'] });

    await assert.rejects(
      transaction(driver).execute(sourceDir, prefix, {}),
      (error: unknown) => error instanceof IncompleteInstallError
        && error.path === join(prefix, 'include/zlib.h')
        && error.exitCode === 5
    );
    assert.equal(await readFile(manifestPath, 'utf8'), `${join(prefix, 'bin/zpipe')}\n`);
  });

  it('accumulates manifest lines across installs', async () => {
    await writeTree(join(dir, 'el9', '.packages', 'zlib'), { '1.3.files': '/earlier/file\n' });
    await transaction(new FakeBuildDriver({ 'lib/libz.so': '' })).execute(sourceDir, prefix, {});

    assert.equal(await readFile(manifestPath, 'utf8'), `/earlier/file\n${join(prefix, 'lib/libz.so')}\n`);
  });

  it('does not build while another transaction holds the prefix', async () => {
    const lock = await acquirePrefixLock(prefix);
    const driver = new FakeBuildDriver(PACKAGE_FILES);
    try {
      await assert.rejects(
        transaction(driver).execute(sourceDir, prefix, {}),
        (error: unknown) => error instanceof PrefixLockedError && error.exitCode === 6
      );
    } finally {
      await lock.release();
    }
    assert.equal(driver.invocations.length, 0);
  });

  it('rejects a relative prefix before building', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES);
    await assert.rejects(transaction(driver).execute(sourceDir, 'relative/prefix', {}), ValidationError);
    assert.equal(driver.invocations.length, 0);
  });

  it('dry run reports the footprint without touching the prefix or the manifest', async () => {
    const driver = new FakeBuildDriver(PACKAGE_FILES);
    const result = await transaction(driver).dryRun(sourceDir, prefix, {});

    assert.deepEqual(result.footprint, ['bin/zpipe', 'include/zlib.h', 'lib/libz.so']);
    assert.deepEqual(result.installed, []);
    assert.deepEqual(driver.invocations.map(i => i.phase), ['discovery']);
    assert.equal(await exists(prefix), false);
    assert.equal(await exists(manifestPath), false);
  });

  it('dry run still detects collisions', async () => {
    await writeTree(prefix, { 'bin/zpipe': 'foreign' });
    await assert.rejects(
      transaction(new FakeBuildDriver(PACKAGE_FILES)).dryRun(sourceDir, prefix, {}),
      CollisionDetectedError
    );
  });
});

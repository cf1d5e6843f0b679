import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { readFile, readdir } from 'fs/promises';
import { join } from 'path';
import {
  installPackage,
  requirePlatform,
  resolvePackageDefinition,
  type DriverFactoryInput
} from '../../../src/core/install/install-package.js';
import type { ExecutionContext } from '../../../src/types/execution-context.js';
import type { PackageDefinition } from '../../../src/types/index.js';
import {
  AlreadyInstalledError,
  CollisionDetectedError,
  PackageNotFoundError,
  ValidationError,
  VersionParseError
} from '../../../src/utils/errors.js';
import { exists } from '../../../src/utils/fs.js';
import { readInstallRecord } from '../../../src/core/registry/install-records.js';
import { probeHostToken } from '../../../src/core/transaction/probe-directory.js';
import {
  FakeBuildDriver,
  createTestContext,
  makeTempDir,
  removeTempDir,
  writeTree,
  type RecordingOutput
} from '../../test-helpers.js';

const zlib: PackageDefinition = {
  'version-regex': ['(?<major>\\d+)\\.(?<minor>\\d+)'],
  source: '{root}/sources/{package}-{major}',
  build: { commands: ['make install'], config: { target: '{platform}-{minor}' } }
};

const FILES = { 'lib/libz.so': '12345', 'include/zlib.h': 'abc' };

describe('installPackage', () => {
  let root: string;
  let ctx: ExecutionContext & { output: RecordingOutput };
  let factoryInputs: DriverFactoryInput[];
  let driver: FakeBuildDriver;

  const driverFactory = (input: DriverFactoryInput): FakeBuildDriver => {
    factoryInputs.push(input);
    return driver;
  };

  beforeEach(async () => {
    root = await makeTempDir('install');
    ctx = createTestContext(root, { zlib, 'zlib-ng': { ...zlib, prefix: '{root}/custom/{package}' } });
    ctx.settings['tmp-dir-prefix'] = join(root, 'tmp');
    factoryInputs = [];
    driver = new FakeBuildDriver(FILES);
  });

  afterEach(async () => {
    await removeTempDir(root);
  });

  it('installs into the default prefix and writes the install record', async () => {
    const prefix = join(root, 'el9', 'zlib', '1.3');
    const result = await installPackage(ctx, { name: 'zlib', version: '1.3', driverFactory });

    assert.equal(result.prefix, prefix);
    assert.equal(result.recordPath, join(root, 'el9', '.packages', 'zlib', '1.3.json'));
    assert.deepEqual(result.footprint, ['include/zlib.h', 'lib/libz.so']);

    const record = await readInstallRecord(result.recordPath);
    assert.deepEqual(record && { ...record, installedAt: 'checked-below' }, {
      package: 'zlib',
      version: { fullVersion: '1.3', major: '1', minor: '3' },
      installedAt: 'checked-below',
      prefix,
      manifest: join(root, 'el9', '.packages', 'zlib', '1.3.files'),
      fsEntries: [join(prefix, 'include/zlib.h'), join(prefix, 'lib/libz.so')],
      stats: { size: 8, nFiles: 2 }
    });
    assert.ok(record && !Number.isNaN(Date.parse(record.installedAt)));
    assert.equal(
      await readFile(result.manifestPath, 'utf8'),
      `${join(prefix, 'include/zlib.h')}\n${join(prefix, 'lib/libz.so')}\n`
    );
    assert.deepEqual(ctx.output.of('success'), ['Package "zlib" of version "1.3" installed (8.0B in 2 files)']);
  });

  it('expands the source and build config with version attributes', async () => {
    await installPackage(ctx, { name: 'zlib', version: '1.3', driverFactory });

    assert.equal(factoryInputs[0]?.packageName, 'zlib');
    assert.equal(factoryInputs[0]?.fullVersion, '1.3');
    assert.equal(factoryInputs[0]?.platform, 'el9');
    assert.equal(factoryInputs[0]?.variables.major, '1');
    assert.equal(driver.invocations[0]?.sourceDir, join(root, 'sources', 'zlib-1'));
    assert.ok(driver.invocations[0]?.installRoot.startsWith(
      join(root, 'tmp', `lpkgm-probe-el9-zlib-1.3-${probeHostToken()}-${process.pid}-`)
    ));
    assert.deepEqual(driver.invocations[0]?.config, { target: 'el9-3' });
  });

  it('honours a custom prefix template', async () => {
    const result = await installPackage(ctx, { name: 'zlib-ng', version: '2.1', driverFactory });
    assert.equal(result.prefix, join(root, 'custom', 'zlib-ng'));
  });

  it('refuses a version that is already installed', async () => {
    await installPackage(ctx, { name: 'zlib', version: '1.3', driverFactory });

    await assert.rejects(
      installPackage(ctx, { name: 'zlib', version: '1.3', driverFactory }),
      AlreadyInstalledError
    );
    assert.equal(driver.invocations.length, 2);
  });

  it('leaves no record behind when the install collides', async () => {
    await writeTree(join(root, 'el9', 'zlib', '1.3'), { 'lib/libz.so': 'foreign' });

    await assert.rejects(installPackage(ctx, { name: 'zlib', version: '1.3', driverFactory }), CollisionDetectedError);
    assert.equal(await exists(join(root, 'el9', '.packages', 'zlib', '1.3.json')), false);
  });

  it('dry run reports the footprint only', async () => {
    const result = await installPackage(ctx, { name: 'zlib', version: '1.3', dryRun: true, driverFactory });

    assert.equal(result.dryRun, true);
    assert.equal(result.record, undefined);
    assert.equal(await exists(result.prefix), false);
    assert.equal(await exists(result.recordPath), false);
    assert.deepEqual(ctx.output.of('info'), ['Dry run: 2 file(s) would be installed, no collisions found.']);
    assert.deepEqual(await readdir(join(root, 'tmp')), []);
  });

  it('rejects unknown packages and unparsable versions', async () => {
    await assert.rejects(installPackage(ctx, { name: 'gcc', version: '13.2', driverFactory }), PackageNotFoundError);
    await assert.rejects(installPackage(ctx, { name: 'zlib', version: 'latest', driverFactory }), VersionParseError);
  });
});

describe('resolvePackageDefinition', () => {
  const packages = { zlib, 'zlib-ng': zlib, gcc: zlib };

  it('accepts a pattern matching exactly one package', () => {
    assert.equal(resolvePackageDefinition(packages, 'g*')[0], 'gcc');
    assert.equal(resolvePackageDefinition(packages, 'zlib')[0], 'zlib');
  });

  it('rejects ambiguous and unknown patterns', () => {
    assert.throws(() => resolvePackageDefinition(packages, 'zlib*'), ValidationError);
    assert.throws(
      () => resolvePackageDefinition(packages, 'clang'),
      (error: unknown) => error instanceof PackageNotFoundError && error.message === 'Package "clang" is not known.'
    );
  });
});

describe('requirePlatform', () => {
  it('explains how to select a platform', () => {
    const ctx = createTestContext('/sw', {}, { platform: undefined });
    assert.throws(
      () => requirePlatform(ctx),
      (error: unknown) => error instanceof ValidationError && error.message.includes('-Dplatform=<id>')
    );
  });
});

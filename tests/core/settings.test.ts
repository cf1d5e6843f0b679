import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import {
  getSelectedPlatform,
  loadSettings,
  resolveSettingsPath,
  validateSettings
} from '../../src/core/settings.js';
import { ConfigError } from '../../src/utils/errors.js';
import { makeTempDir, removeTempDir } from '../test-helpers.js';

const zlib = {
  'version-regex': ['(?<major>\\d+)\\.(?<minor>\\d+)'],
  source: '{settingsDir}/sources/zlib-{fullVersion}',
  build: { commands: ['make install DESTDIR={installRoot}'], config: { jobs: 4 } }
};

describe('settings', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir('settings');
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  describe('resolveSettingsPath', () => {
    it('prefers the option, then the environment, then the default file', () => {
      assert.equal(resolveSettingsPath('conf/a.json', { LPKGM_SETTINGS: '/etc/b.json' }, '/work'), '/work/conf/a.json');
      assert.equal(resolveSettingsPath(undefined, { LPKGM_SETTINGS: '/etc/b.json' }, '/work'), '/etc/b.json');
      assert.equal(resolveSettingsPath(undefined, {}, '/work'), '/work/lpkgm-settings.json');
    });
  });

  describe('loadSettings', () => {
    it('expands definitions into the root and resolves it against the settings directory', async () => {
      const settingsPath = join(dir, 'lpkgm-settings.json');
      await writeFile(settingsPath, JSON.stringify({
        root: '{tree}/{site}',
        definitions: { tree: 'software', site: 'lab', platform: 'el9' },
        packages: { zlib }
      }));

      const settings = await loadSettings(settingsPath, { env: {}, cwd: '/work' });
      assert.equal(settings.root, join(dir, 'software', 'lab'));
      assert.equal(settings.definitions.platform, 'el9');
      assert.equal(settings.definitions.settingsDir, dir);
      assert.equal(settings.definitions.pwd, '/work');
      assert.equal(settings.definitions.root, join(dir, 'software', 'lab'));
      assert.deepEqual(settings.packages.zlib?.build.config, { jobs: '4' });
      assert.equal(getSelectedPlatform(settings), 'el9');
    });

    it('lets command line definitions override the file', async () => {
      const settingsPath = join(dir, 'lpkgm-settings.json');
      await writeFile(settingsPath, JSON.stringify({ root: '/sw', definitions: { platform: 'el9' } }));

      const settings = await loadSettings(settingsPath, { overrides: { platform: 'el8' }, env: {} });
      assert.equal(getSelectedPlatform(settings), 'el8');
    });

    it('reads YAML settings and expands environment variables in paths', async () => {
      const settingsPath = join(dir, 'lpkgm-settings.yaml');
      await writeFile(settingsPath, [
        'root: $SW_BASE/tree',
        'log-dir: logs',
        'packages:',
        '  zlib:',
        '    version-regex: ["(?<major>\\\\d+)"]',
        '    source: /src/zlib',
        '    build:',
        '      commands:',
        '        - [make, install]',
        ''
      ].join('\n'));

      const settings = await loadSettings(settingsPath, { env: { SW_BASE: '/opt' } });
      assert.equal(settings.root, '/opt/tree');
      assert.equal(settings['log-dir'], join(dir, 'logs'));
      assert.deepEqual(settings.packages.zlib?.build.commands, [['make', 'install']]);
      assert.deepEqual(settings.packages.zlib?.['version-regex'], ['(?<major>\\d+)']);
      assert.equal(getSelectedPlatform(settings), undefined);
    });

    it('fails when the file is missing', async () => {
      const settingsPath = join(dir, 'absent.json');
      await assert.rejects(
        loadSettings(settingsPath),
        (error: unknown) => error instanceof ConfigError && error.message === `Settings file not found: "${settingsPath}"`
      );
    });

    it('fails on an unknown definition in the root', async () => {
      const settingsPath = join(dir, 'lpkgm-settings.json');
      await writeFile(settingsPath, JSON.stringify({ root: '/sw/{nowhere}' }));
      await assert.rejects(loadSettings(settingsPath, { env: {} }), ConfigError);
    });
  });

  describe('validateSettings', () => {
    it('requires a root', () => {
      assert.throws(
        () => validateSettings({ packages: {} }, 'settings.json'),
        (error: unknown) => error instanceof ConfigError
          && error.message === 'Invalid settings file settings.json: "root" is required'
      );
    });

    it('requires a package source', () => {
      const { source: _source, ...withoutSource } = zlib;
      assert.throws(
        () => validateSettings({ root: '/sw', packages: { zlib: withoutSource } }, 'settings.json'),
        (error: unknown) => error instanceof ConfigError
          && error.message === 'Invalid settings file settings.json: "packages.zlib.source" is required'
      );
    });

    it('rejects version expressions that do not compile', () => {
      assert.throws(
        () => validateSettings({ root: '/sw', packages: { zlib: { ...zlib, 'version-regex': ['(unclosed'] } } }, 's.json'),
        (error: unknown) => error instanceof ConfigError && error.message.includes('"packages.zlib.version-regex"')
      );
    });

    it('accepts per-platform version lists', () => {
      const settings = validateSettings(
        { root: '/sw', packages: { zlib: { ...zlib, versions: { 'el*': ['1.3', '1.2'] } } } },
        's.json'
      );
      assert.deepEqual(settings.packages.zlib?.versions, { 'el*': ['1.3', '1.2'] });
    });
  });
});

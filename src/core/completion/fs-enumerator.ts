/**
 * File System Enumerator
 *
 * Answers completion queries from the software tree on disk and the
 * package definitions in the settings.
 */

import { join, extname } from 'path';
import { readdir, stat } from 'fs/promises';
import { minimatch } from 'minimatch';
import type { LpkgmSettings, PackageDefinition } from '../../types/index.js';
import type { PrefixEnumerator } from './prefix-enumerator.js';
import {
  DIR_PATTERNS,
  FILE_PATTERNS,
  PLATFORM_DEFINITION,
  PLATFORM_SEARCH_DEPTH,
  RECENT_LOG_FILES_LIMIT,
  SHOW_FORMATS
} from '../../constants/index.js';
import { listInstalledPackageNames, listInstalledVersions, findInstallRecords } from '../registry/install-records.js';
import { getRegistryDir } from '../registry/paths.js';
import { isDirectory, listFiles } from '../../utils/fs.js';

export interface FileSystemEnumeratorOptions {
  /** Software tree root; without it no platforms are known */
  root?: string;
  packages?: Readonly<Record<string, PackageDefinition>>;
  defaultPlatform?: string;
  /** Directory searched for settings files */
  cwd?: string;
  logDir?: string;
}

const SETTINGS_FLAGS: ReadonlySet<string> = new Set(['-c', '--settings']);
const PACKAGE_PAIR_FLAGS: ReadonlySet<string> = new Set(['-u', '--use', '-k', '--keep']);
const DEFINE_FLAGS: ReadonlySet<string> = new Set(['-D', '--define']);
const FORMAT_FLAGS: ReadonlySet<string> = new Set(['--format']);

export class FileSystemEnumerator implements PrefixEnumerator {
  private readonly options: FileSystemEnumeratorOptions;

  constructor(options: FileSystemEnumeratorOptions) {
    this.options = options;
  }

  static fromSettings(settings: LpkgmSettings, cwd: string = process.cwd()): FileSystemEnumerator {
    return new FileSystemEnumerator({
      root: settings.root,
      packages: settings.packages,
      defaultPlatform: settings.definitions[PLATFORM_DEFINITION] || undefined,
      cwd,
      logDir: settings['log-dir']
    });
  }

  /**
   * Directories up to PLATFORM_SEARCH_DEPTH levels below the root that
   * hold a package registry, as `/`-separated paths relative to the root.
   */
  async platforms(): Promise<string[]> {
    const { root } = this.options;
    if (!root || !(await isDirectory(root))) {
      return [];
    }
    const found: string[] = [];
    await this.searchPlatforms(root, '', 1, found);
    return found.sort();
  }

  private async searchPlatforms(root: string, relativeDir: string, depth: number, found: string[]): Promise<void> {
    if (depth > PLATFORM_SEARCH_DEPTH) {
      return;
    }
    const entries = await readdir(relativeDir ? join(root, relativeDir) : root, { withFileTypes: true });
    for (const entry of entries) {
      if (!entry.isDirectory() || entry.name.startsWith('.')) continue;
      const candidate = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
      if (await isDirectory(join(root, candidate, DIR_PATTERNS.PACKAGES_REGISTRY))) {
        found.push(candidate);
      }
      await this.searchPlatforms(root, candidate, depth + 1, found);
    }
  }

  async installedPackages(platform: string): Promise<string[]> {
    const { root } = this.options;
    return root ? listInstalledPackageNames(getRegistryDir(root, platform)) : [];
  }

  async installedVersions(platform: string, packageName: string): Promise<string[]> {
    const { root } = this.options;
    return root ? listInstalledVersions(getRegistryDir(root, platform), packageName) : [];
  }

  async installablePackages(): Promise<string[]> {
    return Object.keys(this.options.packages ?? {}).sort();
  }

  /**
   * Versions listed in the package definition: a plain list applies to
   * every platform, a map is keyed by platform glob.
   */
  async installableVersions(platform: string, packageName: string): Promise<string[]> {
    const versions = this.options.packages?.[packageName]?.versions;
    if (!versions) {
      return [];
    }
    if (Array.isArray(versions)) {
      return [...versions];
    }
    return Object.entries(versions)
      .filter(([pattern]) => minimatch(platform, pattern))
      .flatMap(([, list]) => list);
  }

  async flagValues(flag: string, platform?: string): Promise<string[]> {
    if (SETTINGS_FLAGS.has(flag)) {
      return this.settingsFiles();
    }
    if (PACKAGE_PAIR_FLAGS.has(flag)) {
      return platform ? this.installedPairs(platform) : [];
    }
    if (DEFINE_FLAGS.has(flag)) {
      return (await this.platforms()).map(id => `${PLATFORM_DEFINITION}=${id}`);
    }
    if (FORMAT_FLAGS.has(flag)) {
      return [...SHOW_FORMATS];
    }
    return this.recentLogFiles();
  }

  async defaultPlatform(): Promise<string | undefined> {
    return this.options.defaultPlatform;
  }

  private async settingsFiles(): Promise<string[]> {
    const extensions: readonly string[] = FILE_PATTERNS.SETTINGS_EXTENSIONS;
    const files = await listFiles(this.options.cwd ?? process.cwd());
    return files.filter(file => extensions.includes(extname(file).toLowerCase()));
  }

  private async installedPairs(platform: string): Promise<string[]> {
    const { root } = this.options;
    if (!root) {
      return [];
    }
    const entries = await findInstallRecords(getRegistryDir(root, platform));
    return entries.map(entry => `${entry.record.package}/${entry.record.version.fullVersion}`);
  }

  /**
   * Most recently modified files of the log directory, newest first
   */
  private async recentLogFiles(): Promise<string[]> {
    const { logDir } = this.options;
    if (!logDir || !(await isDirectory(logDir))) {
      return [];
    }
    const files = await listFiles(logDir);
    const dated = await Promise.all(
      files.map(async file => ({ file, mtime: (await stat(join(logDir, file))).mtimeMs }))
    );
    return dated
      .sort((a, b) => b.mtime - a.mtime || (a.file < b.file ? -1 : 1))
      .slice(0, RECENT_LOG_FILES_LIMIT)
      .map(item => item.file);
  }
}

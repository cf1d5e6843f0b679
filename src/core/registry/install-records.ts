import { basename, join } from 'path';
import { minimatch } from 'minimatch';
import type { InstallRecord, InstallStats, PackageVersion } from '../../types/index.js';
import { FILE_PATTERNS } from '../../constants/index.js';
import { isDirectory, listDirectories, listFiles, readJsonOrJsoncFile, writeJsonFile } from '../../utils/fs.js';
import { describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Install records kept in a platform's package registry directory.
 */

export interface InstalledEntry {
  record: InstallRecord;
  recordPath: string;
}

/** A `name/version` glob pair; the version half defaults to `*` */
export interface RecordExclusion {
  name: string;
  version: string;
}

export interface RecordQuery {
  /** Glob over package names, default `*` */
  name?: string;
  /** Glob over full version strings, default `*` */
  version?: string;
  exclude?: readonly RecordExclusion[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isPackageVersion(value: unknown): value is PackageVersion {
  return isRecord(value)
    && typeof value.fullVersion === 'string'
    && Object.values(value).every(item => typeof item === 'string');
}

function isInstallStats(value: unknown): value is InstallStats {
  return isRecord(value) && typeof value.size === 'number' && typeof value.nFiles === 'number';
}

export function isInstallRecord(value: unknown): value is InstallRecord {
  return isRecord(value)
    && typeof value.package === 'string'
    && isPackageVersion(value.version)
    && typeof value.installedAt === 'string'
    && typeof value.prefix === 'string'
    && typeof value.manifest === 'string'
    && Array.isArray(value.fsEntries)
    && value.fsEntries.every(entry => typeof entry === 'string')
    && isInstallStats(value.stats);
}

/**
 * Parse `name/version` exclusion globs as given with `--keep`
 */
export function parseExclusions(entries: readonly string[]): RecordExclusion[] {
  return entries.map(entry => {
    const separator = entry.indexOf('/');
    return separator < 0
      ? { name: entry, version: '*' }
      : { name: entry.slice(0, separator), version: entry.slice(separator + 1) || '*' };
  });
}

/**
 * Read one install record. Files that do not hold a record are skipped
 * with a warning.
 */
export async function readInstallRecord(recordPath: string): Promise<InstallRecord | undefined> {
  const content = await readJsonOrJsoncFile(recordPath);
  if (!isInstallRecord(content)) {
    logger.warn(`File "${recordPath}" does not seem to be an install record (ignored).`);
    return undefined;
  }
  return content;
}

export async function writeInstallRecord(recordPath: string, record: InstallRecord): Promise<void> {
  await writeJsonFile(recordPath, record);
  logger.debug(`Install record written: ${recordPath}`);
}

/**
 * Package names with at least one entry in the registry. Hidden and empty
 * directories are not packages.
 */
export async function listInstalledPackageNames(registryDir: string): Promise<string[]> {
  if (!(await isDirectory(registryDir))) {
    return [];
  }
  const names: string[] = [];
  for (const name of await listDirectories(registryDir)) {
    if (name.startsWith('.')) continue;
    if ((await listFiles(join(registryDir, name))).length === 0) continue;
    names.push(name);
  }
  return names;
}

/**
 * Record file paths of one package, sorted
 */
async function listRecordFiles(packageDir: string): Promise<string[]> {
  const files = await listFiles(packageDir);
  return files
    .filter(file => file.endsWith(FILE_PATTERNS.RECORD_SUFFIX) && !file.startsWith('.'))
    .map(file => join(packageDir, file));
}

function versionFromRecordPath(recordPath: string): string {
  return basename(recordPath, FILE_PATTERNS.RECORD_SUFFIX);
}

/**
 * Find install records whose package name and version match the query
 * globs, minus the exclusions. Results are ordered by package name, then
 * record file name.
 */
export async function findInstallRecords(registryDir: string, query: RecordQuery = {}): Promise<InstalledEntry[]> {
  const namePattern = query.name ?? '*';
  const versionPattern = query.version ?? '*';
  const exclusions = query.exclude ?? [];
  const entries: InstalledEntry[] = [];

  for (const name of await listInstalledPackageNames(registryDir)) {
    if (!minimatch(name, namePattern)) continue;

    for (const recordPath of await listRecordFiles(join(registryDir, name))) {
      const version = versionFromRecordPath(recordPath);
      if (!minimatch(version, versionPattern)) continue;
      if (exclusions.some(ex => minimatch(name, ex.name) && minimatch(version, ex.version))) {
        logger.debug(`Excluded from selection: ${name}/${version}`);
        continue;
      }

      let record: InstallRecord | undefined;
      try {
        record = await readInstallRecord(recordPath);
      } catch (error) {
        logger.warn(`Failed to read install record "${recordPath}" (ignored): ${describeError(error)}`);
        continue;
      }
      if (record) {
        entries.push({ record, recordPath });
      }
    }
  }

  return entries;
}

/**
 * Full version strings recorded for one package
 */
export async function listInstalledVersions(registryDir: string, packageName: string): Promise<string[]> {
  const entries = await findInstallRecords(registryDir, { name: packageName });
  return entries
    .filter(entry => entry.record.package === packageName)
    .map(entry => entry.record.version.fullVersion);
}

/**
 * Show Packages
 *
 * Renders the installed packages of a platform as a table (or JSON), or the
 * full install records when both a name and a version are given.
 */

import * as semver from 'semver';
import type { ExecutionContext } from '../../types/execution-context.js';
import { findInstallRecords, type InstalledEntry } from '../registry/install-records.js';
import { getRegistryDir } from '../registry/paths.js';
import { requirePlatform } from '../install/install-package.js';
import { formatInstalledAt, formatSize, renderTable } from '../../utils/formatters.js';
import { ValidationError } from '../../utils/errors.js';
import { SHOW_FORMATS } from '../../constants/index.js';

export type ShowFormat = typeof SHOW_FORMATS[number];

export interface ShowPackagesOptions {
  namePattern?: string;
  versionPattern?: string;
  format?: ShowFormat;
}

export function isShowFormat(value: string): value is ShowFormat {
  return SHOW_FORMATS.some(format => format === value);
}

/**
 * Order versions semver-aware where both sides coerce to a version, falling
 * back to plain string order.
 */
export function compareVersionStrings(a: string, b: string): number {
  const left = semver.coerce(a);
  const right = semver.coerce(b);
  if (left && right) {
    const byVersion = semver.compare(left, right);
    if (byVersion !== 0) return byVersion;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

function compareEntries(a: InstalledEntry, b: InstalledEntry): number {
  if (a.record.package !== b.record.package) {
    return a.record.package < b.record.package ? -1 : 1;
  }
  return compareVersionStrings(a.record.version.fullVersion, b.record.version.fullVersion);
}

interface SummaryRow {
  package: string;
  version: string;
  size: string;
  installed: string;
  files: number;
}

function toSummaryRow(entry: InstalledEntry): SummaryRow {
  return {
    package: entry.record.package,
    version: entry.record.version.fullVersion,
    size: formatSize(entry.record.stats.size),
    installed: formatInstalledAt(entry.record.installedAt),
    files: entry.record.stats.nFiles
  };
}

/**
 * @returns Text to print, newline terminated
 */
export async function showPackages(ctx: ExecutionContext, options: ShowPackagesOptions = {}): Promise<string> {
  const format = options.format ?? 'ascii';
  const platform = requirePlatform(ctx);
  const registryDir = getRegistryDir(ctx.settings.root, platform);

  if (options.versionPattern) {
    if (!options.namePattern) {
      throw new ValidationError('A package name is required together with a version');
    }
    const entries = await findInstallRecords(registryDir, {
      name: options.namePattern,
      version: options.versionPattern
    });
    return `${JSON.stringify(entries.sort(compareEntries).map(entry => entry.record), null, 2)}\n`;
  }

  const entries = (await findInstallRecords(registryDir, { name: options.namePattern ?? '*' })).sort(compareEntries);

  if (entries.length === 0) {
    const notice = `no packages installed -- "${registryDir}" is empty`;
    return format === 'json'
      ? `${JSON.stringify({ error: notice })}\n`
      : ` (${notice}).\n`;
  }

  const rows = entries.map(toSummaryRow);
  if (format === 'json') {
    return `${JSON.stringify(rows, null, 2)}\n`;
  }

  const overall = entries.reduce((total, entry) => total + entry.record.stats.size, 0);
  const table = renderTable(rows, [
    { header: 'Package', accessor: row => row.package, align: 'right' },
    { header: 'Version', accessor: row => row.version },
    { header: 'Size', accessor: row => row.size, align: 'right' },
    { header: 'Installed', accessor: row => row.installed },
    { header: 'Files', accessor: row => String(row.files), align: 'right' }
  ]);
  return `${table}\n${formatSize(overall)} overall\n`;
}

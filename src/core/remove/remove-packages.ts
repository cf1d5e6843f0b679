/**
 * Remove Packages
 *
 * Selects installed packages by name and version globs, asks for
 * confirmation, then deletes exactly the files their install records list.
 * Directories emptied by the deletion are pruned up to the package prefix.
 */

import { dirname } from 'path';
import { lstat } from 'fs/promises';
import type { Stats } from 'fs';
import pico from 'picocolors';
import type { ExecutionContext } from '../../types/execution-context.js';
import { LpkgmError, ErrorCodes } from '../../types/index.js';
import { findInstallRecords, parseExclusions, type InstalledEntry } from '../registry/install-records.js';
import { getPackageRegistryDir, getRegistryDir } from '../registry/paths.js';
import { requirePlatform } from '../install/install-package.js';
import { isAbsentPathError, remove, removeEmptyParents } from '../../utils/fs.js';
import { formatStatsSummary, renderTable } from '../../utils/formatters.js';
import { FileSystemError, PackageNotFoundError, describeError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface RemovePackagesOptions {
  namePattern: string;
  versionPattern: string;
  /** Skip the confirmation prompt */
  yes?: boolean;
  /** `name/version` globs excluded from the selection */
  keep?: readonly string[];
}

export interface RemovePackagesResult {
  selected: InstalledEntry[];
  removed: InstalledEntry[];
  /** False when the user declined, or no confirmation was possible */
  confirmed: boolean;
}

/**
 * Delete the files of one install, then its manifest and record.
 * The record is kept when a file cannot be removed.
 */
export async function uninstallEntry(entry: InstalledEntry, registryDir: string): Promise<void> {
  const { record, recordPath } = entry;
  const dirs = new Set<string>();

  for (const fsEntry of record.fsEntries) {
    let stats: Stats;
    try {
      stats = await lstat(fsEntry);
    } catch (error) {
      if (isAbsentPathError(error)) {
        logger.warn(`Already gone: ${fsEntry}`);
        dirs.add(dirname(fsEntry));
        continue;
      }
      throw new FileSystemError(`Failed to stat: ${fsEntry}`, { path: fsEntry, error });
    }
    if (stats.isDirectory()) {
      logger.warn(`Not removing directory listed as a file: ${fsEntry}`);
      continue;
    }
    logger.debug(`${stats.isSymbolicLink() ? 'Un-linking' : 'Deleting file'} ${fsEntry}`);
    await remove(fsEntry);
    dirs.add(dirname(fsEntry));
  }

  // Deepest directories first so parents see their children gone
  const ordered = [...dirs].sort((a, b) => b.length - a.length);
  for (const dir of ordered) {
    await removeEmptyParents(dir, record.prefix);
  }

  await remove(record.manifest);
  await remove(recordPath);
  const packageDir = getPackageRegistryDir(registryDir, record.package);
  await removeEmptyParents(packageDir, packageDir);
}

export async function removePackages(
  ctx: ExecutionContext,
  options: RemovePackagesOptions
): Promise<RemovePackagesResult> {
  const platform = requirePlatform(ctx);
  const registryDir = getRegistryDir(ctx.settings.root, platform);

  const selected = await findInstallRecords(registryDir, {
    name: options.namePattern,
    version: options.versionPattern,
    exclude: parseExclusions(options.keep ?? [])
  });
  if (selected.length === 0) {
    throw new PackageNotFoundError(
      `Package is not installed: ${options.namePattern} of version "${options.versionPattern}" ` +
        `(no install record in ${registryDir})`,
      { registryDir }
    );
  }

  const table = renderTable(selected, [
    { header: 'Package', accessor: entry => entry.record.package, align: 'right' },
    { header: 'Version', accessor: entry => entry.record.version.fullVersion },
    { header: 'Stats', accessor: entry => formatStatsSummary(entry.record.stats) }
  ]);
  ctx.output.note(table, `Packages selected for deletion (${selected.length}):`);

  if (!options.yes) {
    if (!ctx.interactive) {
      ctx.output.warn(
        `Automatic confirmation is not set and the terminal is not interactive, ` +
          `refusing to delete ${selected.length} package(s).`
      );
      return { selected, removed: [], confirmed: false };
    }
    const confirmed = await ctx.prompt.confirm(pico.bold('Confirm deletion of selected packages?'), false);
    if (!confirmed) {
      return { selected, removed: [], confirmed: false };
    }
  }

  const removed: InstalledEntry[] = [];
  const failed: string[] = [];
  for (const entry of selected) {
    const label = `${entry.record.package}/${entry.record.version.fullVersion}`;
    ctx.output.step(`Removing "${label}" (${formatStatsSummary(entry.record.stats)}), installed at ${entry.record.installedAt}`);
    try {
      await uninstallEntry(entry, registryDir);
      removed.push(entry);
      ctx.output.success(`"${label}" removed.`);
    } catch (error) {
      logger.error(`Error while removing ${label}`, { error });
      ctx.output.error(
        `Failed to remove "${label}": ${describeError(error)}. ` +
          `Install record ${entry.recordPath} kept for further investigation.`
      );
      failed.push(label);
    }
  }

  if (failed.length > 0) {
    throw new LpkgmError(
      `Failed to remove ${failed.length} package(s): ${failed.join(', ')}`,
      ErrorCodes.FILE_SYSTEM_ERROR,
      { failed }
    );
  }
  return { selected, removed, confirmed: true };
}

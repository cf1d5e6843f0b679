/**
 * Install Package
 *
 * Resolves a package definition and version from the settings, runs the
 * install transaction for it and records the result in the platform's
 * package registry.
 */

import { resolve } from 'path';
import { tmpdir } from 'os';
import { minimatch } from 'minimatch';
import type { ExecutionContext } from '../../types/execution-context.js';
import type { BuildDefinition, InstallRecord, PackageDefinition, PackageVersion } from '../../types/index.js';
import type { BuildDriver } from '../build/build-driver.js';
import { CommandBuildDriver } from '../build/command-build-driver.js';
import { InstallTransaction, type TransactionResult } from '../transaction/index.js';
import { parsePackageVersion } from '../registry/version-parser.js';
import { getManifestPath, getRecordPath, getRegistryDir } from '../registry/paths.js';
import { writeInstallRecord } from '../registry/install-records.js';
import { DEFAULT_PREFIX_TEMPLATE, PLATFORM_DEFINITION } from '../../constants/index.js';
import { expandTemplate, type TemplateVariables } from '../../utils/definitions.js';
import { exists, getStats } from '../../utils/fs.js';
import { formatStatsSummary } from '../../utils/formatters.js';
import {
  AlreadyInstalledError,
  PackageNotFoundError,
  ValidationError
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface DriverFactoryInput {
  packageName: string;
  fullVersion: string;
  build: BuildDefinition;
  variables: TemplateVariables;
  platform: string;
  logDir?: string;
}

export type BuildDriverFactory = (input: DriverFactoryInput) => BuildDriver;

export interface InstallPackageOptions {
  /** Package name; shell-style patterns must match exactly one package */
  name: string;
  version: string;
  dryRun?: boolean;
  /** Defaults to a CommandBuildDriver over the package's build commands */
  driverFactory?: BuildDriverFactory;
}

export interface InstallPackageResult {
  packageName: string;
  version: PackageVersion;
  prefix: string;
  manifestPath: string;
  recordPath: string;
  footprint: string[];
  dryRun: boolean;
  record?: InstallRecord;
}

const defaultDriverFactory: BuildDriverFactory = input => new CommandBuildDriver({
  commands: input.build.commands,
  env: input.build.env,
  variables: input.variables,
  platform: input.platform,
  logDir: input.logDir,
  logName: `${input.packageName}-${input.fullVersion}`
});

/**
 * Find the single package definition matching `pattern`.
 */
export function resolvePackageDefinition(
  packages: Readonly<Record<string, PackageDefinition>>,
  pattern: string
): [string, PackageDefinition] {
  const matches = Object.entries(packages).filter(([name]) => minimatch(name, pattern));
  if (matches.length === 0) {
    throw new PackageNotFoundError(`Package "${pattern}" is not known.`, { pattern });
  }
  const [match] = matches;
  if (!match || matches.length > 1) {
    throw new ValidationError(
      `Multiple packages match "${pattern}": ${matches.map(([name]) => name).join(', ')}`,
      { pattern }
    );
  }
  return match;
}

/**
 * The platform to operate on, or an error telling how to select one
 */
export function requirePlatform(ctx: ExecutionContext): string {
  if (!ctx.platform) {
    throw new ValidationError(
      `No platform selected; pass -D${PLATFORM_DEFINITION}=<id> or define "${PLATFORM_DEFINITION}" in ${ctx.settingsPath}`
    );
  }
  return ctx.platform;
}

async function collectStats(paths: readonly string[]): Promise<{ size: number; nFiles: number }> {
  let size = 0;
  for (const path of paths) {
    size += (await getStats(path)).size;
  }
  return { size, nFiles: paths.length };
}

export async function installPackage(
  ctx: ExecutionContext,
  options: InstallPackageOptions
): Promise<InstallPackageResult> {
  const { settings } = ctx;
  const [packageName, definition] = resolvePackageDefinition(settings.packages, options.name);
  const version = parsePackageVersion(packageName, options.version, definition);
  const platform = requirePlatform(ctx);

  const registryDir = getRegistryDir(settings.root, platform);
  const recordPath = getRecordPath(registryDir, packageName, version.fullVersion);
  const manifestPath = getManifestPath(registryDir, packageName, version.fullVersion);
  if (await exists(recordPath)) {
    throw new AlreadyInstalledError(packageName, version.fullVersion, recordPath);
  }

  const variables: TemplateVariables = {
    ...settings.definitions,
    ...version,
    package: packageName,
    platform,
    root: settings.root
  };
  const expand = (template: string, context: string): string =>
    expandTemplate(template, variables, { strict: true, context });

  const sourceDir = resolve(ctx.sourceCwd, expand(definition.source, 'source'));
  const prefix = resolve(ctx.sourceCwd, expand(definition.prefix ?? DEFAULT_PREFIX_TEMPLATE, 'prefix'));
  const buildConfig: Record<string, string> = {};
  for (const [key, value] of Object.entries(definition.build.config ?? {})) {
    buildConfig[key] = expand(value, `build config ${key}`);
  }

  const driverFactory = options.driverFactory ?? defaultDriverFactory;
  const transaction = new InstallTransaction({
    driver: driverFactory({
      packageName,
      fullVersion: version.fullVersion,
      build: definition.build,
      variables,
      platform,
      logDir: settings['log-dir']
    }),
    identity: `${platform}-${packageName}-${version.fullVersion}`,
    manifestPath,
    probeRoot: settings['tmp-dir-prefix'] ?? tmpdir()
  });

  logger.debug(`Installing ${packageName}/${version.fullVersion}`, { sourceDir, prefix, buildConfig });
  ctx.output.step(`Installing "${packageName}" of version "${version.fullVersion}" into ${prefix}`);

  const dryRun = options.dryRun ?? false;
  const result: TransactionResult = dryRun
    ? await transaction.dryRun(sourceDir, prefix, buildConfig)
    : await transaction.execute(sourceDir, prefix, buildConfig);
  for (const warning of result.warnings) {
    ctx.output.warn(warning);
  }

  if (dryRun) {
    ctx.output.info(`Dry run: ${result.footprint.length} file(s) would be installed, no collisions found.`);
    return { packageName, version, prefix, manifestPath, recordPath, footprint: result.footprint, dryRun };
  }

  const record: InstallRecord = {
    package: packageName,
    version,
    installedAt: new Date().toISOString(),
    prefix,
    manifest: manifestPath,
    fsEntries: result.installed,
    stats: await collectStats(result.installed)
  };
  await writeInstallRecord(recordPath, record);

  ctx.output.success(
    `Package "${packageName}" of version "${version.fullVersion}" installed (${formatStatsSummary(record.stats)})`
  );
  return { packageName, version, prefix, manifestPath, recordPath, footprint: result.footprint, dryRun, record };
}

/**
 * Install Transaction
 *
 * Probe-then-commit installation into a shared prefix:
 *
 *   1. discovery   build into a fresh probe directory
 *   2. footprint   list the regular files it produced, delete the probe
 *   3. collision   refuse if any of them already exists under the prefix
 *   4. commit      build again, into the prefix itself
 *   5. verify      require every footprint file and append it to the manifest
 *
 * The prefix is not written before step 4. Nothing is retried; every failure
 * ends the transaction. The whole sequence runs under the prefix lock.
 */

import { isAbsolute, resolve } from 'path';
import { tmpdir } from 'os';
import type { BuildConfig, BuildDriver } from '../build/build-driver.js';
import { extractFootprint, resolveFootprintPath } from './footprint.js';
import { findCollisions } from './collision-check.js';
import { appendManifest } from './manifest-writer.js';
import { withPrefixLock } from './prefix-lock.js';
import { createProbeDirectory, removeProbeDirectory, sweepStaleProbeDirectories } from './probe-directory.js';
import { isRegularFile } from '../../utils/fs.js';
import {
  BuildFailedError,
  CollisionDetectedError,
  IncompleteInstallError,
  ProbeCleanupFailedError,
  ValidationError,
  describeError,
  type BuildPhase
} from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface InstallTransactionOptions {
  driver: BuildDriver;
  /** Package identity (e.g. `name-version`), part of the probe directory name */
  identity: string;
  /** Where the manifest is appended */
  manifestPath: string;
  /** Parent of probe directories, default the OS temp directory */
  probeRoot?: string;
  /** Deletes a probe directory, reporting a failure instead of throwing */
  removeProbe?: (probeDir: string) => Promise<ProbeCleanupFailedError | undefined>;
}

export interface TransactionResult {
  manifestPath: string;
  /** Relative footprint, in discovery order */
  footprint: string[];
  /** Absolute paths verified and appended to the manifest */
  installed: string[];
  /** Non-fatal problems, such as a probe directory that could not be removed */
  warnings: string[];
}

export class InstallTransaction {
  private readonly options: InstallTransactionOptions;

  constructor(options: InstallTransactionOptions) {
    this.options = options;
  }

  /**
   * Install `buildSource` into `prefix`.
   *
   * @returns Path of the manifest
   */
  async install(buildSource: string, prefix: string, buildConfig: BuildConfig): Promise<string> {
    const result = await this.execute(buildSource, prefix, buildConfig);
    return result.manifestPath;
  }

  /**
   * Full transaction, with the footprint and warnings the caller may want to report.
   */
  async execute(buildSource: string, prefix: string, buildConfig: BuildConfig): Promise<TransactionResult> {
    assertAbsolutePrefix(prefix);
    const sourceDir = resolve(buildSource);
    const config = freezeConfig(buildConfig);
    const warnings: string[] = [];

    return withPrefixLock(prefix, async () => {
      const footprint = await this.discover(sourceDir, config, warnings);
      await this.checkCollisions(prefix, footprint);

      logger.info(`Committing ${footprint.length} file(s) into ${prefix}`);
      await this.runDriver(sourceDir, prefix, config, 'commit');

      const installed = await this.verify(prefix, footprint);
      logger.info(`Manifest updated: ${this.options.manifestPath}`);
      return { manifestPath: this.options.manifestPath, footprint, installed, warnings };
    });
  }

  /**
   * Discovery and collision check only. The prefix, the manifest and the
   * prefix lock are left alone; `installed` stays empty.
   */
  async dryRun(buildSource: string, prefix: string, buildConfig: BuildConfig): Promise<TransactionResult> {
    assertAbsolutePrefix(prefix);
    const warnings: string[] = [];
    const footprint = await this.discover(resolve(buildSource), freezeConfig(buildConfig), warnings);
    await this.checkCollisions(prefix, footprint);
    return { manifestPath: this.options.manifestPath, footprint, installed: [], warnings };
  }

  private async discover(sourceDir: string, config: BuildConfig, warnings: string[]): Promise<string[]> {
    const probeRoot = resolve(this.options.probeRoot ?? tmpdir());
    await sweepStaleProbeDirectories(probeRoot, this.options.identity);

    const probeDir = await createProbeDirectory(probeRoot, this.options.identity);
    try {
      await this.runDriver(sourceDir, probeDir, config, 'discovery');
      return await extractFootprint(probeDir);
    } finally {
      const removeProbe = this.options.removeProbe ?? removeProbeDirectory;
      const failure = await removeProbe(probeDir);
      if (failure) {
        warnings.push(failure.message);
      }
    }
  }

  private async checkCollisions(prefix: string, footprint: readonly string[]): Promise<void> {
    const collisions = await findCollisions(prefix, footprint);
    if (collisions.length > 0) {
      throw new CollisionDetectedError(collisions);
    }
  }

  private async runDriver(sourceDir: string, installRoot: string, config: BuildConfig, phase: BuildPhase): Promise<void> {
    logger.debug(`Running ${phase} build`, { sourceDir, installRoot });
    try {
      await this.options.driver.install({ sourceDir, installRoot, config, phase });
    } catch (error) {
      if (error instanceof BuildFailedError) {
        throw error;
      }
      throw new BuildFailedError(describeError(error), { phase });
    }
  }

  /**
   * Stops at the first missing file. The files verified before it are
   * still appended so the manifest shows what was placed.
   */
  private async verify(prefix: string, footprint: readonly string[]): Promise<string[]> {
    const verified: string[] = [];
    for (const relativePath of footprint) {
      const target = resolveFootprintPath(prefix, relativePath);
      if (!(await isRegularFile(target))) {
        await appendManifest(this.options.manifestPath, verified);
        throw new IncompleteInstallError(target, prefix);
      }
      verified.push(target);
    }
    await appendManifest(this.options.manifestPath, verified);
    return verified;
  }
}

function assertAbsolutePrefix(prefix: string): void {
  if (!prefix || !isAbsolute(prefix)) {
    throw new ValidationError(`Install prefix must be an absolute path, got "${prefix}"`, { prefix });
  }
}

function freezeConfig(buildConfig: BuildConfig): BuildConfig {
  return Object.freeze({ ...buildConfig });
}

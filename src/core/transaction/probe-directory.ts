/**
 * Probe Directory Helpers
 *
 * A probe directory receives the discovery-phase install. It is named
 * `lpkgm-probe-<identity>-<host>-<pid>-<token>` under the probe root so that
 * transactions for different package versions, or concurrent runs for the
 * same one, never share it. The probe root may be shared between hosts, so
 * only remnants written from this host are ever judged by their pid.
 */

import { join } from 'path';
import { hostname } from 'os';
import { mkdtemp, readdir, rm } from 'fs/promises';
import { FILE_PATTERNS } from '../../constants/index.js';
import { ensureDir, isAbsentPathError } from '../../utils/fs.js';
import { FileSystemError, ProbeCleanupFailedError, getErrorCode } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const REMNANT_SUFFIX_PATTERN = /^(\d+)-[A-Za-z0-9]+$/;

/**
 * Make an identity usable as part of a directory name
 */
export function sanitizeProbeIdentity(identity: string): string {
  const sanitized = identity.replace(/[^A-Za-z0-9._+-]+/g, '_');
  return sanitized || 'build';
}

function probeNamePrefix(identity: string): string {
  return `${FILE_PATTERNS.PROBE_PREFIX}${sanitizeProbeIdentity(identity)}-`;
}

/** Host part of the probe names written by this process */
export function probeHostToken(host: string = hostname()): string {
  return sanitizeProbeIdentity(host);
}

/**
 * Create a fresh, empty probe directory.
 *
 * @returns Absolute path to the created directory
 */
export async function createProbeDirectory(probeRoot: string, identity: string): Promise<string> {
  await ensureDir(probeRoot);
  try {
    const probeDir = await mkdtemp(join(probeRoot, `${probeNamePrefix(identity)}${probeHostToken()}-${process.pid}-`));
    logger.debug(`Created probe directory: ${probeDir}`);
    return probeDir;
  } catch (error) {
    throw new FileSystemError(`Failed to create probe directory under ${probeRoot}`, { probeRoot, error });
  }
}

/**
 * Delete a probe directory with everything in it.
 *
 * Never throws: a failure is logged and handed back so the caller can
 * report it as a warning.
 */
export async function removeProbeDirectory(probeDir: string): Promise<ProbeCleanupFailedError | undefined> {
  try {
    await rm(probeDir, { recursive: true, force: true });
    logger.debug(`Removed probe directory: ${probeDir}`);
    return undefined;
  } catch (error) {
    const failure = new ProbeCleanupFailedError(probeDir, error);
    logger.warn(failure.message, { probeDir, error });
    return failure;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return getErrorCode(error) === 'EPERM';
  }
}

/**
 * Remove probe directories of the same identity left behind by processes
 * of this host that no longer run. Probes of other hosts are never touched.
 *
 * @returns Paths of the remnants removed
 */
export async function sweepStaleProbeDirectories(probeRoot: string, identity: string): Promise<string[]> {
  let names: string[];
  try {
    names = await readdir(probeRoot);
  } catch (error) {
    if (isAbsentPathError(error)) {
      return [];
    }
    throw new FileSystemError(`Failed to read probe root: ${probeRoot}`, { probeRoot, error });
  }

  const prefix = `${probeNamePrefix(identity)}${probeHostToken()}-`;
  const swept: string[] = [];
  for (const name of names) {
    if (!name.startsWith(prefix)) continue;
    const match = REMNANT_SUFFIX_PATTERN.exec(name.slice(prefix.length));
    if (!match) continue;

    const pid = Number(match[1]);
    if (pid === process.pid || isProcessAlive(pid)) continue;

    const remnant = join(probeRoot, name);
    logger.info(`Removing stale probe directory: ${remnant}`);
    const failure = await removeProbeDirectory(remnant);
    if (!failure) {
      swept.push(remnant);
    }
  }
  return swept;
}

import { join } from 'path';
import { DIR_PATTERNS, FILE_PATTERNS } from '../../constants/index.js';

/**
 * Registry layout below the software tree root:
 *
 *   <root>/<platform>/.packages/<name>/<fullVersion>.json   install record
 *   <root>/<platform>/.packages/<name>/<fullVersion>.files  manifest
 */

export function getPlatformRoot(root: string, platform: string): string {
  return join(root, platform);
}

export function getRegistryDir(root: string, platform: string): string {
  return join(getPlatformRoot(root, platform), DIR_PATTERNS.PACKAGES_REGISTRY);
}

export function getPackageRegistryDir(registryDir: string, packageName: string): string {
  return join(registryDir, packageName);
}

export function getRecordPath(registryDir: string, packageName: string, fullVersion: string): string {
  return join(registryDir, packageName, `${fullVersion}${FILE_PATTERNS.RECORD_SUFFIX}`);
}

export function getManifestPath(registryDir: string, packageName: string, fullVersion: string): string {
  return join(registryDir, packageName, `${fullVersion}${FILE_PATTERNS.MANIFEST_SUFFIX}`);
}

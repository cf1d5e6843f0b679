/**
 * Collision check: which footprint entries already exist as regular files
 * under the prefix. Symlinks are followed; a missing parent directory means
 * the path is absent.
 */

import { isRegularFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';
import { resolveFootprintPath } from './footprint.js';

/**
 * @returns Absolute paths of the colliding entries, in footprint order
 */
export async function findCollisions(prefix: string, footprint: readonly string[]): Promise<string[]> {
  const collisions: string[] = [];
  for (const relativePath of footprint) {
    const target = resolveFootprintPath(prefix, relativePath);
    if (await isRegularFile(target)) {
      logger.debug(`Collision: ${target}`);
      collisions.push(target);
    }
  }
  return collisions;
}

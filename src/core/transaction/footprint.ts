import { resolve } from 'path';
import { walkRegularFiles } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

/**
 * Relative paths of every regular file a build placed under `installRoot`,
 * `/`-separated, in sorted traversal order.
 */
export async function extractFootprint(installRoot: string): Promise<string[]> {
  const footprint: string[] = [];
  for await (const relativePath of walkRegularFiles(installRoot)) {
    footprint.push(relativePath);
  }
  logger.debug(`Footprint of ${installRoot}: ${footprint.length} file(s)`);
  return footprint;
}

/**
 * Absolute location of a footprint entry under a prefix
 */
export function resolveFootprintPath(prefix: string, relativePath: string): string {
  return resolve(prefix, relativePath);
}

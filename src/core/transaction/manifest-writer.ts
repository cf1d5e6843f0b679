import { appendTextFile } from '../../utils/fs.js';

/**
 * Append absolute paths to a manifest, one per line. The file is created
 * when missing; existing lines are left alone, so repeated installs may
 * accumulate duplicates.
 */
export async function appendManifest(manifestPath: string, paths: readonly string[]): Promise<void> {
  await appendTextFile(manifestPath, paths.map(path => `${path}\n`).join(''));
}

import { promises as fs, constants as fsConstants, type Dirent, type Stats } from 'fs';
import { join, dirname } from 'path';
import { parse as parseJsonc, type ParseError, printParseErrorCode } from 'jsonc-parser';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, getErrorCode } from './errors.js';

/**
 * File system utilities with proper error handling
 */

/**
 * Syscall codes meaning "nothing usable is there": the path is missing, a
 * parent is missing or not a directory, or a symlink chain never ends.
 */
const ABSENT_PATH_CODES = new Set(['ENOENT', 'ENOTDIR', 'ELOOP']);

export function isAbsentPathError(error: unknown): boolean {
  const code = getErrorCode(error);
  return code !== undefined && ABSENT_PATH_CODES.has(code);
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Check if a path is a directory
 */
export async function isDirectory(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

/**
 * Check whether `path`, with symlinks followed, is a regular file.
 *
 * Missing paths (including missing parent directories) answer false; any
 * other failure, such as a permission error, is rethrown because it says
 * nothing about whether the file is there.
 */
export async function isRegularFile(path: string): Promise<boolean> {
  try {
    const stats = await fs.stat(path);
    return stats.isFile();
  } catch (error) {
    if (isAbsentPathError(error)) {
      return false;
    }
    throw new FileSystemError(`Failed to stat: ${path}`, { path, error });
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to locate or create directory: ${path}`, { path, error });
  }
}

/**
 * Read a file as text
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    throw new FileSystemError(`Failed to read file: ${path}`, { path, error });
  }
}

/**
 * Write text to a file
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to write file: ${path}`, { path, error });
  }
}

/**
 * Append text to a file, creating it (and its directory) when missing.
 * Existing content is never rewritten.
 */
export async function appendTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  try {
    await ensureDir(dirname(path));
    await fs.appendFile(path, content, encoding);
    logger.debug(`Appended to file: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to append to file: ${path}`, { path, error });
  }
}

/**
 * Remove a file or directory recursively
 */
export async function remove(path: string): Promise<void> {
  try {
    await fs.rm(path, { recursive: true, force: true });
    logger.debug(`Removed: ${path}`);
  } catch (error) {
    throw new FileSystemError(`Failed to remove: ${path}`, { path, error });
  }
}

/**
 * List files in a directory (non-recursive)
 */
export async function listFiles(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isFile() && !isJunk(entry.name))
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list files in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * List directories in a directory (non-recursive)
 */
export async function listDirectories(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath, { withFileTypes: true });
    return entries
      .filter(entry => entry.isDirectory())
      .map(entry => entry.name)
      .sort();
  } catch (error) {
    throw new FileSystemError(`Failed to list directories in directory: ${dirPath}`, { dirPath, error });
  }
}

/**
 * Recursively walk a directory and yield every regular file, as a path
 * relative to `root` with `/` separators.
 *
 * Entries are visited in sorted order so the same tree always yields the
 * same sequence. Symlinks are not followed and not yielded, directories are
 * descended into, and nothing is filtered out by name.
 */
export async function* walkRegularFiles(root: string, relativeDir: string = ''): AsyncGenerator<string> {
  const dirPath = relativeDir ? join(root, relativeDir) : root;
  let entries: Dirent[];
  try {
    entries = await fs.readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new FileSystemError(`Failed to read directory: ${dirPath}`, { dirPath, error });
  }

  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const relativePath = relativeDir ? `${relativeDir}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      yield* walkRegularFiles(root, relativePath);
    } else if (entry.isFile()) {
      yield relativePath;
    }
  }
}

/**
 * Get file stats
 */
export async function getStats(path: string): Promise<Stats> {
  try {
    return await fs.stat(path);
  } catch (error) {
    throw new FileSystemError(`Failed to get stats for: ${path}`, { path, error });
  }
}

/**
 * Write object to JSON file
 */
export async function writeJsonFile(path: string, data: unknown, indent: number = 2): Promise<void> {
  const content = JSON.stringify(data, null, indent);
  await writeTextFile(path, content + '\n');
}

/**
 * Read a JSON or JSONC file and parse it.
 * The JSONC parser handles standard JSON too. The result is unvalidated.
 */
export async function readJsonOrJsoncFile(path: string): Promise<unknown> {
  const content = await readTextFile(path);
  const errors: ParseError[] = [];
  const result: unknown = parseJsonc(content, errors, { allowTrailingComma: true });
  if (errors.length > 0 || result === undefined) {
    const reasons = errors.map(e => `${printParseErrorCode(e.error)} at offset ${e.offset}`);
    throw new FileSystemError(`Failed to parse JSON/JSONC file: ${path}`, { path, reasons });
  }
  return result;
}

/**
 * Remove empty directories from `startDir` upward, stopping at the first
 * non-empty directory. `stopDir` is removed when empty but nothing above it
 * is touched; `startDir` must lie inside `stopDir`.
 */
export async function removeEmptyParents(startDir: string, stopDir: string): Promise<string[]> {
  const removed: string[] = [];
  let current = startDir;

  while (current === stopDir || current.startsWith(stopDir.endsWith('/') ? stopDir : `${stopDir}/`)) {
    let entries: string[];
    try {
      entries = await fs.readdir(current);
    } catch (error) {
      if (isAbsentPathError(error)) {
        if (current === stopDir) break;
        current = dirname(current);
        continue;
      }
      throw new FileSystemError(`Failed to read directory: ${current}`, { path: current, error });
    }

    if (entries.length > 0) {
      break;
    }

    try {
      await fs.rmdir(current);
    } catch (error) {
      throw new FileSystemError(`Failed to remove directory: ${current}`, { path: current, error });
    }
    removed.push(current);
    logger.debug(`Removed empty directory: ${current}`);

    if (current === stopDir) break;
    current = dirname(current);
  }

  return removed;
}

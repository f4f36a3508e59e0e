import { constants, promises as fs, Stats } from 'fs';
import * as path from 'path';
import { errorCode } from './flow';

export async function lstatIfExists(s: string): Promise<Stats | undefined> {
  try {
    return await fs.lstat(s);
  } catch (e) {
    if (errorCode(e) === 'ENOENT') { return undefined; }
    throw e;
  }
}

/**
 * Like lstatIfExists, but follows symlinks
 *
 * A symlink pointing nowhere is treated as nonexistent.
 */
export async function statIfExists(s: string): Promise<Stats | undefined> {
  try {
    return await fs.stat(s);
  } catch (e) {
    const code = errorCode(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') { return undefined; }
    throw e;
  }
}

export async function isFile(s: string) {
  return (await statIfExists(s))?.isFile() ?? false;
}

export async function isDirectory(s: string) {
  return (await statIfExists(s))?.isDirectory() ?? false;
}

export async function isExecutableFile(s: string) {
  if (!await isFile(s)) { return false; }
  try {
    await fs.access(s, constants.X_OK);
    return true;
  } catch (e) {
    if (errorCode(e) === 'EACCES') { return false; }
    throw e;
  }
}

export async function readdirIfExists(dir: string): Promise<string[]> {
  try {
    return await fs.readdir(dir);
  } catch (e) {
    const code = errorCode(e);
    if (code === 'ENOENT' || code === 'ENOTDIR') { return []; }
    throw e;
  }
}

export async function ignoreEnoent(block: () => Promise<void>): Promise<void> {
  try {
    await block();
  } catch (e) {
    if (errorCode(e) !== 'ENOENT') { throw e; }
  }
}

/**
 * Find the closest file with the given name up from the starting directory
 *
 * The starting directory itself is checked first, and `cb` decides whether a
 * candidate counts (e.g. `isFile`). Returns the full path to the file, or
 * undefined if the filesystem root was reached without finding it.
 */
export async function findFileUp(filename: string, startDir: string, cb: (fullPath: string) => Promise<boolean>): Promise<string | undefined> {
  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await cb(fullPath)) {
      return fullPath;
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { return undefined; }
    currentDir = next;
  }
}

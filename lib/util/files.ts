import { promises as fs, Stats } from 'fs';
import * as path from 'path';
import * as crypto from 'crypto';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { errorWithCode, hasErrorCode, isEnoent } from './runtime';

export function standardHash() {
  return crypto.createHash('sha1');
}

export async function exists(s: string, cb?: (s: Stats) => boolean) {
  try {
    const st = await fs.lstat(s);
    return cb === undefined || cb(st);
  } catch (e) {
    if (isEnoent(e)) { return false; }
    throw e;
  }
}

export async function readJson(filename: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    throw errorWithCode(hasErrorCode(e) ? e.code : undefined, new Error(`While reading ${filename}: ${e}`));
  }
}

export async function readJsonIfExists(filename: string): Promise<unknown> {
  try {
    return JSON.parse(await fs.readFile(filename, { encoding: 'utf-8' }));
  } catch (e) {
    if (isEnoent(e)) { return undefined; }
    throw errorWithCode(hasErrorCode(e) ? e.code : undefined, new Error(`While reading ${filename}: ${e}`));
  }
}

/**
 * Write JSON to a file by way of a temporary file and a rename
 *
 * Readers either see the old content or the new content, never a partial file.
 */
export async function writeJsonAtomic<A>(filename: string, obj: A) {
  const tmpFile = tempFileFor(filename);
  try {
    await fs.writeFile(tmpFile, JSON.stringify(obj, undefined, 2), { encoding: 'utf-8' });
    await fs.rename(tmpFile, filename);
  } catch (e) {
    await fs.rm(tmpFile, { force: true });
    throw e;
  }
}

/**
 * Copy a stream to a file, replacing the file only once the copy has completed
 *
 * If the copy fails, whatever was at the target before is left untouched.
 */
export async function writeStreamAtomic(source: Readable, target: string) {
  const tmpFile = tempFileFor(target);
  try {
    // Open first, so the temp file exists by the time we might have to remove it
    const handle = await fs.open(tmpFile, 'w');
    await pipeline(source, handle.createWriteStream());
    await fs.rename(tmpFile, target);
  } catch (e) {
    source.destroy();
    await fs.rm(tmpFile, { force: true });
    throw e;
  }
}

/**
 * Temporary sibling of the given file (same directory, so a rename is atomic)
 */
export function tempFileFor(filename: string) {
  return `${filename}.${crypto.randomBytes(4).toString('hex')}.tmp`;
}

/**
 * Delete a file, returning whether it was there
 */
export async function deleteIfExists(filePath: string): Promise<boolean> {
  try {
    await fs.unlink(filePath);
    return true;
  } catch (e) {
    if (isEnoent(e)) { return false; }
    throw e;
  }
}

/**
 * Names of the regular files directly inside a directory (no recursion)
 */
export async function listFiles(dirName: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirName, { withFileTypes: true });
    return entries.filter(e => e.isFile() || e.isSymbolicLink()).map(e => e.name).sort();
  } catch (e) {
    if (isEnoent(e)) { return []; }
    throw e;
  }
}

export interface FileInfo {
  readonly fullPath: string;
  readonly mtimeMs: number;
  readonly size: number;
}

export async function allFilesRecursive(root: string): Promise<FileInfo[]> {
  const ret = new Array<FileInfo>();
  await recurse(root);
  return ret;

  async function recurse(dirName: string) {
    const entries = await fs.readdir(dirName);
    for (const e of entries) {
      const fullPath = path.join(dirName, e);
      const stat = await fs.lstat(fullPath);
      if (stat.isDirectory()) {
        await recurse(fullPath);
      } else {
        ret.push({ fullPath, mtimeMs: stat.mtimeMs, size: stat.size });
      }
    }
  }
}

/**
 * Find the most specific file with the given name up from the starting directory
 */
export async function findFileUp(filename: string, startDir: string): Promise<string | undefined> {
  let currentDir = path.resolve(startDir);
  while (true) {
    const fullPath = path.join(currentDir, filename);
    if (await exists(fullPath)) {
      return fullPath;
    }

    const next = path.dirname(currentDir);
    if (next === currentDir) { return undefined; }
    currentDir = next;
  }
}

import * as path from 'path';
import { CacheEntry, CacheEntrySchema, isCacheEntrySchema } from '../model/cache-entry';
import { CacheFile } from '../util/cache-file';
import { PromisePool } from '../util/concurrency';
import { deleteIfExists, listFiles } from '../util/files';

/**
 * Name of the file that records what the cache directory holds
 */
export const CACHE_DATA_FILE = '.artifact-cache.json';

const CACHE_DATA_VERSION = 1;

/**
 * Cache key to entry
 */
export type CacheState = Map<string, CacheEntry>;

export interface CacheDataSchema {
  readonly version: typeof CACHE_DATA_VERSION;
  readonly entries: CacheEntrySchema[];
}

export function isCacheDataSchema(x: unknown): x is CacheDataSchema {
  return typeof x === 'object' && x !== null
    && 'version' in x && x.version === CACHE_DATA_VERSION
    && 'entries' in x && Array.isArray(x.entries)
    && x.entries.every(isCacheEntrySchema);
}

export function cacheDataFile(cacheDir: string): CacheFile<CacheDataSchema> {
  return new CacheFile(path.join(cacheDir, CACHE_DATA_FILE), isCacheDataSchema);
}

export function pathToCachedFile(cacheDir: string, fileName: string) {
  return path.join(cacheDir, fileName);
}

/**
 * All files in the cache directory, except the cache data file itself
 */
export async function getCacheFiles(cacheDir: string): Promise<Set<string>> {
  const files = await listFiles(cacheDir);
  return new Set(files.filter(f => f !== CACHE_DATA_FILE));
}

/**
 * Read the cache state from disk
 *
 * Returns undefined if there is no cache data file. Throws MalformedCacheFileError
 * if there is one but it can't be used. If the same key occurs twice the last one wins.
 */
export async function loadCacheData(cacheDir: string): Promise<CacheState | undefined> {
  const data = await cacheDataFile(cacheDir).read();
  if (!data) { return undefined; }

  const state: CacheState = new Map();
  for (const schema of data.entries) {
    state.set(schema.cacheKey, CacheEntry.fromSchema(schema));
  }
  return state;
}

/**
 * Remove entries from the state whose file doesn't exist on disk
 *
 * Returns the keys that were removed.
 */
export function removeStaleReferences(cachedFiles: Set<string>, state: CacheState): string[] {
  const removed = new Array<string>();
  for (const [key, entry] of state) {
    if (!cachedFiles.has(entry.fileName)) {
      removed.push(key);
    }
  }
  for (const key of removed) {
    state.delete(key);
  }
  return removed;
}

/**
 * Delete files on disk that no entry in the state refers to
 *
 * Every deletion is attempted; the result lists what happened to each file.
 */
export async function removeUntrackedFiles(
  cacheDir: string,
  cachedFiles: Set<string>,
  state: CacheState,
  pool: PromisePool): Promise<FileDeletion[]> {

  const tracked = new Set(Array.from(state.values()).map(e => e.fileName));
  const untracked = Array.from(cachedFiles).filter(f => !tracked.has(f));
  return deleteFiles(cacheDir, untracked, pool);
}

/**
 * Delete every file in the cache directory, including the cache data file
 */
export async function clearDirectory(cacheDir: string, pool: PromisePool): Promise<FileDeletion[]> {
  return deleteFiles(cacheDir, await listFiles(cacheDir), pool);
}

export function writeCacheData(cacheDir: string, state: CacheState): Promise<void> {
  const entries = Array.from(state.values())
    .sort((a, b) => a.cacheKey.localeCompare(b.cacheKey))
    .map(e => e.toSchema());

  return cacheDataFile(cacheDir).write({
    version: CACHE_DATA_VERSION,
    entries,
  });
}

export type FileDeletion =
  | { readonly fileName: string; readonly ok: true }
  | { readonly fileName: string; readonly ok: false; readonly error: unknown };

async function deleteFiles(cacheDir: string, fileNames: string[], pool: PromisePool): Promise<FileDeletion[]> {
  return pool.all(fileNames.map(fileName => async (): Promise<FileDeletion> => {
    try {
      await deleteIfExists(pathToCachedFile(cacheDir, fileName));
      return { fileName, ok: true };
    } catch (error) {
      return { fileName, ok: false, error };
    }
  }));
}

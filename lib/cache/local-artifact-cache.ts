import { promises as fs } from 'fs';
import { ArtifactNotFoundError, IArtifact } from '../artifacts/artifact';
import { ISyncContext } from '../context';
import { IBatchDownloader, PrefetchDownloader } from '../downloads/batch-downloader';
import { CacheEntry } from '../model/cache-entry';
import { MalformedCacheFileError } from '../util/cache-file';
import { Lock, PromisePool } from '../util/concurrency';
import { UnsupportedOperationError } from '../util/flow';
import { errorMessage } from '../util/runtime';
import * as log from '../util/log';
import {
  cacheDataFile, CacheState, clearDirectory, getCacheFiles, loadCacheData, pathToCachedFile,
  removeStaleReferences, removeUntrackedFiles, writeCacheData,
} from './cache-data';
import { IArtifactCache } from './icache';
import { synchronize, SyncOutcome } from './sync-engine';

export const DEFAULT_CONCURRENCY = 4;

export interface LocalArtifactCacheProps {
  /**
   * Name of the cache, used in messages only
   */
  readonly cacheName: string;

  /**
   * Directory where artifacts are stored
   */
  readonly cacheDir: string;

  /**
   * How many files to copy or delete at the same time
   *
   * @default 4
   */
  readonly concurrency?: number;

  /**
   * Fetches remote artifacts before they are copied
   *
   * @default - a PrefetchDownloader on this cache's pool
   */
  readonly downloader?: IBatchDownloader;
}

/**
 * An on-disk cache of artifacts
 *
 * get() returns the path to the local copy of a cached artifact. All maintenance
 * happens in putAll():
 *
 * - Artifacts that are new, or whose fingerprint changed since they were copied,
 *   are (re)copied. Remote artifacts among them are downloaded in a single batch first.
 * - If removeMissingArtifacts is set, cached artifacts that were not passed are
 *   deleted. That makes putAll() unlike a traditional cache put: it must be called
 *   with every artifact that should stay referenced.
 *
 * The mapping from cache key to entry lives in memory and is written to a file in
 * the cache directory after every change; initialize() reads it back and repairs it
 * against what is actually on disk.
 *
 * initialize(), putAll() and clearCache() run one at a time. They work on a copy of
 * the state that is swapped in when they finish, so get() always sees a consistent
 * state without waiting.
 */
export class LocalArtifactCache implements IArtifactCache {
  public readonly cacheName: string;
  public readonly cacheDir: string;

  private readonly lock = new Lock();
  private readonly pool: PromisePool;
  private readonly downloader: IBatchDownloader;

  /**
   * Maps cache key to entry
   */
  private cacheState: CacheState = new Map();

  constructor(props: LocalArtifactCacheProps) {
    this.cacheName = props.cacheName;
    this.cacheDir = props.cacheDir;
    this.pool = new PromisePool(props.concurrency ?? DEFAULT_CONCURRENCY);
    this.downloader = props.downloader ?? new PrefetchDownloader(this.pool);
  }

  public initialize(): Promise<void> {
    return this.lock.withLock(() => this.loadCacheData());
  }

  /**
   * Delete every file in the cache directory, tracked or not
   *
   * The state is emptied and written even if some files could not be deleted;
   * the next initialize() cleans up whatever was left behind.
   */
  public clearCache(): Promise<void> {
    return this.lock.withLock(() => this.clearCacheUnlocked());
  }

  public async refresh(): Promise<void> {
    throw new UnsupportedOperationError();
  }

  public putAll(artifacts: IArtifact[], context: ISyncContext, removeMissingArtifacts: boolean): Promise<SyncOutcome> {
    return this.lock.withLock(async () => {
      const workingState = new Map(this.cacheState);
      try {
        return await synchronize(artifacts, removeMissingArtifacts, workingState, context, {
          cacheDir: this.cacheDir,
          cacheName: this.cacheName,
          pool: this.pool,
          downloader: this.downloader,
        });
      } finally {
        this.cacheState = workingState;
        await this.writeCacheData();
      }
    });
  }

  public get(cacheKey: string): string | undefined {
    const cacheEntry = this.cacheState.get(cacheKey);
    if (!cacheEntry) { return undefined; }
    return pathToCachedFile(this.cacheDir, cacheEntry.fileName);
  }

  public async lookup(artifact: IArtifact): Promise<string | undefined> {
    let queriedEntry: CacheEntry;
    try {
      queriedEntry = await CacheEntry.forArtifact(artifact);
    } catch (e) {
      if (e instanceof ArtifactNotFoundError) { return undefined; }
      throw e;
    }
    return this.get(queriedEntry.cacheKey);
  }

  /**
   * The cached entries, sorted by key
   */
  public entries(): CacheEntry[] {
    return Array.from(this.cacheState.values()).sort((a, b) => a.cacheKey.localeCompare(b.cacheKey));
  }

  /**
   * Read the state from disk and make it consistent with the files that are there
   *
   * Without a usable cache data file we can't know which files are valid, so then
   * everything is cleared.
   */
  private async loadCacheData() {
    await fs.mkdir(this.cacheDir, { recursive: true });

    const cachedFiles = await getCacheFiles(this.cacheDir);

    let loaded: CacheState | undefined;
    try {
      loaded = await loadCacheData(this.cacheDir);
    } catch (e) {
      if (!(e instanceof MalformedCacheFileError)) { throw e; }
      log.warning(`${e.message}. Clearing directory for a clean start.`);
      return this.clearCacheUnlocked();
    }

    if (!loaded && cachedFiles.size > 0) {
      log.warning(`${cacheDataFile(this.cacheDir).fileName} does not exist, but ${this.cacheDir} contains cached files. Clearing directory for a clean start.`);
      return this.clearCacheUnlocked();
    }

    const state: CacheState = loaded ?? new Map();
    try {
      // Drop references to files that no longer exist
      const removedReferences = removeStaleReferences(cachedFiles, state);
      if (removedReferences.length > 0) {
        log.warning(`${removedReferences.length} invalid references in ${this.cacheName}. Removed invalid references.`);
      }

      // Delete files nothing refers to
      const deletions = await removeUntrackedFiles(this.cacheDir, cachedFiles, state, this.pool);
      const failed = deletions.filter(d => !d.ok);
      if (failed.length > 0) {
        log.warning(`Could not remove ${failed.length} untracked files from ${this.cacheDir}`);
      } else if (deletions.length > 0) {
        log.debug(`Removed ${deletions.length} untracked files from ${this.cacheDir}`);
      }
    } finally {
      this.cacheState = state;
      await this.writeCacheData();
    }
  }

  private async clearCacheUnlocked() {
    try {
      await fs.mkdir(this.cacheDir, { recursive: true });
      const deletions = await clearDirectory(this.cacheDir, this.pool);
      const failed = deletions.filter(d => !d.ok);
      if (failed.length > 0) {
        log.warning(`Could not delete ${failed.length} files from ${this.cacheDir}`);
      }
    } catch (e) {
      log.warning(`Could not delete contents of ${this.cacheDir}: ${errorMessage(e)}`);
    } finally {
      this.cacheState = new Map();
      await this.writeCacheData();
    }
  }

  /**
   * Write the state to disk
   *
   * A failure is only logged: the in-memory state remains the one in use.
   */
  private async writeCacheData() {
    try {
      await writeCacheData(this.cacheDir, this.cacheState);
    } catch (e) {
      log.warning(`Failed to write cache state file ${cacheDataFile(this.cacheDir).fileName}: ${errorMessage(e)}`);
    }
  }
}

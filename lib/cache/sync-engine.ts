import { ArtifactNotFoundError, IArtifact, IRemoteArtifact, isRemoteArtifact } from '../artifacts/artifact';
import { ISyncContext } from '../context';
import { discardAll, IBatchDownloader } from '../downloads/batch-downloader';
import { CacheEntry } from '../model/cache-entry';
import { PromisePool } from '../util/concurrency';
import { deleteIfExists, writeStreamAtomic } from '../util/files';
import { CancelledError, waitFor } from '../util/flow';
import { errorMessage } from '../util/runtime';
import { timed } from '../util/timer';
import * as log from '../util/log';
import { CacheState, pathToCachedFile } from './cache-data';

export interface SyncEngineProps {
  readonly cacheDir: string;

  /**
   * Used in messages only
   */
  readonly cacheName: string;

  readonly pool: PromisePool;
  readonly downloader: IBatchDownloader;
}

/**
 * An artifact that needs to be (re)copied, with the entry it will get once it has been
 */
export interface PendingCopy {
  readonly artifact: IArtifact;
  readonly entry: CacheEntry;
}

export interface SyncPlan {
  readonly updated: PendingCopy[];
  readonly removed: string[];
}

export type ItemResult =
  | { readonly key: string; readonly ok: true }
  | { readonly key: string; readonly ok: false; readonly error: unknown };

export interface SyncOutcome {
  readonly plan: SyncPlan;
  readonly copied: string[];
  readonly removed: string[];
  readonly failedCopies: string[];
  readonly failedRemovals: string[];
  /**
   * The batch download (or planning) failed, so nothing was copied or removed
   */
  readonly incomplete: boolean;
  readonly cancelled: boolean;
}

/**
 * Decide what needs to happen to bring the state in line with the given artifacts
 *
 * Artifacts that can't be resolved are left out, as if they hadn't been passed at all.
 */
export async function planSync(
  artifacts: IArtifact[],
  state: CacheState,
  removeMissingArtifacts: boolean,
  pool: PromisePool): Promise<SyncPlan> {

  const resolved = await pool.all(artifacts.map(artifact => async () => {
    try {
      return { artifact, entry: await CacheEntry.forArtifact(artifact) };
    } catch (e) {
      if (!(e instanceof ArtifactNotFoundError)) { throw e; }
      log.debug(`Not caching ${artifact.displayName}: ${errorMessage(e.cause ?? e)}`);
      return undefined;
    }
  }));

  const keyToCopy = new Map<string, PendingCopy>();
  for (const r of resolved) {
    if (r) { keyToCopy.set(r.entry.cacheKey, r); }
  }

  // New artifacts and artifacts whose entry changed
  const updated = Array.from(keyToCopy.values()).filter(p => !p.entry.equals(state.get(p.entry.cacheKey)));

  const removed = removeMissingArtifacts
    ? Array.from(state.keys()).filter(k => !keyToCopy.has(k))
    : [];

  return { updated, removed };
}

/**
 * Bring the cache directory and the given state in line with the given artifacts
 *
 * The state is updated only for copies and deletions that actually succeeded. This
 * function does not throw for download, copy or delete failures; those are reported
 * to the context and reflected in the returned outcome.
 */
export async function synchronize(
  artifacts: IArtifact[],
  removeMissingArtifacts: boolean,
  state: CacheState,
  context: ISyncContext,
  props: SyncEngineProps): Promise<SyncOutcome> {

  const { cacheDir, cacheName, pool, downloader } = props;
  const signal = context.signal;

  const copied = new Array<string>();
  const removed = new Array<string>();
  const failedCopies = new Array<string>();
  const failedRemovals = new Array<string>();
  let incomplete = false;
  let cancelled = false;

  // Tasks that finish after we've returned must not touch the state anymore
  let sealed = false;

  let plan: SyncPlan = { updated: [], removed: [] };
  try {
    plan = await waitFor(planSync(artifacts, state, removeMissingArtifacts, pool), signal);

    const remoteArtifacts = plan.updated.map(p => p.artifact).filter(isRemoteArtifact);
    if (remoteArtifacts.length > 0) {
      await fetchArtifacts(remoteArtifacts);
    }

    // Copy files to disk
    const copyResults = waitFor(pool.all(plan.updated.map(p => () => runItem(p.entry.cacheKey, async () => {
      await copyLocally(p.artifact, pathToCachedFile(cacheDir, p.entry.fileName));
    }, (r) => {
      if (r.ok) {
        state.set(r.key, p.entry);
        copied.push(r.key);
      } else {
        log.warning(`Failed to copy artifact ${p.artifact.displayName} to ${cacheDir}: ${errorMessage(r.error)}`);
        failedCopies.push(r.key);
      }
    }))), signal);

    // Delete files from disk. Keys are disjoint from the ones being copied.
    const removeResults = waitFor(pool.all(plan.removed.map(key => {
      const fileName = state.get(key)?.fileName;
      return () => runItem(key, async () => {
        if (fileName !== undefined) {
          await deleteIfExists(pathToCachedFile(cacheDir, fileName));
        }
      }, (r) => {
        if (r.ok) {
          state.delete(r.key);
          removed.push(r.key);
        } else {
          log.warning(`Failed to remove ${fileName ?? r.key} from ${cacheDir}: ${errorMessage(r.error)}`);
          failedRemovals.push(r.key);
        }
      });
    })), signal);

    await Promise.all([copyResults, removeResults]);
  } catch (e) {
    if (e instanceof CancelledError) {
      cancelled = true;
      context.setCancelled();
    } else {
      incomplete = true;
      log.debug(`${cacheName} synchronization failed: ${errorMessage(e)}`);
      context.warn(`${cacheName} synchronization didn't complete. Resyncing might fix the issue`);
    }
  } finally {
    sealed = true;
  }

  // Downloads that were never copied would otherwise stay in the staging area
  const notCopied = plan.updated.filter(p => !copied.includes(p.entry.cacheKey)).map(p => p.artifact);
  await discardAll(notCopied.filter(isRemoteArtifact));

  if (copied.length > 0) {
    context.log(`Copied ${copied.length} files to ${cacheName}`);
  }
  if (failedCopies.length > 0) {
    context.warn(`Failed to copy ${failedCopies.length} files to ${cacheName}`);
  }
  if (removed.length > 0) {
    context.log(`Removed ${removed.length} files from ${cacheName}`);
  }
  if (failedRemovals.length > 0) {
    context.warn(`Failed to remove ${failedRemovals.length} files from ${cacheName}`);
  }

  return { plan, copied, removed, failedCopies, failedRemovals, incomplete, cancelled };

  async function fetchArtifacts(remoteArtifacts: IRemoteArtifact[]) {
    log.debug(`Fetching artifacts for ${cacheName}...`);
    await waitFor(timed('FetchCacheArtifacts', () => downloader.downloadAll(remoteArtifacts), (t) => {
      log.debug(`Fetched ${remoteArtifacts.length} artifacts for ${cacheName} in ${t.humanTime()}`);
    }), signal);
  }

  /**
   * Run one unit of work, turning its outcome into a result instead of an exception
   *
   * Doesn't start if the operation was cancelled while the item was queued.
   */
  async function runItem(key: string, block: () => Promise<void>, onDone: (r: ItemResult) => void): Promise<ItemResult> {
    if (signal?.aborted) {
      return { key, ok: false, error: new CancelledError() };
    }

    let result: ItemResult;
    try {
      await block();
      result = { key, ok: true };
    } catch (error) {
      result = { key, ok: false, error };
    }
    if (!sealed) { onDone(result); }
    return result;
  }
}

async function copyLocally(artifact: IArtifact, destinationPath: string) {
  const stream = await artifact.openStream();
  await writeStreamAtomic(stream, destinationPath);
}

import * as os from 'os';
import * as path from 'path';
import { IArtifact } from '../artifacts/artifact';
import { localArtifactsIn } from '../artifacts/local-file-artifact';
import { parseS3Url, S3ObjectStore, s3ArtifactsUnder } from '../artifacts/s3-artifact';
import { makeS3Client, S3ClientOptions } from '../aws/s3-client';
import { LocalArtifactCache } from '../cache/local-artifact-cache';
import { SyncOutcome } from '../cache/sync-engine';
import { MirrorConfig } from '../config';
import { ConsoleSyncContext } from '../context';
import { CacheEntry } from '../model/cache-entry';
import { exists } from '../util/files';
import { SimpleError } from '../util/flow';
import * as log from '../util/log';

export interface SyncCommandOptions {
  /**
   * Delete cached artifacts that are not in the source anymore
   */
  readonly prune: boolean;

  readonly signal?: AbortSignal;

  /**
   * Makes the S3 client for s3:// sources
   *
   * @default makeS3Client
   */
  readonly s3Factory?: (options: S3ClientOptions) => S3ObjectStore;
}

export async function openCache(config: MirrorConfig): Promise<LocalArtifactCache> {
  const cache = new LocalArtifactCache({
    cacheName: config.cacheName,
    cacheDir: config.cacheDir,
    concurrency: config.concurrency,
  });
  await cache.initialize();
  return cache;
}

/**
 * Mirror everything in a directory or under an S3 prefix into the cache
 */
export async function syncCommand(config: MirrorConfig, source: string, options: SyncCommandOptions): Promise<SyncOutcome> {
  const artifacts = await artifactsFrom(source, config, options.s3Factory ?? makeS3Client);
  log.debug(`${artifacts.length} artifacts in ${source}`);

  const cache = await openCache(config);
  const context = new ConsoleSyncContext(options.signal);
  const outcome = await cache.putAll(artifacts, context, options.prune);
  if (outcome.copied.length === 0 && outcome.removed.length === 0 && !outcome.incomplete) {
    log.info(`${config.cacheName} is up to date`);
  }
  return outcome;
}

/**
 * Path of the cached copy of the artifact with the given identity
 */
export async function getCommand(config: MirrorConfig, identity: string): Promise<string | undefined> {
  const cache = await openCache(config);
  return cache.get(CacheEntry.cacheKeyFor(identity));
}

export async function listCommand(config: MirrorConfig): Promise<CacheEntry[]> {
  const cache = await openCache(config);
  return cache.entries();
}

export async function clearCommand(config: MirrorConfig): Promise<void> {
  const cache = new LocalArtifactCache({
    cacheName: config.cacheName,
    cacheDir: config.cacheDir,
    concurrency: config.concurrency,
  });
  await cache.clearCache();
  log.info(`Cleared ${config.cacheName}`);
}

export async function artifactsFrom(
  source: string,
  config: MirrorConfig,
  s3Factory: (options: S3ClientOptions) => S3ObjectStore): Promise<IArtifact[]> {

  const s3Url = parseS3Url(source);
  if (s3Url) {
    const stagingDir = path.join(os.tmpdir(), 'artifact-mirror-staging');
    return s3ArtifactsUnder(s3Factory(config.s3), s3Url.bucketName, s3Url.prefix, stagingDir);
  }

  if (!await exists(source, s => s.isDirectory())) {
    throw new SimpleError(`Not a directory or s3:// URL: ${source}`);
  }
  return localArtifactsIn(source);
}

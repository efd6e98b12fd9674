import { IRemoteArtifact } from '../artifacts/artifact';
import { PROMISE_POOL, PromisePool } from '../util/concurrency';
import { errorMessage } from '../util/runtime';
import * as log from '../util/log';

/**
 * Fetches the bytes of a batch of remote artifacts in one go
 *
 * Either the whole batch succeeds or the returned promise rejects; callers
 * don't learn which artifact failed.
 */
export interface IBatchDownloader {
  downloadAll(artifacts: IRemoteArtifact[]): Promise<void>;
}

/**
 * For when all artifacts are local already
 */
export class NullDownloader implements IBatchDownloader {
  public downloadAll(_artifacts: IRemoteArtifact[]): Promise<void> {
    return Promise.resolve();
  }
}

/**
 * Downloads every artifact on a promise pool, then fails if any of them failed
 */
export class PrefetchDownloader implements IBatchDownloader {
  constructor(private readonly pool: PromisePool = PROMISE_POOL) {
  }

  public async downloadAll(artifacts: IRemoteArtifact[]): Promise<void> {
    if (artifacts.length === 0) { return; }

    const results = await this.pool.allSettled(artifacts.map(a => () => a.download()));
    const failures = new Array<unknown>();
    results.forEach((r, i) => {
      if (r.status === 'rejected') {
        log.debug(`Download of ${artifacts[i].displayName} failed: ${errorMessage(r.reason)}`);
        failures.push(r.reason);
      }
    });

    if (failures.length > 0) {
      // Nothing of this batch is going to be read
      await discardAll(artifacts.filter((_, i) => results[i].status === 'fulfilled'));
      throw new BatchDownloadError(artifacts.length, failures);
    }
    log.debug(`Downloaded ${artifacts.length} artifacts`);
  }
}

/**
 * Discard the downloads of the given artifacts; failures are only logged
 */
export async function discardAll(artifacts: IRemoteArtifact[]): Promise<void> {
  const results = await Promise.allSettled(artifacts.map(a => a.discard()));
  results.forEach((r, i) => {
    if (r.status === 'rejected') {
      log.debug(`Could not discard download of ${artifacts[i].displayName}: ${errorMessage(r.reason)}`);
    }
  });
}

export class BatchDownloadError extends Error {
  constructor(public readonly batchSize: number, public readonly failures: unknown[]) {
    super(`${failures.length} of ${batchSize} downloads failed (first: ${errorMessage(failures[0])})`);
    this.name = 'BatchDownloadError';
  }
}

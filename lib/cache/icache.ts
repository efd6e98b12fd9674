import { IArtifact } from '../artifacts/artifact';
import { ISyncContext } from '../context';
import { SyncOutcome } from './sync-engine';

/**
 * A local copy of a set of artifacts, kept in sync by the caller
 */
export interface IArtifactCache {
  /**
   * Load persisted state. Does disk I/O; call once before anything else.
   */
  initialize(): Promise<void>;

  /**
   * Path to the local copy of the artifact with the given cache key, if cached
   */
  get(cacheKey: string): string | undefined;

  /**
   * Path to the local copy of the given artifact, if cached
   */
  lookup(artifact: IArtifact): Promise<string | undefined>;

  /**
   * Copy new and changed artifacts into the cache
   *
   * If removeMissingArtifacts is set, cached artifacts that are not in the
   * given collection are deleted. Only pass it when the collection is complete.
   */
  putAll(artifacts: IArtifact[], context: ISyncContext, removeMissingArtifacts: boolean): Promise<SyncOutcome>;

  /**
   * Delete everything, including files the cache doesn't know about
   */
  clearCache(): Promise<void>;

  refresh(): Promise<void>;
}

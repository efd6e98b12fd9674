import { Readable } from 'stream';
import { Fingerprint } from '../model/fingerprint';

/**
 * A file that lives somewhere else and can be mirrored into the cache
 */
export interface IArtifact {
  /**
   * Human-readable description, for log messages
   */
  readonly displayName: string;

  /**
   * Logical identity of the artifact, stable across runs
   *
   * Usually a path relative to wherever the artifacts are published.
   */
  identity(): Promise<string>;

  /**
   * A value that changes whenever the artifact's content changes
   */
  fingerprint(): Promise<Fingerprint>;

  openStream(): Promise<Readable>;
}

/**
 * An artifact whose bytes have to be fetched over the network before they can be read cheaply
 */
export interface IRemoteArtifact extends IArtifact {
  readonly remote: true;

  /**
   * Fetch the bytes so that a subsequent openStream() reads them locally
   */
  download(): Promise<void>;

  /**
   * Throw away downloaded bytes that won't be read after all
   */
  discard(): Promise<void>;
}

export function isRemoteArtifact(a: IArtifact): a is IRemoteArtifact {
  return 'remote' in a && a.remote === true && 'download' in a && typeof a.download === 'function'
    && 'discard' in a && typeof a.discard === 'function';
}

export class ArtifactNotFoundError extends Error {
  constructor(public readonly artifactName: string, cause?: unknown) {
    super(`Artifact not found: ${artifactName}`, { cause });
    this.name = 'ArtifactNotFoundError';
  }
}

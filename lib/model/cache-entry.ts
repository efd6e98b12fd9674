import * as path from 'path';
import { ArtifactNotFoundError, IArtifact } from '../artifacts/artifact';
import { standardHash } from '../util/files';
import { Fingerprint, fingerprintEquals, isFingerprint } from './fingerprint';

const KEY_HASH_LENGTH = 16;

export interface CacheEntrySchema {
  readonly cacheKey: string;
  readonly fingerprint: Fingerprint;
  readonly fileName: string;
}

/**
 * Metadata about one cached artifact
 *
 * Two entries are equal if they have the same key and the same fingerprint;
 * that is what decides whether an artifact needs to be copied again.
 */
export class CacheEntry {
  /**
   * Build the entry describing the artifact as it is right now
   *
   * Rejects with ArtifactNotFoundError if the artifact is gone.
   */
  public static async forArtifact(artifact: IArtifact): Promise<CacheEntry> {
    let identity: string;
    let fingerprint: Fingerprint;
    try {
      [identity, fingerprint] = await Promise.all([artifact.identity(), artifact.fingerprint()]);
    } catch (e) {
      if (e instanceof ArtifactNotFoundError) { throw e; }
      throw new ArtifactNotFoundError(artifact.displayName, e);
    }
    const cacheKey = CacheEntry.cacheKeyFor(identity);
    return new CacheEntry(cacheKey, fingerprint, CacheEntry.fileNameFor(cacheKey, identity));
  }

  public static fromSchema(schema: CacheEntrySchema) {
    return new CacheEntry(schema.cacheKey, schema.fingerprint, schema.fileName);
  }

  /**
   * The cache key for an artifact identity
   *
   * Readable prefix from the base name, uniqueness from a hash of the full identity.
   */
  public static cacheKeyFor(identity: string): string {
    const base = path.posix.basename(identity);
    const ext = path.posix.extname(base);
    const stem = sanitize(base.substring(0, base.length - ext.length)) || 'artifact';
    const hash = standardHash().update(identity).digest('hex').substring(0, KEY_HASH_LENGTH);
    return `${stem}_${hash}`;
  }

  /**
   * The on-disk file name; the key plus the identity's extension, if any
   */
  public static fileNameFor(cacheKey: string, identity: string): string {
    return cacheKey + sanitize(path.posix.extname(identity));
  }

  constructor(
    public readonly cacheKey: string,
    public readonly fingerprint: Fingerprint,
    public readonly fileName: string) {
  }

  public equals(rhs: CacheEntry | undefined): boolean {
    return rhs !== undefined
      && this.cacheKey === rhs.cacheKey
      && fingerprintEquals(this.fingerprint, rhs.fingerprint);
  }

  public toSchema(): CacheEntrySchema {
    return {
      cacheKey: this.cacheKey,
      fingerprint: this.fingerprint,
      fileName: this.fileName,
    };
  }
}

export function isCacheEntrySchema(x: unknown): x is CacheEntrySchema {
  return typeof x === 'object' && x !== null
    && 'cacheKey' in x && typeof x.cacheKey === 'string' && x.cacheKey !== ''
    && 'fileName' in x && typeof x.fileName === 'string' && isPlainFileName(x.fileName)
    && 'fingerprint' in x && isFingerprint(x.fingerprint);
}

/**
 * A file name that stays inside the directory it is joined to
 */
function isPlainFileName(s: string) {
  return s !== '' && s !== '.' && s !== '..' && !/[\\/]/.test(s);
}

function sanitize(s: string) {
  return s.replace(/[^A-Za-z0-9._-]/g, '_');
}

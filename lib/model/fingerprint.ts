/**
 * What an artifact exposes to tell whether its content changed
 */
export type Fingerprint = TimestampFingerprint | VersionFingerprint;

/**
 * Last modification time, for artifacts on a filesystem
 */
export interface TimestampFingerprint {
  readonly type: 'timestamp';
  readonly epochMs: number;
}

/**
 * An opaque version identifier (object version, ETag, blob id)
 */
export interface VersionFingerprint {
  readonly type: 'version';
  readonly id: string;
}

export function timestampFingerprint(epochMs: number): TimestampFingerprint {
  return { type: 'timestamp', epochMs };
}

export function versionFingerprint(id: string): VersionFingerprint {
  return { type: 'version', id };
}

export function fingerprintEquals(a: Fingerprint, b: Fingerprint): boolean {
  switch (a.type) {
    case 'timestamp':
      return b.type === 'timestamp' && a.epochMs === b.epochMs;
    case 'version':
      return b.type === 'version' && a.id === b.id;
  }
}

export function isFingerprint(x: unknown): x is Fingerprint {
  if (typeof x !== 'object' || x === null || !('type' in x)) { return false; }
  switch (x.type) {
    case 'timestamp':
      return 'epochMs' in x && typeof x.epochMs === 'number' && Number.isFinite(x.epochMs);
    case 'version':
      return 'id' in x && typeof x.id === 'string';
    default:
      return false;
  }
}

export function describeFingerprint(f: Fingerprint): string {
  switch (f.type) {
    case 'timestamp': return new Date(f.epochMs).toISOString();
    case 'version': return f.id;
  }
}

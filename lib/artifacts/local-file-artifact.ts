import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { timestampFingerprint, TimestampFingerprint } from '../model/fingerprint';
import { allFilesRecursive } from '../util/files';
import { isEnoent } from '../util/runtime';
import { ArtifactNotFoundError, IArtifact } from './artifact';

/**
 * An artifact that is a file on a (possibly network-mounted) filesystem
 *
 * Identified by its path relative to a root directory; changes are detected by
 * modification time.
 */
export class LocalFileArtifact implements IArtifact {
  public readonly displayName: string;

  constructor(public readonly root: string, public readonly relativePath: string) {
    this.displayName = relativePath;
  }

  public get fullPath() {
    return path.join(this.root, this.relativePath);
  }

  public identity(): Promise<string> {
    return Promise.resolve(this.relativePath.split(path.sep).join('/'));
  }

  public async fingerprint(): Promise<TimestampFingerprint> {
    try {
      const stat = await fs.stat(this.fullPath);
      return timestampFingerprint(stat.mtimeMs);
    } catch (e) {
      if (isEnoent(e)) { throw new ArtifactNotFoundError(this.displayName, e); }
      throw e;
    }
  }

  public openStream(): Promise<Readable> {
    // createReadStream only reports a missing file once it's read from
    return new Promise((ok, ko) => {
      const stream = createReadStream(this.fullPath);
      stream.once('open', () => ok(stream));
      stream.once('error', (e) => ko(isEnoent(e) ? new ArtifactNotFoundError(this.displayName, e) : e));
    });
  }
}

/**
 * All files under a directory, as artifacts
 */
export async function localArtifactsIn(root: string): Promise<LocalFileArtifact[]> {
  const resolvedRoot = path.resolve(root);
  const files = await allFilesRecursive(resolvedRoot);
  return files
    .map(f => new LocalFileArtifact(resolvedRoot, path.relative(resolvedRoot, f.fullPath)))
    .sort((a, b) => a.relativePath.localeCompare(b.relativePath));
}

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Readable } from 'stream';
import { ArtifactNotFoundError, IArtifact, IRemoteArtifact } from '../lib/artifacts/artifact';
import { ISyncContext } from '../lib/context';
import { IBatchDownloader } from '../lib/downloads/batch-downloader';
import { versionFingerprint, VersionFingerprint } from '../lib/model/fingerprint';

/**
 * An artifact held in memory, with switches to make it misbehave
 */
export class MemoryArtifact implements IArtifact {
  public readonly displayName: string;

  /**
   * How often the content was read
   */
  public opened = 0;

  public missing = false;
  public failRead = false;

  /**
   * If set, openStream() waits for this before returning
   */
  public gate?: Promise<void>;

  constructor(public readonly artifactPath: string, public content: string, public version = 'v1') {
    this.displayName = artifactPath;
  }

  public update(content: string, version: string) {
    this.content = content;
    this.version = version;
  }

  public identity(): Promise<string> {
    if (this.missing) { return Promise.reject(new ArtifactNotFoundError(this.displayName)); }
    return Promise.resolve(this.artifactPath);
  }

  public fingerprint(): Promise<VersionFingerprint> {
    if (this.missing) { return Promise.reject(new ArtifactNotFoundError(this.displayName)); }
    return Promise.resolve(versionFingerprint(this.version));
  }

  public async openStream(): Promise<Readable> {
    this.opened += 1;
    if (this.gate) { await this.gate; }
    if (this.failRead) {
      return new Readable({
        read() {
          this.destroy(new Error('read failed'));
        },
      });
    }
    return Readable.from([Buffer.from(this.content)]);
  }
}

export class MemoryRemoteArtifact extends MemoryArtifact implements IRemoteArtifact {
  public readonly remote = true;
  public downloads = 0;
  public discards = 0;
  public failDownload = false;

  public download(): Promise<void> {
    this.downloads += 1;
    if (this.failDownload) { return Promise.reject(new Error('connection reset')); }
    return Promise.resolve();
  }

  public discard(): Promise<void> {
    this.discards += 1;
    return Promise.resolve();
  }
}

export class RecordingDownloader implements IBatchDownloader {
  public readonly batches = new Array<string[]>();
  public fail = false;

  public downloadAll(artifacts: IRemoteArtifact[]): Promise<void> {
    this.batches.push(artifacts.map(a => a.displayName));
    if (this.fail) { return Promise.reject(new Error('network unreachable')); }
    return Promise.resolve();
  }
}

export class RecordingSyncContext implements ISyncContext {
  public readonly messages = new Array<string>();
  public readonly warnings = new Array<string>();
  private cancelled = false;

  constructor(public readonly signal?: AbortSignal) {
  }

  public get isCancelled() { return this.cancelled; }

  public log(message: string) {
    this.messages.push(message);
  }

  public warn(message: string) {
    this.warnings.push(message);
  }

  public setCancelled() {
    this.cancelled = true;
  }
}

export interface Deferred {
  readonly promise: Promise<void>;
  resolve(): void;
}

export function deferred(): Deferred {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((ok) => { resolve = ok; });
  return { promise, resolve };
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'amirror-test-'));
}

export async function removeTempDir(dir: string) {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function readDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export async function readText(file: string): Promise<string> {
  return fs.readFile(file, { encoding: 'utf-8' });
}

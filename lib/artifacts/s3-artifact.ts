import { createReadStream, promises as fs } from 'fs';
import * as path from 'path';
import { Readable } from 'stream';
import { versionFingerprint, VersionFingerprint } from '../model/fingerprint';
import { standardHash, writeStreamAtomic } from '../util/files';
import { errorMessage } from '../util/runtime';
import { s3BodyToStream } from '../util/streams';
import * as log from '../util/log';
import { ArtifactNotFoundError, IRemoteArtifact } from './artifact';

/**
 * The parts of the S3 client that artifacts need
 *
 * The aggregated `S3` client from @aws-sdk/client-s3 satisfies this.
 */
export interface S3ObjectStore {
  getObject(input: { Bucket: string; Key: string }): Promise<{ Body?: unknown }>;
  headObject(input: { Bucket: string; Key: string }): Promise<{ ETag?: string }>;
  listObjectsV2(input: { Bucket: string; Prefix?: string; ContinuationToken?: string }): Promise<S3Listing>;
}

export interface S3Listing {
  readonly Contents?: Array<{ Key?: string; ETag?: string }>;
  readonly IsTruncated?: boolean;
  readonly NextContinuationToken?: string;
}

export interface S3ArtifactProps {
  readonly bucketName: string;
  readonly key: string;

  /**
   * Part of the key that is not part of the artifact's identity
   *
   * @default ''
   */
  readonly prefix?: string;

  /**
   * ETag, if already known from a listing
   */
  readonly etag?: string;

  /**
   * Where downloaded bytes are kept until they are copied
   */
  readonly stagingDir: string;
}

/**
 * An object in an S3 bucket
 *
 * Changes are detected by ETag. download() fetches the object into a staging
 * directory; the first openStream() after that reads the staged copy, and
 * removes it once it has been read; discard() removes it unread. Without a
 * download, openStream() streams straight from S3.
 */
export class S3Artifact implements IRemoteArtifact {
  public readonly remote = true;
  public readonly displayName: string;

  private readonly bucketName: string;
  private readonly key: string;
  private readonly prefix: string;
  private readonly stagingDir: string;
  private etag?: string;
  private stagedFile?: string;

  constructor(private readonly s3: S3ObjectStore, props: S3ArtifactProps) {
    this.bucketName = props.bucketName;
    this.key = props.key;
    this.prefix = props.prefix ?? '';
    this.etag = props.etag;
    this.stagingDir = props.stagingDir;
    this.displayName = `s3://${this.bucketName}/${this.key}`;
  }

  public identity(): Promise<string> {
    const relative = this.key.startsWith(this.prefix) ? this.key.substring(this.prefix.length) : this.key;
    return Promise.resolve(relative.replace(/^\/+/, ''));
  }

  public async fingerprint(): Promise<VersionFingerprint> {
    if (this.etag === undefined) {
      const response = await this.call(() => this.s3.headObject({ Bucket: this.bucketName, Key: this.key }));
      this.etag = response.ETag;
    }
    if (!this.etag) {
      throw new ArtifactNotFoundError(this.displayName, new Error('Object has no ETag'));
    }
    return versionFingerprint(stripQuotes(this.etag));
  }

  public async download(): Promise<void> {
    const target = path.join(this.stagingDir, standardHash().update(this.displayName).digest('hex'));
    await fs.mkdir(this.stagingDir, { recursive: true });

    const start = Date.now();
    await writeStreamAtomic(await this.fetchBody(), target);
    this.stagedFile = target;

    const delta = (Date.now() - start) / 1000;
    log.debug(`Downloaded ${this.displayName} in ${delta.toFixed(1)}s`);
  }

  public async discard(): Promise<void> {
    const staged = this.stagedFile;
    if (staged === undefined) { return; }

    this.stagedFile = undefined;
    await fs.rm(staged, { force: true });
  }

  public async openStream(): Promise<Readable> {
    const staged = this.stagedFile;
    if (staged === undefined) {
      return this.fetchBody();
    }

    this.stagedFile = undefined;
    const stream = createReadStream(staged);
    stream.once('close', () => {
      fs.rm(staged, { force: true }).catch((e) => {
        log.debug(`Could not remove staged file ${staged}: ${errorMessage(e)}`);
      });
    });
    return stream;
  }

  private async fetchBody(): Promise<Readable> {
    const response = await this.call(() => this.s3.getObject({ Bucket: this.bucketName, Key: this.key }));
    return s3BodyToStream(response.Body);
  }

  /**
   * Make an S3 call, translating "no such object" into ArtifactNotFoundError
   */
  private async call<A>(block: () => Promise<A>): Promise<A> {
    try {
      return await block();
    } catch (e) {
      if (e instanceof Error && (e.name === 'NoSuchKey' || e.name === 'NotFound')) {
        throw new ArtifactNotFoundError(this.displayName, e);
      }
      throw e;
    }
  }
}

/**
 * All objects under a prefix in a bucket, as artifacts
 *
 * Keys ending in '/' (folder markers) are skipped.
 */
export async function s3ArtifactsUnder(
  s3: S3ObjectStore,
  bucketName: string,
  prefix: string,
  stagingDir: string): Promise<S3Artifact[]> {

  const ret = new Array<S3Artifact>();
  let continuationToken: string | undefined = undefined;
  while (true) {
    const response: S3Listing = await s3.listObjectsV2({
      Bucket: bucketName,
      Prefix: prefix,
      ...continuationToken ? { ContinuationToken: continuationToken } : undefined,
    });

    for (const obj of response.Contents ?? []) {
      if (!obj.Key || obj.Key.endsWith('/')) { continue; }
      ret.push(new S3Artifact(s3, { bucketName, key: obj.Key, prefix, etag: obj.ETag, stagingDir }));
    }

    if (!response.IsTruncated) { break; }
    continuationToken = response.NextContinuationToken;
  }
  return ret;
}

/**
 * Split an s3://bucket/prefix URL
 */
export function parseS3Url(url: string): { bucketName: string; prefix: string } | undefined {
  const m = /^s3:\/\/([^/]+)\/?(.*)$/.exec(url);
  if (!m) { return undefined; }
  return { bucketName: m[1], prefix: m[2] };
}

function stripQuotes(s: string) {
  return s.replace(/^"(.*)"$/, '$1');
}

import { promises as fs } from 'fs';
import * as path from 'path';
import { ArtifactNotFoundError } from '../lib/artifacts/artifact';
import { LocalFileArtifact, localArtifactsIn } from '../lib/artifacts/local-file-artifact';
import { readStream } from '../lib/util/streams';
import { makeTempDir, removeTempDir } from './util';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
  await fs.mkdir(path.join(dir, 'sub'));
  await fs.writeFile(path.join(dir, 'a.txt'), 'alpha');
  await fs.writeFile(path.join(dir, 'sub', 'd.txt'), 'delta');
});

afterEach(async () => {
  await removeTempDir(dir);
});

test('identity is the path relative to the root, with forward slashes', async () => {
  const artifact = new LocalFileArtifact(dir, path.join('sub', 'd.txt'));

  expect(await artifact.identity()).toEqual('sub/d.txt');
});

test('fingerprint is the modification time', async () => {
  const when = new Date('2024-03-01T12:00:00Z');
  await fs.utimes(path.join(dir, 'a.txt'), when, when);

  expect(await new LocalFileArtifact(dir, 'a.txt').fingerprint()).toEqual({ type: 'timestamp', epochMs: when.getTime() });
});

test('openStream reads the file', async () => {
  const stream = await new LocalFileArtifact(dir, 'a.txt').openStream();

  expect((await readStream(stream)).toString()).toEqual('alpha');
});

test('a missing file is reported as not found', async () => {
  const artifact = new LocalFileArtifact(dir, 'gone.txt');

  await expect(artifact.fingerprint()).rejects.toBeInstanceOf(ArtifactNotFoundError);
  await expect(artifact.openStream()).rejects.toBeInstanceOf(ArtifactNotFoundError);
});

test('all files in a directory tree, sorted', async () => {
  const artifacts = await localArtifactsIn(dir);

  expect(await Promise.all(artifacts.map(a => a.identity()))).toEqual(['a.txt', 'sub/d.txt']);
});

import { promises as fs } from 'fs';
import * as path from 'path';
import {
  CACHE_DATA_FILE, CacheState, getCacheFiles, loadCacheData, removeStaleReferences,
  removeUntrackedFiles, writeCacheData,
} from '../lib/cache/cache-data';
import { CacheEntry } from '../lib/model/cache-entry';
import { timestampFingerprint, versionFingerprint } from '../lib/model/fingerprint';
import { MalformedCacheFileError } from '../lib/util/cache-file';
import { PromisePool } from '../lib/util/concurrency';
import { makeTempDir, readDir, readText, removeTempDir } from './util';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
});

afterEach(async () => {
  await removeTempDir(dir);
});

function stateOf(...entries: CacheEntry[]): CacheState {
  return new Map(entries.map(e => [e.cacheKey, e] as const));
}

test('written state loads back with every field intact', async () => {
  const state = stateOf(
    new CacheEntry('b_1', versionFingerprint('"etag-1"'), 'b_1.jar'),
    new CacheEntry('a_2', timestampFingerprint(1600000000123.5), 'a_2'),
  );

  await writeCacheData(dir, state);
  const loaded = await loadCacheData(dir);

  expect(loaded && Array.from(loaded.values()).map(e => e.toSchema())).toEqual([
    { cacheKey: 'a_2', fingerprint: { type: 'timestamp', epochMs: 1600000000123.5 }, fileName: 'a_2' },
    { cacheKey: 'b_1', fingerprint: { type: 'version', id: '"etag-1"' }, fileName: 'b_1.jar' },
  ]);
});

test('cache data file lists entries sorted by key and leaves no temporary files', async () => {
  await writeCacheData(dir, stateOf(
    new CacheEntry('z', versionFingerprint('1'), 'z.txt'),
    new CacheEntry('m', versionFingerprint('2'), 'm.txt'),
  ));

  expect(await readDir(dir)).toEqual([CACHE_DATA_FILE]);
  const written = JSON.parse(await readText(path.join(dir, CACHE_DATA_FILE)));
  expect(written.version).toEqual(1);
  expect(written.entries.map((e: { cacheKey: string }) => e.cacheKey)).toEqual(['m', 'z']);
});

test('loading without a cache data file gives undefined', async () => {
  expect(await loadCacheData(dir)).toBeUndefined();
});

test('loading invalid JSON is an error', async () => {
  await fs.writeFile(path.join(dir, CACHE_DATA_FILE), '{ "version": 1, "entr');

  await expect(loadCacheData(dir)).rejects.toBeInstanceOf(MalformedCacheFileError);
});

test('loading an unknown version is an error', async () => {
  await fs.writeFile(path.join(dir, CACHE_DATA_FILE), JSON.stringify({ version: 2, entries: [] }));

  await expect(loadCacheData(dir)).rejects.toBeInstanceOf(MalformedCacheFileError);
});

test('loading an entry with a bad fingerprint is an error', async () => {
  await fs.writeFile(path.join(dir, CACHE_DATA_FILE), JSON.stringify({
    version: 1,
    entries: [{ cacheKey: 'k', fileName: 'k.txt', fingerprint: { type: 'timestamp', epochMs: 'yesterday' } }],
  }));

  await expect(loadCacheData(dir)).rejects.toBeInstanceOf(MalformedCacheFileError);
});

test('cache files exclude the cache data file and directories', async () => {
  await writeCacheData(dir, new Map());
  await fs.writeFile(path.join(dir, 'one.txt'), '1');
  await fs.mkdir(path.join(dir, 'subdir'));

  expect(Array.from(await getCacheFiles(dir))).toEqual(['one.txt']);
});

test('cache files of a directory that does not exist', async () => {
  expect((await getCacheFiles(path.join(dir, 'nope'))).size).toEqual(0);
});

test('stale references are removed and reported', () => {
  const state = stateOf(
    new CacheEntry('a', versionFingerprint('1'), 'a.txt'),
    new CacheEntry('b', versionFingerprint('1'), 'b.txt'),
    new CacheEntry('c', versionFingerprint('1'), 'c.txt'),
  );

  const removed = removeStaleReferences(new Set(['a.txt', 'c.txt', 'stray.txt']), state);

  expect(removed).toEqual(['b']);
  expect(Array.from(state.keys())).toEqual(['a', 'c']);
});

test('untracked files are deleted, tracked files are kept', async () => {
  await fs.writeFile(path.join(dir, 'a.txt'), 'a');
  await fs.writeFile(path.join(dir, 'stray.txt'), 'stray');
  const state = stateOf(new CacheEntry('a', versionFingerprint('1'), 'a.txt'));

  const deletions = await removeUntrackedFiles(dir, await getCacheFiles(dir), state, new PromisePool(2));

  expect(deletions).toEqual([{ fileName: 'stray.txt', ok: true }]);
  expect(await readDir(dir)).toEqual(['a.txt']);
});

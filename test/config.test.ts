import { promises as fs } from 'fs';
import * as path from 'path';
import { CONFIG_FILE, loadConfig, parseConfig } from '../lib/config';
import { SimpleError } from '../lib/util/flow';
import { makeTempDir, removeTempDir } from './util';

let dir: string;

beforeEach(async () => {
  dir = await makeTempDir();
  await fs.mkdir(path.join(dir, 'sub'));
});

afterEach(async () => {
  await removeTempDir(dir);
});

test('config file is found upwards, cacheDir is relative to it', async () => {
  await fs.writeFile(path.join(dir, CONFIG_FILE), JSON.stringify({
    cacheDir: 'my-cache',
    cacheName: 'team cache',
    concurrency: 2,
    s3: { region: 'eu-west-1' },
  }));

  const config = await loadConfig(path.join(dir, 'sub'));

  expect(config).toEqual({
    cacheDir: path.join(dir, 'my-cache'),
    cacheName: 'team cache',
    concurrency: 2,
    s3: { region: 'eu-west-1' },
  });
});

test('overrides win over the config file', async () => {
  await fs.writeFile(path.join(dir, CONFIG_FILE), JSON.stringify({ cacheDir: 'my-cache', concurrency: 2 }));

  const config = await loadConfig(dir, { cacheDir: path.join(dir, 'elsewhere'), concurrency: 8 });

  expect(config.cacheDir).toEqual(path.join(dir, 'elsewhere'));
  expect(config.concurrency).toEqual(8);
  expect(config.cacheName).toEqual('artifact cache');
});

test('bad concurrency override is rejected', async () => {
  await expect(loadConfig(dir, { cacheDir: dir, concurrency: 0 })).rejects.toThrow('concurrency must be a positive integer, got: 0');
});

test('invalid fields are named', () => {
  expect(() => parseConfig({ concurrency: 0 }, 'cfg.json')).toThrow(new SimpleError("cfg.json: 'concurrency' should be a positive integer"));
  expect(() => parseConfig({ cacheDir: 5 }, 'cfg.json')).toThrow("cfg.json: 'cacheDir' should be a string");
  expect(() => parseConfig({ s3: { profile: true } }, 'cfg.json')).toThrow("cfg.json: 's3.profile' should be a string");
  expect(() => parseConfig([], 'cfg.json')).toThrow("cfg.json: '(root)' should be an object");
});

test('an empty config file is fine', () => {
  expect(parseConfig({}, 'cfg.json')).toEqual({});
});

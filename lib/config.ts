import * as os from 'os';
import * as path from 'path';
import { S3ClientOptions } from './aws/s3-client';
import { DEFAULT_CONCURRENCY } from './cache/local-artifact-cache';
import { findFileUp, readJson } from './util/files';
import { SimpleError } from './util/flow';
import * as log from './util/log';

export const CONFIG_FILE = 'artifact-mirror.json';

export interface MirrorConfig {
  readonly cacheDir: string;
  readonly cacheName: string;
  readonly concurrency: number;
  readonly s3: S3ClientOptions;
}

/**
 * What can be put in artifact-mirror.json. All fields are optional.
 */
export interface ConfigFileSchema {
  /**
   * Relative to the directory containing the config file
   */
  readonly cacheDir?: string;
  readonly cacheName?: string;
  readonly concurrency?: number;
  readonly s3?: S3ClientOptions;
}

export type ConfigOverrides = Partial<Omit<MirrorConfig, 's3'>>;

export function defaultCacheDir() {
  return path.join(os.homedir(), '.cache', 'artifact-mirror', 'default');
}

/**
 * Determine the configuration: command-line overrides, then the nearest config file, then defaults
 */
export async function loadConfig(startDir: string, overrides: ConfigOverrides = {}): Promise<MirrorConfig> {
  const configFile = await findFileUp(CONFIG_FILE, startDir);

  let fromFile: ConfigFileSchema = {};
  if (configFile) {
    log.debug(`Reading configuration from ${configFile}`);
    fromFile = parseConfig(await readJson(configFile), configFile);
  }

  const fileCacheDir = fromFile.cacheDir !== undefined && configFile !== undefined
    ? path.resolve(path.dirname(configFile), fromFile.cacheDir)
    : undefined;

  const concurrency = overrides.concurrency ?? fromFile.concurrency ?? DEFAULT_CONCURRENCY;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new SimpleError(`concurrency must be a positive integer, got: ${concurrency}`);
  }

  return {
    cacheDir: path.resolve(overrides.cacheDir ?? fileCacheDir ?? defaultCacheDir()),
    cacheName: overrides.cacheName ?? fromFile.cacheName ?? 'artifact cache',
    concurrency,
    s3: fromFile.s3 ?? {},
  };
}

/**
 * Check the content of a config file, naming the first field that's wrong
 */
export function parseConfig(x: unknown, fileName: string): ConfigFileSchema {
  const fail = (field: string, expected: string): never => {
    throw new SimpleError(`${fileName}: '${field}' should be ${expected}`);
  };

  if (typeof x !== 'object' || x === null || Array.isArray(x)) {
    return fail('(root)', 'an object');
  }

  const ret: {
    cacheDir?: string;
    cacheName?: string;
    concurrency?: number;
    s3?: S3ClientOptions;
  } = {};

  if ('cacheDir' in x) {
    if (typeof x.cacheDir !== 'string') { return fail('cacheDir', 'a string'); }
    ret.cacheDir = x.cacheDir;
  }
  if ('cacheName' in x) {
    if (typeof x.cacheName !== 'string') { return fail('cacheName', 'a string'); }
    ret.cacheName = x.cacheName;
  }
  if ('concurrency' in x) {
    if (typeof x.concurrency !== 'number' || !Number.isInteger(x.concurrency) || x.concurrency < 1) {
      return fail('concurrency', 'a positive integer');
    }
    ret.concurrency = x.concurrency;
  }
  if ('s3' in x) {
    const s3 = x.s3;
    if (typeof s3 !== 'object' || s3 === null || Array.isArray(s3)) { return fail('s3', 'an object'); }
    let region: string | undefined;
    let profile: string | undefined;
    if ('region' in s3) {
      if (typeof s3.region !== 'string') { return fail('s3.region', 'a string'); }
      region = s3.region;
    }
    if ('profile' in s3) {
      if (typeof s3.profile !== 'string') { return fail('s3.profile', 'a string'); }
      profile = s3.profile;
    }
    ret.s3 = { region, profile };
  }

  return ret;
}

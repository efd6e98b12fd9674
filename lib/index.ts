export * from './artifacts/artifact';
export * from './artifacts/local-file-artifact';
export * from './artifacts/s3-artifact';
export * from './aws/s3-client';
export * from './cache/icache';
export * from './cache/local-artifact-cache';
export * from './cache/sync-engine';
export * from './config';
export * from './context';
export * from './downloads/batch-downloader';
export * from './model/cache-entry';
export * from './model/fingerprint';

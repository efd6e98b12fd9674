// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');
import * as log from '../lib/util/log';

let written: string[];

beforeEach(() => {
  chalk.level = 0;
  written = [];
  jest.spyOn(process.stderr, 'write').mockImplementation((s: string | Uint8Array) => {
    written.push(s.toString());
    return true;
  });
});

afterEach(() => {
  jest.restoreAllMocks();
  log.setVerbosity(0);
});

test('by default, debug messages are hidden', () => {
  log.debug('details');
  log.info('Copied 1 files to test cache');

  expect(written).toEqual(['Copied 1 files to test cache\n']);
});

test('quiet leaves only warnings and errors', () => {
  log.setVerbosity(-1);

  log.info('Copied 1 files to test cache');
  log.warning('Failed to copy 1 files to test cache');
  log.error('Not cached: a.txt');

  expect(written).toEqual(['Failed to copy 1 files to test cache\n', 'Not cached: a.txt\n']);
});

test('verbose debug messages carry the elapsed time', () => {
  log.setVerbosity(1);
  log.markStartTime();

  log.debug('details');

  expect(written).toHaveLength(1);
  expect(written[0]).toMatch(/^\[ +\d+\.\d\] details\n$/);
});

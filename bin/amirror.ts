#!/usr/bin/env node
import * as path from 'path';
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { clearCommand, getCommand, listCommand, syncCommand } from '../lib/commands/cache-commands';
import { ConfigOverrides, loadConfig } from '../lib/config';
import { describeFingerprint } from '../lib/model/fingerprint';
import { SimpleError } from '../lib/util/flow';
import * as log from '../lib/util/log';

async function main() {
  log.markStartTime();
  const argv = await yargs(hideBin(process.argv))
    .usage('$0 <cmd> [args]')
    .command('sync <source>', 'Mirror a directory or s3://bucket/prefix into the cache', (y) => y
      .positional('source', { type: 'string', demandOption: true, desc: 'Directory or s3:// URL' })
      .option('prune', {
        type: 'boolean',
        desc: 'Delete cached artifacts that are no longer in the source',
        default: false,
      }))
    .command('get <identity>', 'Print the path of a cached artifact', (y) => y
      .positional('identity', { type: 'string', demandOption: true, desc: 'Path of the artifact relative to its source' }))
    .command('list', 'List cached artifacts')
    .command('clear', 'Delete everything in the cache')
    .option('verbose', {
      alias: 'v',
      type: 'count',
      desc: 'Increase logging verbosity',
    })
    .option('quiet', {
      alias: 'q',
      type: 'boolean',
      desc: 'Only print warnings and errors',
      default: false,
    })
    .option('cache-dir', {
      alias: 'd',
      type: 'string',
      desc: 'Cache directory (default from artifact-mirror.json, or ~/.cache/artifact-mirror/default)',
      requiresArg: true,
    })
    .option('name', {
      type: 'string',
      desc: 'Name of the cache, used in messages',
      requiresArg: true,
    })
    .option('concurrency', {
      alias: 'j',
      type: 'number',
      desc: 'Number of files copied or deleted at once',
      requiresArg: true,
    })
    .demandCommand(1)
    .help()
    .strict()
    .showHelpOnFail(false)
    .parseAsync();

  log.setVerbosity(argv.quiet ? -1 : argv.verbose);

  const overrides: ConfigOverrides = {
    cacheDir: argv['cache-dir'] !== undefined ? path.resolve(argv['cache-dir']) : undefined,
    cacheName: argv.name,
    concurrency: argv.concurrency,
  };
  const config = await loadConfig(process.cwd(), overrides);
  log.debug(`Cache directory: ${config.cacheDir}`);

  const [command] = argv._;
  switch (command) {
    case 'sync': {
      const source = stringArg(argv.source, 'source');
      const controller = new AbortController();
      process.once('SIGINT', () => {
        log.warning('Interrupted, finishing up...');
        controller.abort();
      });
      const outcome = await syncCommand(config, source, { prune: argv.prune === true, signal: controller.signal });
      if (outcome.cancelled) {
        process.exitCode = 130;
      } else if (outcome.incomplete || outcome.failedCopies.length > 0 || outcome.failedRemovals.length > 0) {
        process.exitCode = 1;
      }
      break;
    }
    case 'get': {
      const identity = stringArg(argv.identity, 'identity');
      const cachedPath = await getCommand(config, identity);
      if (cachedPath === undefined) {
        throw new SimpleError(`Not cached: ${identity}`);
      }
      process.stdout.write(cachedPath + '\n');
      break;
    }
    case 'list':
      for (const entry of await listCommand(config)) {
        process.stdout.write(`${entry.cacheKey}  ${entry.fileName}  ${describeFingerprint(entry.fingerprint)}\n`);
      }
      break;
    case 'clear':
      await clearCommand(config);
      break;
    default:
      throw new SimpleError(`Unknown command: ${command}`);
  }
}

function stringArg(x: unknown, name: string): string {
  if (typeof x !== 'string') {
    throw new SimpleError(`Missing argument: ${name}`);
  }
  return x;
}

main().catch(e => {
  if (e instanceof SimpleError) {
    log.error(e.message);
  } else {
    // eslint-disable-next-line no-console
    console.error(e);
  }
  process.exitCode = 1;
});

// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');

/**
 * How much goes to stderr
 *
 * Below 0 only warnings and errors are printed, from 1 up debug messages as well.
 * stdout is left to the commands that print results.
 */
let verbosity = 0;

let startTime = Date.now();

export function setVerbosity(level: number) {
  verbosity = level;
}

export function debug(s: string) {
  if (verbosity >= 1) {
    write(chalk.gray, `[${pad(6, elapsedTime(), ' ')}] ${s}`);
  }
}

export function info(s: string) {
  if (verbosity >= 0) {
    write(chalk.blue, s);
  }
}

export function warning(s: string) {
  write(chalk.yellow, s);
}

export function error(s: string) {
  write(chalk.red, s);
}

export function markStartTime() {
  startTime = Date.now();
}

function write(color: (s: string) => string, s: string) {
  process.stderr.write(color(s) + '\n');
}

function elapsedTime() {
  const elapsedS = (Date.now() - startTime) / 1000.0;
  return elapsedS.toFixed(1);
}

function pad(n: number, x: string, p: string = ' ') {
  return p.repeat(Math.max(n - x.length, 0)) + x;
}

// eslint-disable-next-line @typescript-eslint/no-require-imports
import chalk = require('chalk');

let verbose = false;

let startTime = Date.now();

export function setVerbose(v: boolean) {
  verbose = v;
}

/**
 * Only printed in verbose mode, prefixed with the seconds since startup
 */
export function debug(s: string) {
  if (verbose) {
    emit(chalk.gray(`[${elapsedTime().padStart(6, ' ')}] ${s}`));
  }
}

export function warning(s: string) {
  emit(chalk.yellow(s));
}

export function error(s: string) {
  emit(chalk.red(s));
}

export function markStartTime() {
  startTime = Date.now();
}

// stdout belongs to the formatter, so everything we say goes to stderr
function emit(line: string) {
  process.stderr.write(line + '\n');
}

function elapsedTime() {
  return ((Date.now() - startTime) / 1000.0).toFixed(1);
}

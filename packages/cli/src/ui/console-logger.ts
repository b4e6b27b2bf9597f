/**
 * Console Logger
 *
 * Chalk-backed implementation of the core Logger. Everything goes to
 * stderr so stdout stays clean for `--format json`.
 */

import chalk from 'chalk';
import type { Logger } from 'depgate-core';

export interface ConsoleLoggerOptions {
  /** Print debug messages */
  verbose?: boolean;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  return {
    error: (message) => console.error(chalk.red(message)),
    warn: (message) => console.error(chalk.yellow(message)),
    info: (message) => console.error(chalk.dim(message)),
    debug: (message) => {
      if (verbose) {
        console.error(chalk.gray(`[debug] ${message}`));
      }
    },
  };
}

// src/logger.ts
// Console logging with chalk. Components receive a Logger so tests can silence them.

import chalk from 'chalk';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string, error?: unknown): void;
  section(title: string): void;
}

export function createConsoleLogger(options: { verbose: boolean }): Logger {
  return {
    debug(message) {
      if (options.verbose) {
        console.log(chalk.gray(message));
      }
    },
    info(message) {
      console.log(message);
    },
    success(message) {
      console.log(chalk.green(message));
    },
    warn(message) {
      console.warn(chalk.yellow(message));
    },
    error(message, error) {
      if (error === undefined) {
        console.error(chalk.red(message));
        return;
      }
      const detail = error instanceof Error ? error.message : String(error);
      console.error(chalk.red(message), chalk.gray(detail));
    },
    section(title) {
      console.log(chalk.bold.green(`\n${title}`));
      console.log(chalk.gray('─'.repeat(50)));
    },
  };
}

const noop = (): void => undefined;

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  success: noop,
  warn: noop,
  error: noop,
  section: noop,
};

/**
 * Console rendering shared by the setup and check commands
 */

import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import { EnvironmentError, ProvisionError, getErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { formatEntry, formatEntryText } from '../provision/report.js';
import type { RunReporter } from '../provision/runner.js';
import type { StatusLevel } from '../provision/types.js';

const SPINNER_SYMBOLS: Record<StatusLevel, string> = {
  OK: chalk.green('✓'),
  WARN: chalk.yellow('⚠'),
  FAIL: chalk.red('✗'),
};

export function printBanner(title: string): void {
  const width = 39;
  const left = Math.max(0, Math.floor((width - title.length) / 2));
  const line = `${' '.repeat(left)}${title}`.padEnd(width);
  console.log(chalk.bold.cyan('\n╔═══════════════════════════════════════╗'));
  console.log(chalk.bold.cyan(`║${line}║`));
  console.log(chalk.bold.cyan('╚═══════════════════════════════════════╝\n'));
}

/**
 * One spinner per item; it is replaced by the item's status line when done
 */
export function createSpinnerReporter(verb: string): RunReporter {
  let spinner: Ora | null = null;

  return {
    onPhase(title) {
      console.log(chalk.bold(`\n${title}:`));
    },
    onItemStart(name) {
      spinner = ora({ text: `${verb} ${name}...`, indent: 2 }).start();
    },
    onItemDone(entry) {
      if (spinner) {
        spinner.stopAndPersist({ symbol: SPINNER_SYMBOLS[entry.level], text: formatEntryText(entry) });
        spinner = null;
      } else {
        console.log(formatEntry(entry));
      }
    },
  };
}

/**
 * Print a known failure and exit; unexpected errors keep their stack under --debug
 */
export function exitWithError(error: unknown): never {
  if (error instanceof EnvironmentError) {
    logger.error(error.message);
    if (error.hint) {
      console.error(chalk.dim(`  ${error.hint}`));
    }
  } else if (error instanceof ProvisionError) {
    logger.error(error.message);
  } else {
    logger.error(`Unexpected error: ${getErrorMessage(error)}`);
    logger.debug('Stack trace', error);
  }
  process.exit(1);
}

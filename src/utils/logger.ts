/**
 * Console logger
 *
 * Debug output is off unless DEVPROV_DEBUG is set or setDebug(true) is called
 * (the CLI does this for --debug). Everything else goes to stderr/stdout
 * through chalk so the final summary stays readable.
 */

import chalk from 'chalk';

type LogArg = unknown;

function formatArg(arg: LogArg): string {
  if (arg instanceof Error) {
    return arg.stack ?? arg.message;
  }
  if (typeof arg === 'object' && arg !== null) {
    try {
      return JSON.stringify(arg);
    } catch {
      return String(arg);
    }
  }
  return String(arg);
}

function isTruthyEnv(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

export class Logger {
  private debugEnabled: boolean;

  constructor(debugEnabled = isTruthyEnv(process.env.DEVPROV_DEBUG)) {
    this.debugEnabled = debugEnabled;
  }

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  debug(message: string, ...args: LogArg[]): void {
    if (!this.debugEnabled) {
      return;
    }
    const extra = args.length > 0 ? ` ${args.map(formatArg).join(' ')}` : '';
    console.error(chalk.gray(`[debug] ${message}${extra}`));
  }

  info(message: string, ...args: LogArg[]): void {
    console.log(chalk.cyan('ℹ'), message, ...args.map(formatArg));
  }

  success(message: string, ...args: LogArg[]): void {
    console.log(chalk.green('✓'), message, ...args.map(formatArg));
  }

  warn(message: string, ...args: LogArg[]): void {
    console.warn(chalk.yellow('⚠'), message, ...args.map(formatArg));
  }

  error(message: string, ...args: LogArg[]): void {
    console.error(chalk.red('✗'), message, ...args.map(formatArg));
  }
}

export const logger = new Logger();

/**
 * Console logger whose threshold follows the CLI verbosity.
 *
 * verbose prints everything, default hides debug output, quiet prints only
 * errors. Validation reports are not log output and bypass the logger.
 */
import chalk from 'chalk';
import type { Verbosity } from '../core/options/schema.js';

type Channel = 'debug' | 'info' | 'warn' | 'error';

const CHANNEL_RANK: Record<Channel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Lowest channel printed at each verbosity.
const THRESHOLD: Record<Verbosity, Channel> = {
  verbose: 'debug',
  default: 'info',
  quiet: 'error',
};

export class Logger {
  private threshold: Channel;

  constructor(verbosity: Verbosity = 'default') {
    this.threshold = THRESHOLD[verbosity];
  }

  setVerbosity(verbosity: Verbosity): void {
    this.threshold = THRESHOLD[verbosity];
  }

  private enabled(channel: Channel): boolean {
    return CHANNEL_RANK[channel] >= CHANNEL_RANK[this.threshold];
  }

  /**
   * Debug line, with an optional object dumped as JSON below it.
   */
  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.enabled('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
    if (data) {
      console.log(chalk.gray(JSON.stringify(data, null, 2)));
    }
  }

  info(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.blue(`[INFO] ${message}`));
  }

  /** A finished file operation. Printed on the info channel. */
  success(message: string): void {
    if (!this.enabled('info')) return;
    console.log(chalk.green(`✓ ${message}`));
  }

  warn(message: string): void {
    if (!this.enabled('warn')) return;
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    if (!this.enabled('error')) return;
    console.error(chalk.red(`[ERROR] ${message}`));
  }
}

export const logger = new Logger();

/**
 * Console sink
 *
 * Writes each message straight to the console, coloured by level with chalk.
 * WARNING goes to console.warn and CRITICAL to console.error.
 */

import { Chalk } from 'chalk';

import type { ConsoleAPI, ConsoleSinkConfig, LogLevel, LogSink } from '../types';

/**
 * Create a console sink
 * @param consoleApi - Console abstraction (global console in production)
 * @param config - Sink configuration
 * @returns Sink writing to the console
 */
export function createConsoleSink(consoleApi: ConsoleAPI, config: ConsoleSinkConfig): LogSink {
  const chalk = new Chalk({ level: config.colors ? 1 : 0 });

  function write(formattedMessage: string, level: LogLevel): void {
    switch (level) {
      case 0:
        consoleApi.log(chalk.gray(formattedMessage));
        break;
      case 1:
        consoleApi.log(formattedMessage);
        break;
      case 2:
        consoleApi.warn(chalk.yellow(formattedMessage));
        break;
      case 3:
        consoleApi.error(chalk.red.bold(formattedMessage));
        break;
    }
  }

  return { write: write };
}

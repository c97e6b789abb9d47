/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger) and prefixed child loggers
 * - Console sink coloured with chalk (createConsoleSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, levelTag, shouldLog, fmtValue } from './helpers';
export { createConsoleSink } from './console';
export { createLogger, createPrefixedLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  FilterContext
} from './types';

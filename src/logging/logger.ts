/**
 * Logger factory
 *
 * One root logger per process, clocked by the simulation. Each dome writes
 * through a prefixed child so its lines carry the dome id.
 */

import { formatLogMessage, shouldLog } from './helpers';
import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, SinkWithLevel } from './types';

/**
 * Create the root logger
 *
 * A message that passes `shouldLog` is tagged once and handed to every sink
 * whose `minLevel` it reaches. A throwing sink is reported on the console
 * and skipped.
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: () => simulation.now(),
 *     sinks: [{ sink: createConsoleSink(console, { colors: true }), minLevel: LOG_LEVELS.INFO }]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.warning("dome-a: O2 low");
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const demoteHours = config.demoteHours;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function log(level: LogLevel, msg: string): void {
    const context = { currentLevel: currentLevel, uptime: timeSource() - startTime, demoteHours: demoteHours };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (const entry of sinks) {
      if (level < entry.minLevel) {
        continue;
      }

      try {
        entry.sink.write(formattedMessage, level);
      } catch (err) {
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  return {
    log: log,
    debug: function(msg: string) { log(logLevels.DEBUG, msg); },
    info: function(msg: string) { log(logLevels.INFO, msg); },
    warning: function(msg: string) { log(logLevels.WARNING, msg); },
    critical: function(msg: string) { log(logLevels.CRITICAL, msg); },
    setLevel: setLevel,
    getLevel: getLevel
  };
}

/**
 * Wrap a logger so every message starts with a prefix
 *
 * Level changes pass through to the parent.
 *
 * @param parent - Logger to write through
 * @param prefix - Text put before each message, e.g. a dome id
 */
export function createPrefixedLogger(parent: Logger, prefix: string): Logger {
  function log(level: LogLevel, msg: string): void {
    parent.log(level, "[" + prefix + "] " + msg);
  }

  return {
    log: log,
    debug: function(msg: string) { parent.debug("[" + prefix + "] " + msg); },
    info: function(msg: string) { parent.info("[" + prefix + "] " + msg); },
    warning: function(msg: string) { parent.warning("[" + prefix + "] " + msg); },
    critical: function(msg: string) { parent.critical("[" + prefix + "] " + msg); },
    setLevel: parent.setLevel,
    getLevel: parent.getLevel
  };
}

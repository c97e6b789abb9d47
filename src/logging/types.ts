/**
 * Logger, sink and filter types shared by every dome and the simulation run
 */

// ═══════════════════════════════════════════════════════════════
// LEVELS
// ═══════════════════════════════════════════════════════════════

/** Severity: 0 debug, 1 info, 2 warning, 3 critical */
export type LogLevel = 0 | 1 | 2 | 3;

/** Level table handed to the pure filter helpers */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER
// ═══════════════════════════════════════════════════════════════

/**
 * Leveled logger used by controllers, the coordinator and boot code.
 * Timestamps come from the injected clock, so simulated runs log
 * simulated seconds.
 */
export interface Logger {
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
}

export interface LoggerConfig {
  /** Lowest level that reaches any sink */
  level: LogLevel;
  /** After this many hours of run time INFO is treated as DEBUG; 0 keeps INFO forever */
  demoteHours: number;
}

/** A sink and the lowest level routed to it */
export interface SinkWithLevel {
  sink: LogSink;
  minLevel: LogLevel;
}

export interface LoggerDependencies {
  /** Seconds since run start (simulated time or wall clock) */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINKS
// ═══════════════════════════════════════════════════════════════

/**
 * Output target. Receives only messages that passed filtering; the level
 * travels along for sinks that style by severity.
 */
export interface LogSink {
  write(formattedMessage: string, level: LogLevel): void;
}

export interface ConsoleSinkConfig {
  /** Colour lines by severity */
  colors: boolean;
}

/** The slice of `console` the sink writes through; tests pass a mock */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// ═══════════════════════════════════════════════════════════════
// FILTERING
// ═══════════════════════════════════════════════════════════════

/** Inputs to the per-message keep/drop decision */
export interface FilterContext {
  currentLevel: LogLevel;
  /** Seconds since the logger was created */
  uptime: number;
  demoteHours: number;
}

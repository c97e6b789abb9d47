/**
 * Pure pieces of the logger: tags, formatting and the keep/drop rule
 */

import { TIME_CONSTANTS } from '@utils/constants';

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Level tag prefixed to each message
 *
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 */
export function levelTag(level: LogLevel, logLevels: LogLevels): string {
  if (level === logLevels.INFO) return "ℹ️ [INFO]     ";
  if (level === logLevels.WARNING) return "⚠️ [WARNING]  ";
  if (level === logLevels.CRITICAL) return "🚨 [CRITICAL] ";
  return "[DEBUG]    ";
}

/** Prefix a message with its level tag */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  return levelTag(level, logLevels) + msg;
}

/**
 * Decide whether a message is kept
 *
 * Anything below the current level is dropped. Long simulated runs would
 * drown in per-tick INFO lines, so once uptime passes `demoteHours` INFO is
 * dropped too, unless the logger runs at DEBUG or demotion is off (0).
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * TIME_CONSTANTS.SECONDS_PER_HOUR) {
      return false;
    }
  }

  return true;
}

/** Reading value for log lines; "n/a" when missing */
export function fmtValue(value: number | null, digits: number, unit: string): string {
  if (value === null) return "n/a";
  return value.toFixed(digits) + unit;
}

/**
 * Simulation clock conversions
 *
 * Simulation time is a plain number of seconds since the dome was created.
 */

import { TIME_CONSTANTS } from '../constants';

/**
 * Convert seconds to hours
 */
export function toHours(seconds: number): number {
  return seconds / TIME_CONSTANTS.SECONDS_PER_HOUR;
}

/**
 * Simulation day (0-based) containing the given time
 */
export function simulationDay(seconds: number): number {
  return Math.floor(seconds / TIME_CONSTANTS.SECONDS_PER_DAY);
}

/**
 * Hour within the current 24 h day, in [0, 24)
 */
export function hourOfDay(seconds: number): number {
  const hours = toHours(seconds) % TIME_CONSTANTS.HOURS_PER_DAY;
  return hours < 0 ? hours + TIME_CONSTANTS.HOURS_PER_DAY : hours;
}

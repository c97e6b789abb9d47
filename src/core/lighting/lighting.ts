/**
 * Photoperiod lighting schedule
 *
 * Lights are on for the first photoperiodHours of every 24 h day with a
 * one-hour linear ramp at sunrise and at sunset. Supplemental lighting only
 * covers what transmitted sunlight does not.
 */

import { clamp } from '@utils/number';

/** Length of the sunrise and sunset ramps (hours) */
export const RAMP_HOURS = 1;

/**
 * Scheduled light level for an hour of the day
 * @param hourOfDay - Hour within the day, [0, 24)
 * @param photoperiodHours - Hours of light per day
 * @returns Fraction of full light (0–1)
 */
export function photoperiodFraction(hourOfDay: number, photoperiodHours: number): number {
  if (photoperiodHours <= 0) {
    return 0;
  }
  if (photoperiodHours >= 24) {
    return 1;
  }
  if (hourOfDay >= photoperiodHours) {
    return 0;
  }

  const sunrise = hourOfDay / RAMP_HOURS;
  const sunset = (photoperiodHours - hourOfDay) / RAMP_HOURS;
  return clamp(Math.min(sunrise, sunset, 1), 0, 1);
}

/**
 * Lamp command that tops natural light up to the scheduled level
 * @param scheduled - Scheduled light level (0–1)
 * @param natural - Natural light reaching the crop (0–1)
 */
export function supplementalLighting(scheduled: number, natural: number): number {
  return clamp(scheduled - natural, 0, 1);
}

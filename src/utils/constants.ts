/**
 * Global constants used throughout the application
 */

export const TIME_CONSTANTS = {
  SECONDS_PER_MINUTE: 60,
  SECONDS_PER_HOUR: 3600,
  SECONDS_PER_DAY: 86400,
  HOURS_PER_DAY: 24,
} as const;

export const PHYSICAL_CONSTANTS = {
  /** 0 °C in kelvin */
  KELVIN_OFFSET: 273.15,
  STANDARD_PRESSURE_KPA: 101.325,
  /** Lunar synodic day (sunrise to sunrise) in hours */
  LUNAR_SYNODIC_DAY_HOURS: 708.7,
} as const;

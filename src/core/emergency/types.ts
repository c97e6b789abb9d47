/**
 * Emergency monitor type definitions
 */

import type { SensorReading } from '$types/common';

/**
 * Hazard kinds, in override priority order (later entries win)
 */
export const HAZARD_KINDS = {
  HUMIDITY_EXCURSION: 'HUMIDITY_EXCURSION',
  TEMPERATURE_EXCURSION: 'TEMPERATURE_EXCURSION',
  CO2_EXCESS: 'CO2_EXCESS',
  O2_DEPLETION: 'O2_DEPLETION',
  OVERPRESSURE: 'OVERPRESSURE'
} as const;

export type HazardKind = typeof HAZARD_KINDS[keyof typeof HAZARD_KINDS];

export type HazardDirection = 'HIGH' | 'LOW';

/**
 * Fixed corrective actions
 */
export type CorrectiveAction =
  | 'MAX_SCRUB_AND_VENT'
  | 'FULL_HEAT'
  | 'COOL_DOWN'
  | 'FULL_MIST'
  | 'DRY_OUT'
  | 'SEAL_AND_LIGHT'
  | 'RELIEF_VENT';

/**
 * Hazard predicate limits
 */
export interface HazardThresholds {
  /** Survivable temperature band (°C) */
  temperatureMinC: number;
  temperatureMaxC: number;
  /** Survivable humidity band (%) */
  humidityMinPct: number;
  humidityMaxPct: number;
  /** CO₂ toxic threshold (ppm) */
  co2ToxicPpm: number;
  /** O₂ viability threshold (%) */
  o2MinPct: number;
  /** Structural pressure limit (kPa) */
  pressureMaxKPa: number;
}

/**
 * A predicate that is true for the current reading
 */
export interface HazardFinding {
  kind: HazardKind;
  direction: HazardDirection;
  /** Measured value that tripped the predicate */
  value: number;
  /** Limit it crossed */
  limit: number;
}

/**
 * One hazard episode, appended to the emergency log when opened
 */
export interface EmergencyEvent {
  /** Position in the emergency log */
  id: number;
  kind: HazardKind;
  direction: HazardDirection;
  /** Simulation time the predicate first became true (s) */
  openedAt: number;
  /** Reading that tripped the predicate */
  trigger: SensorReading;
  action: CorrectiveAction;
  /** Simulation time the predicate became false (s), null while open */
  resolvedAt: number | null;
}

/**
 * Monitor state (owned by one dome)
 */
export interface EmergencyMonitorState {
  /** Append-only log; an event's id is its index */
  log: EmergencyEvent[];
  /** Id of the open event per hazard kind */
  openIds: Partial<Record<HazardKind, number>>;
}

/**
 * Result of one monitor evaluation
 */
export interface MonitorUpdate {
  /** Predicates true this tick, in priority order */
  findings: HazardFinding[];
  /** Events opened this tick */
  opened: EmergencyEvent[];
  /** Events resolved this tick */
  resolved: EmergencyEvent[];
  /** Some event was open before this tick */
  wasOpen: boolean;
}

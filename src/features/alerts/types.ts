/**
 * Out-of-tolerance alert types
 */

export type AlertKind = 'TEMPERATURE_DEVIATION' | 'HUMIDITY_DEVIATION' | 'CO2_LOW' | 'O2_FIRE_RISK';

export type AlertSeverity = 'WARNING' | 'CRITICAL';

/**
 * State for a single alert
 */
export interface SingleAlertState {
  /** Time the condition first held (null if not tracking) */
  startTime: number | null;
  /** Severity already fired for the current exceedance */
  firedSeverity: AlertSeverity | null;
}

/**
 * An alert that fired
 */
export interface Alert {
  kind: AlertKind;
  severity: AlertSeverity;
  /** Measured value */
  value: number;
  /** Time the condition started (s) */
  since: number;
  message: string;
}

/**
 * Combined state for all alerts
 */
export interface AlertState {
  tracking: Record<AlertKind, SingleAlertState>;
  /** Alerts that fired this tick */
  justFired: Alert[];
}

/**
 * Configuration for alerts
 */
export interface AlertConfig {
  /** Temperature tolerance (°C): WARNING beyond 2×, CRITICAL beyond 3× */
  temperatureToleranceC: number;
  /** Humidity tolerance (%): WARNING beyond 2× */
  humidityTolerancePct: number;
  /** Minimum CO₂ for plant growth (ppm) */
  co2MinPpm: number;
  /** O₂ level above which fire risk is flagged (%) */
  o2MaxPct: number;
  /** Time a condition must hold before its alert fires (s) */
  delaySec: number;
}

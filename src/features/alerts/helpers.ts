/**
 * Helper functions for alert logic
 */

import type { SensorReading, Setpoint } from '$types/common';
import { assertNever } from '@utils/assert';

import type { AlertConfig, AlertKind, AlertSeverity, SingleAlertState } from './types';

export const ALERT_KINDS: readonly AlertKind[] = ['TEMPERATURE_DEVIATION', 'HUMIDITY_DEVIATION', 'CO2_LOW', 'O2_FIRE_RISK'];

/**
 * Severity of one alert condition for a reading
 * @returns The severity, or null when the condition does not hold
 */
export function alertSeverity(
  kind: AlertKind,
  reading: SensorReading,
  setpoint: Setpoint,
  config: AlertConfig
): AlertSeverity | null {
  switch (kind) {
    case 'TEMPERATURE_DEVIATION': {
      const deviation = Math.abs(reading.temperatureC - setpoint.temperatureC);
      if (deviation > 3 * config.temperatureToleranceC) return 'CRITICAL';
      if (deviation > 2 * config.temperatureToleranceC) return 'WARNING';
      return null;
    }
    case 'HUMIDITY_DEVIATION':
      return Math.abs(reading.humidityPct - setpoint.humidityPct) > 2 * config.humidityTolerancePct ? 'WARNING' : null;
    case 'CO2_LOW':
      return reading.co2Ppm < config.co2MinPpm ? 'WARNING' : null;
    case 'O2_FIRE_RISK':
      return reading.o2Pct > config.o2MaxPct ? 'CRITICAL' : null;
    default:
      return assertNever(kind);
  }
}

/**
 * Measured value behind an alert kind
 */
export function alertValue(kind: AlertKind, reading: SensorReading): number {
  switch (kind) {
    case 'TEMPERATURE_DEVIATION':
      return reading.temperatureC;
    case 'HUMIDITY_DEVIATION':
      return reading.humidityPct;
    case 'CO2_LOW':
      return reading.co2Ppm;
    case 'O2_FIRE_RISK':
      return reading.o2Pct;
    default:
      return assertNever(kind);
  }
}

/**
 * Human-readable alert text
 */
export function formatAlertMessage(kind: AlertKind, reading: SensorReading, setpoint: Setpoint): string {
  switch (kind) {
    case 'TEMPERATURE_DEVIATION':
      return "Temperature " + reading.temperatureC.toFixed(1) + "°C off setpoint " + setpoint.temperatureC.toFixed(1) + "°C";
    case 'HUMIDITY_DEVIATION':
      return "Humidity " + reading.humidityPct.toFixed(1) + "% off setpoint " + setpoint.humidityPct.toFixed(1) + "%";
    case 'CO2_LOW':
      return "CO2 " + reading.co2Ppm.toFixed(0) + "ppm too low for growth";
    case 'O2_FIRE_RISK':
      return "O2 " + reading.o2Pct.toFixed(1) + "% is a fire hazard";
    default:
      return assertNever(kind);
  }
}

/**
 * Update a single alert state
 * @param severity - Severity the condition holds at, null when it does not hold
 * @param now - Current timestamp in seconds
 * @param state - Current alert state
 * @param delaySec - Delay before firing in seconds
 * @returns Updated alert state and whether it just fired
 */
export function updateSingleAlert(
  severity: AlertSeverity | null,
  now: number,
  state: SingleAlertState,
  delaySec: number
): { state: SingleAlertState; justFired: boolean } {
  // Condition cleared - reset tracking
  if (severity === null) {
    return {
      state: { startTime: null, firedSeverity: null },
      justFired: false,
    };
  }

  const startTime = state.startTime ?? now;
  const escalated = state.firedSeverity === 'WARNING' && severity === 'CRITICAL';

  if ((state.firedSeverity === null || escalated) && (now - startTime) >= delaySec) {
    return {
      state: { startTime: startTime, firedSeverity: severity },
      justFired: true,
    };
  }

  return {
    state: { startTime: startTime, firedSeverity: state.firedSeverity },
    justFired: false,
  };
}

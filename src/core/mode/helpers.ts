/**
 * Mode state machine helper functions
 */

import { MODES } from '$types/common';
import type { Mode, OperatorMode, SensorReading, Setpoint } from '$types/common';
import { ValidationError } from '$types/errors';
import { isFiniteNumber, isInteger } from '@utils/number';

import type { ModeConfig, StabilityTolerance } from './types';

/**
 * Operator edges: IDLE ⇄ GROWING ⇄ MAINTENANCE
 */
const OPERATOR_EDGES: Readonly<Record<OperatorMode, readonly OperatorMode[]>> = {
  IDLE: [MODES.GROWING],
  GROWING: [MODES.IDLE, MODES.MAINTENANCE],
  MAINTENANCE: [MODES.GROWING]
};

/**
 * Narrow a mode to the modes an operator controls
 */
export function isOperatorMode(mode: Mode): mode is OperatorMode {
  return mode === MODES.IDLE || mode === MODES.GROWING || mode === MODES.MAINTENANCE;
}

/**
 * Check whether an operator may move between two modes
 */
export function isOperatorEdge(from: Mode, to: OperatorMode): boolean {
  if (!isOperatorMode(from)) return false;
  return OPERATOR_EDGES[from].includes(to);
}

/**
 * Check that a reading lies within tolerance of a setpoint
 */
export function isWithinTolerance(
  reading: SensorReading,
  setpoint: Setpoint,
  tolerance: StabilityTolerance
): boolean {
  return Math.abs(reading.temperatureC - setpoint.temperatureC) <= tolerance.temperatureC &&
    Math.abs(reading.humidityPct - setpoint.humidityPct) <= tolerance.humidityPct &&
    Math.abs(reading.co2Ppm - setpoint.co2Ppm) <= tolerance.co2Ppm &&
    Math.abs(reading.o2Pct - setpoint.o2Pct) <= tolerance.o2Pct;
}

/**
 * Validate mode timing
 * @throws {ValidationError} If a duration is negative or the escalation count is below 1
 */
export function validateModeConfig(config: ModeConfig): void {
  const durations: (keyof Omit<ModeConfig, 'startupTolerance' | 'escalationCount'>)[] = [
    'startupDwellSec', 'cooldownSec', 'escalationWindowSec', 'unresolvedTimeoutSec'
  ];
  for (const key of durations) {
    const value = config[key];
    if (!isFiniteNumber(value) || value < 0) {
      throw new ValidationError(key + " must be a non-negative number, got " + value);
    }
  }
  if (!isInteger(config.escalationCount) || config.escalationCount < 1) {
    throw new ValidationError("escalationCount must be an integer >= 1, got " + config.escalationCount);
  }
  const tolerance = config.startupTolerance;
  for (const key of ['temperatureC', 'humidityPct', 'co2Ppm', 'o2Pct'] as const) {
    if (!isFiniteNumber(tolerance[key]) || tolerance[key] <= 0) {
      throw new ValidationError("startupTolerance." + key + " must be a positive number, got " + tolerance[key]);
    }
  }
}

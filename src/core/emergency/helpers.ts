/**
 * Emergency monitor helper functions
 *
 * Hazard predicates and the fixed corrective-action policy.
 */

import type { ActuatorCommand, SensorReading } from '$types/common';
import { ValidationError } from '$types/errors';
import { assertNever } from '@utils/assert';
import { isFiniteNumber } from '@utils/number';

import { HAZARD_KINDS } from './types';
import type { CorrectiveAction, HazardFinding, HazardKind, HazardThresholds } from './types';

/** Evaluation and override order; later kinds win a conflict */
export const HAZARD_ORDER: readonly HazardKind[] = [
  HAZARD_KINDS.HUMIDITY_EXCURSION,
  HAZARD_KINDS.TEMPERATURE_EXCURSION,
  HAZARD_KINDS.CO2_EXCESS,
  HAZARD_KINDS.O2_DEPLETION,
  HAZARD_KINDS.OVERPRESSURE
];

/**
 * Validate hazard thresholds
 * @throws {ValidationError} If a band is inverted or a limit is not finite
 */
export function validateHazardThresholds(thresholds: HazardThresholds): void {
  const keys: (keyof HazardThresholds)[] = [
    'temperatureMinC', 'temperatureMaxC', 'humidityMinPct', 'humidityMaxPct', 'co2ToxicPpm', 'o2MinPct', 'pressureMaxKPa'
  ];
  for (const key of keys) {
    if (!isFiniteNumber(thresholds[key])) {
      throw new ValidationError(key + " must be a finite number, got " + thresholds[key]);
    }
  }
  if (thresholds.temperatureMinC >= thresholds.temperatureMaxC) {
    throw new ValidationError(
      "temperatureMinC (" + thresholds.temperatureMinC + ") must be less than temperatureMaxC (" + thresholds.temperatureMaxC + ")"
    );
  }
  if (thresholds.humidityMinPct >= thresholds.humidityMaxPct) {
    throw new ValidationError(
      "humidityMinPct (" + thresholds.humidityMinPct + ") must be less than humidityMaxPct (" + thresholds.humidityMaxPct + ")"
    );
  }
}

/**
 * Evaluate one hazard predicate
 * @returns The finding, or null when the predicate is false
 */
export function evaluateHazard(
  kind: HazardKind,
  reading: SensorReading,
  thresholds: HazardThresholds
): HazardFinding | null {
  switch (kind) {
    case HAZARD_KINDS.TEMPERATURE_EXCURSION:
      if (reading.temperatureC > thresholds.temperatureMaxC) {
        return { kind: kind, direction: 'HIGH', value: reading.temperatureC, limit: thresholds.temperatureMaxC };
      }
      if (reading.temperatureC < thresholds.temperatureMinC) {
        return { kind: kind, direction: 'LOW', value: reading.temperatureC, limit: thresholds.temperatureMinC };
      }
      return null;
    case HAZARD_KINDS.HUMIDITY_EXCURSION:
      if (reading.humidityPct > thresholds.humidityMaxPct) {
        return { kind: kind, direction: 'HIGH', value: reading.humidityPct, limit: thresholds.humidityMaxPct };
      }
      if (reading.humidityPct < thresholds.humidityMinPct) {
        return { kind: kind, direction: 'LOW', value: reading.humidityPct, limit: thresholds.humidityMinPct };
      }
      return null;
    case HAZARD_KINDS.CO2_EXCESS:
      return reading.co2Ppm > thresholds.co2ToxicPpm
        ? { kind: kind, direction: 'HIGH', value: reading.co2Ppm, limit: thresholds.co2ToxicPpm }
        : null;
    case HAZARD_KINDS.O2_DEPLETION:
      return reading.o2Pct < thresholds.o2MinPct
        ? { kind: kind, direction: 'LOW', value: reading.o2Pct, limit: thresholds.o2MinPct }
        : null;
    case HAZARD_KINDS.OVERPRESSURE:
      return reading.pressureKPa > thresholds.pressureMaxKPa
        ? { kind: kind, direction: 'HIGH', value: reading.pressureKPa, limit: thresholds.pressureMaxKPa }
        : null;
    default:
      return assertNever(kind);
  }
}

/**
 * Evaluate every hazard predicate
 * @returns Findings in override priority order
 */
export function evaluateHazards(reading: SensorReading, thresholds: HazardThresholds): HazardFinding[] {
  const findings: HazardFinding[] = [];
  for (const kind of HAZARD_ORDER) {
    const finding = evaluateHazard(kind, reading, thresholds);
    if (finding !== null) {
      findings.push(finding);
    }
  }
  return findings;
}

/**
 * Policy: corrective action for a finding
 */
export function correctiveActionFor(finding: HazardFinding): CorrectiveAction {
  switch (finding.kind) {
    case HAZARD_KINDS.CO2_EXCESS:
      return 'MAX_SCRUB_AND_VENT';
    case HAZARD_KINDS.TEMPERATURE_EXCURSION:
      return finding.direction === 'HIGH' ? 'COOL_DOWN' : 'FULL_HEAT';
    case HAZARD_KINDS.HUMIDITY_EXCURSION:
      return finding.direction === 'HIGH' ? 'DRY_OUT' : 'FULL_MIST';
    case HAZARD_KINDS.O2_DEPLETION:
      return 'SEAL_AND_LIGHT';
    case HAZARD_KINDS.OVERPRESSURE:
      return 'RELIEF_VENT';
    default:
      return assertNever(finding.kind);
  }
}

/**
 * Apply one corrective action over a command (MUTABLE)
 */
export function applyCorrectiveAction(command: ActuatorCommand, action: CorrectiveAction): ActuatorCommand {
  switch (action) {
    case 'MAX_SCRUB_AND_VENT':
      command.co2Rate = -1;
      command.vent = 1;
      break;
    case 'FULL_HEAT':
      command.heater = 1;
      command.fan = 0;
      break;
    case 'COOL_DOWN':
      command.heater = 0;
      command.lighting = 0;
      command.fan = 1;
      break;
    case 'FULL_MIST':
      command.mister = 1;
      break;
    case 'DRY_OUT':
      command.mister = 0;
      command.nutrientDosing = false;
      command.vent = 1;
      break;
    case 'SEAL_AND_LIGHT':
      command.vent = 0;
      command.lighting = 1;
      command.co2Rate = Math.max(command.co2Rate, 0);
      break;
    case 'RELIEF_VENT':
      command.vent = 1;
      command.heater = 0;
      command.co2Rate = Math.min(command.co2Rate, 0);
      break;
    default:
      assertNever(action);
  }
  return command;
}

/**
 * Override a PID command with the corrective actions of every finding
 * @param command - Command computed by the regulation loops
 * @param findings - Active findings in priority order
 * @returns A new command; the input is not modified
 */
export function overrideCommand(command: ActuatorCommand, findings: HazardFinding[]): ActuatorCommand {
  const result = { ...command };
  for (const finding of findings) {
    applyCorrectiveAction(result, correctiveActionFor(finding));
  }
  return result;
}


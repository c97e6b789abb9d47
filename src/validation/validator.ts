/**
 * Configuration validation
 *
 * Collects every error and warning instead of stopping at the first one.
 * Module parameter checks are delegated to each module's own validator.
 */

import { validateHazardThresholds } from '@core/emergency';
import { validateEnergyConfig } from '@core/energy';
import { validateModeConfig } from '@core/mode';
import { validatePidConfig } from '@core/pid';
import { validateAmbientProfile, validatePhysicsModel } from '@core/physics';
import { validateCoordinatorConfig } from '@features/coordinator';
import type { Setpoint } from '$types/common';
import type { DomeConfig, SimulationConfig, SurvivableEnvelope } from '$types/config';

import { addError, addWarning, collectModuleErrors, validateBand, validateNumberRange } from './helpers';
import type { ValidationError, ValidationResult, ValidationWarning } from './types';

/**
 * Check a setpoint against the survivable envelope
 * @returns One message per value outside the envelope
 */
export function setpointEnvelopeViolations(setpoint: Setpoint, envelope: SurvivableEnvelope): string[] {
  const violations: string[] = [];
  if (setpoint.temperatureC < envelope.temperatureMinC || setpoint.temperatureC > envelope.temperatureMaxC) {
    violations.push(`temperatureC ${setpoint.temperatureC} outside ${envelope.temperatureMinC}-${envelope.temperatureMaxC}`);
  }
  if (setpoint.humidityPct < envelope.humidityMinPct || setpoint.humidityPct > envelope.humidityMaxPct) {
    violations.push(`humidityPct ${setpoint.humidityPct} outside ${envelope.humidityMinPct}-${envelope.humidityMaxPct}`);
  }
  if (setpoint.co2Ppm < envelope.co2MinPpm || setpoint.co2Ppm > envelope.co2MaxPpm) {
    violations.push(`co2Ppm ${setpoint.co2Ppm} outside ${envelope.co2MinPpm}-${envelope.co2MaxPpm}`);
  }
  if (setpoint.o2Pct < envelope.o2MinPct || setpoint.o2Pct > envelope.o2MaxPct) {
    violations.push(`o2Pct ${setpoint.o2Pct} outside ${envelope.o2MinPct}-${envelope.o2MaxPct}`);
  }
  if (setpoint.photoperiodHours < 0 || setpoint.photoperiodHours > 24) {
    violations.push(`photoperiodHours ${setpoint.photoperiodHours} outside 0-24`);
  }
  return violations;
}

/**
 * Validate a dome configuration
 * @param config - Configuration to check
 * @returns Result with every error and warning found
 */
export function validateDomeConfig(config: DomeConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  if (config.domeId.trim() === '') {
    addError(errors, 'domeId', 'domeId must be a non-empty string');
  }

  // Regulation
  collectModuleErrors('pid.temperature', errors, () => validatePidConfig(config.pid.temperature));
  collectModuleErrors('pid.humidity', errors, () => validatePidConfig(config.pid.humidity));
  collectModuleErrors('pid.co2', errors, () => validatePidConfig(config.pid.co2));
  validateNumberRange(config.baselineFan, 'baselineFan', 0, 1, errors, warnings, 0, 0.5);

  // Envelope and profiles
  const env = config.envelope;
  validateBand(env.temperatureMinC, env.temperatureMaxC, 'envelope.temperature', errors);
  validateBand(env.humidityMinPct, env.humidityMaxPct, 'envelope.humidity', errors);
  validateBand(env.co2MinPpm, env.co2MaxPpm, 'envelope.co2', errors);
  validateBand(env.o2MinPct, env.o2MaxPct, 'envelope.o2', errors);

  const profiles = config.profiles;
  const named: [string, Setpoint][] = [
    ['startup', profiles.startup],
    ['idle', profiles.idle],
    ['growing', profiles.growing],
    ['maintenance', profiles.maintenance],
    ['safeHold', profiles.safeHold]
  ];
  for (const [name, setpoint] of named) {
    for (const violation of setpointEnvelopeViolations(setpoint, env)) {
      addError(errors, 'profiles.' + name, `profiles.${name}: ${violation}`);
    }
  }

  // Safety
  collectModuleErrors('hazards', errors, () => validateHazardThresholds(config.hazards));
  collectModuleErrors('modes', errors, () => validateModeConfig(config.modes));
  if (config.hazards.o2MinPct >= profiles.safeHold.o2Pct) {
    addWarning(warnings, 'hazards.o2MinPct',
      `hazards.o2MinPct (${config.hazards.o2MinPct}) is not below the safe-hold O2 setpoint (${profiles.safeHold.o2Pct})`);
  }
  if (config.hazards.temperatureMinC >= env.temperatureMinC || config.hazards.temperatureMaxC <= env.temperatureMaxC) {
    addWarning(warnings, 'hazards.temperature', 'hazard temperature band is not wider than the envelope');
  }
  validateNumberRange(config.alerts.delaySec, 'alerts.delaySec', 0, 86400, errors, warnings, 0, 3600);
  validateNumberRange(config.alerts.temperatureToleranceC, 'alerts.temperatureToleranceC', 0.1, 20, errors, warnings);
  validateNumberRange(config.alerts.humidityTolerancePct, 'alerts.humidityTolerancePct', 0.1, 50, errors, warnings);

  // Plant model
  collectModuleErrors('energy', errors, () => validateEnergyConfig(config.energy));
  collectModuleErrors('physics', errors, () => validatePhysicsModel(config.physics));
  collectModuleErrors('ambient', errors, () => validateAmbientProfile(config.ambient));
  validateBand(config.dosing.phMin, config.dosing.phMax, 'dosing.ph', errors);
  validateNumberRange(config.dosing.targetConcentrationPpm, 'dosing.targetConcentrationPpm', 0, 10000, errors, warnings);

  const initial = config.initialReading;
  validateNumberRange(initial.humidityPct, 'initialReading.humidityPct', 0, 100, errors, warnings);
  validateNumberRange(initial.o2Pct, 'initialReading.o2Pct', 0, 100, errors, warnings);
  validateNumberRange(initial.light, 'initialReading.light', 0, 1, errors, warnings);
  validateNumberRange(initial.substrateMoisture, 'initialReading.substrateMoisture', 0, 1, errors, warnings);

  // Reporting
  validateNumberRange(config.historySampleSec, 'historySampleSec', 1, 86400 * 30, errors, warnings, 60, 86400);

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Validate a simulation configuration
 * @param config - Configuration to check
 * @returns Result with every error and warning found
 */
export function validateSimulationConfig(config: SimulationConfig): ValidationResult {
  const errors: ValidationError[] = [];
  const warnings: ValidationWarning[] = [];

  validateNumberRange(config.tickSec, 'tickSec', 0.001, 86400, errors, warnings, 1, 600);
  validateNumberRange(config.coordinatorIntervalSec, 'coordinatorIntervalSec', 0.001, 86400 * 30, errors, warnings);
  if (config.coordinatorIntervalSec < config.tickSec) {
    addError(errors, 'coordinatorIntervalSec',
      `coordinatorIntervalSec (${config.coordinatorIntervalSec}) must be at least tickSec (${config.tickSec})`);
  }
  collectModuleErrors('coordinator', errors, () => validateCoordinatorConfig(config.coordinator));

  return {
    valid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Physical response helper functions
 */

import { PhysicsValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { AmbientProfile, Forcing, PhysicsModel } from './types';

/**
 * Exponential approach of a first-order lag
 * @param current - Value at the start of the step
 * @param target - Forcing value
 * @param tauSec - Time constant in seconds
 * @param dt - Step length in seconds
 */
export function approach(current: number, target: number, tauSec: number, dt: number): number {
  return target + (current - target) * Math.exp(-dt / tauSec);
}

/**
 * Weighted mean of forcing values; zero-weight entries are ignored
 * @returns The first forcing's value if every weight is zero
 */
export function blend(forcings: Forcing[]): number {
  let weighted = 0;
  let total = 0;
  for (const forcing of forcings) {
    if (forcing.weight > 0) {
      weighted += forcing.value * forcing.weight;
      total += forcing.weight;
    }
  }
  if (total === 0) {
    return forcings.length > 0 ? forcings[0].value : 0;
  }
  return weighted / total;
}

/**
 * Validate physical model parameters
 * @throws {PhysicsValidationError} If a parameter is out of range
 */
export function validatePhysicsModel(model: PhysicsModel): void {
  const tau = model.timeConstantsSec;
  const names: (keyof typeof tau)[] = ['temperature', 'humidity', 'co2', 'o2', 'light', 'substrateMoisture', 'pressure'];
  for (const name of names) {
    if (!isFiniteNumber(tau[name]) || tau[name] <= 0) {
      throw new PhysicsValidationError("Time constant for " + name + " must be positive, got " + tau[name]);
    }
  }

  const weights: [string, number][] = [
    ['misterWeight', model.misterWeight],
    ['ventWeight', model.ventWeight],
    ['scrubberWeight', model.scrubberWeight],
    ['injectorWeight', model.injectorWeight],
    ['photosynthesisWeight', model.photosynthesisWeight],
    ['ventPressureWeight', model.ventPressureWeight],
  ];
  for (const [name, value] of weights) {
    if (!isFiniteNumber(value) || value < 0) {
      throw new PhysicsValidationError(name + " must be a non-negative finite number, got " + value);
    }
  }

  if (!isFiniteNumber(model.daylightTransmission) || model.daylightTransmission < 0 || model.daylightTransmission > 1) {
    throw new PhysicsValidationError("daylightTransmission must be between 0 and 1, got " + model.daylightTransmission);
  }
  if (!isFiniteNumber(model.nominalPressureKPa) || model.nominalPressureKPa <= 0) {
    throw new PhysicsValidationError("nominalPressureKPa must be positive, got " + model.nominalPressureKPa);
  }
}

/**
 * Validate the exterior day/night profile
 * @throws {PhysicsValidationError} If the cycle is malformed
 */
export function validateAmbientProfile(profile: AmbientProfile): void {
  if (!isFiniteNumber(profile.cycleHours) || profile.cycleHours <= 0) {
    throw new PhysicsValidationError("cycleHours must be positive, got " + profile.cycleHours);
  }
  if (!isFiniteNumber(profile.dayFraction) || profile.dayFraction < 0 || profile.dayFraction > 1) {
    throw new PhysicsValidationError("dayFraction must be between 0 and 1, got " + profile.dayFraction);
  }
  if (!isFiniteNumber(profile.dayTempC) || !isFiniteNumber(profile.nightTempC)) {
    throw new PhysicsValidationError("Exterior temperatures must be finite numbers");
  }
}

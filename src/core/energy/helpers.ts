/**
 * Energy accountant helper functions
 */

import type { ActuatorCommand } from '$types/common';
import { ValidationError } from '$types/errors';
import { clamp, isFiniteNumber } from '@utils/number';

import type { DrawFunction, EnergyChannel, EnergyConfig, EnergyLedger } from './types';

export const ENERGY_CHANNELS: readonly EnergyChannel[] = ['heating', 'lighting', 'ventilation', 'misting', 'other'];

/**
 * Draw of one channel at a commanded fraction (kW)
 */
export function channelDraw(fn: DrawFunction, fraction: number): number {
  return fn.idleKw + fn.ratedKw * Math.pow(clamp(fraction, 0, 1), fn.exponent);
}

/**
 * Commanded fraction seen by each channel
 *
 * The "other" channel carries the circulation fan and the CO₂ scrubber or
 * injector, whichever is running.
 */
export function channelFractions(command: ActuatorCommand): EnergyLedger {
  return {
    heating: command.heater,
    lighting: command.lighting,
    ventilation: command.vent,
    misting: command.mister,
    other: clamp(command.fan + Math.abs(command.co2Rate), 0, 1)
  };
}

/**
 * Sum of every channel (kWh)
 */
export function totalEnergy(ledger: EnergyLedger): number {
  let total = 0;
  for (const channel of ENERGY_CHANNELS) {
    total += ledger[channel];
  }
  return total;
}

/**
 * Validate draw functions
 * @throws {ValidationError} If a draw is negative or an exponent is not positive
 */
export function validateEnergyConfig(config: EnergyConfig): void {
  for (const channel of ENERGY_CHANNELS) {
    const fn = config[channel];
    if (!isFiniteNumber(fn.idleKw) || fn.idleKw < 0) {
      throw new ValidationError(channel + ".idleKw must be a non-negative number, got " + fn.idleKw);
    }
    if (!isFiniteNumber(fn.ratedKw) || fn.ratedKw < 0) {
      throw new ValidationError(channel + ".ratedKw must be a non-negative number, got " + fn.ratedKw);
    }
    if (!isFiniteNumber(fn.exponent) || fn.exponent <= 0) {
      throw new ValidationError(channel + ".exponent must be a positive number, got " + fn.exponent);
    }
  }
}

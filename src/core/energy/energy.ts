/**
 * Energy accountant
 *
 * Integrates per-channel draw every tick, in every mode.
 */

import type { ActuatorCommand } from '$types/common';
import { TIME_CONSTANTS } from '@utils/constants';

import { channelDraw, channelFractions, ENERGY_CHANNELS } from './helpers';
import type { EnergyConfig, EnergyLedger, PowerDraw } from './types';

/**
 * Create an empty ledger
 */
export function createEnergyLedger(): EnergyLedger {
  return { heating: 0, lighting: 0, ventilation: 0, misting: 0, other: 0 };
}

/**
 * Instantaneous draw of a command (kW)
 */
export function powerDraw(command: ActuatorCommand, config: EnergyConfig): PowerDraw {
  const fractions = channelFractions(command);
  const draw = createEnergyLedger();
  for (const channel of ENERGY_CHANNELS) {
    draw[channel] = channelDraw(config[channel], fractions[channel]);
  }
  return draw;
}

/**
 * Add one tick of energy to the ledger (MUTABLE)
 *
 * @param ledger - Ledger (will be mutated)
 * @param command - Command in effect during the tick
 * @param config - Draw functions
 * @param dt - Tick length (s); non-positive adds nothing
 * @returns Energy added this tick (kWh)
 */
export function accumulateEnergy(
  ledger: EnergyLedger,
  command: ActuatorCommand,
  config: EnergyConfig,
  dt: number
): number {
  if (!(dt > 0)) return 0;

  const hours = dt / TIME_CONSTANTS.SECONDS_PER_HOUR;
  const draw = powerDraw(command, config);
  let added = 0;
  for (const channel of ENERGY_CHANNELS) {
    const delta = Math.max(0, draw[channel] * hours);
    ledger[channel] += delta;
    added += delta;
  }
  return added;
}

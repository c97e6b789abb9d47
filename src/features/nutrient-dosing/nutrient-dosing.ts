/**
 * Nutrient dosing decision
 *
 * Misting carries nutrient solution when the substrate is short of nutrients
 * and its pH is inside the crop's band. Dosing into alkaline or acidic
 * substrate is withheld.
 */

import type { NutrientInput } from '$types/common';

import type { DosingConfig, DosingDecision } from './types';

/**
 * Decide whether this tick's misting includes nutrients
 *
 * @param misterFraction - Commanded mister rate (0–1)
 * @param nutrients - Nutrient-release output, null when unknown
 * @param config - Target concentration and pH band
 */
export function decideNutrientDosing(
  misterFraction: number,
  nutrients: NutrientInput | null,
  config: DosingConfig
): DosingDecision {
  if (!(misterFraction > 0)) {
    return { dose: false, reason: 'mister off' };
  }
  if (nutrients === null) {
    return { dose: false, reason: 'no nutrient data' };
  }
  if (nutrients.ph < config.phMin || nutrients.ph > config.phMax) {
    return { dose: false, reason: 'pH ' + nutrients.ph.toFixed(2) + ' outside ' + config.phMin + '-' + config.phMax };
  }
  if (nutrients.concentrationPpm >= config.targetConcentrationPpm) {
    return { dose: false, reason: 'concentration at target' };
  }
  return { dose: true, reason: 'concentration ' + nutrients.concentrationPpm.toFixed(0) + 'ppm below target' };
}

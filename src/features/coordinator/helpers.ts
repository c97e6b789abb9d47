/**
 * Helper functions for the coordinator
 */

import { ValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { CoordinatorConfig, RedistributionPlan } from './types';

/**
 * Validate coordinator thresholds
 * @throws {ValidationError} If viability < restore target <= surplus does not hold
 */
export function validateCoordinatorConfig(config: CoordinatorConfig): void {
  const { viabilityPct, surplusPct, restoreTargetPct } = config;
  if (!isFiniteNumber(viabilityPct) || !isFiniteNumber(surplusPct) || !isFiniteNumber(restoreTargetPct)) {
    throw new ValidationError("coordinator thresholds must be finite numbers");
  }
  if (!(viabilityPct < restoreTargetPct && restoreTargetPct <= surplusPct)) {
    throw new ValidationError(
      "coordinator thresholds must satisfy viabilityPct < restoreTargetPct <= surplusPct, got " +
      viabilityPct + " / " + restoreTargetPct + " / " + surplusPct
    );
  }
}

/**
 * Sum of every delta in a plan (zero up to rounding)
 */
export function netDelta(plan: RedistributionPlan): number {
  let sum = 0;
  for (const delta of Object.values(plan.deltas)) {
    sum += delta;
  }
  return sum;
}

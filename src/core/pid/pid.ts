/**
 * Discrete PID controller
 *
 * One state object per regulated variable. The update mutates only that state.
 */

import { clamp, isFiniteNumber } from '@utils/number';

import { neutralOutput } from './helpers';
import type { PidConfig, PidResult, PidState } from './types';

/**
 * Create zeroed loop state
 */
export function createPidState(): PidState {
  return {
    integral: 0,
    previousError: 0,
    hasPrevious: false,
    windup: false,
    faultCount: 0
  };
}

/**
 * Compute the loop output for one step (MUTABLE)
 *
 * error = setpoint - measured; the integral is clamped to ±integralLimit;
 * the derivative uses the previous error and is zero on the first step after
 * a reset. A non-positive or non-finite dt is rejected: the neutral output is
 * returned, faultCount is incremented and integral/previous error are left as
 * they were.
 *
 * @param state - Loop state (will be mutated)
 * @param config - Gains and bounds
 * @param setpoint - Target value
 * @param measured - Current measured value
 * @param dt - Elapsed time in seconds
 */
export function updatePid(
  state: PidState,
  config: PidConfig,
  setpoint: number,
  measured: number,
  dt: number
): PidResult {
  if (!isFiniteNumber(dt) || dt <= 0) {
    state.faultCount++;
    return { output: neutralOutput(config), fault: 'NON_POSITIVE_DT', terms: { p: 0, i: 0, d: 0 } };
  }

  const error = setpoint - measured;

  const rawIntegral = state.integral + error * dt;
  state.integral = clamp(rawIntegral, -config.integralLimit, config.integralLimit);
  state.windup = state.integral !== rawIntegral;

  const derivative = state.hasPrevious ? (error - state.previousError) / dt : 0;
  state.previousError = error;
  state.hasPrevious = true;

  const p = config.kp * error;
  const i = config.ki * state.integral;
  const d = config.kd * derivative;

  return {
    output: clamp(p + i + d, config.outputMin, config.outputMax),
    fault: null,
    terms: { p: p, i: i, d: d }
  };
}

/**
 * Clear accumulated history (MUTABLE)
 *
 * The fault counter survives a reset.
 */
export function resetPid(state: PidState): PidState {
  state.integral = 0;
  state.previousError = 0;
  state.hasPrevious = false;
  state.windup = false;
  return state;
}

/**
 * PID helper functions
 */

import { PidValidationError } from '$types/errors';
import { clamp, isFiniteNumber } from '@utils/number';

import type { PidConfig } from './types';

/**
 * Validate loop configuration
 * @throws {PidValidationError} If configuration is invalid
 */
export function validatePidConfig(config: PidConfig): void {
  if (!isFiniteNumber(config.kp) || config.kp < 0) {
    throw new PidValidationError("kp must be a non-negative finite number, got " + config.kp);
  }
  if (!isFiniteNumber(config.ki) || config.ki < 0) {
    throw new PidValidationError("ki must be a non-negative finite number, got " + config.ki);
  }
  if (!isFiniteNumber(config.kd) || config.kd < 0) {
    throw new PidValidationError("kd must be a non-negative finite number, got " + config.kd);
  }
  if (!isFiniteNumber(config.outputMin) || !isFiniteNumber(config.outputMax) || config.outputMin >= config.outputMax) {
    throw new PidValidationError(
      "outputMin (" + config.outputMin + ") must be less than outputMax (" + config.outputMax + ")"
    );
  }
  if (!isFiniteNumber(config.integralLimit) || config.integralLimit <= 0) {
    throw new PidValidationError("integralLimit must be a positive finite number, got " + config.integralLimit);
  }
}

/**
 * Output returned when an update is rejected: zero, pulled into the output range
 */
export function neutralOutput(config: PidConfig): number {
  return clamp(0, config.outputMin, config.outputMax);
}

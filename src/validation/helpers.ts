/**
 * Building blocks for the dome and simulation config validators
 */

import { ValidationError as ModuleValidationError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { ValidationError, ValidationWarning } from './types';

// ═══════════════════════════════════════════════════════════════
// ERROR AND WARNING BUILDERS
// ═══════════════════════════════════════════════════════════════

/** Record a failure that rejects the config */
export function addError(errors: ValidationError[], field: string, message: string): void {
  errors.push({ level: 'CRITICAL', field: field, message: message });
}

/** Record a value that is accepted but unusual */
export function addWarning(warnings: ValidationWarning[], field: string, message: string): void {
  warnings.push({ level: 'WARNING', field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// RANGE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Check a number against a hard range and, optionally, a recommended one
 *
 * Outside the hard range (NaN and Infinity included) is an error; inside it
 * but outside the recommended range is a warning. Undefined values are
 * skipped so optional keys can share the call.
 */
export function validateNumberRange(
  value: number | undefined,
  field: string,
  criticalMin: number,
  criticalMax: number,
  errors: ValidationError[],
  warnings: ValidationWarning[],
  recommendedMin?: number,
  recommendedMax?: number
): void {
  if (value === undefined) return;

  if (!isFiniteNumber(value) || value < criticalMin || value > criticalMax) {
    addError(errors, field, `${field} must be between ${criticalMin} and ${criticalMax} (got ${value})`);
    return;
  }

  if (recommendedMin === undefined || recommendedMax === undefined) return;
  if (value < recommendedMin || value > recommendedMax) {
    addWarning(
      warnings,
      field,
      `${field} is outside recommended range ${recommendedMin}-${recommendedMax} (got ${value})`
    );
  }
}

/** Require a band's lower bound strictly below its upper bound */
export function validateBand(min: number, max: number, field: string, errors: ValidationError[]): void {
  if (!isFiniteNumber(min) || !isFiniteNumber(max) || min >= max) {
    addError(errors, field, `${field} lower bound must be less than upper bound (got ${min} / ${max})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// MODULE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Run a module validator that throws and record its failure as a field error
 *
 * Errors other than validation errors are rethrown.
 *
 * @param field - Field name the validator covers
 * @param errors - Array to append errors to
 * @param validate - Module validator
 */
export function collectModuleErrors(field: string, errors: ValidationError[], validate: () => void): void {
  try {
    validate();
  } catch (err) {
    if (err instanceof ModuleValidationError) {
      addError(errors, field, `${field}: ${err.message}`);
      return;
    }
    throw err;
  }
}

/**
 * Global error types for the dome controller
 * Custom errors for validation and constraint violations
 */

/**
 * Base validation error for all modules
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Error thrown when a dome or simulation configuration is rejected at initialization
 */
export class ConfigValidationError extends ValidationError {
  /** Every field that failed validation */
  readonly fields: { field: string; message: string }[];

  constructor(message: string, fields: { field: string; message: string }[] = []) {
    super(message);
    this.name = 'ConfigValidationError';
    this.fields = fields;
  }
}

/**
 * Error thrown when PID gains or bounds are invalid
 */
export class PidValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PidValidationError';
  }
}

/**
 * Error thrown when physical model parameters are invalid
 */
export class PhysicsValidationError extends ValidationError {
  constructor(message: string) {
    super(message);
    this.name = 'PhysicsValidationError';
  }
}

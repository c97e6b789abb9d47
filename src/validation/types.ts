/** One failed check; `field` is the dotted config path, e.g. "pid.temperature.kp" */
export interface ValidationError {
  field: string;
  message: string;
  level?: string;
}

/** A value that is accepted but outside its recommended range */
export interface ValidationWarning {
  field: string;
  message: string;
  level?: string;
}

/** Outcome of validating a dome or simulation config */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
  warnings: ValidationWarning[];
}

export { validateDomeConfig, validateSimulationConfig, setpointEnvelopeViolations } from './validator';
export {
  addError,
  addWarning,
  validateNumberRange,
  validateBand,
  collectModuleErrors
} from './helpers';
export type { ValidationError, ValidationWarning, ValidationResult } from './types';

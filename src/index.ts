/**
 * Dome environmental control
 *
 * Public entry point. Callers own the dome controllers or the simulation
 * and feed them per-tick inputs.
 */

export { initialize, createAppLogger } from '@boot/init';
export {
  DEFAULT_DOME_CONFIG,
  DEFAULT_SIMULATION_CONFIG,
  LOGGING_CONFIG,
  APP_CONSTANTS,
  createDomeConfig,
  createSimulationConfig
} from '@boot/config';
export type { DomeConfigOverrides } from '@boot/config';
export type { AppLoggingConfig, InitOptions } from '@boot/types';

export * from '@core/index';
export * from '@features/alerts';
export * from '@features/coordinator';
export * from '@features/history';
export * from '@features/nutrient-dosing';
export * from '@system/dome';
export * from '@system/simulation';
export * from '@events';
export * from '@logging';
export {
  validateDomeConfig,
  validateSimulationConfig,
  setpointEnvelopeViolations
} from '@validation';
export type {
  ValidationError as ValidationIssue,
  ValidationWarning,
  ValidationResult
} from '@validation';
export * from '$types';

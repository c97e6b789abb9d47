export { createDomeController, createDomeState } from './dome';
export {
  setpointForMode,
  measuredValue,
  targetValue,
  processPid,
  lightingCommand,
  clampCommand,
  assertFiniteReading
} from './helpers';
export * from './types';

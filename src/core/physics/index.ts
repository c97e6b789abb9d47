export { respond, forcingTargets } from './physics';
export { ambientAt } from './ambient';
export { approach, blend, validatePhysicsModel, validateAmbientProfile } from './helpers';
export * from './types';

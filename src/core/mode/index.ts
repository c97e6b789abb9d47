export { createModeState, evaluateStartup, applyHazardStatus, requestMode } from './mode';
export { isOperatorMode, isOperatorEdge, isWithinTolerance, validateModeConfig } from './helpers';
export * from './types';

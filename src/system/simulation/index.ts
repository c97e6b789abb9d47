export { createSimulation } from './simulation';
export { resolveInputs, summarizeDome } from './helpers';
export * from './types';

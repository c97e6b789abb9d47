export { planRedistribution, rebalance } from './coordinator';
export { validateCoordinatorConfig, netDelta } from './helpers';
export * from './types';

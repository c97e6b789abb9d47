export { createEnergyLedger, powerDraw, accumulateEnergy } from './energy';
export { channelDraw, channelFractions, totalEnergy, validateEnergyConfig, ENERGY_CHANNELS } from './helpers';
export * from './types';

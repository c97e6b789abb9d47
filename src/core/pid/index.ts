export { createPidState, updatePid, resetPid } from './pid';
export { validatePidConfig, neutralOutput } from './helpers';
export * from './types';

export { createEmergencyMonitorState, updateEmergencyMonitor, hasOpenEvents, openEvents } from './emergency';
export {
  evaluateHazard,
  evaluateHazards,
  correctiveActionFor,
  applyCorrectiveAction,
  overrideCommand,
  validateHazardThresholds,
  HAZARD_ORDER
} from './helpers';
export * from './types';

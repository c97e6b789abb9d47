export { initAlertState, updateAlerts, activeAlerts } from './alerts';
export { alertSeverity, updateSingleAlert, ALERT_KINDS } from './helpers';
export * from './types';

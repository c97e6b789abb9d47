/**
 * Out-of-tolerance alerts
 *
 * Non-emergency alerts measured against the active setpoint. Each alert
 * fires once per exceedance after its delay, and again if a WARNING
 * escalates to CRITICAL. Hazards that force EMERGENCY are handled by the
 * emergency monitor, not here.
 */

import type { SensorReading, Setpoint } from '$types/common';

import { ALERT_KINDS, alertSeverity, alertValue, formatAlertMessage, updateSingleAlert } from './helpers';
import type { AlertConfig, AlertKind, AlertState, SingleAlertState } from './types';

/**
 * Initialize alert state
 * @returns Fresh alert state with all tracking reset
 */
export function initAlertState(): AlertState {
  return {
    tracking: {
      TEMPERATURE_DEVIATION: { startTime: null, firedSeverity: null },
      HUMIDITY_DEVIATION: { startTime: null, firedSeverity: null },
      CO2_LOW: { startTime: null, firedSeverity: null },
      O2_FIRE_RISK: { startTime: null, firedSeverity: null }
    },
    justFired: []
  };
}

/**
 * Update all alerts
 *
 * @param reading - Current reading
 * @param setpoint - Active setpoint
 * @param now - Current timestamp in seconds
 * @param alertState - Current alert state
 * @param config - Tolerances and delay
 * @returns Updated alert state; `justFired` lists the alerts to report
 */
export function updateAlerts(
  reading: SensorReading,
  setpoint: Setpoint,
  now: number,
  alertState: AlertState,
  config: AlertConfig
): AlertState {
  const next = initAlertState();

  for (const kind of ALERT_KINDS) {
    const severity = alertSeverity(kind, reading, setpoint, config);
    const result = updateSingleAlert(severity, now, alertState.tracking[kind], config.delaySec);
    next.tracking[kind] = result.state;

    if (result.justFired && severity !== null) {
      next.justFired.push({
        kind: kind,
        severity: severity,
        value: alertValue(kind, reading),
        since: result.state.startTime ?? now,
        message: formatAlertMessage(kind, reading, setpoint)
      });
    }
  }

  return next;
}

/**
 * Alerts that have fired and whose condition still holds
 */
export function activeAlerts(state: AlertState): { kind: AlertKind; tracking: SingleAlertState }[] {
  return ALERT_KINDS
    .filter(function(kind) { return state.tracking[kind].firedSeverity !== null; })
    .map(function(kind) { return { kind: kind, tracking: state.tracking[kind] }; });
}

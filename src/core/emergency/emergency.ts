/**
 * Emergency monitor
 *
 * Evaluated once per tick before the regulation loops. Opens one event per
 * hazard kind when its predicate becomes true and resolves it when the
 * predicate becomes false. The log is append-only.
 */

import type { SensorReading } from '$types/common';

import { correctiveActionFor, evaluateHazards, HAZARD_ORDER } from './helpers';
import type { EmergencyEvent, EmergencyMonitorState, HazardThresholds, MonitorUpdate } from './types';

/**
 * Create empty monitor state
 */
export function createEmergencyMonitorState(): EmergencyMonitorState {
  return { log: [], openIds: {} };
}

/**
 * True while any event is open
 */
export function hasOpenEvents(state: EmergencyMonitorState): boolean {
  return HAZARD_ORDER.some(function(kind) { return state.openIds[kind] !== undefined; });
}

/**
 * Events currently open, in priority order
 */
export function openEvents(state: EmergencyMonitorState): EmergencyEvent[] {
  const events: EmergencyEvent[] = [];
  for (const kind of HAZARD_ORDER) {
    const id = state.openIds[kind];
    if (id !== undefined && state.log[id] !== undefined) {
      events.push(state.log[id]);
    }
  }
  return events;
}

/**
 * Evaluate hazards for this tick (MUTABLE)
 *
 * @param state - Monitor state (will be mutated)
 * @param reading - Current reading
 * @param thresholds - Predicate limits
 * @param now - Simulation time in seconds
 */
export function updateEmergencyMonitor(
  state: EmergencyMonitorState,
  reading: SensorReading,
  thresholds: HazardThresholds,
  now: number
): MonitorUpdate {
  const wasOpen = hasOpenEvents(state);
  const findings = evaluateHazards(reading, thresholds);
  const opened: EmergencyEvent[] = [];
  const resolved: EmergencyEvent[] = [];

  for (const kind of HAZARD_ORDER) {
    const finding = findings.find(function(f) { return f.kind === kind; });
    const openId = state.openIds[kind];

    if (finding && openId === undefined) {
      const event: EmergencyEvent = {
        id: state.log.length,
        kind: kind,
        direction: finding.direction,
        openedAt: now,
        trigger: { ...reading },
        action: correctiveActionFor(finding),
        resolvedAt: null
      };
      state.log.push(event);
      state.openIds[kind] = event.id;
      opened.push(event);
    } else if (!finding && openId !== undefined) {
      const event = state.log[openId];
      if (event !== undefined) {
        event.resolvedAt = now;
        resolved.push(event);
      }
      delete state.openIds[kind];
    }
  }

  return { findings: findings, opened: opened, resolved: resolved, wasOpen: wasOpen };
}

/**
 * Mode state machine
 *
 * STARTUP → IDLE ⇄ GROWING ⇄ MAINTENANCE; any mode → EMERGENCY;
 * EMERGENCY → IDLE after the cooldown, or → SHUTDOWN on repeated or
 * unresolved hazards. SHUTDOWN is terminal. SHUTDOWN is only ever entered
 * from EMERGENCY.
 */

import { MODES } from '$types/common';
import type { Mode, OperatorMode, SensorReading, Setpoint } from '$types/common';
import { simulationDay } from '@utils/time';

import { isOperatorEdge, isWithinTolerance } from './helpers';
import type { HazardStatus, ModeConfig, ModeRequestResult, ModeState, ModeTransition } from './types';

/**
 * Create mode state for a new dome (starts in STARTUP)
 */
export function createModeState(now: number): ModeState {
  return {
    mode: MODES.STARTUP,
    enteredAt: now,
    previousMode: null,
    stableSince: null,
    clearSince: null,
    hazardActiveSince: null,
    onsets: [],
    shutdownReason: null
  };
}

/**
 * Move to a new mode (MUTABLE)
 */
function enter(state: ModeState, to: Mode, now: number, reason: string): ModeTransition {
  const transition: ModeTransition = { from: state.mode, to: to, at: now, reason: reason };
  state.previousMode = state.mode;
  state.mode = to;
  state.enteredAt = now;
  state.stableSince = null;
  if (to === MODES.SHUTDOWN) {
    state.shutdownReason = reason;
  }
  return transition;
}

/**
 * Advance STARTUP once the reading has stayed stable for the dwell time (MUTABLE)
 *
 * @param state - Mode state (will be mutated)
 * @param reading - Current reading
 * @param setpoint - Startup setpoint
 * @param config - Mode timing
 * @param now - Simulation time (s)
 * @returns The STARTUP → IDLE transition, or null
 */
export function evaluateStartup(
  state: ModeState,
  reading: SensorReading,
  setpoint: Setpoint,
  config: ModeConfig,
  now: number
): ModeTransition | null {
  if (state.mode !== MODES.STARTUP) return null;

  if (!isWithinTolerance(reading, setpoint, config.startupTolerance)) {
    state.stableSince = null;
    return null;
  }

  if (state.stableSince === null) {
    state.stableSince = now;
  }
  if (now - state.stableSince >= config.startupDwellSec) {
    return enter(state, MODES.IDLE, now, "readings stable for " + (now - state.stableSince) + "s");
  }
  return null;
}

/**
 * Apply the emergency monitor's verdict for this tick (MUTABLE)
 *
 * A hazard onset is a tick on which a hazard is open while none was open the
 * tick before. Onsets inside the escalation window are counted.
 *
 * @param state - Mode state (will be mutated)
 * @param status - Hazard status after this tick's evaluation
 * @param config - Mode timing
 * @param now - Simulation time (s)
 * @returns Transitions taken this tick, in order
 */
export function applyHazardStatus(
  state: ModeState,
  status: HazardStatus,
  config: ModeConfig,
  now: number
): ModeTransition[] {
  const transitions: ModeTransition[] = [];
  if (state.mode === MODES.SHUTDOWN) return transitions;

  if (!status.anyOpen) {
    state.hazardActiveSince = null;
    if (state.mode !== MODES.EMERGENCY) return transitions;

    if (state.clearSince === null) {
      state.clearSince = now;
    }
    if (now - state.clearSince >= config.cooldownSec) {
      state.clearSince = null;
      transitions.push(enter(state, MODES.IDLE, now, "hazards clear for " + config.cooldownSec + "s"));
    }
    return transitions;
  }

  state.clearSince = null;
  if (!status.wasOpen || state.hazardActiveSince === null) {
    state.hazardActiveSince = now;
    state.onsets.push(now);
  }
  state.onsets = state.onsets.filter(function(t) { return now - t <= config.escalationWindowSec; });

  if (state.mode !== MODES.EMERGENCY) {
    transitions.push(enter(state, MODES.EMERGENCY, now, "hazard detected"));
  }

  if (state.onsets.length >= config.escalationCount) {
    transitions.push(enter(state, MODES.SHUTDOWN, now,
      state.onsets.length + " hazard onsets within " + config.escalationWindowSec + "s"));
  } else if (now - state.hazardActiveSince > config.unresolvedTimeoutSec) {
    transitions.push(enter(state, MODES.SHUTDOWN, now,
      "hazard unresolved for " + (now - state.hazardActiveSince) + "s"));
  }
  return transitions;
}

/**
 * Handle an operator mode request (MUTABLE)
 *
 * @param state - Mode state (will be mutated on acceptance)
 * @param target - Requested mode
 * @param substrateReadyDay - Day the substrate is load bearing, null if unknown
 * @param now - Simulation time (s)
 */
export function requestMode(
  state: ModeState,
  target: OperatorMode,
  substrateReadyDay: number | null,
  now: number
): ModeRequestResult {
  if (state.mode === target) {
    return { accepted: false, reason: "already in " + target };
  }
  if (!isOperatorEdge(state.mode, target)) {
    return { accepted: false, reason: "no operator transition from " + state.mode + " to " + target };
  }
  if (target === MODES.GROWING) {
    if (substrateReadyDay === null) {
      return { accepted: false, reason: "substrate-ready day unknown" };
    }
    const day = simulationDay(now);
    if (day < substrateReadyDay) {
      return { accepted: false, reason: "substrate not ready until day " + substrateReadyDay + " (day " + day + ")" };
    }
  }
  return { accepted: true, transition: enter(state, target, now, "operator request") };
}

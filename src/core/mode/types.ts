/**
 * Mode state machine type definitions
 */

import type { Mode } from '$types/common';

/**
 * Allowed distance from the startup setpoint before a reading counts as stable
 */
export interface StabilityTolerance {
  temperatureC: number;
  humidityPct: number;
  co2Ppm: number;
  o2Pct: number;
}

/**
 * Mode transition timing
 */
export interface ModeConfig {
  startupTolerance: StabilityTolerance;
  /** Time the reading must stay stable before STARTUP → IDLE (s) */
  startupDwellSec: number;
  /** Time every hazard must stay clear before EMERGENCY → IDLE (s) */
  cooldownSec: number;
  /** Hazard onsets within the window that force SHUTDOWN */
  escalationCount: number;
  escalationWindowSec: number;
  /** A hazard open longer than this forces SHUTDOWN (s) */
  unresolvedTimeoutSec: number;
}

/**
 * Mode state (owned by one dome)
 */
export interface ModeState {
  mode: Mode;
  /** Simulation time the current mode was entered (s) */
  enteredAt: number;
  previousMode: Mode | null;
  /** Start of the current stable period in STARTUP, null when unstable */
  stableSince: number | null;
  /** Time every hazard cleared in EMERGENCY, null while one is open */
  clearSince: number | null;
  /** Start of the current continuous hazard period, null when none is open */
  hazardActiveSince: number | null;
  /** Hazard onset times still inside the escalation window */
  onsets: number[];
  /** Why the dome shut down, null before SHUTDOWN */
  shutdownReason: string | null;
}

/**
 * A completed transition
 */
export interface ModeTransition {
  from: Mode;
  to: Mode;
  at: number;
  reason: string;
}

/**
 * Hazard status seen by the state machine on one tick
 */
export interface HazardStatus {
  /** Some hazard is open after this tick's evaluation */
  anyOpen: boolean;
  /** Some hazard was open before this tick's evaluation */
  wasOpen: boolean;
}

/**
 * Outcome of an operator mode request
 */
export type ModeRequestResult =
  | { accepted: true; transition: ModeTransition }
  | { accepted: false; reason: string };

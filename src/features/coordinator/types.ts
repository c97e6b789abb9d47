/**
 * Multi-dome coordinator types
 */

import type { Mode, SensorReading } from '$types/common';

/**
 * O₂ thresholds shared by all domes (percentage points). A dome whose own
 * viability threshold is higher uses that instead.
 */
export interface CoordinatorConfig {
  /** Domes below this are in deficit */
  viabilityPct: number;
  /** Donors never give below this */
  surplusPct: number;
  /** Level a deficit dome is topped up to */
  restoreTargetPct: number;
}

/**
 * What the coordinator may see and do to a dome. Implemented by dome controllers.
 */
export interface CoordinatedDome {
  readonly id: string;
  getMode(): Mode;
  getReading(): SensorReading;
  /** The dome's own O₂ viability threshold (%) */
  getO2ViabilityPct(): number;
  /** Add an O₂ delta (percentage points) to the dome's own reading */
  applyResourceDelta(o2DeltaPct: number): void;
}

/**
 * Post-tick O₂ of one dome
 */
export interface DomeO2 {
  domeId: string;
  o2Pct: number;
  mode: Mode;
  /** The dome's own viability threshold; raises the shared thresholds for this dome */
  viabilityPct: number;
}

/**
 * A single donor-to-recipient transfer
 */
export interface Transfer {
  from: string;
  to: string;
  amountPct: number;
}

/**
 * A deficit the coordinator could not fully cover
 */
export interface DeclinedDeficit {
  domeId: string;
  o2Pct: number;
  /** Amount asked for */
  requestedPct: number;
  /** Amount granted (0 when fully declined) */
  grantedPct: number;
}

/**
 * Outcome of one redistribution pass
 */
export interface RedistributionPlan {
  /** Net delta per dome id; sums to zero */
  deltas: Record<string, number>;
  transfers: Transfer[];
  declined: DeclinedDeficit[];
}

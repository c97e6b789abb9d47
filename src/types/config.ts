/**
 * Type definitions for dome and simulation configuration
 */

import type { AlertConfig } from '@features/alerts';
import type { CoordinatorConfig } from '@features/coordinator';
import type { DosingConfig } from '@features/nutrient-dosing';
import type { HazardThresholds } from '@core/emergency';
import type { EnergyConfig } from '@core/energy';
import type { ModeConfig } from '@core/mode';
import type { PidConfig } from '@core/pid';
import type { AmbientProfile, PhysicsModel } from '@core/physics';
import type { LogLevels } from '@logging';

import type { ControlledVariable, SensorReading, Setpoint } from './common';

/**
 * Setpoint per mode. EMERGENCY and SHUTDOWN hold the safe-hold profile.
 */
export interface SetpointProfiles {
  startup: Setpoint;
  idle: Setpoint;
  growing: Setpoint;
  maintenance: Setpoint;
  safeHold: Setpoint;
}

/**
 * Range the crop survives; every setpoint must lie inside it
 */
export interface SurvivableEnvelope {
  temperatureMinC: number;
  temperatureMaxC: number;
  humidityMinPct: number;
  humidityMaxPct: number;
  co2MinPpm: number;
  co2MaxPpm: number;
  o2MinPct: number;
  o2MaxPct: number;
}

/**
 * Configuration of one dome
 */
export interface DomeConfig {
  readonly domeId: string;

  // ───────── REGULATION ─────────
  readonly pid: Readonly<Record<ControlledVariable, PidConfig>>;
  readonly profiles: SetpointProfiles;
  readonly envelope: SurvivableEnvelope;
  /** Circulation fan level outside the radiator loop (0–1) */
  readonly baselineFan: number;

  // ───────── SAFETY ─────────
  readonly hazards: HazardThresholds;
  readonly modes: ModeConfig;
  readonly alerts: AlertConfig;

  // ───────── PLANT MODEL ─────────
  readonly energy: EnergyConfig;
  readonly physics: PhysicsModel;
  readonly ambient: AmbientProfile;
  readonly initialReading: SensorReading;
  readonly dosing: DosingConfig;

  // ───────── REPORTING ─────────
  readonly historySampleSec: number;
}

/**
 * Configuration of a multi-dome run
 */
export interface SimulationConfig {
  /** Control tick length (s) */
  readonly tickSec: number;
  /** Coordinator cadence in simulated time (s) */
  readonly coordinatorIntervalSec: number;
  readonly coordinator: CoordinatorConfig;
}

/**
 * Internal engine constants
 */
export interface AppConstants {
  readonly LOG_LEVELS: LogLevels;
}

/**
 * Recursive partial used for configuration overrides
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

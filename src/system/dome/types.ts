/**
 * Dome controller type definitions
 */

import type { EmergencyEvent, EmergencyMonitorState } from '@core/emergency';
import type { EnergyLedger } from '@core/energy';
import type { ModeRequestResult, ModeState } from '@core/mode';
import type { PidState } from '@core/pid';
import type { AmbientConditions, PhysicsModel } from '@core/physics';
import type { DomeEventEmitter, DomeEventListener, DomeEventName } from '@events';
import type { AlertState } from '@features/alerts';
import type { CoordinatedDome } from '@features/coordinator';
import type { HistoryState, HistorySummary } from '@features/history';
import type { DosingDecision } from '@features/nutrient-dosing';
import type { Logger } from '@logging';
import type {
  ActuatorCommand,
  ControlFault,
  ControlledVariable,
  ExternalInputs,
  Mode,
  OperatorMode,
  SensorReading,
  Setpoint
} from '$types/common';
import type { DomeConfig, SetpointProfiles } from '$types/config';

/**
 * Complete state of one dome (MUTABLE inside a tick draft only)
 */
export interface DomeState {
  /** Simulation time (s) since the dome was created */
  time: number;
  mode: ModeState;
  reading: SensorReading;
  /** Setpoint used on the last tick */
  setpoint: Setpoint;
  /** Command issued on the last tick */
  command: ActuatorCommand;
  pid: Record<ControlledVariable, PidState>;
  energy: EnergyLedger;
  emergency: EmergencyMonitorState;
  alerts: AlertState;
  history: HistoryState;
  faults: ControlFault[];
  /** Profiles in effect; may differ from the configured ones after updateProfile */
  profiles: SetpointProfiles;
  /** Last substrate-ready day received from the inputs */
  substrateReadyDay: number | null;
  dosing: DosingDecision | null;
  tickCount: number;
}

/**
 * Where the append-only records stood when a tick began
 */
export interface TickCheckpoint {
  sampleCount: number;
  logLength: number;
  faultCount: number;
  /** Emergency events open at the start; a tick may resolve them */
  openIds: number[];
}

/**
 * Plant response used to advance the reading
 */
export type PlantResponse = (
  reading: SensorReading,
  command: ActuatorCommand,
  ambient: AmbientConditions,
  dt: number,
  model: PhysicsModel
) => SensorReading;

/**
 * Dependencies of a dome controller
 */
export interface DomeControllerDeps {
  /** Parent logger; messages are prefixed with the dome id. Silent if omitted. */
  logger?: Logger;
  /** Event emitter; a private one is created if omitted */
  events?: DomeEventEmitter;
  /** Physical response; the first-order lag model if omitted */
  plant?: PlantResponse;
}

/**
 * Outcome of one tick
 */
export type TickResult =
  | { ok: true; mode: Mode; transitions: number }
  | { ok: false; error: string };

/**
 * Point-in-time copy of a dome's externally visible state
 */
export interface DomeSnapshot {
  domeId: string;
  time: number;
  mode: Mode;
  reading: SensorReading;
  setpoint: Setpoint;
  command: ActuatorCommand;
  energy: EnergyLedger;
  energyKwh: number;
  openEmergencies: number;
  faultCount: number;
  shutdownReason: string | null;
}

/**
 * Controller for one dome
 */
export interface DomeController extends CoordinatedDome {
  /**
   * Advance the dome by one tick. The state is committed only on success;
   * on an internal fault the pre-tick state is kept and the fault recorded.
   */
  tick(dt: number, inputs: ExternalInputs): TickResult;
  requestMode(target: OperatorMode, substrateReadyDay?: number | null): ModeRequestResult;
  /**
   * Change a setpoint profile at run time
   * @returns Envelope violations; the profile is applied regardless
   */
  updateProfile(name: keyof SetpointProfiles, patch: Partial<Setpoint>): string[];
  snapshot(): DomeSnapshot;
  historySummary(): HistorySummary;
  history(): HistoryState;
  emergencyLog(): EmergencyEvent[];
  faults(): ControlFault[];
  on<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
  off<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
  readonly config: DomeConfig;
}

/**
 * Simulation runner type definitions
 */

import type { EnergyLedger } from '@core/energy';
import type { DomeEventListener, DomeEventName } from '@events';
import type { Transfer } from '@features/coordinator';
import type { HistorySummary } from '@features/history';
import type { Logger } from '@logging';
import type { DomeController, PlantResponse } from '@system/dome';
import type { ExternalInputs, Mode } from '$types/common';
import type { SimulationConfig } from '$types/config';

export type RunStatus = 'COMPLETED' | 'CANCELLED' | 'FAILED';

/**
 * Inputs for one dome at one tick, or the same inputs for every dome and tick
 */
export type InputSource = ExternalInputs | ((domeId: string, timeSec: number) => ExternalInputs);

export interface RunOptions {
  /** Checked between ticks */
  signal?: AbortSignal;
}

export interface SimulationDeps {
  /** Parent logger for the run and every dome. Silent if omitted. */
  logger?: Logger;
  /** Physical response shared by all domes */
  plant?: PlantResponse;
}

/**
 * End-of-run state of one dome
 */
export interface DomeRunSummary {
  domeId: string;
  mode: Mode;
  timeSec: number;
  energy: EnergyLedger;
  energyKwh: number;
  emergencies: number;
  openEmergencies: number;
  faults: number;
  /** A tick was rolled back during the run, or the dome is in SHUTDOWN */
  failed: boolean;
  shutdownReason: string | null;
  history: HistorySummary;
}

export interface RunSummary {
  status: RunStatus;
  /** Process-level failure message when status is FAILED */
  error: string | null;
  /** Simulated seconds covered by this run */
  elapsedSec: number;
  ticks: number;
  coordinatorPasses: number;
  transfers: Transfer[];
  /** Dome-level failures: a tick rolled back during this run, or the dome is in SHUTDOWN */
  failedDomes: string[];
  /** Domes that ended the run in SHUTDOWN */
  shutdownDomes: string[];
  domes: DomeRunSummary[];
}

export interface Simulation {
  readonly config: SimulationConfig;
  readonly domes: DomeController[];
  /** Simulated time (s) */
  time(): number;
  dome(domeId: string): DomeController | undefined;
  /**
   * Advance every dome until durationSec of simulated time has passed
   */
  run(durationSec: number, inputs: InputSource, options?: RunOptions): RunSummary;
  on<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
  off<K extends DomeEventName>(name: K, listener: DomeEventListener<K>): void;
}

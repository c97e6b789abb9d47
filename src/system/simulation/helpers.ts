/**
 * Simulation runner helpers
 */

import type { DomeController } from '@system/dome';
import { MODES } from '$types/common';
import type { ExternalInputs } from '$types/common';

import type { DomeRunSummary, InputSource } from './types';

/**
 * Inputs for one dome at one time
 */
export function resolveInputs(source: InputSource, domeId: string, timeSec: number): ExternalInputs {
  return typeof source === 'function' ? source(domeId, timeSec) : source;
}

/**
 * End-of-run summary of one dome
 * @param tickFailed - A tick of this dome was rolled back during the run
 */
export function summarizeDome(dome: DomeController, tickFailed: boolean): DomeRunSummary {
  const snap = dome.snapshot();
  return {
    domeId: snap.domeId,
    mode: snap.mode,
    timeSec: snap.time,
    energy: snap.energy,
    energyKwh: snap.energyKwh,
    emergencies: dome.emergencyLog().length,
    openEmergencies: snap.openEmergencies,
    faults: snap.faultCount,
    failed: tickFailed || snap.mode === MODES.SHUTDOWN,
    shutdownReason: snap.shutdownReason,
    history: dome.historySummary()
  };
}

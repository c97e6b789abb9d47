/**
 * Time-series history
 *
 * Keeps a sampled series of readings, commands, mode and energy for
 * reporting, plus running statistics over every tick.
 */

import { MODES } from '$types/common';
import type { Mode } from '$types/common';
import { TIME_CONSTANTS } from '@utils/constants';

import { formatValue, summarizeStats, TRACKED_VARIABLES, updateStats } from './helpers';
import type { HistorySample, HistoryState, HistorySummary } from './types';

/**
 * Create empty history
 * @returns Fresh history state
 */
export function createHistory(): HistoryState {
  return {
    samples: [],
    lastSampleAt: null,
    stats: {
      temperatureC: { min: null, max: null, sum: 0, count: 0 },
      humidityPct: { min: null, max: null, sum: 0, count: 0 },
      co2Ppm: { min: null, max: null, sum: 0, count: 0 },
      o2Pct: { min: null, max: null, sum: 0, count: 0 }
    },
    modeSeconds: {}
  };
}

/**
 * Record one tick (MUTABLE)
 *
 * Statistics take every tick; the sample is appended only when
 * `sampleSec` has passed since the last one.
 *
 * @param history - History state (will be mutated)
 * @param sample - State at the end of the tick
 * @param dt - Tick length in seconds, credited to the sample's mode
 * @param sampleSec - Sampling interval in seconds
 * @returns True if the sample was appended
 */
export function recordHistory(
  history: HistoryState,
  sample: HistorySample,
  dt: number,
  sampleSec: number
): boolean {
  for (const variable of TRACKED_VARIABLES) {
    history.stats[variable] = updateStats(history.stats[variable], sample.reading[variable]);
  }
  if (dt > 0) {
    history.modeSeconds[sample.mode] = (history.modeSeconds[sample.mode] ?? 0) + dt;
  }

  if (history.lastSampleAt !== null && sample.time - history.lastSampleAt < sampleSec) {
    return false;
  }
  history.samples.push({ ...sample, reading: { ...sample.reading }, command: { ...sample.command } });
  history.lastSampleAt = sample.time;
  return true;
}

/**
 * Calculate summary statistics
 */
export function summarizeHistory(history: HistoryState): HistorySummary {
  const modeHours: Partial<Record<Mode, number>> = {};
  for (const mode of Object.values(MODES)) {
    const seconds = history.modeSeconds[mode];
    if (seconds !== undefined) {
      modeHours[mode] = seconds / TIME_CONSTANTS.SECONDS_PER_HOUR;
    }
  }

  return {
    sampleCount: history.samples.length,
    variables: {
      temperatureC: summarizeStats(history.stats.temperatureC),
      humidityPct: summarizeStats(history.stats.humidityPct),
      co2Ppm: summarizeStats(history.stats.co2Ppm),
      o2Pct: summarizeStats(history.stats.o2Pct)
    },
    modeHours: modeHours
  };
}

/**
 * Format a summary for logging
 */
export function formatHistorySummary(summary: HistorySummary): string {
  const t = summary.variables.temperatureC;
  const o2 = summary.variables.o2Pct;
  const co2 = summary.variables.co2Ppm;
  return `History: ${summary.sampleCount} samples, ` +
    `Temp ${formatValue(t.min, 1)}/${formatValue(t.max, 1)}/${formatValue(t.avg, 1)}C, ` +
    `O2 ${formatValue(o2.min, 2)}/${formatValue(o2.max, 2)}%, ` +
    `CO2 ${formatValue(co2.min, 0)}/${formatValue(co2.max, 0)}ppm`;
}

import type { ActuatorCommand, Mode, SensorReading } from '$types/common';

/**
 * One recorded point of the time series
 */
export interface HistorySample {
  /** Simulation time (s) */
  time: number;
  mode: Mode;
  reading: SensorReading;
  command: ActuatorCommand;
  /** Cumulative energy at this point (kWh) */
  energyKwh: number;
}

export type TrackedVariable = 'temperatureC' | 'humidityPct' | 'co2Ppm' | 'o2Pct';

export interface VariableStats {
  min: number | null;
  max: number | null;
  sum: number;
  count: number;
}

export interface HistoryState {
  samples: HistorySample[];
  /** Time of the last appended sample, null before the first */
  lastSampleAt: number | null;
  /** Running statistics over every tick, not only sampled ones */
  stats: Record<TrackedVariable, VariableStats>;
  /** Seconds spent in each mode */
  modeSeconds: Partial<Record<Mode, number>>;
}

export interface VariableSummary {
  min: number | null;
  max: number | null;
  avg: number | null;
}

export interface HistorySummary {
  sampleCount: number;
  variables: Record<TrackedVariable, VariableSummary>;
  modeHours: Partial<Record<Mode, number>>;
}

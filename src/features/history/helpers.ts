/**
 * Helper functions for history statistics
 */

import type { TrackedVariable, VariableStats, VariableSummary } from './types';

export const TRACKED_VARIABLES: readonly TrackedVariable[] = ['temperatureC', 'humidityPct', 'co2Ppm', 'o2Pct'];

/**
 * Update running statistics with one value
 */
export function updateStats(stats: VariableStats, value: number): VariableStats {
  return {
    min: stats.min === null || value < stats.min ? value : stats.min,
    max: stats.max === null || value > stats.max ? value : stats.max,
    sum: stats.sum + value,
    count: stats.count + 1,
  };
}

/**
 * Min, max and mean of running statistics
 */
export function summarizeStats(stats: VariableStats): VariableSummary {
  return {
    min: stats.min,
    max: stats.max,
    avg: stats.count > 0 ? stats.sum / stats.count : null,
  };
}

/**
 * Format a value for display, handling null values
 */
export function formatValue(value: number | null, digits: number): string {
  return value !== null ? value.toFixed(digits) : 'n/a';
}

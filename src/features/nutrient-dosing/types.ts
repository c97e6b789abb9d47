/**
 * Nutrient dosing types
 */

/**
 * Configuration for nutrient dosing
 */
export interface DosingConfig {
  /** Dose while the substrate solution is below this concentration (ppm) */
  targetConcentrationPpm: number;
  /** Acceptable pH band for the crop */
  phMin: number;
  phMax: number;
}

/**
 * Dosing decision for one tick
 */
export interface DosingDecision {
  dose: boolean;
  reason: string;
}

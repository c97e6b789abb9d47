/**
 * Energy accountant type definitions
 */

export type EnergyChannel = 'heating' | 'lighting' | 'ventilation' | 'misting' | 'other';

/**
 * Draw of one channel: idleKw + ratedKw · fraction^exponent
 */
export interface DrawFunction {
  /** Baseline draw with the actuator off (kW) */
  idleKw: number;
  /** Additional draw at full command (kW) */
  ratedKw: number;
  /** 2 for resistive heating, 1 for linear loads */
  exponent: number;
}

export type EnergyConfig = Record<EnergyChannel, DrawFunction>;

/**
 * Cumulative energy per channel (kWh). Never decreases.
 */
export type EnergyLedger = Record<EnergyChannel, number>;

/**
 * Instantaneous draw per channel (kW)
 */
export type PowerDraw = Record<EnergyChannel, number>;

/**
 * PID controller type definitions
 */

/**
 * Loop gains
 */
export interface PidGains {
  kp: number;
  ki: number;
  kd: number;
}

/**
 * Full loop configuration: gains, output bounds and anti-windup limit
 */
export interface PidConfig extends PidGains {
  /** Lower output bound */
  outputMin: number;
  /** Upper output bound */
  outputMax: number;
  /** Absolute bound on the accumulated integral (error·s) */
  integralLimit: number;
}

/**
 * Internal state owned by exactly one loop
 */
export interface PidState {
  /** Accumulated integral error (error·s) */
  integral: number;
  /** Error from the previous valid update */
  previousError: number;
  /** False until the first valid update after creation or reset */
  hasPrevious: boolean;
  /** Integral was clamped on the last valid update */
  windup: boolean;
  /** Number of rejected updates (non-positive dt) */
  faultCount: number;
}

/**
 * Fault raised by a rejected update
 */
export type PidFault = 'NON_POSITIVE_DT';

/**
 * Result of one update
 */
export interface PidResult {
  /** Bounded loop output */
  output: number;
  /** Set when the update was rejected and the neutral output returned */
  fault: PidFault | null;
  /** Individual terms, for diagnostics */
  terms: { p: number; i: number; d: number };
}

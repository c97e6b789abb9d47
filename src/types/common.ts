/**
 * Common type definitions used throughout the project
 */

/**
 * Instantaneous physical state of a dome as seen by its sensors.
 * Produced once per tick by the physical response model; read-only to controllers.
 */
export interface SensorReading {
  /** Interior air temperature (°C) */
  temperatureC: number;
  /** Relative humidity (%) */
  humidityPct: number;
  /** CO₂ concentration (ppm) */
  co2Ppm: number;
  /** O₂ fraction (%) */
  o2Pct: number;
  /** Light intensity as a fraction of full (0–1), lagged photosynthesis proxy */
  light: number;
  /** Substrate moisture fraction (0–1) */
  substrateMoisture: number;
  /** Interior pressure proxy (kPa) */
  pressureKPa: number;
}

/**
 * Target values for the regulated variables
 */
export interface Setpoint {
  temperatureC: number;
  humidityPct: number;
  co2Ppm: number;
  o2Pct: number;
  /** Hours of light per 24 h day */
  photoperiodHours: number;
}

/**
 * Commands last issued to the actuators.
 * Fractions are 0–1; co2Rate is -1 (full scrub) to +1 (full injection).
 */
export interface ActuatorCommand {
  heater: number;
  vent: number;
  mister: number;
  lighting: number;
  co2Rate: number;
  /** Circulation fan feeding the radiator loop */
  fan: number;
  /** Misting carries nutrient solution */
  nutrientDosing: boolean;
}

/**
 * Regulated variables with their own PID loop
 */
export type ControlledVariable = 'temperature' | 'humidity' | 'co2';

/**
 * Dome operating modes
 */
export const MODES = {
  STARTUP: 'STARTUP',
  IDLE: 'IDLE',
  GROWING: 'GROWING',
  MAINTENANCE: 'MAINTENANCE',
  EMERGENCY: 'EMERGENCY',
  SHUTDOWN: 'SHUTDOWN'
} as const;

export type Mode = typeof MODES[keyof typeof MODES];

/**
 * Modes an operator may select directly
 */
export type OperatorMode = typeof MODES.IDLE | typeof MODES.GROWING | typeof MODES.MAINTENANCE;

/**
 * Nutrient-release model output for the current day
 */
export interface NutrientInput {
  /** Available nutrient concentration in the substrate solution (ppm) */
  concentrationPpm: number;
  ph: number;
}

/**
 * Values supplied by external collaborators each tick
 */
export interface ExternalInputs {
  /** Simulation day on which the substrate reaches load-bearing strength, null if unknown */
  substrateReadyDay: number | null;
  /** Nutrient-release output, null when no data */
  nutrients: NutrientInput | null;
}

/**
 * Actuators forced to their safe-off state
 */
export const SAFE_OFF_COMMAND: Readonly<ActuatorCommand> = {
  heater: 0,
  vent: 0,
  mister: 0,
  lighting: 0,
  co2Rate: 0,
  fan: 0,
  nutrientDosing: false
};

/**
 * Kind of a recorded control fault
 */
export type ControlFaultKind = 'PID_INVALID_DT' | 'TICK_FAILED';

/**
 * A fault the dome survived
 */
export interface ControlFault {
  /** Simulation time of the tick (s) */
  time: number;
  kind: ControlFaultKind;
  /** Regulated variable for PID faults */
  variable: ControlledVariable | null;
  message: string;
}

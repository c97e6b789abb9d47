import type { AppConstants, DeepPartial, DomeConfig, SimulationConfig } from '$types/config';
import type { ConsoleSinkConfig, LoggerConfig, LogLevel } from '@logging';
import { PHYSICAL_CONSTANTS } from '@utils/constants';

// ─────────────────────────────────────────────────────────────
// DOME CONFIGURATION
//   Defaults for one dome: regulation, safety, plant model.
//   Override per dome with createDomeConfig().
// ─────────────────────────────────────────────────────────────

export const DEFAULT_DOME_CONFIG: Readonly<DomeConfig> = {
  // domeId
  //   Role: Name used in logs, events and the run summary.
  //   Critical: Non-empty, unique within a simulation.
  domeId: 'dome-1',

  // pid
  //   Role: One loop per regulated variable. Output in [-1, 1]:
  //     temperature: + heater, - circulation fan (radiator)
  //     humidity:    + mister, - vent
  //     co2:         + injection, - scrubbing
  //   Critical: kp/ki/kd ≥ 0, outputMin < outputMax, integralLimit > 0.
  //   Recommended: ki · integralLimit ≈ 1 so the integral alone can saturate the output.
  pid: {
    temperature: { kp: 0.2, ki: 0.002, kd: 0, outputMin: -1, outputMax: 1, integralLimit: 500 },
    humidity: { kp: 0.05, ki: 0.0005, kd: 0, outputMin: -1, outputMax: 1, integralLimit: 2000 },
    co2: { kp: 0.002, ki: 0.00002, kd: 0, outputMin: -1, outputMax: 1, integralLimit: 50000 },
  },

  // profiles
  //   Role: Active setpoint per mode. EMERGENCY holds safeHold.
  //   Critical: Every value inside the envelope (rejected at initialization otherwise).
  //   Recommended: growing at 20–24 °C, 65–75 %, 800–1200 ppm CO₂, 16 h light.
  profiles: {
    startup: { temperatureC: 20, humidityPct: 60, co2Ppm: 1000, o2Pct: 20.5, photoperiodHours: 12 },
    idle: { temperatureC: 18, humidityPct: 60, co2Ppm: 800, o2Pct: 20.5, photoperiodHours: 8 },
    growing: { temperatureC: 22, humidityPct: 70, co2Ppm: 1000, o2Pct: 21, photoperiodHours: 16 },
    maintenance: { temperatureC: 18, humidityPct: 55, co2Ppm: 800, o2Pct: 20.5, photoperiodHours: 12 },
    safeHold: { temperatureC: 18, humidityPct: 60, co2Ppm: 800, o2Pct: 20.5, photoperiodHours: 12 },
  },

  // envelope
  //   Role: Range the crop survives. Setpoints are checked against it.
  //   Critical: Each min < max.
  envelope: {
    temperatureMinC: 5,
    temperatureMaxC: 35,
    humidityMinPct: 30,
    humidityMaxPct: 90,
    co2MinPpm: 300,
    co2MaxPpm: 1500,
    o2MinPct: 18,
    o2MaxPct: 23,
  },

  // baselineFan
  //   Role: Circulation fan level when the radiator loop is idle.
  //   Critical: 0–1.
  //   Recommended: 0.1–0.3; enough to keep air mixed over the crop.
  baselineFan: 0.2,

  // hazards
  //   Role: Emergency predicates. Crossing any limit opens an EmergencyEvent.
  //   Critical: Bands wider than the envelope; o2MinPct below every setpoint.
  //   Recommended: CO₂ toxic at 2000 ppm, O₂ viability at 19 %, 110 kPa structural limit.
  hazards: {
    temperatureMinC: 2,
    temperatureMaxC: 40,
    humidityMinPct: 15,
    humidityMaxPct: 97,
    co2ToxicPpm: 2000,
    o2MinPct: 19,
    pressureMaxKPa: 110,
  },

  // modes
  //   Role: STARTUP dwell, EMERGENCY cooldown and escalation to SHUTDOWN.
  //   Critical: Durations ≥ 0, escalationCount ≥ 1.
  //   Recommended: 3 onsets within 6 h shut the dome down; a hazard open for 4 h does too.
  modes: {
    startupTolerance: { temperatureC: 2, humidityPct: 10, co2Ppm: 300, o2Pct: 1.5 },
    startupDwellSec: 1800,
    cooldownSec: 600,
    escalationCount: 3,
    escalationWindowSec: 6 * 3600,
    unresolvedTimeoutSec: 4 * 3600,
  },

  // alerts
  //   Role: Non-emergency deviations from the active setpoint.
  //   Recommended: delaySec of a few ticks so transients after a mode change stay quiet.
  alerts: {
    temperatureToleranceC: 2,
    humidityTolerancePct: 5,
    co2MinPpm: 300,
    o2MaxPct: 23.5,
    delaySec: 300,
  },

  // energy
  //   Role: Draw per channel = idleKw + ratedKw · fraction^exponent.
  //   Critical: idleKw, ratedKw ≥ 0; exponent > 0.
  //   Recommended: exponent 2 for resistive heating, 1 for everything else.
  energy: {
    heating: { idleKw: 0, ratedKw: 5, exponent: 2 },
    lighting: { idleKw: 0.05, ratedKw: 3, exponent: 1 },
    ventilation: { idleKw: 0, ratedKw: 0.5, exponent: 1 },
    misting: { idleKw: 0, ratedKw: 0.3, exponent: 1 },
    other: { idleKw: 0.1, ratedKw: 0.6, exponent: 1 },
  },

  // physics
  //   Role: First-order lag response of the dome.
  //   Critical: Time constants > 0, weights ≥ 0, daylightTransmission 0–1.
  physics: {
    timeConstantsSec: {
      temperature: 600,
      humidity: 300,
      co2: 600,
      o2: 1800,
      light: 60,
      substrateMoisture: 3600,
      pressure: 300,
    },
    heaterRiseC: 50,
    lightingRiseC: 6,
    fanCoolingC: 15,
    ventCoolingC: 5,
    passiveHumidityPct: 50,
    passiveMoisture: 0.2,
    misterWeight: 2,
    ventWeight: 0.5,
    scrubberWeight: 2,
    injectorWeight: 1,
    injectorCo2Ppm: 3000,
    respirationCo2Ppm: 1200,
    photosynthesisCo2Ppm: 300,
    respirationO2Pct: 19.5,
    photosynthesisO2Pct: 23,
    photosynthesisWeight: 1,
    nominalPressureKPa: 101.3,
    referenceTemperatureC: 22,
    ventPressureWeight: 0.2,
    daylightTransmission: 0.3,
  },

  // ambient
  //   Role: Exterior boundary. Temperatures are the effective boundary behind
  //     the dome's insulation, not bare surface values. Vacuum outside.
  //   Recommended: cycleHours at the lunar synodic day.
  ambient: {
    dayTempC: 15,
    nightTempC: -25,
    cycleHours: PHYSICAL_CONSTANTS.LUNAR_SYNODIC_DAY_HOURS,
    dayFraction: 0.5,
    phaseOffsetHours: 0,
    atmosphere: { co2Ppm: 0, o2Pct: 0, humidityPct: 0, pressureKPa: 0 },
  },

  // initialReading
  //   Role: Physical state when the dome is created (STARTUP).
  initialReading: {
    temperatureC: 15,
    humidityPct: 50,
    co2Ppm: 1200,
    o2Pct: 19.8,
    light: 0,
    substrateMoisture: 0.3,
    pressureKPa: 98,
  },

  // dosing
  //   Role: Misting carries nutrients below the target concentration, inside the pH band.
  //   Recommended: pH 5.5–7.0 for most crops.
  dosing: {
    targetConcentrationPpm: 150,
    phMin: 5.5,
    phMax: 7.0,
  },

  // historySampleSec
  //   Role: Interval between recorded history samples.
  //   Critical: > 0.
  //   Recommended: 10× the tick; statistics still see every tick.
  historySampleSec: 600,
};

// ─────────────────────────────────────────────────────────────
// SIMULATION CONFIGURATION
// ─────────────────────────────────────────────────────────────

export const DEFAULT_SIMULATION_CONFIG: Readonly<SimulationConfig> = {
  // tickSec
  //   Role: Control tick length in simulated seconds.
  //   Critical: > 0.
  //   Recommended: 30–120 s; well under the fastest time constant.
  tickSec: 60,

  // coordinatorIntervalSec
  //   Role: Simulated time between O₂ redistribution passes.
  //   Critical: ≥ tickSec.
  coordinatorIntervalSec: 600,

  // coordinator
  //   Role: O₂ thresholds for redistribution.
  //   Critical: viabilityPct < restoreTargetPct ≤ surplusPct.
  coordinator: {
    viabilityPct: 19,
    surplusPct: 22,
    restoreTargetPct: 20,
  },
};

// ─────────────────────────────────────────────────────────────
// LOGGING
// ─────────────────────────────────────────────────────────────

export const LOGGING_CONFIG: Readonly<LoggerConfig & ConsoleSinkConfig & { consoleLevel: LogLevel }> = {
  // level
  //   Role: Master log verbosity (0=DEBUG..3=CRITICAL).
  //   Recommended: 1 (INFO) for normal runs, 0 (DEBUG) while tuning loops.
  level: 1,

  // demoteHours
  //   Role: Simulated hours after which INFO lines are suppressed (0 disables).
  //   Recommended: 0 for short runs; 24+ for multi-week simulations.
  demoteHours: 0,

  consoleLevel: 1,
  colors: true,
};

// ─────────────────────────────────────────────────────────────
// APPLICATION CONSTANTS
// ─────────────────────────────────────────────────────────────

export const APP_CONSTANTS: Readonly<AppConstants> = {
  // LOG_LEVELS
  //   Role: Canonical mapping of log level names to numeric codes.
  //   Critical: Values must be distinct.
  LOG_LEVELS: {
    DEBUG: 0,
    INFO: 1,
    WARNING: 2,
    CRITICAL: 3,
  },
};

// ─────────────────────────────────────────────────────────────
// FACTORIES
// ─────────────────────────────────────────────────────────────

export type DomeConfigOverrides = DeepPartial<DomeConfig>;

/**
 * Build a dome configuration from the defaults and partial overrides
 *
 * Nested sections are merged field by field. Nothing is validated here;
 * createDomeController validates.
 */
export function createDomeConfig(overrides: DomeConfigOverrides = {}): DomeConfig {
  const base = DEFAULT_DOME_CONFIG;
  const o = overrides;

  return {
    domeId: o.domeId ?? base.domeId,
    pid: {
      temperature: { ...base.pid.temperature, ...o.pid?.temperature },
      humidity: { ...base.pid.humidity, ...o.pid?.humidity },
      co2: { ...base.pid.co2, ...o.pid?.co2 },
    },
    profiles: {
      startup: { ...base.profiles.startup, ...o.profiles?.startup },
      idle: { ...base.profiles.idle, ...o.profiles?.idle },
      growing: { ...base.profiles.growing, ...o.profiles?.growing },
      maintenance: { ...base.profiles.maintenance, ...o.profiles?.maintenance },
      safeHold: { ...base.profiles.safeHold, ...o.profiles?.safeHold },
    },
    envelope: { ...base.envelope, ...o.envelope },
    baselineFan: o.baselineFan ?? base.baselineFan,
    hazards: { ...base.hazards, ...o.hazards },
    modes: {
      ...base.modes,
      ...o.modes,
      startupTolerance: { ...base.modes.startupTolerance, ...o.modes?.startupTolerance },
    },
    alerts: { ...base.alerts, ...o.alerts },
    energy: {
      heating: { ...base.energy.heating, ...o.energy?.heating },
      lighting: { ...base.energy.lighting, ...o.energy?.lighting },
      ventilation: { ...base.energy.ventilation, ...o.energy?.ventilation },
      misting: { ...base.energy.misting, ...o.energy?.misting },
      other: { ...base.energy.other, ...o.energy?.other },
    },
    physics: {
      ...base.physics,
      ...o.physics,
      timeConstantsSec: { ...base.physics.timeConstantsSec, ...o.physics?.timeConstantsSec },
    },
    ambient: {
      ...base.ambient,
      ...o.ambient,
      atmosphere: { ...base.ambient.atmosphere, ...o.ambient?.atmosphere },
    },
    initialReading: { ...base.initialReading, ...o.initialReading },
    dosing: { ...base.dosing, ...o.dosing },
    historySampleSec: o.historySampleSec ?? base.historySampleSec,
  };
}

/**
 * Build a simulation configuration from the defaults and partial overrides
 */
export function createSimulationConfig(overrides: DeepPartial<SimulationConfig> = {}): SimulationConfig {
  const base = DEFAULT_SIMULATION_CONFIG;
  return {
    tickSec: overrides.tickSec ?? base.tickSec,
    coordinatorIntervalSec: overrides.coordinatorIntervalSec ?? base.coordinatorIntervalSec,
    coordinator: { ...base.coordinator, ...overrides.coordinator },
  };
}

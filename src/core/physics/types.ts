/**
 * Physical response model type definitions
 */

/**
 * Time constants (seconds) of the first-order lag for each variable
 */
export interface TimeConstants {
  temperature: number;
  humidity: number;
  co2: number;
  o2: number;
  light: number;
  substrateMoisture: number;
  pressure: number;
}

/**
 * Parameters of the simplified dome response
 */
export interface PhysicsModel {
  timeConstantsSec: TimeConstants;

  // ───────── THERMAL ─────────
  /** Equilibrium rise above exterior (°C) at full heater */
  heaterRiseC: number;
  /** Equilibrium rise (°C) from full supplemental lighting */
  lightingRiseC: number;
  /** Equilibrium drop (°C) at full circulation fan (radiator loop) */
  fanCoolingC: number;
  /** Equilibrium drop (°C) at full vent */
  ventCoolingC: number;

  // ───────── MOISTURE ─────────
  /** Humidity the dome drifts to with no misting or venting (%) */
  passiveHumidityPct: number;
  /** Substrate moisture the dome drifts to with no misting (0–1) */
  passiveMoisture: number;
  /** Blend weight of the mister at full rate */
  misterWeight: number;

  // ───────── GAS EXCHANGE ─────────
  /** Blend weight of the vent toward the ambient composition at full rate */
  ventWeight: number;
  /** Blend weight of the scrubber toward zero CO₂ at full rate */
  scrubberWeight: number;
  /** Blend weight of the injector at full rate */
  injectorWeight: number;
  /** CO₂ level the injector drives toward (ppm) */
  injectorCo2Ppm: number;
  /** CO₂ level plant and microbial respiration settles at in the dark (ppm) */
  respirationCo2Ppm: number;
  /** CO₂ level photosynthesis drives toward (ppm) */
  photosynthesisCo2Ppm: number;
  /** O₂ level respiration settles at in the dark (%) */
  respirationO2Pct: number;
  /** O₂ level photosynthesis drives toward (%) */
  photosynthesisO2Pct: number;
  /** Blend weight of photosynthesis at full light */
  photosynthesisWeight: number;

  // ───────── PRESSURE & LIGHT ─────────
  /** Interior pressure at the reference temperature (kPa) */
  nominalPressureKPa: number;
  referenceTemperatureC: number;
  /** Blend weight of the vent toward ambient pressure at full rate */
  ventPressureWeight: number;
  /** Fraction of natural sunlight that reaches the crop (0–1) */
  daylightTransmission: number;
}

/**
 * Composition of the exterior boundary
 */
export interface Atmosphere {
  co2Ppm: number;
  o2Pct: number;
  humidityPct: number;
  pressureKPa: number;
}

/**
 * Exterior conditions at one instant
 */
export interface AmbientConditions {
  exteriorTempC: number;
  /** 1 in daylight, 0 at night */
  solarFraction: number;
  atmosphere: Atmosphere;
}

/**
 * Day/night cycle of the exterior boundary
 */
export interface AmbientProfile {
  /** Exterior temperature during the day (°C) */
  dayTempC: number;
  /** Exterior temperature during the night (°C) */
  nightTempC: number;
  /** Sunrise to sunrise (hours) */
  cycleHours: number;
  /** Fraction of the cycle in daylight (0–1) */
  dayFraction: number;
  /** Shift of the cycle relative to simulation time zero (hours) */
  phaseOffsetHours: number;
  atmosphere: Atmosphere;
}

/**
 * One weighted pull toward a forcing value
 */
export interface Forcing {
  value: number;
  weight: number;
}

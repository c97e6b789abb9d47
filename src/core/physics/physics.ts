/**
 * Dome physical response model
 *
 * First-order lag per variable: each one decays exponentially toward a
 * forcing value computed from the actuator command, the exterior boundary and
 * the lagged light proxy. Not a heat/mass transfer solver.
 */

import type { ActuatorCommand, SensorReading } from '$types/common';
import { PHYSICAL_CONSTANTS } from '@utils/constants';
import { clamp } from '@utils/number';

import { approach, blend } from './helpers';
import type { AmbientConditions, PhysicsModel } from './types';

/**
 * Forcing values the reading is pulled toward under the given command
 */
export function forcingTargets(
  reading: SensorReading,
  command: ActuatorCommand,
  ambient: AmbientConditions,
  model: PhysicsModel
): SensorReading {
  const atmosphere = ambient.atmosphere;
  const ventW = command.vent * model.ventWeight;
  const photoW = reading.light * model.photosynthesisWeight;
  const scrub = command.co2Rate < 0 ? -command.co2Rate : 0;
  const inject = command.co2Rate > 0 ? command.co2Rate : 0;

  const temperatureC = ambient.exteriorTempC
    + command.heater * model.heaterRiseC
    + command.lighting * model.lightingRiseC
    - command.fan * model.fanCoolingC
    - command.vent * model.ventCoolingC;

  const humidityPct = blend([
    { value: model.passiveHumidityPct, weight: 1 },
    { value: 100, weight: command.mister * model.misterWeight },
    { value: atmosphere.humidityPct, weight: ventW }
  ]);

  const co2Ppm = blend([
    { value: model.respirationCo2Ppm, weight: 1 },
    { value: model.photosynthesisCo2Ppm, weight: photoW },
    { value: atmosphere.co2Ppm, weight: ventW },
    { value: 0, weight: scrub * model.scrubberWeight },
    { value: model.injectorCo2Ppm, weight: inject * model.injectorWeight }
  ]);

  const o2Pct = blend([
    { value: model.respirationO2Pct, weight: 1 },
    { value: model.photosynthesisO2Pct, weight: photoW },
    { value: atmosphere.o2Pct, weight: ventW }
  ]);

  const kelvin = PHYSICAL_CONSTANTS.KELVIN_OFFSET;
  const pressureKPa = blend([
    { value: model.nominalPressureKPa * (reading.temperatureC + kelvin) / (model.referenceTemperatureC + kelvin), weight: 1 },
    { value: atmosphere.pressureKPa, weight: command.vent * model.ventPressureWeight }
  ]);

  return {
    temperatureC: temperatureC,
    humidityPct: humidityPct,
    co2Ppm: co2Ppm,
    o2Pct: o2Pct,
    light: clamp(command.lighting + ambient.solarFraction * model.daylightTransmission, 0, 1),
    substrateMoisture: blend([
      { value: model.passiveMoisture, weight: 1 },
      { value: 1, weight: command.mister * model.misterWeight }
    ]),
    pressureKPa: pressureKPa
  };
}

/**
 * Advance the dome's physical state by one step
 *
 * A non-positive dt returns an unchanged copy.
 *
 * @param reading - Reading at the start of the step
 * @param command - Command applied during the step
 * @param ambient - Exterior conditions during the step
 * @param dt - Step length in seconds
 * @param model - Model parameters
 * @returns Reading at the end of the step
 */
export function respond(
  reading: SensorReading,
  command: ActuatorCommand,
  ambient: AmbientConditions,
  dt: number,
  model: PhysicsModel
): SensorReading {
  if (!(dt > 0)) {
    return { ...reading };
  }

  const target = forcingTargets(reading, command, ambient, model);
  const tau = model.timeConstantsSec;

  return {
    temperatureC: approach(reading.temperatureC, target.temperatureC, tau.temperature, dt),
    humidityPct: clamp(approach(reading.humidityPct, target.humidityPct, tau.humidity, dt), 0, 100),
    co2Ppm: Math.max(0, approach(reading.co2Ppm, target.co2Ppm, tau.co2, dt)),
    o2Pct: clamp(approach(reading.o2Pct, target.o2Pct, tau.o2, dt), 0, 100),
    light: clamp(approach(reading.light, target.light, tau.light, dt), 0, 1),
    substrateMoisture: clamp(approach(reading.substrateMoisture, target.substrateMoisture, tau.substrateMoisture, dt), 0, 1),
    pressureKPa: Math.max(0, approach(reading.pressureKPa, target.pressureKPa, tau.pressure, dt))
  };
}

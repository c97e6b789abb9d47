/**
 * Dome tick steps
 *
 * Each step reads or mutates the tick draft. None of them emits events.
 */

import { overrideCommand } from '@core/emergency';
import type { HazardFinding } from '@core/emergency';
import { photoperiodFraction, supplementalLighting } from '@core/lighting';
import { resetPid, updatePid } from '@core/pid';
import type { AmbientConditions } from '@core/physics';
import { decideNutrientDosing } from '@features/nutrient-dosing';
import { fmtValue } from '@logging';
import type { Logger } from '@logging';
import { MODES } from '$types/common';
import type {
  ActuatorCommand,
  ControlFault,
  ControlledVariable,
  ExternalInputs,
  Mode,
  SensorReading,
  Setpoint
} from '$types/common';
import type { DomeConfig, SetpointProfiles } from '$types/config';
import { clamp, isFiniteNumber } from '@utils/number';
import { hourOfDay } from '@utils/time';

import type { DomeState, TickCheckpoint } from './types';

const CONTROLLED_VARIABLES: ControlledVariable[] = ['temperature', 'humidity', 'co2'];

/**
 * Working copy of the state for one tick
 *
 * Small parts are copied. History samples, the emergency log and the fault
 * log only grow, so the draft shares them with the committed state and
 * `rollbackDraft` cuts them back if the tick fails.
 */
export function draftState(state: DomeState): { draft: DomeState; checkpoint: TickCheckpoint } {
  const openIds: number[] = [];
  for (const id of Object.values(state.emergency.openIds)) {
    if (id !== undefined) openIds.push(id);
  }

  const draft: DomeState = {
    ...state,
    mode: { ...state.mode, onsets: state.mode.onsets.slice() },
    reading: { ...state.reading },
    setpoint: { ...state.setpoint },
    command: { ...state.command },
    pid: {
      temperature: { ...state.pid.temperature },
      humidity: { ...state.pid.humidity },
      co2: { ...state.pid.co2 }
    },
    energy: { ...state.energy },
    emergency: { log: state.emergency.log, openIds: { ...state.emergency.openIds } },
    alerts: structuredClone(state.alerts),
    history: {
      ...state.history,
      stats: structuredClone(state.history.stats),
      modeSeconds: { ...state.history.modeSeconds }
    },
    dosing: state.dosing === null ? null : { ...state.dosing }
  };

  return {
    draft: draft,
    checkpoint: {
      sampleCount: state.history.samples.length,
      logLength: state.emergency.log.length,
      faultCount: state.faults.length,
      openIds: openIds
    }
  };
}

/**
 * Undo what a failed tick appended to the shared records (MUTABLE)
 */
export function rollbackDraft(state: DomeState, checkpoint: TickCheckpoint): void {
  state.history.samples.length = checkpoint.sampleCount;
  state.emergency.log.length = checkpoint.logLength;
  state.faults.length = checkpoint.faultCount;
  for (const id of checkpoint.openIds) {
    const event = state.emergency.log[id];
    if (event !== undefined) {
      event.resolvedAt = null;
    }
  }
}

/**
 * Setpoint in effect for a mode. EMERGENCY and SHUTDOWN hold the safe-hold profile.
 */
export function setpointForMode(profiles: SetpointProfiles, mode: Mode): Setpoint {
  switch (mode) {
    case MODES.STARTUP:
      return profiles.startup;
    case MODES.IDLE:
      return profiles.idle;
    case MODES.GROWING:
      return profiles.growing;
    case MODES.MAINTENANCE:
      return profiles.maintenance;
    case MODES.EMERGENCY:
    case MODES.SHUTDOWN:
      return profiles.safeHold;
  }
}

/**
 * Measured value of a regulated variable
 */
export function measuredValue(variable: ControlledVariable, reading: SensorReading): number {
  switch (variable) {
    case 'temperature':
      return reading.temperatureC;
    case 'humidity':
      return reading.humidityPct;
    case 'co2':
      return reading.co2Ppm;
  }
}

/**
 * Target value of a regulated variable
 */
export function targetValue(variable: ControlledVariable, setpoint: Setpoint): number {
  switch (variable) {
    case 'temperature':
      return setpoint.temperatureC;
    case 'humidity':
      return setpoint.humidityPct;
    case 'co2':
      return setpoint.co2Ppm;
  }
}

/**
 * Clear every loop's accumulated history (MUTABLE)
 */
export function resetAllPids(state: DomeState): void {
  for (const variable of CONTROLLED_VARIABLES) {
    resetPid(state.pid[variable]);
  }
}

/**
 * Run the three loops and map their outputs onto actuators (MUTABLE)
 *
 * temperature: positive drives the heater, negative adds radiator fan on top
 * of the baseline. humidity: positive drives the mister, negative the vent.
 * co2: the output is the injection (+) or scrub (-) rate.
 *
 * A rejected update yields the neutral output and a PID_INVALID_DT fault.
 *
 * @param state - Tick draft (pid states and fault log will be mutated)
 * @param config - Dome configuration
 * @param setpoint - Active setpoint
 * @param dt - Tick length (s)
 * @param logger - Dome logger
 * @returns Command before lighting, dosing and overrides
 */
export function processPid(
  state: DomeState,
  config: DomeConfig,
  setpoint: Setpoint,
  dt: number,
  logger: Logger
): { command: ActuatorCommand; faults: ControlFault[] } {
  const outputs: Record<ControlledVariable, number> = { temperature: 0, humidity: 0, co2: 0 };
  const faults: ControlFault[] = [];

  for (const variable of CONTROLLED_VARIABLES) {
    const result = updatePid(
      state.pid[variable],
      config.pid[variable],
      targetValue(variable, setpoint),
      measuredValue(variable, state.reading),
      dt
    );
    outputs[variable] = result.output;

    if (result.fault !== null) {
      const fault: ControlFault = {
        time: state.time,
        kind: 'PID_INVALID_DT',
        variable: variable,
        message: variable + " loop rejected dt=" + dt
      };
      state.faults.push(fault);
      faults.push(fault);
      logger.warning("PID " + variable + ": invalid dt " + dt + ", neutral output");
    }
  }

  const temperature = outputs.temperature;
  const humidity = outputs.humidity;

  return {
    command: {
      heater: Math.max(temperature, 0),
      fan: config.baselineFan + Math.max(-temperature, 0),
      mister: Math.max(humidity, 0),
      vent: Math.max(-humidity, 0),
      co2Rate: outputs.co2,
      lighting: 0,
      nutrientDosing: false
    },
    faults: faults
  };
}

/**
 * Lamp level for the photoperiod, topping up transmitted daylight
 */
export function lightingCommand(
  time: number,
  setpoint: Setpoint,
  ambient: AmbientConditions,
  daylightTransmission: number
): number {
  const scheduled = photoperiodFraction(hourOfDay(time), setpoint.photoperiodHours);
  return supplementalLighting(scheduled, ambient.solarFraction * daylightTransmission);
}

/**
 * Finish the command: hazard overrides, bounds, then dosing (MUTABLE)
 *
 * Dosing follows the mister level actually sent, so a FULL_MIST override can
 * carry nutrients and a DRY_OUT override carries none.
 *
 * @returns Final command
 */
export function finishCommand(
  state: DomeState,
  command: ActuatorCommand,
  findings: HazardFinding[],
  inputs: ExternalInputs,
  config: DomeConfig
): ActuatorCommand {
  const overridden = findings.length > 0 ? overrideCommand(command, findings) : command;
  const final = clampCommand(overridden);

  const decision = decideNutrientDosing(final.mister, inputs.nutrients, config.dosing);
  state.dosing = decision;
  final.nutrientDosing = decision.dose;
  return final;
}

/**
 * Pull every actuator into its physical range
 */
export function clampCommand(command: ActuatorCommand): ActuatorCommand {
  return {
    heater: clamp(command.heater, 0, 1),
    vent: clamp(command.vent, 0, 1),
    mister: clamp(command.mister, 0, 1),
    lighting: clamp(command.lighting, 0, 1),
    co2Rate: clamp(command.co2Rate, -1, 1),
    fan: clamp(command.fan, 0, 1),
    nutrientDosing: command.nutrientDosing
  };
}

/**
 * Throw if the plant produced a value that cannot be committed
 * @throws {Error} Naming the first non-finite field
 */
export function assertFiniteReading(reading: SensorReading): void {
  const keys: (keyof SensorReading)[] = [
    'temperatureC', 'humidityPct', 'co2Ppm', 'o2Pct', 'light', 'substrateMoisture', 'pressureKPa'
  ];
  for (const key of keys) {
    if (!isFiniteNumber(reading[key])) {
      throw new Error("plant produced non-finite " + key + ": " + String(reading[key]));
    }
  }
}

/**
 * One-line reading summary for debug logs
 */
export function formatReading(reading: SensorReading): string {
  return "T=" + fmtValue(reading.temperatureC, 1, "C") +
    " RH=" + fmtValue(reading.humidityPct, 0, "%") +
    " CO2=" + fmtValue(reading.co2Ppm, 0, "ppm") +
    " O2=" + fmtValue(reading.o2Pct, 2, "%") +
    " P=" + fmtValue(reading.pressureKPa, 1, "kPa");
}

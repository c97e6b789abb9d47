/**
 * Application initialization
 */

import { createConsoleSink, createLogger, fmtValue } from '@logging';
import type { ConsoleAPI, Logger } from '@logging';
import { createSimulation } from '@system/simulation';
import type { Simulation } from '@system/simulation';
import type { DeepPartial, SimulationConfig } from '$types/config';
import { validateDomeConfig, validateSimulationConfig } from '@validation';
import type { ValidationResult } from '@validation';

import { APP_CONSTANTS, LOGGING_CONFIG, createDomeConfig, createSimulationConfig } from './config';
import type { DomeConfigOverrides } from './config';
import type { AppLoggingConfig, InitOptions } from './types';

/**
 * Logger writing to the console through the coloured sink
 *
 * @param timeSource - Clock used for INFO auto-demotion (simulated seconds)
 * @param consoleApi - Console to write to
 * @param config - Levels and colours
 */
export function createAppLogger(
  timeSource: () => number,
  consoleApi: ConsoleAPI = console,
  config: AppLoggingConfig = LOGGING_CONFIG
): Logger {
  const consoleSink = createConsoleSink(consoleApi, { colors: config.colors });

  return createLogger({
    level: config.level,
    demoteHours: config.demoteHours
  }, {
    timeSource: timeSource,
    sinks: [{ sink: consoleSink, minLevel: config.consoleLevel }]
  }, APP_CONSTANTS.LOG_LEVELS);
}

function reportInvalid(label: string, result: ValidationResult, consoleApi: ConsoleAPI): boolean {
  if (!result.valid) {
    consoleApi.error("INIT FAIL: Invalid configuration (" + label + ")");
    result.errors.forEach(function(err) {
      consoleApi.error("  [" + err.field + "]: " + err.message);
    });
    return true;
  }
  return false;
}

/**
 * Build configurations, validate them and create a simulation with a console logger
 *
 * Configuration errors are printed and null is returned. Warnings are logged
 * by the simulation and its domes.
 *
 * @param domes - Overrides per dome, applied to the defaults
 * @param simulation - Overrides for the run settings
 * @param options - Console and logging settings
 */
export function initialize(
  domes: DomeConfigOverrides[],
  simulation: DeepPartial<SimulationConfig> = {},
  options: InitOptions = {}
): Simulation | null {
  const consoleApi = options.consoleApi ?? console;
  const domeConfigs = domes.map(function(overrides) { return createDomeConfig(overrides); });
  const simConfig = createSimulationConfig(simulation);

  let failed = reportInvalid("simulation", validateSimulationConfig(simConfig), consoleApi);
  for (const config of domeConfigs) {
    if (reportInvalid(config.domeId, validateDomeConfig(config), consoleApi)) {
      failed = true;
    }
  }
  if (failed) {
    return null;
  }

  let sim: Simulation | null = null;
  const logger = createAppLogger(function() { return sim === null ? 0 : sim.time(); }, consoleApi, options.logging);

  sim = createSimulation(domeConfigs, simConfig, { logger: logger });

  logger.info("🚀 Dome Controller: " + domeConfigs.length + " domes, tick " + simConfig.tickSec + "s, coordinator every " + simConfig.coordinatorIntervalSec + "s");
  for (const config of domeConfigs) {
    const growing = config.profiles.growing;
    logger.info("🎯 " + config.domeId + " | " + fmtValue(growing.temperatureC, 1, "C") + " " +
      fmtValue(growing.humidityPct, 0, "%") + " " + fmtValue(growing.co2Ppm, 0, "ppm") + " O2 " +
      fmtValue(growing.o2Pct, 1, "%") + " | 💡 " + growing.photoperiodHours + "h");
  }

  return sim;
}

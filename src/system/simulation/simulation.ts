/**
 * Multi-dome simulation runner
 *
 * Ticks every dome in order, then runs the coordinator whenever its
 * cadence comes due. Coordinator passes happen between ticks, never inside
 * one. A rolled-back tick or SHUTDOWN marks that dome failed; a thrown error
 * outside the domes stops the run with status FAILED.
 */

import { APP_CONSTANTS, LOGGING_CONFIG } from '@boot/config';
import { createDomeEventEmitter } from '@events';
import type { DomeEventListener, DomeEventName } from '@events';
import { rebalance } from '@features/coordinator';
import type { Transfer } from '@features/coordinator';
import { createLogger, fmtValue } from '@logging';
import { createDomeController } from '@system/dome';
import type { DomeController } from '@system/dome';
import { MODES } from '$types/common';
import type { DomeConfig, SimulationConfig } from '$types/config';
import { ConfigValidationError } from '$types/errors';
import { formatDuration } from '@utils/time';
import { validateSimulationConfig } from '@validation';

import { resolveInputs, summarizeDome } from './helpers';
import type { InputSource, RunOptions, RunStatus, RunSummary, Simulation, SimulationDeps } from './types';

/**
 * Create a simulation over a set of domes
 *
 * @param domeConfigs - One configuration per dome; ids must be unique
 * @param config - Tick and coordinator settings
 * @param deps - Logger and plant response
 * @throws {ConfigValidationError} If any configuration is invalid or a dome id repeats
 */
export function createSimulation(
  domeConfigs: DomeConfig[],
  config: SimulationConfig,
  deps: SimulationDeps = {}
): Simulation {
  const validation = validateSimulationConfig(config);
  if (!validation.valid) {
    throw new ConfigValidationError(
      "Invalid simulation configuration: " + validation.errors.map(function(e) { return e.message; }).join("; "),
      validation.errors.map(function(e) { return { field: e.field, message: e.message }; })
    );
  }

  const seen = new Set<string>();
  for (const domeConfig of domeConfigs) {
    if (seen.has(domeConfig.domeId)) {
      throw new ConfigValidationError("Duplicate dome id '" + domeConfig.domeId + "'", [
        { field: 'domeId', message: "duplicate dome id '" + domeConfig.domeId + "'" }
      ]);
    }
    seen.add(domeConfig.domeId);
  }

  let time = 0;
  let nextCoordinatorAt = config.coordinatorIntervalSec;
  const events = createDomeEventEmitter();
  const logger = deps.logger ?? createLogger(
    { level: LOGGING_CONFIG.level, demoteHours: LOGGING_CONFIG.demoteHours },
    { timeSource: function() { return time; }, sinks: [] },
    APP_CONSTANTS.LOG_LEVELS
  );

  for (const warning of validation.warnings) {
    logger.warning("Config: " + warning.message);
  }

  const domes: DomeController[] = domeConfigs.map(function(domeConfig) {
    return createDomeController(domeConfig, { logger: logger, events: events, plant: deps.plant });
  });

  function run(durationSec: number, inputs: InputSource, options: RunOptions = {}): RunSummary {
    const start = time;
    const end = start + Math.max(0, durationSec);
    const failed = new Set<string>();
    const transfers: Transfer[] = [];
    let ticks = 0;
    let passes = 0;
    let status: RunStatus = 'COMPLETED';
    let error: string | null = null;

    logger.info("Run: " + domes.length + " domes, " + formatDuration(end - start) + " at " + config.tickSec + "s ticks");

    try {
      while (time < end) {
        if (options.signal?.aborted) {
          status = 'CANCELLED';
          logger.warning("Run cancelled at t=" + time + "s");
          break;
        }

        for (const dome of domes) {
          const result = dome.tick(config.tickSec, resolveInputs(inputs, dome.id, time));
          if (!result.ok) {
            failed.add(dome.id);
          }
        }
        time += config.tickSec;
        ticks++;

        if (time >= nextCoordinatorAt) {
          const plan = rebalance(domes, config.coordinator, logger);
          for (const transfer of plan.transfers) {
            transfers.push(transfer);
          }
          passes++;
          nextCoordinatorAt += config.coordinatorIntervalSec;
        }
      }
    } catch (err) {
      status = 'FAILED';
      error = err instanceof Error ? err.message : String(err);
      logger.critical("Run failed at t=" + time + "s: " + error);
    }

    const summary: RunSummary = {
      status: status,
      error: error,
      elapsedSec: time - start,
      ticks: ticks,
      coordinatorPasses: passes,
      transfers: transfers,
      failedDomes: [],
      shutdownDomes: [],
      domes: domes.map(function(d) { return summarizeDome(d, failed.has(d.id)); })
    };
    for (const dome of summary.domes) {
      if (dome.failed) summary.failedDomes.push(dome.domeId);
      if (dome.mode === MODES.SHUTDOWN) summary.shutdownDomes.push(dome.domeId);
    }

    let totalKwh = 0;
    for (const dome of summary.domes) {
      totalKwh += dome.energyKwh;
    }
    logger.info("Run " + status + " after " + formatDuration(summary.elapsedSec) + ": " +
      fmtValue(totalKwh, 2, "kWh") + ", " + summary.failedDomes.length + " failed domes (" +
      summary.shutdownDomes.length + " shut down)");

    return summary;
  }

  return {
    config: config,
    domes: domes,
    time: function() { return time; },
    dome: function(domeId: string) {
      return domes.find(function(d) { return d.id === domeId; });
    },
    run: run,
    on: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) { events.on(name, listener); },
    off: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) { events.off(name, listener); }
  };
}

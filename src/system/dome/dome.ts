/**
 * Dome controller
 *
 * One tick: hazard evaluation, mode transitions, regulation, physical
 * response, energy, alerts, history. The tick runs on a draft of the state
 * which replaces the committed state only when the tick completes. Log
 * lines and events of a tick are published after the commit.
 */

import { APP_CONSTANTS, LOGGING_CONFIG } from '@boot/config';
import { createEmergencyMonitorState, hasOpenEvents, updateEmergencyMonitor } from '@core/emergency';
import type { EmergencyEvent } from '@core/emergency';
import { accumulateEnergy, createEnergyLedger, totalEnergy } from '@core/energy';
import { applyHazardStatus, createModeState, evaluateStartup, isOperatorMode, requestMode } from '@core/mode';
import type { ModeRequestResult, ModeTransition } from '@core/mode';
import { createPidState } from '@core/pid';
import { ambientAt, respond } from '@core/physics';
import { createDomeEventEmitter, EVENT_NAMES } from '@events';
import type { DomeEventListener, DomeEventName } from '@events';
import { initAlertState, updateAlerts } from '@features/alerts';
import { createHistory, recordHistory, summarizeHistory } from '@features/history';
import { createLogger, createPrefixedLogger, fmtValue } from '@logging';
import type { Logger, LogLevel } from '@logging';
import { MODES, SAFE_OFF_COMMAND } from '$types/common';
import type { ControlFault, ExternalInputs, OperatorMode, Setpoint } from '$types/common';
import type { DomeConfig, SetpointProfiles } from '$types/config';
import { ConfigValidationError } from '$types/errors';
import { clamp } from '@utils/number';
import { validateDomeConfig, setpointEnvelopeViolations } from '@validation';

import {
  assertFiniteReading,
  draftState,
  finishCommand,
  formatReading,
  lightingCommand,
  processPid,
  resetAllPids,
  rollbackDraft,
  setpointForMode
} from './helpers';
import type { DomeController, DomeControllerDeps, DomeSnapshot, DomeState, TickResult } from './types';

/**
 * Initial state for a validated configuration
 */
export function createDomeState(config: DomeConfig): DomeState {
  return {
    time: 0,
    mode: createModeState(0),
    reading: { ...config.initialReading },
    setpoint: { ...config.profiles.startup },
    command: { ...SAFE_OFF_COMMAND },
    pid: { temperature: createPidState(), humidity: createPidState(), co2: createPidState() },
    energy: createEnergyLedger(),
    emergency: createEmergencyMonitorState(),
    alerts: initAlertState(),
    history: createHistory(),
    faults: [],
    profiles: structuredClone(config.profiles),
    substrateReadyDay: null,
    dosing: null,
    tickCount: 0
  };
}

/**
 * Create a controller for one dome
 *
 * @param config - Dome configuration
 * @param deps - Logger, event emitter and plant response
 * @throws {ConfigValidationError} If the configuration has errors; every field error is listed
 */
export function createDomeController(config: DomeConfig, deps: DomeControllerDeps = {}): DomeController {
  const validation = validateDomeConfig(config);
  if (!validation.valid) {
    throw new ConfigValidationError(
      "Invalid configuration for dome '" + config.domeId + "': " +
        validation.errors.map(function(e) { return e.message; }).join("; "),
      validation.errors.map(function(e) { return { field: e.field, message: e.message }; })
    );
  }

  let state = createDomeState(config);
  const events = deps.events ?? createDomeEventEmitter();
  const plant = deps.plant ?? respond;
  const parentLogger = deps.logger ?? createLogger(
    { level: LOGGING_CONFIG.level, demoteHours: LOGGING_CONFIG.demoteHours },
    { timeSource: function() { return state.time; }, sinks: [] },
    APP_CONSTANTS.LOG_LEVELS
  );
  const logger = createPrefixedLogger(parentLogger, config.domeId);

  for (const warning of validation.warnings) {
    logger.warning("Config: " + warning.message);
  }

  /**
   * Logger whose lines wait in `pending` until the tick commits
   */
  function deferredLogger(pending: (() => void)[]): Logger {
    function log(level: LogLevel, msg: string): void {
      pending.push(function() { logger.log(level, msg); });
    }
    return {
      log: log,
      debug: function(msg: string) { pending.push(function() { logger.debug(msg); }); },
      info: function(msg: string) { pending.push(function() { logger.info(msg); }); },
      warning: function(msg: string) { pending.push(function() { logger.warning(msg); }); },
      critical: function(msg: string) { pending.push(function() { logger.critical(msg); }); },
      setLevel: logger.setLevel,
      getLevel: logger.getLevel
    };
  }

  function logTransition(out: Logger, transition: ModeTransition): void {
    const line = "Mode " + transition.from + " -> " + transition.to + ": " + transition.reason;
    if (transition.to === MODES.EMERGENCY || transition.to === MODES.SHUTDOWN) {
      out.critical(line);
    } else {
      out.info(line);
    }
  }

  function logOpened(out: Logger, event: EmergencyEvent): void {
    out.critical("Hazard " + event.kind + " (" + event.direction + ") at t=" + event.openedAt + "s, action " + event.action);
  }

  function logResolved(out: Logger, event: EmergencyEvent): void {
    out.info("Hazard " + event.kind + " resolved after " + ((event.resolvedAt ?? event.openedAt) - event.openedAt) + "s");
  }

  /**
   * Run the tick steps against a draft (MUTABLE)
   * @returns Callbacks that publish this tick's log lines and events
   */
  function runTick(draft: DomeState, dt: number, inputs: ExternalInputs): { pending: (() => void)[]; transitions: number } {
    const pending: (() => void)[] = [];
    const tickLog = deferredLogger(pending);
    const step = dt > 0 ? dt : 0;
    const now = draft.time;
    draft.substrateReadyDay = inputs.substrateReadyDay;

    // Hazards
    const monitor = updateEmergencyMonitor(draft.emergency, draft.reading, config.hazards, now);
    for (const event of monitor.opened) {
      logOpened(tickLog, event);
      const copy = { ...event, trigger: { ...event.trigger } };
      pending.push(function() { events.emit(EVENT_NAMES.EMERGENCY_OPENED, { domeId: config.domeId, event: copy }); });
    }
    for (const event of monitor.resolved) {
      logResolved(tickLog, event);
      const copy = { ...event, trigger: { ...event.trigger } };
      pending.push(function() { events.emit(EVENT_NAMES.EMERGENCY_RESOLVED, { domeId: config.domeId, event: copy }); });
    }

    // Mode
    const anyOpen = hasOpenEvents(draft.emergency);
    const transitions = applyHazardStatus(draft.mode, { anyOpen: anyOpen, wasOpen: monitor.wasOpen }, config.modes, now);
    if (!anyOpen) {
      const startup = evaluateStartup(draft.mode, draft.reading, draft.profiles.startup, config.modes, now);
      if (startup !== null) {
        transitions.push(startup);
      }
    }
    for (const transition of transitions) {
      logTransition(tickLog, transition);
      if (transition.to !== MODES.EMERGENCY) {
        resetAllPids(draft);
      }
      pending.push(function() {
        events.emit(EVENT_NAMES.MODE_CHANGED, {
          domeId: config.domeId,
          from: transition.from,
          to: transition.to,
          at: transition.at,
          reason: transition.reason
        });
      });
    }

    // Regulation
    const mode = draft.mode.mode;
    const setpoint = setpointForMode(draft.profiles, mode);
    draft.setpoint = { ...setpoint };
    const ambient = ambientAt(now, config.ambient);

    if (mode === MODES.SHUTDOWN) {
      draft.command = { ...SAFE_OFF_COMMAND };
      draft.dosing = null;
    } else {
      const regulated = processPid(draft, config, setpoint, dt, tickLog);
      for (const fault of regulated.faults) {
        pending.push(function() { events.emit(EVENT_NAMES.FAULT, { domeId: config.domeId, fault: fault }); });
      }
      const command = regulated.command;
      command.lighting = lightingCommand(now, setpoint, ambient, config.physics.daylightTransmission);
      draft.command = finishCommand(draft, command, monitor.findings, inputs, config);
    }

    // Plant and energy
    const next = plant(draft.reading, draft.command, ambient, step, config.physics);
    assertFiniteReading(next);
    draft.reading = next;
    accumulateEnergy(draft.energy, draft.command, config.energy, step);
    draft.time = now + step;
    draft.tickCount++;

    // Alerts apply to operator modes only
    if (isOperatorMode(mode)) {
      draft.alerts = updateAlerts(draft.reading, setpoint, draft.time, draft.alerts, config.alerts);
      for (const alert of draft.alerts.justFired) {
        const line = "Alert " + alert.kind + ": " + alert.message;
        if (alert.severity === 'CRITICAL') {
          tickLog.critical(line);
        } else {
          tickLog.warning(line);
        }
        pending.push(function() { events.emit(EVENT_NAMES.ALERT, { domeId: config.domeId, alert: alert }); });
      }
    } else {
      draft.alerts = initAlertState();
    }

    // History
    const energyKwh = totalEnergy(draft.energy);
    recordHistory(draft.history, {
      time: draft.time,
      mode: mode,
      reading: draft.reading,
      command: draft.command,
      energyKwh: energyKwh
    }, step, config.historySampleSec);

    tickLog.debug("t=" + draft.time + "s " + mode + " " + formatReading(draft.reading) + " E=" + fmtValue(energyKwh, 3, "kWh"));

    const tickEvent = {
      domeId: config.domeId,
      time: draft.time,
      mode: mode,
      reading: { ...draft.reading },
      command: { ...draft.command },
      energyKwh: energyKwh
    };
    pending.push(function() { events.emit(EVENT_NAMES.TICK, tickEvent); });

    return { pending: pending, transitions: transitions.length };
  }

  function tick(dt: number, inputs: ExternalInputs): TickResult {
    const { draft, checkpoint } = draftState(state);
    let outcome: { pending: (() => void)[]; transitions: number };

    try {
      outcome = runTick(draft, dt, inputs);
    } catch (err) {
      rollbackDraft(state, checkpoint);
      const message = err instanceof Error ? err.message : String(err);
      const fault: ControlFault = { time: state.time, kind: 'TICK_FAILED', variable: null, message: message };
      state.faults.push(fault);
      logger.critical("Tick failed at t=" + state.time + "s, state kept: " + message);
      events.emit(EVENT_NAMES.FAULT, { domeId: config.domeId, fault: fault });
      return { ok: false, error: message };
    }

    state = draft;
    for (const publish of outcome.pending) {
      publish();
    }
    return { ok: true, mode: state.mode.mode, transitions: outcome.transitions };
  }

  function handleModeRequest(target: OperatorMode, substrateReadyDay?: number | null): ModeRequestResult {
    const readyDay = substrateReadyDay === undefined ? state.substrateReadyDay : substrateReadyDay;
    const result = requestMode(state.mode, target, readyDay, state.time);
    if (!result.accepted) {
      logger.info("Mode request " + target + " rejected: " + result.reason);
      return result;
    }
    resetAllPids(state);
    logTransition(logger, result.transition);
    events.emit(EVENT_NAMES.MODE_CHANGED, {
      domeId: config.domeId,
      from: result.transition.from,
      to: result.transition.to,
      at: result.transition.at,
      reason: result.transition.reason
    });
    return result;
  }

  function updateProfile(name: keyof SetpointProfiles, patch: Partial<Setpoint>): string[] {
    const updated: Setpoint = { ...state.profiles[name], ...patch };
    const violations = setpointEnvelopeViolations(updated, config.envelope);
    for (const violation of violations) {
      logger.warning("Profile " + name + " outside envelope: " + violation);
    }
    state.profiles[name] = updated;
    return violations;
  }

  function snapshot(): DomeSnapshot {
    return {
      domeId: config.domeId,
      time: state.time,
      mode: state.mode.mode,
      reading: { ...state.reading },
      setpoint: { ...state.setpoint },
      command: { ...state.command },
      energy: { ...state.energy },
      energyKwh: totalEnergy(state.energy),
      openEmergencies: Object.keys(state.emergency.openIds).length,
      faultCount: state.faults.length,
      shutdownReason: state.mode.shutdownReason
    };
  }

  return {
    id: config.domeId,
    config: config,
    tick: tick,
    requestMode: handleModeRequest,
    updateProfile: updateProfile,
    snapshot: snapshot,
    getMode: function() { return state.mode.mode; },
    getReading: function() { return { ...state.reading }; },
    getO2ViabilityPct: function() { return config.hazards.o2MinPct; },
    applyResourceDelta: function(o2DeltaPct: number) {
      state.reading.o2Pct = clamp(state.reading.o2Pct + o2DeltaPct, 0, 100);
      logger.debug("O2 adjusted by " + fmtValue(o2DeltaPct, 2, "%") + " to " + fmtValue(state.reading.o2Pct, 2, "%"));
    },
    historySummary: function() { return summarizeHistory(state.history); },
    history: function() { return structuredClone(state.history); },
    emergencyLog: function() { return structuredClone(state.emergency.log); },
    faults: function() { return state.faults.map(function(f) { return { ...f }; }); },
    on: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) { events.on(name, listener); },
    off: function<K extends DomeEventName>(name: K, listener: DomeEventListener<K>) { events.off(name, listener); }
  };
}

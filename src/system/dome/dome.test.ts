/**
 * Tests for the dome controller
 */

import { createDomeConfig } from '@boot/config';
import type { DomeConfigOverrides } from '@boot/config';
import type { DomeEmergencyEvent, DomeFaultEvent, DomeModeChangedEvent, DomeTickEvent } from '@events';
import type { Logger } from '@logging';
import type { ExternalInputs, SensorReading } from '$types/common';
import { ConfigValidationError } from '$types/errors';

import { createDomeController } from './dome';
import type { DomeController, PlantResponse } from './types';

// ═══════════════════════════════════════════════════════════════
// Fixtures
// ═══════════════════════════════════════════════════════════════

const inputs: ExternalInputs = { substrateReadyDay: null, nutrients: null };

const clearReading: SensorReading = {
  temperatureC: 18,
  humidityPct: 60,
  co2Ppm: 800,
  o2Pct: 20.5,
  light: 0,
  substrateMoisture: 0.3,
  pressureKPa: 100
};

const toxicReading: SensorReading = { ...clearReading, co2Ppm: 5000 };

function mockLogger(): Logger {
  return {
    log: vi.fn(),
    debug: vi.fn(),
    info: vi.fn(),
    warning: vi.fn(),
    critical: vi.fn(),
    setLevel: vi.fn(),
    getLevel: vi.fn(() => 1 as const)
  };
}

/**
 * Plant whose output is whatever the test puts in `next`
 */
function scriptedPlant(initial: SensorReading): { plant: PlantResponse; next: { reading: SensorReading } } {
  const next = { reading: initial };
  return {
    next,
    plant: () => ({ ...next.reading })
  };
}

function domeWith(overrides: DomeConfigOverrides, plant?: PlantResponse, logger?: Logger): DomeController {
  return createDomeController(createDomeConfig({ domeId: 'dome-a', ...overrides }), { plant, logger });
}

describe('createDomeController', () => {
  // ═══════════════════════════════════════════════════════════════
  // Configuration
  // ═══════════════════════════════════════════════════════════════

  describe('configuration', () => {
    it('should reject a profile outside the envelope listing the field', () => {
      let caught: unknown = null;
      try {
        domeWith({ profiles: { growing: { temperatureC: 40 } } });
      } catch (err) {
        caught = err;
      }

      expect(caught).toBeInstanceOf(ConfigValidationError);
      if (caught instanceof ConfigValidationError) {
        expect(caught.fields).toEqual([
          { field: 'profiles.growing', message: 'profiles.growing: temperatureC 40 outside 5-35' }
        ]);
      }
    });

    it('should log configuration warnings', () => {
      const logger = mockLogger();

      domeWith({ baselineFan: 0.8 }, undefined, logger);

      expect(logger.warning).toHaveBeenCalledWith(
        '[dome-a] Config: baselineFan is outside recommended range 0-0.5 (got 0.8)'
      );
    });

    it('should start in STARTUP at time zero with the initial reading', () => {
      const dome = domeWith({});
      const snap = dome.snapshot();

      expect(snap.mode).toBe('STARTUP');
      expect(snap.time).toBe(0);
      expect(snap.reading.co2Ppm).toBe(1200);
      expect(snap.energyKwh).toBe(0);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Emergency handling
  // ═══════════════════════════════════════════════════════════════

  describe('CO2 excess', () => {
    it('should open an event, enter EMERGENCY and command full scrub and vent', () => {
      const dome = domeWith({ initialReading: { co2Ppm: 5000 } });

      const result = dome.tick(60, inputs);

      expect(result).toEqual({ ok: true, mode: 'EMERGENCY', transitions: 1 });
      const log = dome.emergencyLog();
      expect(log).toHaveLength(1);
      expect(log[0].kind).toBe('CO2_EXCESS');
      expect(log[0].openedAt).toBe(0);
      expect(log[0].resolvedAt).toBeNull();
      expect(log[0].trigger.co2Ppm).toBe(5000);
      const command = dome.snapshot().command;
      expect(command.co2Rate).toBe(-1);
      expect(command.vent).toBe(1);
    });

    it('should emit emergency and mode events', () => {
      const dome = domeWith({ initialReading: { co2Ppm: 5000 } });
      const opened: DomeEmergencyEvent[] = [];
      const modes: DomeModeChangedEvent[] = [];
      dome.on('emergency_opened', (e) => { opened.push(e); });
      dome.on('mode_changed', (e) => { modes.push(e); });

      dome.tick(60, inputs);

      expect(opened).toHaveLength(1);
      expect(opened[0].domeId).toBe('dome-a');
      expect(modes).toEqual([
        { domeId: 'dome-a', from: 'STARTUP', to: 'EMERGENCY', at: 0, reason: 'hazard detected' }
      ]);
    });

    it('should log the hazard and transition as critical', () => {
      const logger = mockLogger();
      const dome = domeWith({ initialReading: { co2Ppm: 5000 } }, undefined, logger);

      dome.tick(60, inputs);

      expect(logger.critical).toHaveBeenCalledWith('[dome-a] Hazard CO2_EXCESS (HIGH) at t=0s, action MAX_SCRUB_AND_VENT');
      expect(logger.critical).toHaveBeenCalledWith('[dome-a] Mode STARTUP -> EMERGENCY: hazard detected');
    });
  });

  describe('cooldown and escalation', () => {
    it('should return to IDLE once hazards stay clear for the cooldown', () => {
      const script = scriptedPlant(clearReading);
      const dome = domeWith({ initialReading: toxicReading, modes: { cooldownSec: 120 } }, script.plant);

      dome.tick(60, inputs); // t=0 hazard
      dome.tick(60, inputs); // t=60 resolved, cooldown starts
      dome.tick(60, inputs); // t=120
      expect(dome.getMode()).toBe('EMERGENCY');

      const result = dome.tick(60, inputs); // t=180

      expect(result).toEqual({ ok: true, mode: 'IDLE', transitions: 1 });
      expect(dome.emergencyLog()[0].resolvedAt).toBe(60);
    });

    it('should shut down on the third hazard onset within the window', () => {
      const script = scriptedPlant(clearReading);
      const dome = domeWith({ initialReading: toxicReading }, script.plant);
      const modes: DomeModeChangedEvent[] = [];
      dome.on('mode_changed', (e) => { modes.push(e); });

      dome.tick(60, inputs); // onset 1
      script.next.reading = toxicReading;
      dome.tick(60, inputs); // clear
      script.next.reading = clearReading;
      dome.tick(60, inputs); // onset 2
      script.next.reading = toxicReading;
      dome.tick(60, inputs); // clear
      dome.tick(60, inputs); // onset 3

      expect(dome.getMode()).toBe('SHUTDOWN');
      expect(dome.emergencyLog()).toHaveLength(3);
      expect(modes.map((m) => m.to)).toEqual(['EMERGENCY', 'SHUTDOWN']);
      expect(dome.snapshot().shutdownReason).toBe('3 hazard onsets within 21600s');
    });

    it('should issue safe-off commands and keep accruing idle energy in SHUTDOWN', () => {
      const script = scriptedPlant(toxicReading);
      const dome = domeWith({ initialReading: toxicReading, modes: { escalationCount: 1 } }, script.plant);

      dome.tick(60, inputs);
      expect(dome.getMode()).toBe('SHUTDOWN');
      const before = dome.snapshot();

      dome.tick(60, inputs);
      const after = dome.snapshot();

      expect(after.command).toEqual({
        heater: 0, vent: 0, mister: 0, lighting: 0, co2Rate: 0, fan: 0, nutrientDosing: false
      });
      // lighting idle 0.05 kW + other idle 0.1 kW for one minute
      expect(after.energyKwh - before.energyKwh).toBeCloseTo(0.0025, 10);
      expect(after.time).toBe(120);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Startup
  // ═══════════════════════════════════════════════════════════════

  describe('startup', () => {
    it('should move to IDLE after readings stay stable for the dwell time', () => {
      const stable: SensorReading = { ...clearReading, temperatureC: 20, humidityPct: 60, co2Ppm: 1000, o2Pct: 20.5 };
      const script = scriptedPlant(stable);
      const dome = domeWith({ initialReading: stable, modes: { startupDwellSec: 120 } }, script.plant);

      dome.tick(60, inputs);
      dome.tick(60, inputs);
      expect(dome.getMode()).toBe('STARTUP');

      dome.tick(60, inputs);

      expect(dome.getMode()).toBe('IDLE');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Faults
  // ═══════════════════════════════════════════════════════════════

  describe('faults', () => {
    it('should record a PID fault per loop on a zero dt and keep the clock', () => {
      const dome = domeWith({});
      const faults: DomeFaultEvent[] = [];
      dome.on('fault', (e) => { faults.push(e); });

      const result = dome.tick(0, inputs);

      expect(result.ok).toBe(true);
      expect(dome.faults().map((f) => f.variable)).toEqual(['temperature', 'humidity', 'co2']);
      expect(dome.faults()[0]).toEqual({
        time: 0,
        kind: 'PID_INVALID_DT',
        variable: 'temperature',
        message: 'temperature loop rejected dt=0'
      });
      expect(faults).toHaveLength(3);
      expect(dome.snapshot().time).toBe(0);
      expect(dome.snapshot().energyKwh).toBe(0);
    });

    it('should roll back the tick when the plant throws', () => {
      const dome = domeWith({ initialReading: { co2Ppm: 5000 } }, () => {
        throw new Error('plant failure');
      });
      const opened: DomeEmergencyEvent[] = [];
      dome.on('emergency_opened', (e) => { opened.push(e); });

      const result = dome.tick(60, inputs);

      expect(result).toEqual({ ok: false, error: 'plant failure' });
      expect(dome.getMode()).toBe('STARTUP');
      expect(dome.emergencyLog()).toEqual([]);
      expect(dome.snapshot().time).toBe(0);
      expect(dome.faults()).toEqual([
        { time: 0, kind: 'TICK_FAILED', variable: null, message: 'plant failure' }
      ]);
      expect(opened).toHaveLength(0);
    });

    it('should publish no hazard or mode lines from a rolled-back tick', () => {
      const logger = mockLogger();
      const dome = domeWith({ initialReading: { co2Ppm: 5000 } }, () => {
        throw new Error('plant failure');
      }, logger);

      dome.tick(60, inputs);

      expect(vi.mocked(logger.critical).mock.calls).toEqual([
        ['[dome-a] Tick failed at t=0s, state kept: plant failure']
      ]);
      expect(logger.info).not.toHaveBeenCalled();
      expect(logger.debug).not.toHaveBeenCalled();
    });

    it('should undo a resolution and samples recorded by a failed tick', () => {
      let failing = false;
      const plant: PlantResponse = () => {
        if (failing) throw new Error('plant failure');
        return { ...clearReading };
      };
      const dome = domeWith({ initialReading: toxicReading, historySampleSec: 60 }, plant);

      dome.tick(60, inputs);
      failing = true;
      const result = dome.tick(60, inputs);

      expect(result.ok).toBe(false);
      expect(dome.emergencyLog().map((e) => e.resolvedAt)).toEqual([null]);
      expect(dome.snapshot().openEmergencies).toBe(1);
      expect(dome.history().samples.map((h) => h.time)).toEqual([60]);
      expect(dome.faults().map((f) => f.kind)).toEqual(['TICK_FAILED']);

      failing = false;
      dome.tick(60, inputs);

      expect(dome.emergencyLog().map((e) => e.resolvedAt)).toEqual([60]);
      expect(dome.history().samples.map((h) => h.time)).toEqual([60, 120]);
    });

    it('should keep tick cost flat as the records grow', () => {
      const dome = domeWith({ historySampleSec: 60 });

      for (let i = 0; i < 14400; i++) {
        dome.tick(60, inputs);
      }

      expect(dome.snapshot().time).toBe(864000);
      expect(dome.history().samples).toHaveLength(14400);
    });

    it('should reject a non-finite plant output', () => {
      const logger = mockLogger();
      const dome = domeWith({}, () => ({ ...clearReading, temperatureC: Number.NaN }), logger);

      const result = dome.tick(60, inputs);

      expect(result).toEqual({ ok: false, error: 'plant produced non-finite temperatureC: NaN' });
      expect(logger.critical).toHaveBeenCalledWith(
        '[dome-a] Tick failed at t=0s, state kept: plant produced non-finite temperatureC: NaN'
      );
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Regulation
  // ═══════════════════════════════════════════════════════════════

  describe('regulation', () => {
    it('should include nutrients when misting into a short substrate', () => {
      const dome = domeWith({});

      dome.tick(60, { substrateReadyDay: null, nutrients: { concentrationPpm: 100, ph: 6.5 } });

      const command = dome.snapshot().command;
      // humidity 50 against 60: 0.05 * 10 + 0.0005 * 600
      expect(command.mister).toBeCloseTo(0.8, 10);
      expect(command.nutrientDosing).toBe(true);
    });

    it('should dose with the mist forced by a humidity-low hazard', () => {
      const dome = domeWith({ initialReading: { humidityPct: 10 } });

      dome.tick(60, { substrateReadyDay: null, nutrients: { concentrationPpm: 100, ph: 6.5 } });

      const command = dome.snapshot().command;
      expect(command.mister).toBe(1);
      expect(command.nutrientDosing).toBe(true);
    });

    it('should not dose while a humidity-high hazard dries the dome out', () => {
      const dome = domeWith({ initialReading: { humidityPct: 99 } });

      dome.tick(60, { substrateReadyDay: null, nutrients: { concentrationPpm: 100, ph: 6.5 } });

      const command = dome.snapshot().command;
      expect(command.mister).toBe(0);
      expect(command.nutrientDosing).toBe(false);
    });

    it('should advance time and energy on a normal tick', () => {
      const dome = domeWith({});

      dome.tick(60, inputs);
      dome.tick(60, inputs);

      const snap = dome.snapshot();
      expect(snap.time).toBe(120);
      expect(snap.energyKwh).toBeGreaterThan(0);
    });

    it('should publish tick events after the state is committed', () => {
      const dome = domeWith({});
      const seen: { event: DomeTickEvent; committed: number }[] = [];
      dome.on('tick', (e) => { seen.push({ event: e, committed: dome.snapshot().time }); });

      dome.tick(60, inputs);

      expect(seen).toHaveLength(1);
      expect(seen[0].event.time).toBe(60);
      expect(seen[0].committed).toBe(60);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Operator and coordinator interface
  // ═══════════════════════════════════════════════════════════════

  describe('requestMode', () => {
    function idleDome(): DomeController {
      const stable: SensorReading = { ...clearReading, temperatureC: 20, co2Ppm: 1000 };
      const script = scriptedPlant(stable);
      const dome = domeWith({ initialReading: stable, modes: { startupDwellSec: 0 } }, script.plant);
      dome.tick(60, { substrateReadyDay: 2, nutrients: null });
      return dome;
    }

    it('should reject operator requests during STARTUP', () => {
      const dome = domeWith({});

      expect(dome.requestMode('GROWING', 0)).toEqual({
        accepted: false,
        reason: 'no operator transition from STARTUP to GROWING'
      });
    });

    it('should gate GROWING on the last substrate-ready day received', () => {
      const dome = idleDome();

      expect(dome.getMode()).toBe('IDLE');
      expect(dome.requestMode('GROWING')).toEqual({
        accepted: false,
        reason: 'substrate not ready until day 2 (day 0)'
      });
    });

    it('should accept GROWING once the substrate is ready and announce it', () => {
      const dome = idleDome();
      const modes: DomeModeChangedEvent[] = [];
      dome.on('mode_changed', (e) => { modes.push(e); });

      const result = dome.requestMode('GROWING', 0);

      expect(result.accepted).toBe(true);
      expect(dome.getMode()).toBe('GROWING');
      expect(modes).toEqual([
        { domeId: 'dome-a', from: 'IDLE', to: 'GROWING', at: 60, reason: 'operator request' }
      ]);
    });
  });

  describe('applyResourceDelta', () => {
    it('should add the O2 delta to the reading', () => {
      const dome = domeWith({});

      dome.applyResourceDelta(3);

      expect(dome.getReading().o2Pct).toBeCloseTo(22.8, 10);
    });

    it('should keep O2 within 0-100', () => {
      const dome = domeWith({});

      dome.applyResourceDelta(-200);

      expect(dome.getReading().o2Pct).toBe(0);
    });
  });

  describe('updateProfile', () => {
    it('should apply an out-of-envelope profile with a warning', () => {
      const logger = mockLogger();
      const dome = domeWith({}, undefined, logger);

      const violations = dome.updateProfile('growing', { temperatureC: 40 });

      expect(violations).toEqual(['temperatureC 40 outside 5-35']);
      expect(logger.warning).toHaveBeenCalledWith(
        '[dome-a] Profile growing outside envelope: temperatureC 40 outside 5-35'
      );
    });

    it('should use the updated profile on the next tick', () => {
      const dome = domeWith({});

      dome.updateProfile('startup', { temperatureC: 25 });
      dome.tick(60, inputs);

      expect(dome.snapshot().setpoint.temperatureC).toBe(25);
    });
  });
});

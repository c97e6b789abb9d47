/**
 * Tests for configuration validator
 */

import { createDomeConfig, createSimulationConfig, DEFAULT_DOME_CONFIG } from '@boot/config';

import { setpointEnvelopeViolations, validateDomeConfig, validateSimulationConfig } from './validator';

describe('validateDomeConfig', () => {
  // ═══════════════════════════════════════════════════════════════
  // Defaults
  // ═══════════════════════════════════════════════════════════════

  it('should accept the default configuration without warnings', () => {
    const result = validateDomeConfig(DEFAULT_DOME_CONFIG);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  // ═══════════════════════════════════════════════════════════════
  // Envelope and profiles
  // ═══════════════════════════════════════════════════════════════

  describe('profiles against envelope', () => {
    it('should reject a profile setpoint outside the envelope', () => {
      const config = createDomeConfig({ profiles: { growing: { temperatureC: 40 } } });

      const result = validateDomeConfig(config);

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'profiles.growing',
        message: 'profiles.growing: temperatureC 40 outside 5-35'
      }]);
    });

    it('should report every offending value', () => {
      const config = createDomeConfig({ profiles: { idle: { co2Ppm: 200, o2Pct: 25 } } });

      const result = validateDomeConfig(config);

      expect(result.errors.map(function(e) { return e.message; })).toEqual([
        'profiles.idle: co2Ppm 200 outside 300-1500',
        'profiles.idle: o2Pct 25 outside 18-23'
      ]);
    });

    it('should reject an inverted envelope band', () => {
      const config = createDomeConfig({ envelope: { humidityMinPct: 95 } });

      const result = validateDomeConfig(config);

      const fields = result.errors.map(function(e) { return e.field; });
      expect(fields).toContain('envelope.humidity');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Module validators
  // ═══════════════════════════════════════════════════════════════

  describe('module parameters', () => {
    it('should collect PID errors under the loop name', () => {
      const config = createDomeConfig({ pid: { humidity: { kp: -1 } } });

      const result = validateDomeConfig(config);

      expect(result.errors).toEqual([{
        level: 'CRITICAL',
        field: 'pid.humidity',
        message: 'pid.humidity: kp must be a non-negative finite number, got -1'
      }]);
    });

    it('should collect errors from several modules at once', () => {
      const config = createDomeConfig({
        modes: { escalationCount: 0 },
        energy: { misting: { ratedKw: -1 } }
      });

      const result = validateDomeConfig(config);

      expect(result.errors.map(function(e) { return e.field; })).toEqual(['modes', 'energy']);
    });

    it('should reject a non-positive physics time constant', () => {
      const config = createDomeConfig({ physics: { timeConstantsSec: { co2: 0 } } });

      const result = validateDomeConfig(config);

      expect(result.errors[0].message).toBe('physics: Time constant for co2 must be positive, got 0');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Scalars
  // ═══════════════════════════════════════════════════════════════

  describe('scalar fields', () => {
    it('should reject an empty dome id', () => {
      const result = validateDomeConfig(createDomeConfig({ domeId: '  ' }));

      expect(result.errors[0].field).toBe('domeId');
    });

    it('should reject a baseline fan above 1', () => {
      const result = validateDomeConfig(createDomeConfig({ baselineFan: 1.5 }));

      expect(result.errors[0].message).toBe('baselineFan must be between 0 and 1 (got 1.5)');
    });

    it('should warn on a high baseline fan', () => {
      const result = validateDomeConfig(createDomeConfig({ baselineFan: 0.8 }));

      expect(result.valid).toBe(true);
      expect(result.warnings[0].message).toBe('baselineFan is outside recommended range 0-0.5 (got 0.8)');
    });

    it('should reject an inverted pH band', () => {
      const result = validateDomeConfig(createDomeConfig({ dosing: { phMin: 7, phMax: 6 } }));

      expect(result.errors[0].field).toBe('dosing.ph');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Warnings
  // ═══════════════════════════════════════════════════════════════

  describe('hazard warnings', () => {
    it('should warn when hazard temperature band is inside the envelope', () => {
      const result = validateDomeConfig(createDomeConfig({ hazards: { temperatureMaxC: 30 } }));

      expect(result.valid).toBe(true);
      expect(result.warnings).toEqual([{
        level: 'WARNING',
        field: 'hazards.temperature',
        message: 'hazard temperature band is not wider than the envelope'
      }]);
    });

    it('should warn when O2 hazard limit reaches the safe-hold setpoint', () => {
      const result = validateDomeConfig(createDomeConfig({ hazards: { o2MinPct: 20.5 } }));

      expect(result.warnings[0].field).toBe('hazards.o2MinPct');
    });
  });
});

describe('setpointEnvelopeViolations', () => {
  it('should flag a photoperiod beyond a day', () => {
    const setpoint = { ...DEFAULT_DOME_CONFIG.profiles.growing, photoperiodHours: 25 };

    expect(setpointEnvelopeViolations(setpoint, DEFAULT_DOME_CONFIG.envelope)).toEqual([
      'photoperiodHours 25 outside 0-24'
    ]);
  });
});

describe('validateSimulationConfig', () => {
  it('should accept the defaults', () => {
    const result = validateSimulationConfig(createSimulationConfig());

    expect(result.valid).toBe(true);
    expect(result.warnings).toEqual([]);
  });

  it('should reject a coordinator interval shorter than a tick', () => {
    const result = validateSimulationConfig(createSimulationConfig({ tickSec: 60, coordinatorIntervalSec: 30 }));

    expect(result.errors).toEqual([{
      level: 'CRITICAL',
      field: 'coordinatorIntervalSec',
      message: 'coordinatorIntervalSec (30) must be at least tickSec (60)'
    }]);
  });

  it('should reject a non-positive tick', () => {
    const result = validateSimulationConfig(createSimulationConfig({ tickSec: 0 }));

    expect(result.errors[0].field).toBe('tickSec');
  });

  it('should reject inconsistent coordinator thresholds', () => {
    const result = validateSimulationConfig(createSimulationConfig({ coordinator: { restoreTargetPct: 23 } }));

    expect(result.errors[0].message).toBe(
      'coordinator: coordinator thresholds must satisfy viabilityPct < restoreTargetPct <= surplusPct, got 19 / 23 / 22'
    );
  });
});

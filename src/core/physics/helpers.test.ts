/**
 * Tests for physical response helpers
 */

import { approach, blend, validateAmbientProfile, validatePhysicsModel } from './helpers';
import type { AmbientProfile, PhysicsModel } from './types';

const model: PhysicsModel = {
  timeConstantsSec: { temperature: 1800, humidity: 900, co2: 1200, o2: 7200, light: 300, substrateMoisture: 3600, pressure: 600 },
  heaterRiseC: 60,
  lightingRiseC: 3,
  fanCoolingC: 8,
  ventCoolingC: 4,
  passiveHumidityPct: 55,
  passiveMoisture: 0.3,
  misterWeight: 2,
  ventWeight: 0.5,
  scrubberWeight: 2,
  injectorWeight: 1,
  injectorCo2Ppm: 1500,
  respirationCo2Ppm: 1200,
  photosynthesisCo2Ppm: 350,
  respirationO2Pct: 19.8,
  photosynthesisO2Pct: 23,
  photosynthesisWeight: 2,
  nominalPressureKPa: 101.325,
  referenceTemperatureC: 22,
  ventPressureWeight: 0.2,
  daylightTransmission: 0.6
};

describe('Physics Helpers', () => {
  describe('approach', () => {
    it('should close 1 - e^-1 of the gap after one time constant', () => {
      expect(approach(0, 10, 100, 100)).toBeCloseTo(10 * (1 - Math.exp(-1)), 10);
    });

    it('should stay put when already at the target', () => {
      expect(approach(5, 5, 100, 30)).toBe(5);
    });
  });

  describe('blend', () => {
    it('should compute the weighted mean', () => {
      expect(blend([{ value: 10, weight: 1 }, { value: 40, weight: 2 }])).toBe(30);
    });

    it('should ignore zero weights', () => {
      expect(blend([{ value: 10, weight: 1 }, { value: 1000, weight: 0 }])).toBe(10);
    });

    it('should fall back to the first value when every weight is zero', () => {
      expect(blend([{ value: 7, weight: 0 }, { value: 9, weight: 0 }])).toBe(7);
    });
  });

  describe('validatePhysicsModel', () => {
    it('should accept a valid model', () => {
      expect(() => validatePhysicsModel(model)).not.toThrow();
    });

    it('should throw on a non-positive time constant', () => {
      const broken = { ...model, timeConstantsSec: { ...model.timeConstantsSec, co2: 0 } };
      expect(() => validatePhysicsModel(broken)).toThrow('Time constant for co2 must be positive, got 0');
    });

    it('should throw on a negative weight', () => {
      expect(() => validatePhysicsModel({ ...model, ventWeight: -1 })).toThrow('ventWeight must be a non-negative finite number');
    });

    it('should throw on a transmission above 1', () => {
      expect(() => validatePhysicsModel({ ...model, daylightTransmission: 1.5 })).toThrow('daylightTransmission must be between 0 and 1');
    });
  });

  describe('validateAmbientProfile', () => {
    const profile: AmbientProfile = {
      dayTempC: 40,
      nightTempC: -20,
      cycleHours: 708.7,
      dayFraction: 0.5,
      phaseOffsetHours: 0,
      atmosphere: { co2Ppm: 0, o2Pct: 0, humidityPct: 0, pressureKPa: 0 }
    };

    it('should accept a valid profile', () => {
      expect(() => validateAmbientProfile(profile)).not.toThrow();
    });

    it('should throw on a zero-length cycle', () => {
      expect(() => validateAmbientProfile({ ...profile, cycleHours: 0 })).toThrow('cycleHours must be positive');
    });

    it('should throw on a day fraction above 1', () => {
      expect(() => validateAmbientProfile({ ...profile, dayFraction: 2 })).toThrow('dayFraction must be between 0 and 1');
    });
  });
});

/**
 * Tests for simulation clock conversions
 */

import { hourOfDay, simulationDay, toHours } from './time';

describe('Time Utilities', () => {
  describe('toHours', () => {
    it('should convert seconds to hours', () => {
      expect(toHours(5400)).toBe(1.5);
    });
  });

  describe('simulationDay', () => {
    it('should start at day 0', () => {
      expect(simulationDay(0)).toBe(0);
      expect(simulationDay(86399)).toBe(0);
    });

    it('should roll over at midnight', () => {
      expect(simulationDay(86400)).toBe(1);
      expect(simulationDay(3 * 86400 + 10)).toBe(3);
    });
  });

  describe('hourOfDay', () => {
    it('should wrap every 24 hours', () => {
      expect(hourOfDay(0)).toBe(0);
      expect(hourOfDay(25 * 3600)).toBe(1);
    });

    it('should keep fractional hours', () => {
      expect(hourOfDay(30 * 60)).toBe(0.5);
    });
  });
});

import { ambientAt } from './ambient';
import type { AmbientProfile } from './types';

const profile: AmbientProfile = {
  dayTempC: 40,
  nightTempC: -20,
  cycleHours: 10,
  dayFraction: 0.5,
  phaseOffsetHours: 0,
  atmosphere: { co2Ppm: 0, o2Pct: 0, humidityPct: 0, pressureKPa: 0 }
};

describe('ambientAt', () => {
  it('should start the cycle in daylight', () => {
    const ambient = ambientAt(0, profile);
    expect(ambient.exteriorTempC).toBe(40);
    expect(ambient.solarFraction).toBe(1);
  });

  it('should switch to night after the day fraction', () => {
    const ambient = ambientAt(5 * 3600, profile);
    expect(ambient.exteriorTempC).toBe(-20);
    expect(ambient.solarFraction).toBe(0);
  });

  it('should repeat every cycle', () => {
    expect(ambientAt(12 * 3600, profile).exteriorTempC).toBe(40);
  });

  it('should apply a negative phase offset', () => {
    expect(ambientAt(0, { ...profile, phaseOffsetHours: -1 }).exteriorTempC).toBe(-20);
  });

  it('should pass the atmosphere through', () => {
    expect(ambientAt(0, profile).atmosphere).toBe(profile.atmosphere);
  });
});

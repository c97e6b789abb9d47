/**
 * Unit tests for nutrient dosing
 */

import { decideNutrientDosing } from './nutrient-dosing';
import type { DosingConfig } from './types';

const config: DosingConfig = { targetConcentrationPpm: 150, phMin: 5.5, phMax: 7 };

describe('decideNutrientDosing', () => {
  it('should dose when short of nutrients at a good pH', () => {
    expect(decideNutrientDosing(0.5, { concentrationPpm: 90, ph: 6.5 }, config))
      .toEqual({ dose: true, reason: 'concentration 90ppm below target' });
  });

  it('should not dose with the mister off', () => {
    expect(decideNutrientDosing(0, { concentrationPpm: 90, ph: 6.5 }, config))
      .toEqual({ dose: false, reason: 'mister off' });
  });

  it('should not dose without nutrient data', () => {
    expect(decideNutrientDosing(1, null, config)).toEqual({ dose: false, reason: 'no nutrient data' });
  });

  it('should withhold dosing into alkaline substrate', () => {
    expect(decideNutrientDosing(1, { concentrationPpm: 90, ph: 9.25 }, config))
      .toEqual({ dose: false, reason: 'pH 9.25 outside 5.5-7' });
  });

  it('should accept the edges of the pH band', () => {
    expect(decideNutrientDosing(1, { concentrationPpm: 90, ph: 5.5 }, config).dose).toBe(true);
    expect(decideNutrientDosing(1, { concentrationPpm: 90, ph: 7 }, config).dose).toBe(true);
  });

  it('should stop dosing at the target concentration', () => {
    expect(decideNutrientDosing(1, { concentrationPpm: 150, ph: 6.5 }, config))
      .toEqual({ dose: false, reason: 'concentration at target' });
  });
});

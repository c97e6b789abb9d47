import { createPidState, resetPid, updatePid } from './pid';
import type { PidConfig } from './types';

const baseConfig: PidConfig = {
  kp: 0,
  ki: 0,
  kd: 0,
  outputMin: -100,
  outputMax: 100,
  integralLimit: 100
};

function config(overrides: Partial<PidConfig>): PidConfig {
  return { ...baseConfig, ...overrides };
}

describe('pid', () => {
  describe('createPidState', () => {
    it('should start with no history', () => {
      const state = createPidState();
      expect(state).toEqual({ integral: 0, previousError: 0, hasPrevious: false, windup: false, faultCount: 0 });
    });
  });

  describe('updatePid', () => {
    it('should apply the proportional term', () => {
      const state = createPidState();
      const result = updatePid(state, config({ kp: 2 }), 10, 7, 1);

      expect(result.output).toBe(6);
      expect(result.fault).toBeNull();
      expect(result.terms.p).toBe(6);
    });

    it('should accumulate error times dt in the integral', () => {
      const state = createPidState();
      const cfg = config({ ki: 0.5 });

      expect(updatePid(state, cfg, 10, 8, 2).output).toBe(2);
      expect(state.integral).toBe(4);
      expect(updatePid(state, cfg, 10, 8, 2).output).toBe(4);
      expect(state.integral).toBe(8);
    });

    it('should clamp the integral and flag windup', () => {
      const state = createPidState();
      const result = updatePid(state, config({ ki: 1, integralLimit: 5 }), 10, 0, 1);

      expect(state.integral).toBe(5);
      expect(state.windup).toBe(true);
      expect(result.output).toBe(5);
    });

    it('should clear the windup flag once the integral is back inside the limit', () => {
      const state = createPidState();
      const cfg = config({ ki: 1, integralLimit: 5 });
      updatePid(state, cfg, 10, 0, 1);
      updatePid(state, cfg, 0, 3, 1);

      expect(state.integral).toBe(2);
      expect(state.windup).toBe(false);
    });

    it('should skip the derivative on the first sample', () => {
      const state = createPidState();
      const cfg = config({ kd: 1 });

      expect(updatePid(state, cfg, 10, 7, 1).output).toBe(0);
      expect(updatePid(state, cfg, 10, 9, 2).output).toBe(-1);
    });

    it('should clamp the output to the configured bounds', () => {
      const state = createPidState();
      expect(updatePid(state, config({ kp: 100 }), 10, 7, 1).output).toBe(100);
      expect(updatePid(state, config({ kp: 100 }), 0, 7, 1).output).toBe(-100);
    });

    describe('non-positive dt', () => {
      it.each([0, -5, NaN, Infinity])('should return the neutral output for dt=%s', (dt) => {
        const state = createPidState();
        const result = updatePid(state, config({ kp: 2, outputMin: -1, outputMax: 1 }), 10, 0, dt);

        expect(result.output).toBe(0);
        expect(result.fault).toBe('NON_POSITIVE_DT');
        expect(state.faultCount).toBe(1);
      });

      it('should pull the neutral output into a positive range', () => {
        const state = createPidState();
        const result = updatePid(state, config({ outputMin: 0.2, outputMax: 1 }), 10, 0, 0);
        expect(result.output).toBe(0.2);
      });

      it('should leave the integral and previous error untouched', () => {
        const state = createPidState();
        const cfg = config({ kp: 1, ki: 1 });
        updatePid(state, cfg, 10, 8, 1);
        updatePid(state, cfg, 10, 0, 0);

        expect(state.integral).toBe(2);
        expect(state.previousError).toBe(2);
      });
    });

    describe('closed loop', () => {
      it('should converge without overshoot under proportional control', () => {
        const state = createPidState();
        const cfg = config({ kp: 0.5, outputMin: -10, outputMax: 10 });
        let measured = 0;
        let previousError = Infinity;

        for (let step = 0; step < 20; step++) {
          const error = 10 - measured;
          expect(Math.abs(error)).toBeLessThan(previousError);
          expect(error).toBeGreaterThan(0);
          previousError = Math.abs(error);

          measured += updatePid(state, cfg, 10, measured, 1).output;
        }
      });

      it('should remove a constant disturbance and stay settled', () => {
        const state = createPidState();
        const cfg = config({ kp: 0.5, ki: 0.05, outputMin: -10, outputMax: 10 });
        const leakPerSec = 1;
        let measured = 0;

        for (let step = 0; step < 300; step++) {
          const output = updatePid(state, cfg, 10, measured, 1).output;
          measured += output - leakPerSec;

          if (step >= 250) {
            expect(Math.abs(10 - measured)).toBeLessThan(1e-3);
          }
        }

        expect(state.integral).toBeCloseTo(20, 3);
      });
    });
  });

  describe('resetPid', () => {
    it('should clear history but keep the fault count', () => {
      const state = createPidState();
      const cfg = config({ ki: 1, integralLimit: 1 });
      updatePid(state, cfg, 10, 0, 1);
      updatePid(state, cfg, 10, 0, 0);

      resetPid(state);

      expect(state.integral).toBe(0);
      expect(state.previousError).toBe(0);
      expect(state.hasPrevious).toBe(false);
      expect(state.windup).toBe(false);
      expect(state.faultCount).toBe(1);
    });
  });
});

/**
 * Tests for application initialization
 */

import type { Mock } from 'vitest';

import { createAppLogger, initialize } from './init';

interface MockConsole {
  log: Mock<(message: string) => void>;
  warn: Mock<(message: string) => void>;
  error: Mock<(message: string) => void>;
}

function mockConsole(): MockConsole {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const plainLogging = { level: 1 as const, demoteHours: 0, consoleLevel: 1 as const, colors: false };

describe('createAppLogger', () => {
  it('should write INFO lines to console.log with the level tag', () => {
    const consoleApi = mockConsole();
    const logger = createAppLogger(() => 0, consoleApi, plainLogging);

    logger.info('ready');

    expect(consoleApi.log).toHaveBeenCalledWith('ℹ️ [INFO]     ready');
  });

  it('should drop DEBUG lines below the console level', () => {
    const consoleApi = mockConsole();
    const logger = createAppLogger(() => 0, consoleApi, plainLogging);

    logger.debug('noise');

    expect(consoleApi.log).not.toHaveBeenCalled();
  });

  it('should send CRITICAL lines to console.error', () => {
    const consoleApi = mockConsole();
    const logger = createAppLogger(() => 0, consoleApi, plainLogging);

    logger.critical('hazard');

    expect(consoleApi.error).toHaveBeenCalledWith('🚨 [CRITICAL] hazard');
  });
});

describe('initialize', () => {
  describe('successful initialization', () => {
    it('should return a simulation with one controller per dome', () => {
      const consoleApi = mockConsole();

      const sim = initialize([{ domeId: 'dome-a' }, { domeId: 'dome-b' }], {}, { consoleApi, logging: plainLogging });

      expect(sim).not.toBeNull();
      expect(sim?.domes.map((d) => d.id)).toEqual(['dome-a', 'dome-b']);
      expect(sim?.time()).toBe(0);
    });

    it('should log the startup banner', () => {
      const consoleApi = mockConsole();

      initialize([{ domeId: 'dome-a' }], {}, { consoleApi, logging: plainLogging });

      expect(consoleApi.log).toHaveBeenCalledWith(
        'ℹ️ [INFO]     🚀 Dome Controller: 1 domes, tick 60s, coordinator every 600s'
      );
      expect(consoleApi.log).toHaveBeenCalledWith(
        'ℹ️ [INFO]     🎯 dome-a | 22.0C 70% 1000ppm O2 21.0% | 💡 16h'
      );
    });

    it('should log configuration warnings through the dome logger', () => {
      const consoleApi = mockConsole();

      initialize([{ domeId: 'dome-a', baselineFan: 0.8 }], {}, { consoleApi, logging: plainLogging });

      expect(consoleApi.warn).toHaveBeenCalledWith(
        '⚠️ [WARNING]  [dome-a] Config: baselineFan is outside recommended range 0-0.5 (got 0.8)'
      );
    });
  });

  describe('configuration errors', () => {
    it('should print every field error and return null', () => {
      const consoleApi = mockConsole();

      const sim = initialize([{ domeId: 'dome-a', profiles: { idle: { co2Ppm: 200 } } }], {}, { consoleApi });

      expect(sim).toBeNull();
      expect(consoleApi.error).toHaveBeenCalledWith('INIT FAIL: Invalid configuration (dome-a)');
      expect(consoleApi.error).toHaveBeenCalledWith('  [profiles.idle]: profiles.idle: co2Ppm 200 outside 300-1500');
    });

    it('should reject invalid simulation settings', () => {
      const consoleApi = mockConsole();

      const sim = initialize([{ domeId: 'dome-a' }], { tickSec: 600, coordinatorIntervalSec: 60 }, { consoleApi });

      expect(sim).toBeNull();
      expect(consoleApi.error).toHaveBeenCalledWith('INIT FAIL: Invalid configuration (simulation)');
    });
  });
});

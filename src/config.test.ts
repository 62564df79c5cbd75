import { describe, test, expect } from 'vitest';
import { DEFAULT_CONFIG, inputBufferTicks, resolveConfig, tickDt, tickIntervalMs } from './config';
import { ConfigError } from './errors';

describe('resolveConfig', () => {
  test('returns the defaults when given nothing', () => {
    const config = resolveConfig();
    expect(config).toEqual(DEFAULT_CONFIG);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.worldBounds)).toBe(true);
  });

  test('merges partial world bounds', () => {
    const config = resolveConfig({ worldBounds: { maxX: 500 }, tickRate: 30 });
    expect(config.worldBounds).toEqual({ minX: 0, minY: 0, maxX: 500, maxY: 2048 });
    expect(config.tickRate).toBe(30);
  });

  test('rejects a non-positive tick rate', () => {
    expect(() => resolveConfig({ tickRate: 0 })).toThrow(ConfigError);
  });

  test('rejects a negative epsilon', () => {
    expect(() => resolveConfig({ reconciliationEpsilon: -1 })).toThrow("Invalid config 'reconciliationEpsilon'");
  });

  test('rejects inverted bounds', () => {
    expect(() => resolveConfig({ worldBounds: { minX: 10, maxX: 10 } })).toThrow("Invalid config 'worldBounds'");
  });

  test('rejects fractional history sizes', () => {
    expect(() => resolveConfig({ predictionHistorySize: 2.5 })).toThrow(ConfigError);
  });

  test('rejects recovery longer than the attack', () => {
    expect(() => resolveConfig({ attackTicks: 4, attackRecoveryTicks: 5 })).toThrow("Invalid config 'attackRecoveryTicks'");
  });

  test('derives timing values', () => {
    expect(tickDt({ tickRate: 50 })).toBe(0.02);
    expect(tickIntervalMs({ tickRate: 50 })).toBe(20);
    expect(inputBufferTicks({ inputBufferWindowMs: 250, tickRate: 60 })).toBe(15);
  });
});

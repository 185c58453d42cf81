import { describe, expect, it } from 'vitest';
import { DEFAULT_ENGINE_OPTIONS, clampTickInterval, parseRefreshSeconds, resolveEngineOptions } from '../services/config';

describe('config', () => {
  it('accepts refresh intervals of 1 to 60 whole seconds', () => {
    expect(parseRefreshSeconds('5')).toBe(5000);
    expect(parseRefreshSeconds(' 60 ')).toBe(60000);
    expect(parseRefreshSeconds('1')).toBe(1000);
  });

  it('rejects refresh intervals outside the bounds or not whole seconds', () => {
    expect(parseRefreshSeconds('0')).toBeNull();
    expect(parseRefreshSeconds('61')).toBeNull();
    expect(parseRefreshSeconds('2.5')).toBeNull();
    expect(parseRefreshSeconds('abc')).toBeNull();
    expect(parseRefreshSeconds('')).toBeNull();
  });

  it('clamps tick intervals', () => {
    expect(clampTickInterval(10)).toBe(1000);
    expect(clampTickInterval(120000)).toBe(60000);
    expect(clampTickInterval(Number.NaN)).toBe(1000);
  });

  it('merges overrides onto the defaults', () => {
    const options = resolveEngineOptions({ tickIntervalMs: 100, powerThresholds: { high: 800 } });

    expect(options.tickIntervalMs).toBe(1000);
    expect(options.powerThresholds).toEqual({ medium: 200, high: 800 });
    expect(options.bufferSize).toBe(15);
    expect(options.windowMs).toBe(60000);
  });

  it('keeps the documented defaults', () => {
    expect(DEFAULT_ENGINE_OPTIONS).toMatchObject({
      tickIntervalMs: 1000,
      bufferSize: 15,
      smoothingBase: 1.2,
      minPowerWatts: 1,
      refreshDelayMs: 1000,
      yAxisFloor: 0.005,
    });
  });
});

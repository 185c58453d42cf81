import type { RateConfig } from '../types';

export interface PowerThresholds {
  medium: number; // W, above this the live chart turns amber
  high: number; // W, above this it turns red
}

export interface EngineOptions {
  tickIntervalMs: number;
  bufferSize: number;
  smoothingBase: number;
  minPowerWatts: number;
  windowMs: number;
  refreshDelayMs: number;
  yAxisFloor: number;
  powerThresholds: PowerThresholds;
  clockIntervalMs: number;
  requestTimeoutMs: number;
}

export type EngineOptionsInput = Partial<Omit<EngineOptions, 'powerThresholds'>> & {
  powerThresholds?: Partial<PowerThresholds>;
};

export const MIN_TICK_INTERVAL_MS = 1000;
export const MAX_TICK_INTERVAL_MS = 60000;

export const DEFAULT_ENGINE_OPTIONS: EngineOptions = {
  tickIntervalMs: 1000,
  bufferSize: 15,
  smoothingBase: 1.2,
  minPowerWatts: 1,
  windowMs: 60000,
  refreshDelayMs: 1000,
  yAxisFloor: 0.005,
  powerThresholds: { medium: 200, high: 500 },
  clockIntervalMs: 1000,
  requestTimeoutMs: 10000,
};

export const DEFAULT_RATE_CONFIG: RateConfig = {
  currencyCode: 'EUR',
  pricePerKwh: 0,
  co2Factor: 0,
  efficiencyFactor: 0,
};

export const clampTickInterval = (ms: number): number => {
  if (!Number.isFinite(ms)) return DEFAULT_ENGINE_OPTIONS.tickIntervalMs;
  return Math.min(MAX_TICK_INTERVAL_MS, Math.max(MIN_TICK_INTERVAL_MS, Math.round(ms)));
};

export const resolveEngineOptions = (input: EngineOptionsInput = {}): EngineOptions => {
  const { powerThresholds, ...rest } = input;
  const merged: EngineOptions = {
    ...DEFAULT_ENGINE_OPTIONS,
    ...rest,
    powerThresholds: { ...DEFAULT_ENGINE_OPTIONS.powerThresholds, ...powerThresholds },
  };
  return {
    ...merged,
    tickIntervalMs: clampTickInterval(merged.tickIntervalMs),
    bufferSize: Math.max(1, Math.floor(merged.bufferSize)),
  };
};

/**
 * Validates the refresh interval typed into the realtime panel (seconds).
 * Returns the interval in milliseconds, or null when the input is outside 1-60 s.
 */
export const parseRefreshSeconds = (input: string): number | null => {
  const trimmed = input.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const seconds = Number(trimmed);
  const ms = seconds * 1000;
  if (ms < MIN_TICK_INTERVAL_MS || ms > MAX_TICK_INTERVAL_MS) return null;
  return ms;
};

import { describe, expect, it } from 'vitest';
import { MalformedResponse } from '../services/errors';
import {
  AggregateResultSchema,
  AvailableYearsSchema,
  CostSeriesSchema,
  EnergyUpdateSchema,
  RateConfigSchema,
  UpsCacheSchema,
  parseApiResponse,
  toSample,
} from '../services/schemas';

describe('response schemas', () => {
  it('coerces an energy data response', () => {
    const result = parseApiResponse(
      AggregateResultSchema,
      {
        totalEnergy: '1500.5',
        total_cost: 0.4,
        avgLoad: 140,
        co2: -2,
        trends: { energy: 2000, cost: -150, load: '5' },
        cost_distribution: { morning: 0.1, afternoon: -1, evening: '0.2' },
      },
      'api/energy/data',
    );

    expect(result).toEqual({
      totalEnergyWh: 1500.5,
      totalCost: 0.4,
      avgLoadPercent: 100,
      co2Kg: 0,
      trends: { energy: 1000, cost: -100, load: 5 },
      costDistribution: { morning: 0.1, afternoon: 0, evening: 0.2, night: 0 },
    });
  });

  it('reads missing totals as zero', () => {
    expect(parseApiResponse(AggregateResultSchema, {}, 'api/energy/data')).toEqual({
      totalEnergyWh: 0,
      totalCost: 0,
      avgLoadPercent: 0,
      co2Kg: 0,
    });
  });

  it('drops unreadable cost points', () => {
    const series = parseApiResponse(
      CostSeriesSchema,
      { success: true, series: [[1000, 0.1], ['2024-03-05T10:00:00.000Z', '0.2'], ['bad', 1], [5], 'x'] },
      'api/energy/cost-trend',
    );

    expect(series).toEqual([
      [1000, 0.1],
      [Date.parse('2024-03-05T10:00:00.000Z'), 0.2],
    ]);
  });

  it('rejects an unsuccessful series response', () => {
    expect(() => parseApiResponse(CostSeriesSchema, { success: false, error: 'no data' }, 'api/energy/detailed')).toThrow(
      MalformedResponse,
    );
  });

  it('normalises rate settings', () => {
    const rate = parseApiResponse(
      RateConfigSchema,
      { success: true, data: { currency: ' usd ', price_per_kwh: '0.3' } },
      'api/settings/variables',
    );

    expect(rate).toEqual({ currencyCode: 'USD', pricePerKwh: 0.3, co2Factor: 0, efficiencyFactor: 0 });
  });

  it('parses year lists', () => {
    expect(parseApiResponse(AvailableYearsSchema, ['2023', 2024, 'x'], 'api/energy/available-years')).toEqual([2023, 2024]);
  });

  it('reads the live reading from the second cache entry', () => {
    const body = parseApiResponse(
      UpsCacheSchema,
      { success: true, data: [{ ups_realpower: 1 }, { ups_realpower: '350', ups_load: 35, battery_charge: 100 }] },
      'api/ups/cache',
    );

    expect(toSample(body, 5000, 'api/ups/cache')).toEqual({
      timestamp: 5000,
      realpowerWatts: 350,
      loadPercent: 35,
      batteryCharge: 100,
    });
  });

  it('rejects a cache response without a live reading', () => {
    expect(() => parseApiResponse(UpsCacheSchema, { success: true, data: [{}] }, 'api/ups/cache')).toThrow(MalformedResponse);
    const body = parseApiResponse(UpsCacheSchema, { success: true, data: [{}, 'n/a'] }, 'api/ups/cache');
    expect(() => toSample(body, 0, 'api/ups/cache')).toThrow(MalformedResponse);
  });

  it('parses a push update', () => {
    expect(
      parseApiResponse(EnergyUpdateSchema, { history: [[1000, 0.5]], stats: { totalEnergy: 10 } }, 'energy_update'),
    ).toEqual({
      history: [[1000, 0.5]],
      stats: { totalEnergyWh: 10, totalCost: 0, avgLoadPercent: 0, co2Kg: 0 },
    });
  });
});

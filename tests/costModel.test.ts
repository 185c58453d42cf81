import { describe, expect, it } from 'vitest';
import {
  co2FromEnergy,
  costFromEnergyWh,
  costFromPowerWatts,
  costToEnergyKwh,
  costToWatts,
  createCostModel,
  effectivePower,
  energyWh,
  savedEnergyWh,
} from '../services/analytics/costModel';

describe('costModel', () => {
  it('integrates power over time into energy', () => {
    expect(energyWh(500, 2)).toBe(1000);
    expect(energyWh(0, 5)).toBe(0);
  });

  it('derives saved energy from the efficiency factor', () => {
    expect(savedEnergyWh(2000, 0.25)).toBe(500);
    expect(savedEnergyWh(2000, 0)).toBe(0);
  });

  it('prices energy per kWh', () => {
    expect(costFromEnergyWh(2000, 0.25)).toBe(0.5);
    expect(costFromEnergyWh(0, 0.25)).toBe(0);
  });

  it('converts kWh to CO2 kg', () => {
    expect(co2FromEnergy(4, 0.5)).toBe(2);
  });

  it('derives effective power from load and nominal rating', () => {
    expect(effectivePower(50, 800)).toBe(400);
  });

  it('uses nominal power times load when a rating is known', () => {
    // 1000 W * 20% = 200 W for one hour at 0.5/kWh
    expect(costFromPowerWatts(999, 20, 1000, 0.5)).toBe(0.1);
  });

  it('falls back to the measured power without a rating', () => {
    expect(costFromPowerWatts(400, 20, 0, 0.5)).toBe(0.2);
  });

  it('converts a cost back into energy and average power', () => {
    expect(costToEnergyKwh(0.5, 0.25)).toBe(2);
    expect(costToWatts(0.5, 0.25)).toBe(2000);
  });

  it('returns 0 for the inverse conversions when the price is 0', () => {
    expect(costToEnergyKwh(0.5, 0)).toBe(0);
    expect(costToWatts(0.5, 0)).toBe(0);
  });

  it('binds the rate into a model', () => {
    const model = createCostModel({ currencyCode: 'EUR', pricePerKwh: 0.25, co2Factor: 0.5, efficiencyFactor: 0.8 });

    expect(model.liveCost(400)).toBe(0.1);
    expect(model.liveCo2(400)).toBe(0.2);
  });
});

import type { RateConfig } from '../../types';

export const energyWh = (powerWatts: number, hours: number): number => powerWatts * hours;

export const costFromEnergyWh = (energyWh: number, priceKwh: number): number => (energyWh / 1000) * priceKwh;

export const co2FromEnergy = (energyKwh: number, co2Factor: number): number => energyKwh * co2Factor;

// Energy the UPS saved over a period, from the configured efficiency factor.
export const savedEnergyWh = (energyWh: number, efficiencyFactor: number): number => energyWh * efficiencyFactor;

export const effectivePower = (loadPercent: number, nominalPowerWatts: number): number =>
  nominalPowerWatts * (loadPercent / 100);

/**
 * Hourly cost of a power draw. With a rated (nominal) power the draw is taken as
 * `nominal * load%`, otherwise the measured power is used as-is.
 */
export const costFromPowerWatts = (
  powerWatts: number,
  loadPercent: number,
  nominalPowerWatts: number,
  priceKwh: number,
): number => {
  const watts = nominalPowerWatts > 0 ? effectivePower(loadPercent, nominalPowerWatts) : powerWatts;
  return costFromEnergyWh(energyWh(watts, 1), priceKwh);
};

// Inverse conversions used by chart tooltips.
export const costToEnergyKwh = (cost: number, priceKwh: number): number => (priceKwh > 0 ? cost / priceKwh : 0);

export const costToWatts = (cost: number, priceKwh: number): number => (priceKwh > 0 ? (cost * 1000) / priceKwh : 0);

export interface CostModel {
  readonly rate: RateConfig;
  liveCost(powerWatts: number): number;
  liveCo2(powerWatts: number): number;
}

export const createCostModel = (rate: RateConfig): CostModel => ({
  rate,
  liveCost: (powerWatts) => costFromEnergyWh(energyWh(powerWatts, 1), rate.pricePerKwh),
  liveCo2: (powerWatts) => co2FromEnergy(powerWatts / 1000, rate.co2Factor),
});

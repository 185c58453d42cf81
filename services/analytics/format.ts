import { format } from 'date-fns';
import type { ModeKind, TrendMetric } from '../../types';
import { costToEnergyKwh, costToWatts } from './costModel';
import { timeFormatFor } from './timeRange';

export const currencySymbol = (currency: string): string =>
  currency === 'EUR' ? '€' : currency === 'GBP' ? '£' : currency === 'USD' ? '$' : currency === 'JPY' ? '¥' : `${currency} `;

const safe = (value: number): number => (Number.isFinite(value) ? value : 0);

// Historical totals are energy (Wh/kWh); live values are power (W/kW).
export const formatEnergy = (value: number, live: boolean): string => {
  const v = safe(value);
  const [base, prefixed] = live ? ['W', 'kW'] : ['Wh', 'kWh'];
  return v < 1000 ? `${v.toFixed(1)} ${base}` : `${(v / 1000).toFixed(2)} ${prefixed}`;
};

export const formatCost = (value: number, currency: string, live: boolean): string =>
  `${currencySymbol(currency)}${safe(value).toFixed(live ? 4 : 2)}`;

export const formatLoad = (value: number): string => `${safe(value).toFixed(1)}%`;

export const formatCo2 = (value: number): string => `${safe(value).toFixed(2)} kg`;

export type TrendDirection = 'up' | 'down' | 'neutral';

export const trendDirection = (delta: number): TrendDirection => (delta > 0 ? 'up' : delta < 0 ? 'down' : 'neutral');

export const formatTrend = (delta: number): string => `${Math.abs(safe(delta)).toFixed(1)}% vs last period`;

export const TREND_TITLES: Record<TrendMetric, string> = {
  energy: 'Total Energy',
  cost: 'Total Cost',
  load: 'Average Load',
  co2: 'CO₂ Emissions',
};

export const formatTick = (ts: number, kind: ModeKind): string => format(ts, timeFormatFor(kind));

// Bar tooltip: the cost plus the energy it stands for at the current price.
export const formatCostTooltip = (cost: number, currency: string, priceKwh: number): string =>
  `${currencySymbol(currency)}${safe(cost).toFixed(2)} (${costToEnergyKwh(cost, priceKwh).toFixed(2)} kWh)`;

// Detail tooltip: the cost plus the average power it stands for.
export const formatDetailTooltip = (cost: number, currency: string, priceKwh: number): string =>
  `${currencySymbol(currency)}${safe(cost).toFixed(2)} ( ${costToWatts(cost, priceKwh).toFixed(1)} W )`;

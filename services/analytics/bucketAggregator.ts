import type { Bucket, CostDistribution, CostPoint, DistributionView, PeriodLabel } from '../../types';

export const PERIOD_ORDER: readonly PeriodLabel[] = ['morning', 'afternoon', 'evening', 'night'];

export const PERIOD_LABELS: Record<PeriodLabel, string> = {
  morning: 'Morning (6-12)',
  afternoon: 'Afternoon (12-18)',
  evening: 'Evening (18-23)',
  night: 'Night (23-6)',
};

// Round half up. Scaling goes through the decimal exponent of the shortest string form,
// so 4.0005 becomes exactly 4000.5 instead of 4000.499999...
export const roundHalfUp = (value: number, decimals: number): number => {
  if (!Number.isFinite(value)) return 0;
  const sign = value < 0 ? -1 : 1;
  const [mantissa, exponent = '0'] = String(Math.abs(value)).split('e');
  const scaled = Math.round(Number(`${mantissa}e${Number(exponent) + decimals}`));
  return scaled === 0 ? 0 : (sign * scaled) / Math.pow(10, decimals);
};

export const periodForHour = (hour: number): PeriodLabel => {
  if (hour >= 6 && hour < 12) return 'morning';
  if (hour >= 12 && hour < 18) return 'afternoon';
  if (hour >= 18 && hour < 23) return 'evening';
  return 'night';
};

const emptyDistribution = (): CostDistribution => ({ morning: 0, afternoon: 0, evening: 0, night: 0 });

const toView = (raw: CostDistribution): DistributionView => {
  const buckets: Bucket[] = PERIOD_ORDER.map((periodLabel) => ({
    periodLabel,
    costValue: roundHalfUp(Math.max(0, raw[periodLabel]), 3),
  }));
  // The total is rounded from the unrounded bucket values.
  const total = roundHalfUp(
    PERIOD_ORDER.reduce((sum, period) => sum + Math.max(0, raw[period]), 0),
    2,
  );
  return { buckets, total };
};

/** Display buckets from a backend `cost_distribution`; an absent distribution yields four zero buckets. */
export const fromDistribution = (distribution?: Partial<CostDistribution> | null): DistributionView => {
  const raw = emptyDistribution();
  if (distribution) {
    for (const period of PERIOD_ORDER) {
      const v = distribution[period];
      raw[period] = typeof v === 'number' && Number.isFinite(v) ? v : 0;
    }
  }
  return toView(raw);
};

/** Buckets a raw cost series by the local hour of each point. */
export const fromCostSeries = (series: readonly CostPoint[]): DistributionView => {
  const raw = emptyDistribution();
  for (const [timestamp, cost] of series) {
    raw[periodForHour(new Date(timestamp).getHours())] += cost;
  }
  return toView(raw);
};

export interface EnergySample {
  timestamp: number;
  energyWh: number;
}

export const fromSamples = (samples: readonly EnergySample[], pricePerKwh: number): DistributionView =>
  fromCostSeries(samples.map((s): CostPoint => [s.timestamp, (Math.max(0, s.energyWh) / 1000) * pricePerKwh]));

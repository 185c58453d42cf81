import { z } from 'zod';
import { MalformedResponse } from './errors';
import type {
  AggregateResult,
  CostPoint,
  EnergyUpdateEvent,
  RateConfig,
  Sample,
  TrendMetric,
} from '../types';

export type ApiSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export function parseApiResponse<T>(schema: ApiSchema<T>, data: unknown, path: string): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new MalformedResponse(path, 'unexpected shape', result.error.issues);
  }
  return result.data;
}

// Missing or non-numeric telemetry reads as 0.
export const coerceNumber = (value: unknown): number => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : 0;
  if (typeof value === 'string') {
    const n = parseFloat(value);
    return Number.isFinite(n) ? n : 0;
  }
  return 0;
};

export const nonNegative = (value: unknown): number => Math.max(0, coerceNumber(value));

export const clampPercent = (value: unknown): number => Math.min(100, Math.max(0, coerceNumber(value)));

const TREND_METRICS: TrendMetric[] = ['energy', 'cost', 'load', 'co2'];

const RecordSchema = z.record(z.string(), z.unknown());

export const EnergyDataSchema = z
  .object({
    totalEnergy: z.unknown().optional(),
    total_energy: z.unknown().optional(),
    totalCost: z.unknown().optional(),
    total_cost: z.unknown().optional(),
    avgLoad: z.unknown().optional(),
    avg_load: z.unknown().optional(),
    co2: z.unknown().optional(),
    trends: RecordSchema.nullish(),
    cost_distribution: RecordSchema.nullish(),
  })
  .passthrough();

export type EnergyDataResponse = z.infer<typeof EnergyDataSchema>;

const firstPresent = (...values: unknown[]): unknown => values.find((v) => v !== undefined && v !== null);

export const toAggregateResult = (raw: EnergyDataResponse): AggregateResult => {
  const result: AggregateResult = {
    totalEnergyWh: nonNegative(firstPresent(raw.totalEnergy, raw.total_energy)),
    totalCost: nonNegative(firstPresent(raw.totalCost, raw.total_cost)),
    avgLoadPercent: clampPercent(firstPresent(raw.avgLoad, raw.avg_load)),
    co2Kg: nonNegative(raw.co2),
  };

  if (raw.trends) {
    const trends: Partial<Record<TrendMetric, number>> = {};
    for (const metric of TREND_METRICS) {
      if (raw.trends[metric] === undefined) continue;
      trends[metric] = Math.min(1000, Math.max(-100, coerceNumber(raw.trends[metric])));
    }
    result.trends = trends;
  }

  const distribution = raw.cost_distribution;
  if (distribution) {
    result.costDistribution = {
      morning: nonNegative(distribution.morning),
      afternoon: nonNegative(distribution.afternoon),
      evening: nonNegative(distribution.evening),
      night: nonNegative(distribution.night),
    };
  }

  return result;
};

export const AggregateResultSchema: ApiSchema<AggregateResult> = EnergyDataSchema.transform(toAggregateResult);

const toTimestamp = (value: unknown): number | null => {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string') {
    const ms = Date.parse(value);
    return Number.isNaN(ms) ? null : ms;
  }
  return null;
};

// Points that cannot be read are dropped; costs below zero clamp to zero.
export const toCostSeries = (points: unknown[]): CostPoint[] => {
  const series: CostPoint[] = [];
  for (const point of points) {
    if (!Array.isArray(point) || point.length < 2) continue;
    const ts = toTimestamp(point[0]);
    if (ts === null) continue;
    series.push([ts, nonNegative(point[1])]);
  }
  return series;
};

export const CostSeriesSchema: ApiSchema<CostPoint[]> = z
  .object({
    success: z.boolean(),
    series: z.array(z.unknown()).optional(),
    error: z.string().optional(),
  })
  .superRefine((body, ctx) => {
    if (!body.success) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: body.error ?? 'success=false', path: ['success'] });
    } else if (!body.series) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'series missing', path: ['series'] });
    }
  })
  .transform((body) => toCostSeries(body.series ?? []));

export const AvailableYearsSchema: ApiSchema<number[]> = z
  .array(z.union([z.number(), z.string()]))
  .transform((years) => years.map((y) => Math.trunc(coerceNumber(y))).filter((y) => y > 0));

export const RateConfigSchema: ApiSchema<RateConfig> = z
  .object({
    success: z.literal(true),
    data: z
      .object({
        currency: z.string().optional(),
        price_per_kwh: z.unknown().optional(),
        co2_factor: z.unknown().optional(),
        efficiency_factor: z.unknown().optional(),
      })
      .passthrough(),
  })
  .transform(({ data }) => ({
    currencyCode: data.currency?.trim() ? data.currency.trim().toUpperCase() : 'EUR',
    pricePerKwh: nonNegative(data.price_per_kwh),
    co2Factor: nonNegative(data.co2_factor),
    efficiencyFactor: nonNegative(data.efficiency_factor),
  }));

// The cache endpoint answers with several snapshots; the live reading sits at index 1.
export const UpsCacheSchema = z.object({
  success: z.literal(true),
  data: z.array(z.unknown()).min(2),
});

export const toSample = (body: z.infer<typeof UpsCacheSchema>, timestamp: number, path: string): Sample => {
  const parsed = RecordSchema.safeParse(body.data[1]);
  if (!parsed.success) {
    throw new MalformedResponse(path, 'live reading is not an object', parsed.error.issues);
  }
  const reading = parsed.data;
  const sample: Sample = {
    timestamp,
    realpowerWatts: nonNegative(reading.ups_realpower),
    loadPercent: clampPercent(reading.ups_load),
  };
  if (reading.battery_charge !== undefined && reading.battery_charge !== null) {
    sample.batteryCharge = clampPercent(reading.battery_charge);
  }
  return sample;
};

export const EnergyUpdateSchema: ApiSchema<EnergyUpdateEvent> = z
  .object({
    history: z.unknown().optional(),
    stats: EnergyDataSchema,
  })
  .transform((event) => ({
    history: Array.isArray(event.history) ? toCostSeries(event.history) : [],
    stats: toAggregateResult(event.stats),
  }));

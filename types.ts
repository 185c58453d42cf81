export type ModeKind = 'realtime' | 'today' | 'day' | 'range';

export type ModeState =
  | { kind: 'realtime'; refreshIntervalMs: number }
  | { kind: 'today'; fromTime: string; toTime: string } // HH:mm
  | { kind: 'day'; date: string } // YYYY-MM-DD
  | { kind: 'range'; fromDate: string; toDate: string; year?: number };

export interface Sample {
  timestamp: number; // epoch ms
  realpowerWatts: number;
  loadPercent: number;
  batteryCharge?: number;
}

export interface RateConfig {
  currencyCode: string;
  pricePerKwh: number;
  co2Factor: number;
  efficiencyFactor: number;
}

export type PeriodLabel = 'morning' | 'afternoon' | 'evening' | 'night';

export interface Bucket {
  periodLabel: PeriodLabel;
  costValue: number;
}

export type CostDistribution = Record<PeriodLabel, number>;

export type TrendMetric = 'energy' | 'cost' | 'load' | 'co2';

export interface AggregateResult {
  totalEnergyWh: number;
  totalCost: number;
  avgLoadPercent: number;
  co2Kg: number;
  trends?: Partial<Record<TrendMetric, number>>;
  costDistribution?: CostDistribution;
}

// [timestamp ms, cost in currency units]
export type CostPoint = [number, number];

export interface DistributionView {
  buckets: Bucket[];
  total: number;
}

export type Granularity = 'hour' | 'minute';

export interface DrillDownContext {
  originTimestamp: number;
  granularity: Granularity;
  parentGranularity: ModeKind | Granularity;
}

export interface EnergyQuery {
  type: 'today' | 'day' | 'range' | 'realtime';
  from_time?: string;
  to_time?: string;
}

export interface DetailQuery {
  from_time: string; // ISO instant
  to_time: string;
  detail_type: 'day' | 'hour';
}

export interface EnergyUpdateEvent {
  history: CostPoint[];
  stats: AggregateResult;
}

// Stat card values. `live` switches the display rules to instantaneous units (W, 4-decimal cost).
export interface StatsView {
  energy: number;
  cost: number;
  load: number;
  co2: number;
  trends?: Partial<Record<TrendMetric, number>>;
  live: boolean;
}

export interface Layout {
  columns: 1 | 2;
  showDistribution: boolean;
}

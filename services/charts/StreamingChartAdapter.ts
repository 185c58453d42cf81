import type { Cancel, Clock } from '../clock';
import type { PowerThresholds } from '../config';
import { BaseChartAdapter } from './ChartRenderingAdapter';

export interface StreamingPoint {
  x: number; // epoch ms
  y: number; // smoothed cost
}

export interface StreamingSample {
  timestamp: number;
  value: number;
  powerWatts: number;
}

export type PowerTier = 'low' | 'medium' | 'high';

export const TIER_COLORS: Record<PowerTier, string> = {
  low: '#00c853',
  medium: '#f59e0b',
  high: '#ef4444',
};

export const powerTier = (powerWatts: number, thresholds: PowerThresholds): PowerTier => {
  if (powerWatts > thresholds.high) return 'high';
  if (powerWatts > thresholds.medium) return 'medium';
  return 'low';
};

// Headroom above the visible maximum, never below the floor so the line does not flatten.
export const yAxisMax = (points: readonly StreamingPoint[], floor: number): number => {
  if (points.length === 0) return floor;
  const max = points.reduce((m, p) => Math.max(m, p.y), 0);
  return Math.max(1.2 * max, floor);
};

export interface StreamingSnapshot {
  points: StreamingPoint[];
  yMax: number;
  tier: PowerTier;
  borderColor: string;
  windowStart: number;
  windowEnd: number;
  live: boolean;
}

export interface StreamingChartOptions {
  clock: Clock;
  source: () => StreamingSample | null;
  refreshMs: number;
  delayMs: number;
  windowMs: number;
  yAxisFloor: number;
  thresholds: PowerThresholds;
}

/**
 * Append-only live chart over a sliding time window. After `delayMs` it pulls the latest
 * smoothed sample every `refreshMs` and drops points that slid out of the window.
 */
export class StreamingChartAdapter extends BaseChartAdapter<StreamingPoint[], StreamingSnapshot> {
  readonly kind = 'streaming';
  private timers: Cancel[] = [];

  constructor(private readonly opts: StreamingChartOptions) {
    super({
      points: [],
      yMax: opts.yAxisFloor,
      tier: 'low',
      borderColor: TIER_COLORS.low,
      windowStart: 0,
      windowEnd: 0,
      live: false,
    });
  }

  protected onRender(initialData: StreamingPoint[]): void {
    this.publish(this.appendAfter([], initialData), this.snapshot.tier);
    this.timers.push(
      this.opts.clock.after(this.opts.delayMs, () => {
        this.pull();
        this.timers.push(this.opts.clock.every(this.opts.refreshMs, () => this.pull()));
      }),
    );
  }

  protected onUpdate(newData: StreamingPoint[]): void {
    this.publish(this.appendAfter(this.snapshot.points, newData), this.snapshot.tier);
  }

  protected onDispose(): void {
    this.timers.forEach((cancel) => cancel());
    this.timers = [];
    this.commit({ ...this.snapshot, live: false });
  }

  pull(): void {
    if (!this.live) return;
    const sample = this.opts.source();
    if (!sample) {
      this.publish(this.snapshot.points, this.snapshot.tier);
      return;
    }
    const points = this.appendAfter(this.snapshot.points, [{ x: sample.timestamp, y: sample.value }]);
    this.publish(points, powerTier(sample.powerWatts, this.opts.thresholds));
  }

  private appendAfter(current: StreamingPoint[], incoming: readonly StreamingPoint[]): StreamingPoint[] {
    const next = current.slice();
    for (const point of incoming) {
      const last = next[next.length - 1];
      if (!last || point.x > last.x) next.push(point);
    }
    return next;
  }

  private publish(points: StreamingPoint[], tier: PowerTier): void {
    const windowEnd = this.opts.clock.now() - this.opts.delayMs;
    const windowStart = windowEnd - this.opts.windowMs;
    const visible = points.filter((p) => p.x >= windowStart);
    this.commit({
      points: visible,
      yMax: yAxisMax(visible, this.opts.yAxisFloor),
      tier,
      borderColor: TIER_COLORS[tier],
      windowStart,
      windowEnd,
      live: this.live,
    });
  }
}

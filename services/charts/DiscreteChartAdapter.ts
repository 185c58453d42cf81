import type { CostPoint, DistributionView, ModeKind } from '../../types';
import { fromDistribution } from '../analytics/bucketAggregator';
import { BaseChartAdapter } from './ChartRenderingAdapter';

export interface DiscreteChartData {
  series: CostPoint[];
  distribution: DistributionView;
}

export interface DiscreteSnapshot extends DiscreteChartData {
  period: ModeKind;
  live: boolean;
  version: number;
}

export interface DiscreteChartOptions {
  period: ModeKind;
  onSelect?: (timestamp: number) => void;
}

export const emptyDiscreteData = (): DiscreteChartData => ({ series: [], distribution: fromDistribution(null) });

/** Cost-trend bars plus the usage donut. Every update replaces the whole dataset. */
export class DiscreteChartAdapter extends BaseChartAdapter<DiscreteChartData, DiscreteSnapshot> {
  readonly kind = 'discrete';

  constructor(private readonly opts: DiscreteChartOptions) {
    super({ ...emptyDiscreteData(), period: opts.period, live: false, version: 0 });
  }

  get period(): ModeKind {
    return this.opts.period;
  }

  /** Point selection on the bar series. Returns the selected timestamp, or null for an unknown index. */
  selectPoint(index: number): number | null {
    if (!this.live) return null;
    const point = this.snapshot.series[index];
    if (!point) return null;
    this.opts.onSelect?.(point[0]);
    return point[0];
  }

  protected onRender(initialData: DiscreteChartData): void {
    this.replace(initialData);
  }

  protected onUpdate(newData: DiscreteChartData): void {
    this.replace(newData);
  }

  protected onDispose(): void {
    this.commit({ ...this.snapshot, live: false, version: this.snapshot.version + 1 });
  }

  private replace(data: DiscreteChartData): void {
    this.commit({
      series: data.series.slice(),
      distribution: data.distribution,
      period: this.opts.period,
      live: true,
      version: this.snapshot.version + 1,
    });
  }
}

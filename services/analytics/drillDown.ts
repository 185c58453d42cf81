import { endOfDay, endOfHour, format, startOfDay, startOfHour } from 'date-fns';
import type { CostPoint, DetailQuery, DrillDownContext, ModeKind } from '../../types';
import { RequestSlot } from './requestSlot';

export interface DrillDownPlan {
  context: DrillDownContext;
  query: DetailQuery;
  title: string;
}

const hourTitle = (ts: number): string => `Minutes detail for ${new Date(ts).getHours()}:00`;

const minutePlan = (timestamp: number, parent: DrillDownContext['parentGranularity']): DrillDownPlan => ({
  context: { originTimestamp: timestamp, granularity: 'minute', parentGranularity: parent },
  query: {
    from_time: startOfHour(timestamp).toISOString(),
    to_time: endOfHour(timestamp).toISOString(),
    detail_type: 'hour',
  },
  title: hourTitle(timestamp),
});

/**
 * A point picked on a multi-day range opens the hours of its calendar day;
 * anywhere else it opens the minutes of its clock hour.
 */
export const planDrillDown = (timestamp: number, activeKind: ModeKind): DrillDownPlan => {
  if (activeKind === 'range') {
    return {
      context: { originTimestamp: timestamp, granularity: 'hour', parentGranularity: activeKind },
      query: {
        from_time: startOfDay(timestamp).toISOString(),
        to_time: endOfDay(timestamp).toISOString(),
        detail_type: 'day',
      },
      title: `Hours detail for ${format(timestamp, 'P')}`,
    };
  }
  return minutePlan(timestamp, activeKind);
};

export interface DrillDownResult {
  context: DrillDownContext;
  series: CostPoint[];
  title: string;
}

export type DetailFetcher = (query: DetailQuery, signal: AbortSignal) => Promise<CostPoint[]>;

/**
 * Holds at most one drill-down level. Opening starts a fresh session; selecting inside an
 * hour-level view goes one level down to minutes; selecting inside minutes does nothing.
 */
export class DrillDownFetcher {
  private active: DrillDownContext | null = null;
  private readonly slot = new RequestSlot('drill-down');

  constructor(private readonly fetchDetail: DetailFetcher) {}

  get context(): DrillDownContext | null {
    return this.active;
  }

  async open(timestamp: number, activeKind: ModeKind): Promise<DrillDownResult> {
    this.active = null;
    return this.load(planDrillDown(timestamp, activeKind));
  }

  /** Returns null when the selection is a no-op (already at minute level, or nothing open). */
  async select(timestamp: number): Promise<DrillDownResult | null> {
    if (!this.active || this.active.granularity === 'minute') return null;
    return this.load(minutePlan(timestamp, this.active.granularity));
  }

  close(): void {
    this.slot.cancel();
    this.active = null;
  }

  private async load(plan: DrillDownPlan): Promise<DrillDownResult> {
    const series = await this.slot.run((signal) => this.fetchDetail(plan.query, signal));
    this.active = plan.context;
    return { context: plan.context, series, title: plan.title };
  }
}

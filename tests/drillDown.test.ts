import { describe, expect, it, vi } from 'vitest';
import { DrillDownFetcher, planDrillDown } from '../services/analytics/drillDown';
import { isStaleResponse } from '../services/errors';
import type { CostPoint, DetailQuery } from '../types';
import { deferred } from './helpers/fakeBackend';

const T = new Date(2024, 2, 5, 14, 25, 0).getTime();

describe('planDrillDown', () => {
  it('opens the hours of the calendar day from a Range point', () => {
    const plan = planDrillDown(T, 'range');

    expect(plan.query).toEqual({
      from_time: new Date(2024, 2, 5, 0, 0, 0, 0).toISOString(),
      to_time: new Date(2024, 2, 5, 23, 59, 59, 999).toISOString(),
      detail_type: 'day',
    });
    expect(plan.context).toEqual({ originTimestamp: T, granularity: 'hour', parentGranularity: 'range' });
  });

  it('opens the minutes of the clock hour from Today or Day', () => {
    for (const kind of ['today', 'day'] as const) {
      const plan = planDrillDown(T, kind);
      expect(plan.query).toEqual({
        from_time: new Date(2024, 2, 5, 14, 0, 0, 0).toISOString(),
        to_time: new Date(2024, 2, 5, 14, 59, 59, 999).toISOString(),
        detail_type: 'hour',
      });
      expect(plan.title).toBe('Minutes detail for 14:00');
      expect(plan.context.granularity).toBe('minute');
    }
  });
});

describe('DrillDownFetcher', () => {
  it('descends from hours to minutes and stops there', async () => {
    const fetchDetail = vi.fn<(query: DetailQuery, signal: AbortSignal) => Promise<CostPoint[]>>(async () => [[T, 0.1]]);
    const fetcher = new DrillDownFetcher(fetchDetail);

    const hours = await fetcher.open(T, 'range');
    expect(hours.context.granularity).toBe('hour');

    const minutes = await fetcher.select(T);
    expect(minutes?.context).toEqual({ originTimestamp: T, granularity: 'minute', parentGranularity: 'hour' });
    expect(fetchDetail.mock.calls[1][0].detail_type).toBe('hour');

    expect(await fetcher.select(T)).toBeNull();
    expect(fetchDetail).toHaveBeenCalledTimes(2);
  });

  it('does nothing when selecting with no open view', async () => {
    const fetchDetail = vi.fn<(query: DetailQuery, signal: AbortSignal) => Promise<CostPoint[]>>(async () => []);
    const fetcher = new DrillDownFetcher(fetchDetail);

    expect(await fetcher.select(T)).toBeNull();
    expect(fetchDetail).not.toHaveBeenCalled();
  });

  it('marks a fetch that finishes after close as stale', async () => {
    const pending = deferred<CostPoint[]>();
    const fetcher = new DrillDownFetcher(() => pending.promise);

    const opening = fetcher.open(T, 'today');
    fetcher.close();
    pending.resolve([[T, 0.2]]);

    const error = await opening.catch((e: unknown) => e);
    expect(isStaleResponse(error)).toBe(true);
    expect(fetcher.context).toBeNull();
  });
});

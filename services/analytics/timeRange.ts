import { format, parseISO } from 'date-fns';
import type { AggregateResult, EnergyQuery, Layout, ModeKind, ModeState } from '../../types';
import { DEFAULT_ENGINE_OPTIONS, clampTickInterval } from '../config';

export const timeOfDay = (ms: number): string => format(ms, 'HH:mm');

export const todayMode = (now: number, fromTime = '00:00'): ModeState => ({
  kind: 'today',
  fromTime,
  toTime: timeOfDay(now),
});

export const realtimeMode = (refreshIntervalMs = DEFAULT_ENGINE_OPTIONS.tickIntervalMs): ModeState => ({
  kind: 'realtime',
  refreshIntervalMs: clampTickInterval(refreshIntervalMs),
});

export const yearMode = (year: number): ModeState => ({
  kind: 'range',
  fromDate: `${year}-01-01`,
  toDate: `${year}-12-31`,
  year,
});

// Historical data exists for today when anything was consumed or the UPS carried a load.
export const hasHistoricalData = (probe: AggregateResult | null): boolean =>
  probe !== null && (probe.totalEnergyWh > 0 || probe.avgLoadPercent > 0);

export const resolveInitialMode = (probe: AggregateResult | null, now: number, refreshIntervalMs?: number): ModeState =>
  hasHistoricalData(probe) ? todayMode(now) : realtimeMode(refreshIntervalMs);

export const probeQuery = (now: number): EnergyQuery => ({ type: 'today', from_time: '00:00', to_time: timeOfDay(now) });

export const queryFor = (mode: ModeState): EnergyQuery | null => {
  switch (mode.kind) {
    case 'realtime':
      return null;
    case 'today':
      return { type: 'today', from_time: mode.fromTime, to_time: mode.toTime };
    case 'day':
      return { type: 'day', from_time: mode.date };
    case 'range':
      return { type: 'range', from_time: mode.fromDate, to_time: mode.toDate };
  }
};

export const layoutFor = (mode: ModeState | null): Layout =>
  mode === null || mode.kind === 'realtime'
    ? { columns: 1, showDistribution: false }
    : { columns: 2, showDistribution: true };

const localeDate = (isoDate: string): string => parseISO(isoDate).toLocaleDateString();

export const labelFor = (mode: ModeState | null): string => {
  if (!mode) return '';
  switch (mode.kind) {
    case 'realtime':
      return mode.refreshIntervalMs === DEFAULT_ENGINE_OPTIONS.tickIntervalMs
        ? 'Real Time'
        : `Real Time (${Math.round(mode.refreshIntervalMs / 1000)}s refresh)`;
    case 'today':
      return `Today (${mode.fromTime} - ${mode.toTime})`;
    case 'day':
      return localeDate(mode.date);
    case 'range':
      return mode.year !== undefined ? `Year ${mode.year}` : `${localeDate(mode.fromDate)} - ${localeDate(mode.toDate)}`;
  }
};

export const timeFormatFor = (kind: ModeKind): string => {
  switch (kind) {
    case 'realtime':
      return 'HH:mm:ss';
    case 'today':
    case 'day':
      return 'HH:mm';
    case 'range':
      return 'dd MMM';
  }
};

/** Owns the active display mode. Exactly one mode is active once the page has started. */
export class TimeRangeResolver {
  private state: ModeState | null = null;

  get mode(): ModeState | null {
    return this.state;
  }

  get kind(): ModeKind | null {
    return this.state?.kind ?? null;
  }

  get layout(): Layout {
    return layoutFor(this.state);
  }

  get label(): string {
    return labelFor(this.state);
  }

  enter(next: ModeState): void {
    this.state = next;
  }
}

import { useSyncExternalStore } from 'react';
import type { EnergyAnalyticsController, EnergyViewState } from '../services/analytics/EnergyAnalyticsController';
import type { ChartRenderingAdapter } from '../services/charts/ChartRenderingAdapter';

type SnapshotSource<TSnapshot> = Pick<ChartRenderingAdapter<unknown, TSnapshot>, 'subscribe' | 'getSnapshot'>;

export const useEnergyAnalytics = (controller: EnergyAnalyticsController): EnergyViewState =>
  useSyncExternalStore(controller.subscribe, controller.getState);

export const useChartSnapshot = <TSnapshot,>(adapter: SnapshotSource<TSnapshot>): TSnapshot =>
  useSyncExternalStore(adapter.subscribe, adapter.getSnapshot);

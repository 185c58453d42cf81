import type {
  AggregateResult,
  CostPoint,
  DistributionView,
  DrillDownContext,
  EnergyUpdateEvent,
  Layout,
  ModeState,
  RateConfig,
  StatsView,
} from '../../types';
import type { EnergyApi, RequestOptions } from '../api';
import type { Cancel, Clock } from '../clock';
import { DEFAULT_RATE_CONFIG, type EngineOptions, type EngineOptionsInput, resolveEngineOptions } from '../config';
import { isStaleResponse } from '../errors';
import { logger } from '../logger';
import type { Notifier } from '../notifier';
import type { PushChannel } from '../pushChannel';
import { EnergyUpdateSchema, parseApiResponse } from '../schemas';
import { DiscreteChartAdapter, type DiscreteChartOptions, emptyDiscreteData } from '../charts/DiscreteChartAdapter';
import { StreamingChartAdapter, type StreamingChartOptions } from '../charts/StreamingChartAdapter';
import { fromCostSeries, fromDistribution } from './bucketAggregator';
import { type CostModel, createCostModel } from './costModel';
import { DrillDownFetcher } from './drillDown';
import { RequestSlot } from './requestSlot';
import { RealtimeSmoothingBuffer } from './smoothingBuffer';
import { TimeRangeResolver, probeQuery, queryFor, realtimeMode, resolveInitialMode, yearMode } from './timeRange';

export interface ControllerDeps {
  api: EnergyApi;
  push: PushChannel;
  clock: Clock;
  notifier: Notifier;
  options?: EngineOptionsInput;
  createDiscreteAdapter?: (opts: DiscreteChartOptions) => DiscreteChartAdapter;
  createStreamingAdapter?: (opts: StreamingChartOptions) => StreamingChartAdapter;
}

export type ActiveChart =
  | { kind: 'discrete'; adapter: DiscreteChartAdapter }
  | { kind: 'streaming'; adapter: StreamingChartAdapter };

export interface DrillDownView {
  open: boolean;
  loading: boolean;
  title: string;
  context: DrillDownContext | null;
  series: CostPoint[];
}

export type ControllerStatus = 'idle' | 'starting' | 'ready' | 'disposed';

export interface EnergyViewState {
  status: ControllerStatus;
  mode: ModeState | null;
  label: string;
  layout: Layout;
  rate: RateConfig;
  stats: StatsView | null;
  // Set when the current mode has no stats to show because its load or tick failed.
  statsFailed: boolean;
  chart: ActiveChart | null;
  loading: boolean;
  availableYears: number[];
  drillDown: DrillDownView;
  now: number;
  lastUpdated: number | null;
}

const CLOSED_DRILL_DOWN: DrillDownView = { open: false, loading: false, title: '', context: null, series: [] };

const statsFromAggregate = (aggregate: AggregateResult, live: boolean): StatsView => ({
  energy: aggregate.totalEnergyWh,
  cost: aggregate.totalCost,
  load: aggregate.avgLoadPercent,
  co2: aggregate.co2Kg,
  trends: aggregate.trends,
  live,
});

/**
 * Orchestrates the energy page: owns the active mode, the single chart adapter and the realtime
 * buffer, and is the only writer of view state. React reads it through subscribe/getState.
 */
export class EnergyAnalyticsController {
  private readonly options: EngineOptions;
  private readonly resolver = new TimeRangeResolver();
  private readonly modeSlot = new RequestSlot('mode');
  private readonly tickSlot = new RequestSlot('realtime-tick');
  private readonly drillDown: DrillDownFetcher;
  private readonly buffer: RealtimeSmoothingBuffer;
  private costModel: CostModel;
  private chart: ActiveChart | null = null;
  private modeGeneration = 0;
  private modeEntered = false;
  private stopTick: Cancel | null = null;
  private stopClock: Cancel | null = null;
  private unsubscribePush: (() => void) | null = null;
  private state: EnergyViewState;
  private readonly listeners = new Set<() => void>();

  constructor(private readonly deps: ControllerDeps) {
    this.options = resolveEngineOptions(deps.options);
    this.costModel = createCostModel(DEFAULT_RATE_CONFIG);
    this.buffer = new RealtimeSmoothingBuffer((watts) => this.costModel.liveCost(watts), {
      capacity: this.options.bufferSize,
      base: this.options.smoothingBase,
      minPowerWatts: this.options.minPowerWatts,
    });
    this.drillDown = new DrillDownFetcher((query, signal) => deps.api.getDetailedSeries(query, this.requestOpts(signal)));
    this.state = {
      status: 'idle',
      mode: null,
      label: '',
      layout: this.resolver.layout,
      rate: DEFAULT_RATE_CONFIG,
      stats: null,
      statsFailed: false,
      chart: null,
      loading: false,
      availableYears: [],
      drillDown: CLOSED_DRILL_DOWN,
      now: deps.clock.now(),
      lastUpdated: null,
    };
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getState = (): EnergyViewState => this.state;

  async start(): Promise<void> {
    if (this.state.status !== 'idle') return;
    this.setState({ status: 'starting' });
    logger.page('Starting energy page');

    await this.reloadRateConfig();
    if (this.disposed) return;

    this.stopClock = this.deps.clock.every(this.options.clockIntervalMs, () => this.setState({ now: this.deps.clock.now() }));
    this.deps.push.connect();

    // A mode picked during startup wins over the automatic choice.
    const [, probe] = await Promise.all([
      this.loadAvailableYears(),
      this.modeEntered ? Promise.resolve(null) : this.probeToday(),
    ]);
    if (this.disposed) return;
    this.setState({ status: 'ready' });

    if (this.modeEntered) return;
    await this.enter(resolveInitialMode(probe, this.deps.clock.now(), this.options.tickIntervalMs));
  }

  /** Loads the rate settings. A reload replaces the whole value; a failure keeps the previous one. */
  async reloadRateConfig(): Promise<void> {
    try {
      const rate = await this.deps.api.getRateConfig(this.requestOpts());
      this.costModel = createCostModel(rate);
      this.setState({ rate });
      logger.data('Rate settings loaded', rate);
    } catch (e) {
      logger.error('Failed to load energy rate settings', e);
      this.deps.notifier.error('Failed to load energy rate settings', 'rate');
    }
  }

  selectMode(mode: ModeState): Promise<void> {
    return this.enter(mode);
  }

  setRealtimeInterval(intervalMs: number): Promise<void> {
    return this.enter(realtimeMode(intervalMs));
  }

  selectYear(year: number): Promise<void> {
    return this.enter(yearMode(year));
  }

  async openDrillDown(timestamp: number): Promise<void> {
    const kind = this.resolver.kind;
    if (!kind || kind === 'realtime' || this.disposed) return;

    this.setState({
      drillDown: {
        ...CLOSED_DRILL_DOWN,
        open: true,
        loading: true,
        title: `Consumption detail for ${new Date(timestamp).toLocaleTimeString([], { hour: '2-digit', minute: '2-digit' })}`,
      },
    });
    try {
      const result = await this.drillDown.open(timestamp, kind);
      this.setState({ drillDown: { open: true, loading: false, ...result } });
    } catch (e) {
      if (this.recover(e, 'Failed to load detailed data', 'drill-down')) {
        this.setState({ drillDown: { ...this.state.drillDown, loading: false } });
      }
    }
  }

  async selectDrillDownPoint(index: number): Promise<void> {
    const view = this.state.drillDown;
    const point = view.series[index];
    const context = this.drillDown.context;
    // Minute level is the deepest view; selecting there must not fetch again.
    if (!view.open || !point || !context || context.granularity === 'minute') return;

    this.setState({ drillDown: { ...view, loading: true } });
    try {
      const result = await this.drillDown.select(point[0]);
      if (!result) {
        this.setState({ drillDown: { ...this.state.drillDown, loading: false } });
        return;
      }
      this.setState({ drillDown: { open: true, loading: false, ...result } });
    } catch (e) {
      if (this.recover(e, 'Failed to load detailed data', 'drill-down')) {
        this.setState({ drillDown: { ...this.state.drillDown, loading: false } });
      }
    }
  }

  closeDrillDown(): void {
    this.drillDown.close();
    if (this.state.drillDown !== CLOSED_DRILL_DOWN) this.setState({ drillDown: CLOSED_DRILL_DOWN });
  }

  dispose(): void {
    if (this.disposed) return;
    logger.page('Disposing energy page');
    this.modeSlot.cancel();
    this.tickSlot.cancel();
    this.teardownMode();
    this.stopClock?.();
    this.stopClock = null;
    this.deps.push.disconnect();
    this.setState({ status: 'disposed', chart: null, loading: false });
    this.listeners.clear();
  }

  private get disposed(): boolean {
    return this.state.status === 'disposed';
  }

  private requestOpts(signal?: AbortSignal): RequestOptions {
    return { signal, timeoutMs: this.options.requestTimeoutMs };
  }

  private setState(patch: Partial<EnergyViewState>): void {
    this.state = { ...this.state, ...patch };
    this.listeners.forEach((listener) => listener());
  }

  /** Returns false when the error was a stale response (dropped silently), true when it was surfaced. */
  private recover(error: unknown, message: string, key: string): boolean {
    if (isStaleResponse(error)) {
      logger.data(error.message);
      return false;
    }
    logger.error(message, error);
    this.deps.notifier.error(message, key);
    return true;
  }

  private async probeToday(): Promise<AggregateResult | null> {
    const query = probeQuery(this.deps.clock.now());
    try {
      return await this.modeSlot.run((signal) => this.deps.api.getEnergyData(query, this.requestOpts(signal)));
    } catch (e) {
      if (isStaleResponse(e)) logger.data(e.message);
      else logger.warn('Historical data probe failed, starting in real time', e);
      return null;
    }
  }

  private async loadAvailableYears(): Promise<void> {
    try {
      const years = await this.deps.api.getAvailableYears(this.requestOpts());
      this.setState({ availableYears: years });
    } catch (e) {
      logger.warn('Could not load available years', e);
    }
  }

  private async enter(next: ModeState): Promise<void> {
    if (this.disposed) return;

    // In-flight requests of the previous mode are now stale.
    this.modeSlot.cancel();
    this.tickSlot.cancel();
    this.teardownMode();

    this.resolver.enter(next);
    this.modeEntered = true;
    this.modeGeneration += 1;
    const generation = this.modeGeneration;
    this.chart = this.activateChart(next);
    this.setState({
      mode: next,
      label: this.resolver.label,
      layout: this.resolver.layout,
      chart: this.chart,
      stats: null,
      statsFailed: false,
      loading: next.kind !== 'realtime',
    });
    logger.page(`Entered ${next.kind} mode`, next);

    this.unsubscribePush = this.deps.push.subscribe('energy_update', (payload) => this.handlePush(generation, payload));

    if (next.kind === 'realtime') {
      this.startTick(next.refreshIntervalMs);
    } else {
      await this.loadMode(next);
    }
  }

  private teardownMode(): void {
    this.stopTick?.();
    this.stopTick = null;
    this.unsubscribePush?.();
    this.unsubscribePush = null;
    this.buffer.clear();
    this.closeDrillDown();
    this.disposeChart();
  }

  private disposeChart(): void {
    const chart = this.chart;
    this.chart = null;
    if (!chart) return;
    try {
      chart.adapter.dispose();
    } catch (e) {
      logger.error('Chart disposal failed', e);
    }
  }

  private activateChart(mode: ModeState): ActiveChart | null {
    try {
      if (mode.kind === 'realtime') {
        const create = this.deps.createStreamingAdapter ?? ((opts: StreamingChartOptions) => new StreamingChartAdapter(opts));
        const adapter = create({
          clock: this.deps.clock,
          source: () => this.buffer.latest(),
          refreshMs: mode.refreshIntervalMs,
          delayMs: this.options.refreshDelayMs,
          windowMs: this.options.windowMs,
          yAxisFloor: this.options.yAxisFloor,
          thresholds: this.options.powerThresholds,
        });
        adapter.render([]);
        return { kind: 'streaming', adapter };
      }
      const create = this.deps.createDiscreteAdapter ?? ((opts: DiscreteChartOptions) => new DiscreteChartAdapter(opts));
      const adapter = create({
        period: mode.kind,
        onSelect: (timestamp) => {
          void this.openDrillDown(timestamp);
        },
      });
      adapter.render(emptyDiscreteData());
      return { kind: 'discrete', adapter };
    } catch (e) {
      logger.error('Chart render failed; this render cycle is aborted', e);
      return null;
    }
  }

  private runChartCycle(cycle: () => void): void {
    try {
      cycle();
    } catch (e) {
      logger.error('Chart update failed; this render cycle is aborted', e);
    }
  }

  private startTick(intervalMs: number): void {
    const tick = () => {
      void this.realtimeTick();
    };
    this.stopTick = this.deps.clock.every(intervalMs, tick);
    tick();
  }

  private async realtimeTick(): Promise<void> {
    const timestamp = this.deps.clock.now();
    try {
      const sample = await this.tickSlot.run((signal) => this.deps.api.getLiveSample(timestamp, this.requestOpts(signal)));
      const point = this.buffer.push(sample.timestamp, sample.realpowerWatts);
      this.setState({
        stats: {
          energy: point.powerWatts,
          cost: point.cost,
          load: sample.loadPercent,
          co2: this.costModel.liveCo2(point.powerWatts),
          live: true,
        },
        statsFailed: false,
        lastUpdated: timestamp,
      });
    } catch (e) {
      if (this.recover(e, 'Failed to fetch live UPS data', 'realtime') && this.state.stats === null) {
        this.setState({ statsFailed: true });
      }
    }
  }

  private async loadMode(mode: ModeState): Promise<void> {
    const query = queryFor(mode);
    if (!query) return;
    try {
      const [aggregate, series] = await this.modeSlot.run((signal) =>
        Promise.all([
          this.deps.api.getEnergyData(query, this.requestOpts(signal)),
          this.deps.api.getCostTrend(query, this.requestOpts(signal)),
        ]),
      );
      this.applyDiscrete(series, fromDistribution(aggregate.costDistribution));
      this.setState({ stats: statsFromAggregate(aggregate, false), loading: false, lastUpdated: this.deps.clock.now() });
      logger.page('Energy data updated');
    } catch (e) {
      if (this.recover(e, 'Failed to load energy data', 'mode')) {
        this.setState({ loading: false, statsFailed: this.state.stats === null });
      }
    }
  }

  private applyDiscrete(series: CostPoint[], distribution: DistributionView): void {
    const chart = this.chart;
    if (chart?.kind !== 'discrete') return;
    this.runChartCycle(() => chart.adapter.update({ series, distribution }));
  }

  private handlePush(generation: number, payload: unknown): void {
    if (this.disposed || generation !== this.modeGeneration) {
      logger.data('Dropped energy_update from a superseded mode');
      return;
    }

    let event: EnergyUpdateEvent;
    try {
      event = parseApiResponse(EnergyUpdateSchema, payload, 'energy_update');
    } catch (e) {
      this.recover(e, 'Received a malformed energy update', 'push');
      return;
    }
    logger.event('energy_update', event);

    const chart = this.chart;
    if (chart?.kind === 'streaming') {
      if (event.history.length > 0) {
        this.runChartCycle(() => chart.adapter.update(event.history.map(([x, y]) => ({ x, y }))));
      }
      this.setState({ stats: statsFromAggregate(event.stats, true), statsFailed: false, lastUpdated: this.deps.clock.now() });
      return;
    }

    if (chart?.kind === 'discrete') {
      const current = chart.adapter.getSnapshot();
      const series = event.history.length > 0 ? event.history : current.series;
      const distribution = event.stats.costDistribution
        ? fromDistribution(event.stats.costDistribution)
        : event.history.length > 0
          ? fromCostSeries(event.history)
          : current.distribution;
      this.applyDiscrete(series, distribution);
    }
    this.setState({ stats: statsFromAggregate(event.stats, false), statsFailed: false, lastUpdated: this.deps.clock.now() });
  }
}

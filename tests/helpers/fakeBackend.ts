import { vi } from 'vitest';
import type { EnergyApi, RequestOptions } from '../../services/api';
import type { Cancel, Clock } from '../../services/clock';
import type { Notifier } from '../../services/notifier';
import type { PushChannel, PushEventName } from '../../services/pushChannel';
import type {
  AggregateResult,
  CostPoint,
  DetailQuery,
  EnergyQuery,
  RateConfig,
  Sample,
} from '../../types';

export const testRate: RateConfig = {
  currencyCode: 'EUR',
  pricePerKwh: 0.25,
  co2Factor: 0.5,
  efficiencyFactor: 0.9,
};

export const aggregate = (overrides: Partial<AggregateResult> = {}): AggregateResult => ({
  totalEnergyWh: 1200,
  totalCost: 0.3,
  avgLoadPercent: 25,
  co2Kg: 0.6,
  ...overrides,
});

export const emptyAggregate = (): AggregateResult => aggregate({ totalEnergyWh: 0, totalCost: 0, avgLoadPercent: 0, co2Kg: 0 });

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
};

// Lets every pending promise chain settle.
export const flush = (): Promise<void> => new Promise((resolve) => setTimeout(resolve, 0));

export const createFakeApi = () => ({
  getEnergyData: vi.fn<(query: EnergyQuery, opts?: RequestOptions) => Promise<AggregateResult>>(async () => aggregate()),
  getCostTrend: vi.fn<(query: EnergyQuery, opts?: RequestOptions) => Promise<CostPoint[]>>(async () => []),
  getDetailedSeries: vi.fn<(query: DetailQuery, opts?: RequestOptions) => Promise<CostPoint[]>>(async () => []),
  getAvailableYears: vi.fn<(opts?: RequestOptions) => Promise<number[]>>(async () => [2023, 2024]),
  getRateConfig: vi.fn<(opts?: RequestOptions) => Promise<RateConfig>>(async () => testRate),
  getLiveSample: vi.fn<(timestamp: number, opts?: RequestOptions) => Promise<Sample>>(async (timestamp) => ({
    timestamp,
    realpowerWatts: 400,
    loadPercent: 40,
  })),
}) satisfies EnergyApi;

export type FakeApi = ReturnType<typeof createFakeApi>;

interface ScheduledTask {
  due: number;
  interval: number | null;
  task: () => void;
}

/** Deterministic clock: tasks only run when the test advances time. */
export class ManualClock implements Clock {
  private time: number;
  private nextId = 0;
  private readonly tasks = new Map<number, ScheduledTask>();

  constructor(start: number) {
    this.time = start;
  }

  get pending(): number {
    return this.tasks.size;
  }

  now(): number {
    return this.time;
  }

  every(intervalMs: number, task: () => void): Cancel {
    return this.schedule({ due: this.time + intervalMs, interval: intervalMs, task });
  }

  after(delayMs: number, task: () => void): Cancel {
    return this.schedule({ due: this.time + delayMs, interval: null, task });
  }

  advance(ms: number): void {
    const target = this.time + ms;
    for (;;) {
      let nextId: number | null = null;
      let next: ScheduledTask | null = null;
      for (const [id, scheduled] of this.tasks) {
        if (scheduled.due <= target && (next === null || scheduled.due < next.due)) {
          nextId = id;
          next = scheduled;
        }
      }
      if (nextId === null || next === null) break;
      this.time = next.due;
      if (next.interval === null) this.tasks.delete(nextId);
      else next.due += next.interval;
      next.task();
    }
    this.time = target;
  }

  private schedule(task: ScheduledTask): Cancel {
    const id = this.nextId++;
    this.tasks.set(id, task);
    return () => {
      this.tasks.delete(id);
    };
  }
}

export class FakePushChannel implements PushChannel {
  connects = 0;
  disconnects = 0;
  private readonly handlers = new Map<PushEventName, Set<(payload: unknown) => void>>();

  connect(): void {
    this.connects += 1;
  }

  subscribe(event: PushEventName, handler: (payload: unknown) => void): () => void {
    const set = this.handlers.get(event) ?? new Set();
    set.add(handler);
    this.handlers.set(event, set);
    return () => {
      set.delete(handler);
    };
  }

  disconnect(): void {
    this.disconnects += 1;
  }

  listenerCount(event: PushEventName): number {
    return this.handlers.get(event)?.size ?? 0;
  }

  emit(event: PushEventName, payload: unknown): void {
    this.handlers.get(event)?.forEach((handler) => handler(payload));
  }
}

export class FakeNotifier implements Notifier {
  readonly errors: Array<{ message: string; key?: string }> = [];

  error(message: string, key?: string): void {
    this.errors.push({ message, key });
  }
}

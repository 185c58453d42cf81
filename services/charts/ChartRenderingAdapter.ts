import { logger } from '../logger';

export type ChartKind = 'discrete' | 'streaming';

export interface ChartRenderingAdapter<TData, TSnapshot> {
  readonly kind: ChartKind;
  readonly live: boolean;
  render(initialData: TData): void;
  update(newData: TData): void;
  dispose(): void;
  // useSyncExternalStore contract
  subscribe(listener: () => void): () => void;
  getSnapshot(): TSnapshot;
}

export class ChartLifecycleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ChartLifecycleError';
  }
}

type LifecycleState = 'idle' | 'live' | 'disposed';

export abstract class BaseChartAdapter<TData, TSnapshot> implements ChartRenderingAdapter<TData, TSnapshot> {
  abstract readonly kind: ChartKind;
  protected snapshot: TSnapshot;
  private state: LifecycleState = 'idle';
  private readonly listeners = new Set<() => void>();

  protected constructor(initial: TSnapshot) {
    this.snapshot = initial;
  }

  get live(): boolean {
    return this.state === 'live';
  }

  render(initialData: TData): void {
    if (this.state === 'live') {
      throw new ChartLifecycleError(`${this.kind} chart is already rendered; dispose it first`);
    }
    this.state = 'live';
    logger.chart(`Rendering ${this.kind} chart`);
    this.onRender(initialData);
  }

  update(newData: TData): void {
    if (this.state !== 'live') {
      logger.warn(`Ignoring update on a ${this.state} ${this.kind} chart`);
      return;
    }
    this.onUpdate(newData);
  }

  dispose(): void {
    if (this.state === 'disposed') return;
    const wasLive = this.state === 'live';
    this.state = 'disposed';
    if (wasLive) {
      logger.chart(`Disposing ${this.kind} chart`);
      this.onDispose();
    }
  }

  subscribe = (listener: () => void): (() => void) => {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  };

  getSnapshot = (): TSnapshot => this.snapshot;

  protected commit(next: TSnapshot): void {
    this.snapshot = next;
    this.listeners.forEach((listener) => listener());
  }

  protected abstract onRender(initialData: TData): void;
  protected abstract onUpdate(newData: TData): void;
  protected abstract onDispose(): void;
}

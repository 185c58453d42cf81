import { StaleResponse } from '../errors';

/**
 * One logical request slot (mode load, realtime tick, drill-down). Starting a request supersedes the
 * one in flight: the old request is aborted and its result, if it still arrives, is dropped as stale.
 */
export class RequestSlot {
  private generation = 0;
  private inflight: AbortController | null = null;

  constructor(readonly name: string) {}

  async run<T>(request: (signal: AbortSignal) => Promise<T>): Promise<T> {
    this.inflight?.abort();
    this.generation += 1;
    const generation = this.generation;
    const controller = new AbortController();
    this.inflight = controller;

    try {
      const result = await request(controller.signal);
      if (generation !== this.generation) throw new StaleResponse(this.name, generation, this.generation);
      return result;
    } catch (e) {
      if (generation !== this.generation && !(e instanceof StaleResponse)) {
        throw new StaleResponse(this.name, generation, this.generation);
      }
      throw e;
    } finally {
      if (this.inflight === controller) this.inflight = null;
    }
  }

  cancel(): void {
    this.inflight?.abort();
    this.inflight = null;
    this.generation += 1;
  }
}

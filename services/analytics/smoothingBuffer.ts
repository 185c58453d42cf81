export interface SmoothedPoint {
  timestamp: number;
  value: number; // weighted moving average of the buffered costs
  cost: number; // instantaneous cost of this tick
  powerWatts: number; // power after the minimum clamp
}

export interface SmoothingOptions {
  capacity?: number;
  base?: number;
  minPowerWatts?: number;
}

interface BufferedCost {
  timestamp: number;
  cost: number;
}

/**
 * Ring buffer of live costs with a weighted moving average on top.
 * The element at position i (0 = oldest retained) weighs `base^i`, so the newest always weighs most.
 */
export class RealtimeSmoothingBuffer {
  private readonly entries: BufferedCost[] = [];
  private readonly capacity: number;
  private readonly base: number;
  private readonly minPowerWatts: number;
  private last: SmoothedPoint | null = null;

  constructor(private readonly costOf: (powerWatts: number) => number, opts: SmoothingOptions = {}) {
    this.capacity = Math.max(1, opts.capacity ?? 15);
    this.base = opts.base ?? 1.2;
    this.minPowerWatts = opts.minPowerWatts ?? 1;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Consumes one tick. Timestamps must increase; a reading not newer than the last one is ignored
   * and the current average is returned unchanged.
   */
  push(timestamp: number, powerWatts: number | null | undefined): SmoothedPoint {
    if (this.last && timestamp <= this.last.timestamp) return this.last;

    const watts = Math.max(typeof powerWatts === 'number' && Number.isFinite(powerWatts) ? powerWatts : 0, this.minPowerWatts);
    const cost = this.costOf(watts);

    this.entries.push({ timestamp, cost });
    if (this.entries.length > this.capacity) this.entries.shift();

    this.last = { timestamp, value: this.smoothed(), cost, powerWatts: watts };
    return this.last;
  }

  smoothed(): number {
    if (this.entries.length === 0) return 0;
    let weighted = 0;
    let weightSum = 0;
    this.entries.forEach((entry, i) => {
      const w = Math.pow(this.base, i);
      weighted += entry.cost * w;
      weightSum += w;
    });
    return weighted / weightSum;
  }

  latest(): SmoothedPoint | null {
    return this.last;
  }

  clear(): void {
    this.entries.length = 0;
    this.last = null;
  }
}

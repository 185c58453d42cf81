import { describe, expect, it } from 'vitest';
import { RealtimeSmoothingBuffer } from '../services/analytics/smoothingBuffer';

// Cost equals watts, which keeps the expected averages readable.
const identity = (watts: number) => watts;

describe('RealtimeSmoothingBuffer', () => {
  it('returns the single cost for one sample', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);

    expect(buffer.push(1000, 50)).toEqual({ timestamp: 1000, value: 50, cost: 50, powerWatts: 50 });
  });

  it('weights newer samples by 1.2^i', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);
    buffer.push(1000, 10);
    const point = buffer.push(2000, 20);

    // (10*1 + 20*1.2) / 2.2
    expect(point.value).toBeCloseTo(34 / 2.2, 10);
  });

  it('converges on a constant input', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);
    let value = 0;
    for (let i = 0; i < 15; i++) value = buffer.push(1000 * (i + 1), 120).value;

    expect(value).toBeCloseTo(120, 10);
  });

  it('evicts the oldest sample beyond capacity', () => {
    const buffer = new RealtimeSmoothingBuffer(identity, { capacity: 3 });
    buffer.push(1, 1000);
    buffer.push(2, 10);
    buffer.push(3, 10);
    const point = buffer.push(4, 10);

    expect(buffer.size).toBe(3);
    expect(point.value).toBeCloseTo(10, 10);
  });

  it('clamps non-positive and missing power to the 1 W floor', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);

    expect(buffer.push(1, 0).powerWatts).toBe(1);
    expect(buffer.push(2, -40).powerWatts).toBe(1);
    expect(buffer.push(3, null).powerWatts).toBe(1);
    expect(buffer.push(4, Number.NaN).cost).toBe(1);
  });

  it('ignores a reading that is not newer than the last one', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);
    const first = buffer.push(2000, 30);

    expect(buffer.push(2000, 90)).toBe(first);
    expect(buffer.push(1500, 90)).toBe(first);
    expect(buffer.size).toBe(1);
  });

  it('starts over after clear', () => {
    const buffer = new RealtimeSmoothingBuffer(identity);
    buffer.push(1000, 30);
    buffer.clear();

    expect(buffer.latest()).toBeNull();
    expect(buffer.smoothed()).toBe(0);
    expect(buffer.push(500, 7).value).toBe(7);
  });
});

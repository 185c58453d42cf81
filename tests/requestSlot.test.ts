import { describe, expect, it } from 'vitest';
import { RequestSlot } from '../services/analytics/requestSlot';
import { NetworkFailure, StaleResponse } from '../services/errors';
import { deferred } from './helpers/fakeBackend';

describe('RequestSlot', () => {
  it('resolves the current request', async () => {
    const slot = new RequestSlot('mode');

    await expect(slot.run(async () => 42)).resolves.toBe(42);
  });

  it('aborts and drops the superseded request', async () => {
    const slot = new RequestSlot('mode');
    const first = deferred<string>();
    const signals: AbortSignal[] = [];

    const older = slot.run((signal) => {
      signals.push(signal);
      return first.promise;
    });
    const newer = slot.run(async () => 'new');
    first.resolve('old');

    await expect(older).rejects.toBeInstanceOf(StaleResponse);
    await expect(newer).resolves.toBe('new');
    expect(signals).toHaveLength(1);
    expect(signals[0].aborted).toBe(true);
  });

  it('reports failures of a cancelled request as stale', async () => {
    const slot = new RequestSlot('tick');
    const pending = deferred<number>();

    const run = slot.run(() => pending.promise);
    slot.cancel();
    pending.reject(new NetworkFailure('api/ups/cache', 'aborted'));

    await expect(run).rejects.toBeInstanceOf(StaleResponse);
  });

  it('passes through failures of the current request', async () => {
    const slot = new RequestSlot('tick');
    const failure = new NetworkFailure('api/ups/cache', 'HTTP 500', 500);

    await expect(slot.run(async () => Promise.reject(failure))).rejects.toBe(failure);
  });
});

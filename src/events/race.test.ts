import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Deadline } from './deadline.js';
import { raceEvent } from './race.js';
import { Subscription } from './subscription.js';

describe('raceEvent', () => {
  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves with the event and cancels the deadline', async () => {
    const sub = new Subscription<string>(() => true);
    const deadline = Deadline.after(10);
    const pending = raceEvent(sub, { deadlines: [deadline] });

    await vi.advanceTimersByTimeAsync(1000);
    sub.offer('a');

    expect(await pending).toEqual({ kind: 'event', event: 'a' });
    expect(deadline.isCancelled).toBe(true);
    expect(sub.isCancelled).toBe(false);
  });

  it('keeps deadlines armed when asked to retain them', async () => {
    const sub = new Subscription<string>(() => true);
    const deadline = Deadline.after(10);
    sub.offer('a');

    const result = await raceEvent(sub, { deadlines: [deadline], retainDeadlines: true });

    expect(result.kind).toBe('event');
    expect(deadline.isCancelled).toBe(false);
  });

  it('resolves timeout with the deadline that fired and cancels the subscription', async () => {
    const sub = new Subscription<string>(() => true);
    const session = Deadline.after(10);
    const idle = Deadline.after(3);
    const pending = raceEvent(sub, { deadlines: [session, idle], retainDeadlines: true });

    await vi.advanceTimersByTimeAsync(3000);

    expect(await pending).toEqual({ kind: 'timeout', deadline: idle });
    expect(sub.isCancelled).toBe(true);
  });

  it('returns timeout at once for a deadline that already fired', async () => {
    const deadline = Deadline.after(1);
    await vi.advanceTimersByTimeAsync(1000);
    const sub = new Subscription<string>(() => true);
    sub.offer('late');

    const result = await raceEvent(sub, { deadlines: [deadline] });

    expect(result.kind).toBe('timeout');
    expect(sub.isCancelled).toBe(true);
  });

  it('resolves cancelled when the signal aborts', async () => {
    const sub = new Subscription<string>(() => true);
    const controller = new AbortController();
    const pending = raceEvent(sub, { deadlines: [Deadline.after(10)], signal: controller.signal });

    controller.abort();

    expect(await pending).toEqual({ kind: 'cancelled' });
    expect(sub.isCancelled).toBe(true);
  });

  it('resolves cancelled for an already-aborted signal without waiting', async () => {
    const sub = new Subscription<string>(() => true);
    sub.offer('a');
    const result = await raceEvent(sub, { deadlines: [Deadline.after(10)], signal: AbortSignal.abort() });
    expect(result).toEqual({ kind: 'cancelled' });
  });

  it('reads a subscription cancelled from outside as cancelled', async () => {
    const sub = new Subscription<string>(() => true);
    const pending = raceEvent(sub, { deadlines: [Deadline.after(10)] });
    sub.cancel();
    expect(await pending).toEqual({ kind: 'cancelled' });
  });

  it('removes its abort listener once settled', async () => {
    const controller = new AbortController();
    const remove = vi.spyOn(controller.signal, 'removeEventListener');
    const sub = new Subscription<string>(() => true);
    sub.offer('a');

    await raceEvent(sub, { deadlines: [Deadline.after(10)], signal: controller.signal });

    expect(remove).toHaveBeenCalledWith('abort', expect.any(Function));
  });
});

import type { Deadline } from './deadline.js';
import type { Subscription } from './subscription.js';

export type RaceResult<E> =
  | { kind: 'event'; event: E }
  | { kind: 'timeout'; deadline: Deadline }
  | { kind: 'cancelled' };

export type RaceOptions = {
  deadlines: readonly Deadline[];
  signal?: AbortSignal;
  /**
   * Leave the deadlines armed when an event wins. Menus keep their session
   * budget across waits; prompts do not.
   */
  retainDeadlines?: boolean;
};

/**
 * Wait for whichever comes first: the subscription's next event, any of the
 * deadlines, or the abort signal. The losers are cancelled before this
 * resolves: a timeout or abort cancels the subscription, an event cancels the
 * deadlines unless `retainDeadlines` is set.
 *
 * A subscription cancelled from outside (its hub closed) reads as `cancelled`.
 */
export async function raceEvent<E>(
  subscription: Subscription<E>,
  opts: RaceOptions,
): Promise<RaceResult<E>> {
  const { deadlines, signal } = opts;

  if (signal?.aborted) {
    subscription.cancel();
    return { kind: 'cancelled' };
  }
  const fired = deadlines.find((d) => d.hasFired);
  if (fired) {
    subscription.cancel();
    return { kind: 'timeout', deadline: fired };
  }

  let onAbort: (() => void) | undefined;
  const aborted = new Promise<RaceResult<E>>((resolve) => {
    if (!signal) return;
    onAbort = () => resolve({ kind: 'cancelled' });
    signal.addEventListener('abort', onAbort, { once: true });
  });

  const candidates: Array<Promise<RaceResult<E>>> = [
    subscription.next().then((event): RaceResult<E> =>
      event === null ? { kind: 'cancelled' } : { kind: 'event', event },
    ),
    ...deadlines.map((deadline) =>
      deadline.expired.then((): RaceResult<E> => ({ kind: 'timeout', deadline })),
    ),
    aborted,
  ];

  try {
    const result = await Promise.race(candidates);
    if (result.kind === 'event') {
      if (!opts.retainDeadlines) {
        for (const deadline of deadlines) deadline.cancel();
      }
    } else {
      subscription.cancel();
    }
    return result;
  } finally {
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  }
}

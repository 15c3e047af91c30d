/**
 * A filtered, cancellable view over a shared event stream.
 *
 * Events are delivered in the order they were offered. Events offered while
 * nobody is waiting are buffered until the next `next()` call. Once
 * `cancel()` returns, nothing more is delivered: buffered events are dropped
 * and pending `next()` calls resolve with `null`.
 */
export class Subscription<E> implements AsyncIterable<E> {
  private readonly buffer: E[] = [];
  private waiters: Array<(event: E | null) => void> = [];
  private cancelled = false;

  constructor(
    private readonly accepts: (event: E) => boolean,
    private readonly onCancel: () => void = () => undefined,
  ) {}

  get isCancelled(): boolean {
    return this.cancelled;
  }

  /** Number of accepted events waiting to be read. */
  get pending(): number {
    return this.buffer.length;
  }

  /**
   * Called by the owning hub for every event on this subscription's key.
   * Returns true if the event passed the filter and was delivered or buffered.
   */
  offer(event: E): boolean {
    if (this.cancelled || !this.accepts(event)) return false;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else {
      this.buffer.push(event);
    }
    return true;
  }

  next(): Promise<E | null> {
    if (this.cancelled) return Promise.resolve(null);
    if (this.buffer.length > 0) {
      return Promise.resolve(this.buffer.shift() ?? null);
    }
    return new Promise<E | null>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  /** Idempotent. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.buffer.length = 0;
    const waiters = this.waiters;
    this.waiters = [];
    for (const resolve of waiters) resolve(null);
    this.onCancel();
  }

  async *[Symbol.asyncIterator](): AsyncIterator<E> {
    for (;;) {
      const event = await this.next();
      if (event === null) return;
      yield event;
    }
  }
}

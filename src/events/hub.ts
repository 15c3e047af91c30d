import { PlatformUnavailableError } from '../errors.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { MessageEvent, ReactionEvent } from '../platform/types.js';
import { matchesMessage, matchesReaction } from './filters.js';
import type { MessageFilter, ReactionFilter } from './filters.js';
import { Subscription } from './subscription.js';

export interface EventSource<E, F> {
  subscribe(filter: F): Subscription<E>;
}

export type ReactionEventSource = EventSource<ReactionEvent, ReactionFilter>;
export type MessageEventSource = EventSource<MessageEvent, MessageFilter>;

type HubOptions<E, F> = {
  name: string;
  eventKey: (event: E) => string;
  filterKey: (filter: F) => string;
  matches: (filter: F, event: E) => boolean;
  log?: LoggerLike;
};

/**
 * Registry of subscriptions over one global event stream, keyed so that a
 * dispatched event is only tested against the subscribers of its own key
 * (its message for reactions, its channel for messages).
 */
export class KeyedEventHub<E, F> implements EventSource<E, F> {
  private readonly byKey = new Map<string, Set<Subscription<E>>>();
  private closed = false;

  constructor(private readonly opts: HubOptions<E, F>) {}

  get isClosed(): boolean {
    return this.closed;
  }

  subscribe(filter: F): Subscription<E> {
    if (this.closed) {
      throw new PlatformUnavailableError(`${this.opts.name}: event stream is closed`);
    }
    const key = this.opts.filterKey(filter);
    let bucket = this.byKey.get(key);
    if (!bucket) {
      bucket = new Set();
      this.byKey.set(key, bucket);
    }
    const subscription: Subscription<E> = new Subscription<E>(
      (event) => this.opts.matches(filter, event),
      () => this.remove(key, subscription),
    );
    bucket.add(subscription);
    return subscription;
  }

  /** Returns the number of subscriptions the event was delivered to. */
  dispatch(event: E): number {
    if (this.closed) return 0;
    const bucket = this.byKey.get(this.opts.eventKey(event));
    if (!bucket) return 0;
    let delivered = 0;
    // Copy: offer() never cancels, but a waiter resumed by it may.
    for (const subscription of [...bucket]) {
      if (subscription.offer(event)) delivered++;
    }
    return delivered;
  }

  subscriberCount(): number {
    let n = 0;
    for (const bucket of this.byKey.values()) n += bucket.size;
    return n;
  }

  /** Refuse new subscriptions and cancel every live one. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const all = [...this.byKey.values()].flatMap((bucket) => [...bucket]);
    this.opts.log?.info({ hub: this.opts.name, live: all.length }, 'event-hub:closed');
    for (const subscription of all) subscription.cancel();
    this.byKey.clear();
  }

  private remove(key: string, subscription: Subscription<E>): void {
    const bucket = this.byKey.get(key);
    if (!bucket) return;
    bucket.delete(subscription);
    if (bucket.size === 0) this.byKey.delete(key);
  }
}

export function createReactionHub(log?: LoggerLike): KeyedEventHub<ReactionEvent, ReactionFilter> {
  return new KeyedEventHub<ReactionEvent, ReactionFilter>({
    name: 'reactions',
    eventKey: (event) => event.messageId,
    filterKey: (filter) => filter.messageId,
    matches: matchesReaction,
    log,
  });
}

export function createMessageHub(log?: LoggerLike): KeyedEventHub<MessageEvent, MessageFilter> {
  return new KeyedEventHub<MessageEvent, MessageFilter>({
    name: 'messages',
    eventKey: (event) => event.channelId,
    filterKey: (filter) => filter.channelId,
    matches: matchesMessage,
    log,
  });
}

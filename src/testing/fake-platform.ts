import { vi } from 'vitest';
import type { Mock } from 'vitest';
import type { InteractionDeps } from '../deps.js';
import { createMessageHub, createReactionHub } from '../events/hub.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { EmojiId, MessagePayload, MessageRef, PlatformActions, ReactionEvent } from '../platform/types.js';
import { ReactionManager } from '../reactions/reaction-manager.js';

export type PlatformCall =
  | { op: 'send'; channelId: string; payload: MessagePayload; result: MessageRef }
  | { op: 'edit'; message: MessageRef; payload: MessagePayload }
  | { op: 'addReaction'; message: MessageRef; emoji: EmojiId }
  | { op: 'removeReaction'; message: MessageRef; emoji: EmojiId; userId?: string }
  | { op: 'removeAllReactions'; message: MessageRef }
  | { op: 'deleteMessage'; message: MessageRef };

export type PlatformOp = PlatformCall['op'];

/** Error shape the fake reports as ignorable (like a Discord 10008/50013). */
export class IgnorableFakeError extends Error {
  readonly ignorable = true;
}

/**
 * In-process stand-in for the platform HTTP client. Records every call in
 * order, hands out sequential message ids (`m1`, `m2`, ...) and can be told to
 * fail specific operations.
 */
export class FakePlatform implements PlatformActions {
  readonly calls: PlatformCall[] = [];
  private nextId = 1;
  private readonly failures = new Map<PlatformOp, { error: unknown; remaining: number }>();
  private readonly delays = new Map<PlatformOp, number>();

  /**
   * Called after a user's reaction is removed, the way the gateway reports the
   * removal back to the bot.
   */
  onUserReactionRemoved?: (event: ReactionEvent) => void;

  /** Fail the next `times` calls of `op` (default: every call). */
  failOn(op: PlatformOp, error: unknown, times = Number.POSITIVE_INFINITY): void {
    this.failures.set(op, { error, remaining: times });
  }

  /** Make every call of `op` take `ms` (on the fake clock when timers are faked). */
  delayOn(op: PlatformOp, ms: number): void {
    this.delays.set(op, ms);
  }

  ops(): PlatformOp[] {
    return this.calls.map((c) => c.op);
  }

  callsOf<K extends PlatformOp>(op: K): Array<Extract<PlatformCall, { op: K }>> {
    return this.calls.filter((c): c is Extract<PlatformCall, { op: K }> => c.op === op);
  }

  async send(channelId: string, payload: MessagePayload): Promise<MessageRef> {
    this.maybeFail('send');
    const result = { channelId, messageId: `m${this.nextId++}` };
    this.calls.push({ op: 'send', channelId, payload, result });
    if (this.delays.has('send')) await this.delay('send');
    return result;
  }

  async edit(message: MessageRef, payload: MessagePayload): Promise<void> {
    this.maybeFail('edit');
    this.calls.push({ op: 'edit', message, payload });
    if (this.delays.has('edit')) await this.delay('edit');
  }

  async addReaction(message: MessageRef, emoji: EmojiId): Promise<void> {
    this.maybeFail('addReaction');
    this.calls.push({ op: 'addReaction', message, emoji });
    if (this.delays.has('addReaction')) await this.delay('addReaction');
  }

  async removeReaction(message: MessageRef, emoji: EmojiId, userId?: string): Promise<void> {
    this.maybeFail('removeReaction');
    this.calls.push({ op: 'removeReaction', message, emoji, userId });
    if (this.delays.has('removeReaction')) await this.delay('removeReaction');
    if (userId !== undefined) this.onUserReactionRemoved?.(reaction(message, userId, emoji, 'remove'));
  }

  async removeAllReactions(message: MessageRef): Promise<void> {
    this.maybeFail('removeAllReactions');
    this.calls.push({ op: 'removeAllReactions', message });
    if (this.delays.has('removeAllReactions')) await this.delay('removeAllReactions');
  }

  async deleteMessage(message: MessageRef): Promise<void> {
    this.maybeFail('deleteMessage');
    this.calls.push({ op: 'deleteMessage', message });
    if (this.delays.has('deleteMessage')) await this.delay('deleteMessage');
  }

  isIgnorableError(err: unknown): boolean {
    return err instanceof IgnorableFakeError;
  }

  private maybeFail(op: PlatformOp): void {
    const failure = this.failures.get(op);
    if (!failure || failure.remaining <= 0) return;
    failure.remaining--;
    throw failure.error;
  }

  private delay(op: PlatformOp): Promise<void> {
    const ms = this.delays.get(op) ?? 0;
    return new Promise<void>((resolve) => setTimeout(resolve, ms));
  }
}

export type MockLog = { [K in keyof LoggerLike]: Mock };

export function makeLog(): MockLog {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function makeDeps(opts: { withMessages?: boolean; echoRemovals?: boolean } = {}) {
  const platform = new FakePlatform();
  const log = makeLog();
  const reactionHub = createReactionHub(log);
  if (opts.echoRemovals) platform.onUserReactionRemoved = (event) => reactionHub.dispatch(event);
  const messageHub = createMessageHub(log);
  const deps: InteractionDeps = {
    actions: platform,
    reactions: new ReactionManager(platform, { log }),
    reactionEvents: reactionHub,
    messageEvents: opts.withMessages === false ? undefined : messageHub,
    log,
  };
  return { deps, platform, log, reactionHub, messageHub };
}

export function reaction(
  message: MessageRef,
  userId: string,
  emoji: EmojiId,
  action: ReactionEvent['action'] = 'add',
): ReactionEvent {
  return { channelId: message.channelId, messageId: message.messageId, userId, emoji, action };
}

/** Let every pending promise chain settle. Needs a real `setImmediate`. */
export function flush(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

import { TransientActionError, describeError } from '../errors.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { EmojiId, MessageRef, PlatformActions } from '../platform/types.js';

/**
 * `blocking`: the call returns once every platform call finished.
 * `background`: the calls run in a detached, tracked task and the caller
 * continues immediately.
 */
export type AttachMode = 'blocking' | 'background';

export type ReactionManagerOptions = {
  log?: LoggerLike;
};

function messageKey(message: MessageRef): string {
  return `${message.channelId}:${message.messageId}`;
}

/**
 * Adds and removes reactions on bot messages.
 *
 * Only a blocking `attach` ever throws. Everything else (background attach,
 * detach, clear, delete) logs failures and swallows them, since it runs after
 * the outcome it serves has been decided or alongside a wait that does not
 * depend on it.
 */
export class ReactionManager {
  private readonly tasks = new Map<string, Set<Promise<void>>>();
  private readonly log?: LoggerLike;

  constructor(
    private readonly actions: PlatformActions,
    opts: ReactionManagerOptions = {},
  ) {
    this.log = opts.log;
  }

  /**
   * Add `emojis` in order, so they appear left to right in that order.
   * In background mode `signal` stops adding further emoji once aborted.
   */
  async attach(
    message: MessageRef,
    emojis: readonly EmojiId[],
    mode: AttachMode,
    signal?: AbortSignal,
  ): Promise<void> {
    if (mode === 'blocking') {
      for (const emoji of emojis) {
        try {
          await this.actions.addReaction(message, emoji);
        } catch (err) {
          throw new TransientActionError(`addReaction ${emoji}`, err);
        }
      }
      return;
    }

    this.track(message, async () => {
      for (const emoji of emojis) {
        if (signal?.aborted) return;
        try {
          await this.actions.addReaction(message, emoji);
        } catch (err) {
          this.report(err, 'reaction-manager:background attach failed', { ...message, emoji });
          return;
        }
      }
    });
  }

  /** Remove one reaction: `userId`'s, or the bot's own when omitted. Never throws. */
  async detach(
    message: MessageRef,
    emoji: EmojiId,
    userId: string | undefined,
    mode: AttachMode,
  ): Promise<void> {
    const run = async () => {
      try {
        await this.actions.removeReaction(message, emoji, userId);
      } catch (err) {
        this.report(err, 'reaction-manager:detach failed', { ...message, emoji, userId });
      }
    };
    if (mode === 'blocking') {
      await run();
      return;
    }
    this.track(message, run);
  }

  /** Remove every reaction from the message. Never throws. */
  async clear(message: MessageRef): Promise<void> {
    try {
      await this.actions.removeAllReactions(message);
    } catch (err) {
      this.report(err, 'reaction-manager:clear failed', { ...message });
    }
  }

  /** Delete the message. Never throws; returns whether it is gone. */
  async deleteMessage(message: MessageRef): Promise<boolean> {
    try {
      await this.actions.deleteMessage(message);
      return true;
    } catch (err) {
      this.report(err, 'reaction-manager:delete failed', { ...message });
      return false;
    }
  }

  /** Wait for the background tasks started for this message. */
  async settle(message: MessageRef): Promise<void> {
    const running = this.tasks.get(messageKey(message));
    if (!running) return;
    await Promise.all([...running]);
  }

  /** Wait for every background task. */
  async drain(): Promise<void> {
    const running = [...this.tasks.values()].flatMap((set) => [...set]);
    await Promise.all(running);
  }

  get backgroundTaskCount(): number {
    let n = 0;
    for (const set of this.tasks.values()) n += set.size;
    return n;
  }

  private track(message: MessageRef, work: () => Promise<void>): void {
    const key = messageKey(message);
    let set = this.tasks.get(key);
    if (!set) {
      set = new Set();
      this.tasks.set(key, set);
    }
    const bucket = set;
    // work() catches its own platform errors; this only guards against bugs.
    const task: Promise<void> = work()
      .catch((err: unknown) => {
        this.log?.error({ err, ...message }, 'reaction-manager:background task crashed');
      })
      .finally(() => {
        bucket.delete(task);
        if (bucket.size === 0 && this.tasks.get(key) === bucket) this.tasks.delete(key);
      });
    bucket.add(task);
  }

  private report(err: unknown, msg: string, fields: Record<string, unknown>): void {
    if (this.actions.isIgnorableError(err)) {
      this.log?.debug({ ...fields, error: describeError(err) }, msg);
    } else {
      this.log?.warn({ ...fields, err }, msg);
    }
  }
}

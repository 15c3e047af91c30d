import type { EmojiId, MessageEvent, ReactionEvent } from '../platform/types.js';

/**
 * Which reaction events a prompt or menu cares about. Built once per call and
 * never mutated.
 */
export type ReactionFilter = {
  readonly messageId: string;
  readonly userId: string;
  /** Legal emoji. Events with any other emoji are dropped. */
  readonly emojis: ReadonlySet<EmojiId>;
  /** Also deliver `remove` events (default: additions only). */
  readonly acceptRemovals: boolean;
};

export type MessageFilter = {
  readonly channelId: string;
  readonly authorId: string;
};

export function reactionFilter(
  messageId: string,
  userId: string,
  emojis: Iterable<EmojiId>,
  acceptRemovals = false,
): ReactionFilter {
  return Object.freeze({
    messageId,
    userId,
    emojis: new Set(emojis),
    acceptRemovals,
  });
}

/** Did the expected user react to the expected message with a legal emoji? */
export function matchesReaction(filter: ReactionFilter, event: ReactionEvent): boolean {
  if (event.messageId !== filter.messageId) return false;
  if (event.userId !== filter.userId) return false;
  if (event.action === 'remove' && !filter.acceptRemovals) return false;
  return filter.emojis.has(event.emoji);
}

export function matchesMessage(filter: MessageFilter, event: MessageEvent): boolean {
  return event.channelId === filter.channelId && event.authorId === filter.authorId;
}

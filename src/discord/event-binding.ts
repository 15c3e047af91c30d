import type {
  Client,
  Message,
  MessageReaction,
  PartialMessage,
  PartialMessageReaction,
  PartialUser,
  User,
} from 'discord.js';
import type { KeyedEventHub } from '../events/hub.js';
import type { MessageFilter, ReactionFilter } from '../events/filters.js';
import type { LoggerLike } from '../logging/logger-like.js';
import type { EmojiId, MessageEvent, ReactionAction, ReactionEvent } from '../platform/types.js';

type EmojiLike = {
  id: string | null;
  name: string | null;
  animated?: boolean | null;
};

type ReactionLike = {
  emoji: EmojiLike;
  message: { id: string; channelId: string };
};

type MessageLike = {
  id: string;
  channelId: string;
  content: string | null;
  author: { id: string } | null;
};

/**
 * The emoji string prompts and menus compare against: the unicode name, or
 * `<:name:id>` / `<a:name:id>` for custom emoji (the form `message.react()`
 * accepts).
 */
export function emojiIdentity(emoji: EmojiLike): EmojiId | null {
  if (emoji.id) return `<${emoji.animated ? 'a' : ''}:${emoji.name ?? '_'}:${emoji.id}>`;
  return emoji.name || null;
}

export function toReactionEvent(
  reaction: ReactionLike,
  user: { id: string },
  action: ReactionAction,
): ReactionEvent | null {
  const emoji = emojiIdentity(reaction.emoji);
  if (!emoji) return null;
  return {
    channelId: reaction.message.channelId,
    messageId: reaction.message.id,
    userId: user.id,
    emoji,
    action,
  };
}

export function toMessageEvent(msg: MessageLike): MessageEvent | null {
  if (!msg.author) return null;
  return {
    id: msg.id,
    channelId: msg.channelId,
    authorId: msg.author.id,
    content: msg.content ?? '',
  };
}

export type DiscordEventHubs = {
  reactions: KeyedEventHub<ReactionEvent, ReactionFilter>;
  messages?: KeyedEventHub<MessageEvent, MessageFilter>;
};

/**
 * Feed the client's gateway events into the hubs. Reactions (and messages)
 * from the bot itself are not dispatched.
 *
 * Returns `unbind`, which removes the listeners and closes the hubs, cancelling
 * every prompt and menu still waiting on them.
 */
export function bindDiscordEvents(
  client: Client,
  hubs: DiscordEventHubs,
  log?: LoggerLike,
): () => void {
  const isSelf = (userId: string) => userId === client.user?.id;

  const dispatchReaction = (
    reaction: MessageReaction | PartialMessageReaction,
    user: User | PartialUser,
    action: ReactionAction,
  ) => {
    if (isSelf(user.id)) return;
    const event = toReactionEvent(reaction, user, action);
    if (!event) {
      log?.debug({ messageId: reaction.message.id }, 'discord-events:reaction without emoji identity');
      return;
    }
    hubs.reactions.dispatch(event);
  };

  const onReactionAdd = (reaction: MessageReaction | PartialMessageReaction, user: User | PartialUser) =>
    dispatchReaction(reaction, user, 'add');
  const onReactionRemove = (reaction: MessageReaction | PartialMessageReaction, user: User | PartialUser) =>
    dispatchReaction(reaction, user, 'remove');
  const onMessageCreate = (msg: Message | PartialMessage) => {
    const messages = hubs.messages;
    if (!messages || !msg.author || isSelf(msg.author.id)) return;
    const event = toMessageEvent(msg);
    if (event) messages.dispatch(event);
  };

  client.on('messageReactionAdd', onReactionAdd);
  client.on('messageReactionRemove', onReactionRemove);
  if (hubs.messages) client.on('messageCreate', onMessageCreate);

  let bound = true;
  return () => {
    if (!bound) return;
    bound = false;
    client.off('messageReactionAdd', onReactionAdd);
    client.off('messageReactionRemove', onReactionRemove);
    if (hubs.messages) client.off('messageCreate', onMessageCreate);
    hubs.reactions.close();
    hubs.messages?.close();
  };
}

/**
 * Platform-neutral shapes shared by the prompt and menu engines. The discord.js
 * binding in `src/discord/` maps to and from these; nothing under `src/events`,
 * `src/prompt` or `src/menu` imports discord.js.
 */

/** Identity of a message the bot can react to, edit or delete. */
export type MessageRef = {
  channelId: string;
  messageId: string;
};

/**
 * Emoji identity: a unicode emoji as-is, or `<:name:id>` / `<a:name:id>` for
 * custom emoji.
 */
export type EmojiId = string;

export type ReactionAction = 'add' | 'remove';

/** A user added or removed a reaction. Produced by the gateway binding. */
export type ReactionEvent = {
  channelId: string;
  messageId: string;
  userId: string;
  emoji: EmojiId;
  action: ReactionAction;
};

/** A user sent a message. Used by message prompts. */
export type MessageEvent = {
  id: string;
  channelId: string;
  authorId: string;
  content: string;
};

export type EmbedField = {
  name: string;
  value: string;
  inline?: boolean;
};

/** Structurally compatible with discord.js `APIEmbed`. */
export type EmbedPayload = {
  title?: string;
  description?: string;
  url?: string;
  color?: number;
  fields?: EmbedField[];
  footer?: { text: string; icon_url?: string };
};

/** Content and/or embeds for a send or an edit. */
export type FileAttachment = {
  name: string;
  data: Buffer;
};

export type MessagePayload = {
  content?: string;
  embeds?: EmbedPayload[];
  files?: FileAttachment[];
};

/**
 * Outbound platform calls. Implementations throw on failure; callers decide
 * whether a failure is fatal or only logged.
 */
export interface PlatformActions {
  send(channelId: string, payload: MessagePayload): Promise<MessageRef>;
  edit(message: MessageRef, payload: MessagePayload): Promise<void>;
  addReaction(message: MessageRef, emoji: EmojiId): Promise<void>;
  /** Remove `userId`'s reaction, or the bot's own when `userId` is omitted. */
  removeReaction(message: MessageRef, emoji: EmojiId, userId?: string): Promise<void>;
  removeAllReactions(message: MessageRef): Promise<void>;
  deleteMessage(message: MessageRef): Promise<void>;
  /**
   * True for failures that are expected during cleanup: missing permissions,
   * or a message deleted by a user before the bot got to it.
   */
  isIgnorableError(err: unknown): boolean;
}

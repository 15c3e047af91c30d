import { AttachmentBuilder, RESTJSONErrorCodes } from 'discord.js';
import type { Client, Message, MessageCreateOptions, MessageManager, MessageMentionOptions } from 'discord.js';
import type { EmojiId, FileAttachment, MessagePayload, MessageRef, PlatformActions } from '../platform/types.js';

const NO_MENTIONS: MessageMentionOptions = { parse: [], repliedUser: false };

type TextChannelLike = {
  send(options: MessageCreateOptions): Promise<Message>;
  messages: MessageManager;
};

const IGNORABLE_CODES = new Set<number>([
  RESTJSONErrorCodes.UnknownChannel,
  RESTJSONErrorCodes.UnknownMessage,
  RESTJSONErrorCodes.UnknownEmoji,
  RESTJSONErrorCodes.MissingAccess,
  RESTJSONErrorCodes.MissingPermissions,
]);

function errorCode(err: unknown): number | null {
  if (!err || typeof err !== 'object' || !('code' in err)) return null;
  return typeof err.code === 'number' ? err.code : null;
}

/** Missing permissions, or a channel/message/emoji that no longer exists. */
export function isIgnorableDiscordError(err: unknown): boolean {
  const code = errorCode(err);
  return code !== null && IGNORABLE_CODES.has(code);
}

/** The cache key discord.js uses for a reaction: custom emoji id, else the unicode name. */
export function reactionCacheKey(emoji: EmojiId): string {
  const custom = /^<a?:[^:]*:(\d+)>$/.exec(emoji);
  return custom?.[1] ?? emoji;
}

function toAttachments(files: readonly FileAttachment[]): AttachmentBuilder[] {
  return files.map((f) => new AttachmentBuilder(f.data, { name: f.name }));
}

/** `PlatformActions` over a logged-in discord.js client. */
export class DiscordPlatformActions implements PlatformActions {
  constructor(private readonly client: Client) {}

  async send(channelId: string, payload: MessagePayload): Promise<MessageRef> {
    const channel = await this.fetchChannel(channelId);
    const sent = await channel.send({
      content: payload.content,
      embeds: payload.embeds,
      files: payload.files && toAttachments(payload.files),
      allowedMentions: NO_MENTIONS,
    });
    return { channelId: sent.channelId, messageId: sent.id };
  }

  async edit(message: MessageRef, payload: MessagePayload): Promise<void> {
    const msg = await this.fetchMessage(message);
    // null/[] clear what the previous page had and this one does not.
    await msg.edit({
      content: payload.content ?? null,
      embeds: payload.embeds ?? [],
      attachments: [],
      files: toAttachments(payload.files ?? []),
      allowedMentions: NO_MENTIONS,
    });
  }

  async addReaction(message: MessageRef, emoji: EmojiId): Promise<void> {
    const msg = await this.fetchMessage(message);
    await msg.react(emoji);
  }

  async removeReaction(message: MessageRef, emoji: EmojiId, userId?: string): Promise<void> {
    const msg = await this.fetchMessage(message);
    const reaction = msg.reactions.resolve(reactionCacheKey(emoji));
    if (!reaction) return;
    await reaction.users.remove(userId ?? this.client.user?.id);
  }

  async removeAllReactions(message: MessageRef): Promise<void> {
    const msg = await this.fetchMessage(message);
    await msg.reactions.removeAll();
  }

  async deleteMessage(message: MessageRef): Promise<void> {
    const msg = await this.fetchMessage(message);
    await msg.delete();
  }

  isIgnorableError(err: unknown): boolean {
    return isIgnorableDiscordError(err);
  }

  private async fetchChannel(channelId: string): Promise<TextChannelLike> {
    const channel = await this.client.channels.fetch(channelId);
    if (!channel || !channel.isTextBased() || !('send' in channel)) {
      throw new Error(`channel "${channelId}" not found or not a text channel`);
    }
    return channel;
  }

  private async fetchMessage(message: MessageRef): Promise<Message> {
    const channel = await this.fetchChannel(message.channelId);
    return channel.messages.fetch(message.messageId);
  }
}

export { createInteractions } from './interactions.js';
export type { CreateInteractionsParams, Interactions } from './interactions.js';
export type { InteractionDeps } from './deps.js';

export { ConfigurationError, PlatformUnavailableError, TransientActionError } from './errors.js';
export type { InteractionErrorCode } from './errors.js';
export type { LoggerLike } from './logging/logger-like.js';

export type {
  EmbedField,
  EmbedPayload,
  EmojiId,
  FileAttachment,
  MessageEvent,
  MessagePayload,
  MessageRef,
  PlatformActions,
  ReactionAction,
  ReactionEvent,
} from './platform/types.js';

export { Subscription } from './events/subscription.js';
export { KeyedEventHub, createMessageHub, createReactionHub } from './events/hub.js';
export type { EventSource, MessageEventSource, ReactionEventSource } from './events/hub.js';
export { matchesMessage, matchesReaction, reactionFilter } from './events/filters.js';
export type { MessageFilter, ReactionFilter } from './events/filters.js';
export { Deadline } from './events/deadline.js';
export { raceEvent } from './events/race.js';
export type { RaceOptions, RaceResult } from './events/race.js';

export { ReactionManager } from './reactions/reaction-manager.js';
export type { AttachMode } from './reactions/reaction-manager.js';

export { NO_EMOJI, YES_EMOJI, reactionPrompt, yesOrNoPrompt } from './prompt/reaction-prompt.js';
export type { PromptCleanup, PromptOutcome, ReactionPromptParams } from './prompt/reaction-prompt.js';
export { messagePrompt, messagePromptContent } from './prompt/message-prompt.js';
export type { MessagePromptParams } from './prompt/message-prompt.js';

export { ReactionMenu, runMenu } from './menu/menu.js';
export type { MenuOutcome, MenuParams, MenuState } from './menu/menu.js';
export { DEFAULT_NAVIGATION, FULL_NAVIGATION, JUMP_EMOJI, NAVIGATION_ORDER } from './menu/options.js';
export type {
  FinishAction,
  MenuOptions,
  NavigationEmoji,
  NavigationRole,
  PagePosition,
  PageRenderer,
} from './menu/options.js';

export { escapeMassMentions, pagify } from './formatting/pagify.js';
export type { PagifyOptions } from './formatting/pagify.js';
export { textToFile } from './formatting/text-file.js';
export type { TextFileOptions } from './formatting/text-file.js';

export { DiscordPlatformActions, isIgnorableDiscordError } from './discord/platform-actions.js';
export { bindDiscordEvents, emojiIdentity } from './discord/event-binding.js';

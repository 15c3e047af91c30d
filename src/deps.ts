import type { MessageEventSource, ReactionEventSource } from './events/hub.js';
import type { LoggerLike } from './logging/logger-like.js';
import type { PlatformActions } from './platform/types.js';
import type { ReactionManager } from './reactions/reaction-manager.js';

/** Collaborators shared by every prompt and menu run. */
export type InteractionDeps = {
  actions: PlatformActions;
  reactions: ReactionManager;
  reactionEvents: ReactionEventSource;
  /** Needed by message prompts and the menu's jump-to step only. */
  messageEvents?: MessageEventSource;
  log?: LoggerLike;
};

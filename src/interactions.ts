import type { InteractionDeps } from './deps.js';
import type { MessageEventSource, ReactionEventSource } from './events/hub.js';
import type { LoggerLike } from './logging/logger-like.js';
import { runMenu } from './menu/menu.js';
import type { MenuOutcome, MenuParams } from './menu/menu.js';
import type { PlatformActions } from './platform/types.js';
import { messagePrompt, messagePromptContent } from './prompt/message-prompt.js';
import type { MessagePromptParams } from './prompt/message-prompt.js';
import { reactionPrompt, yesOrNoPrompt } from './prompt/reaction-prompt.js';
import type { PromptOutcome, ReactionPromptParams } from './prompt/reaction-prompt.js';
import { ReactionManager } from './reactions/reaction-manager.js';
import type { MessageEvent } from './platform/types.js';

export type CreateInteractionsParams = {
  actions: PlatformActions;
  reactionEvents: ReactionEventSource;
  messageEvents?: MessageEventSource;
  log?: LoggerLike;
};

export type Interactions = {
  readonly deps: InteractionDeps;
  reactionPrompt(params: ReactionPromptParams): Promise<PromptOutcome>;
  yesOrNoPrompt(params: Omit<ReactionPromptParams, 'emojis'>): Promise<boolean | null>;
  messagePrompt(params: MessagePromptParams): Promise<MessageEvent | null>;
  messagePromptContent(params: MessagePromptParams): Promise<string | null>;
  runMenu(params: MenuParams): Promise<MenuOutcome>;
  /** Wait for background reaction work (attach, detach) to finish. */
  drain(): Promise<void>;
};

/** Bind the prompt and menu operations to one set of collaborators. */
export function createInteractions(params: CreateInteractionsParams): Interactions {
  const deps: InteractionDeps = {
    actions: params.actions,
    reactions: new ReactionManager(params.actions, { log: params.log }),
    reactionEvents: params.reactionEvents,
    messageEvents: params.messageEvents,
    log: params.log,
  };
  return {
    deps,
    reactionPrompt: (p) => reactionPrompt(deps, p),
    yesOrNoPrompt: (p) => yesOrNoPrompt(deps, p),
    messagePrompt: (p) => messagePrompt(deps, p),
    messagePromptContent: (p) => messagePromptContent(deps, p),
    runMenu: (p) => runMenu(deps, p),
    drain: () => deps.reactions.drain(),
  };
}

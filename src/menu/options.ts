import { ConfigurationError } from '../errors.js';
import { assertPositiveSeconds } from '../events/deadline.js';
import type { EmojiId, MessagePayload, MessageRef } from '../platform/types.js';
import { validateEmojiSet } from '../prompt/reaction-prompt.js';

export type NavigationRole = 'first' | 'previous' | 'jump' | 'quit' | 'next' | 'last';

/** Left-to-right order the navigation reactions are attached in. */
export const NAVIGATION_ORDER: readonly NavigationRole[] = ['first', 'previous', 'jump', 'quit', 'next', 'last'];

export type NavigationEmoji = Partial<Record<NavigationRole, EmojiId>>;

export const DEFAULT_NAVIGATION: Readonly<NavigationEmoji> = Object.freeze({
  previous: '◀️',
  quit: '❌',
  next: '▶️',
});

export const FULL_NAVIGATION: Readonly<NavigationEmoji> = Object.freeze({
  first: '⏪',
  previous: '◀️',
  quit: '❌',
  next: '▶️',
  last: '⏩',
});

export const JUMP_EMOJI = '🔢';

/** What happens to the menu message once the menu stops, whatever the reason. */
export type FinishAction = 'delete-message' | 'remove-reactions' | 'leave-as-is';

export type PagePosition = { index: number; total: number };

/** Turns a caller-supplied page into what gets sent. Identity by default. */
export type PageRenderer = (page: MessagePayload, position: PagePosition) => MessagePayload;

export type MenuOptions = {
  /** Wall-clock budget for the whole menu, from start. Not reset by navigation. */
  timeoutSeconds?: number;
  /**
   * Idle mode: additionally stop when no navigation happened for this long.
   * Reset on every accepted reaction.
   */
  idleTimeoutSeconds?: number;
  /** Role to emoji. Roles left out are not offered. */
  navigation?: NavigationEmoji;
  /** Attach the navigation reactions in the background after the first render. */
  nonBlocking?: boolean;
  /** Append `Page i/n` to each rendered page's content. */
  pageNumberIndicator?: boolean;
  onFinish?: FinishAction;
  startPage?: number;
  /** Edit this bot message instead of sending a new one. */
  message?: MessageRef;
  /** Count reaction removals as presses too. */
  acceptRemovals?: boolean;
  /**
   * Remove the user's navigation reaction once handled, so it can be pressed
   * again. Defaults to `!acceptRemovals`; the removal would otherwise count as
   * a second press.
   */
  removeUserReactions?: boolean;
  /** Upper bound for waiting on the page number after a jump press. */
  jumpPromptSeconds?: number;
  render?: PageRenderer;
};

export type ResolvedMenuOptions = {
  timeoutSeconds: number;
  idleTimeoutSeconds: number | null;
  navigation: ReadonlyArray<{ role: NavigationRole; emoji: EmojiId }>;
  nonBlocking: boolean;
  pageNumberIndicator: boolean;
  onFinish: FinishAction;
  startPage: number;
  message: MessageRef | null;
  acceptRemovals: boolean;
  removeUserReactions: boolean;
  jumpPromptSeconds: number;
  render: PageRenderer;
};

export const DEFAULT_MENU_TIMEOUT_SECONDS = 30;
export const DEFAULT_JUMP_PROMPT_SECONDS = 20;

const identityRenderer: PageRenderer = (page) => page;

/**
 * Apply defaults and validate. Throws `ConfigurationError` before the menu
 * touches the platform.
 */
export function resolveMenuOptions(options: MenuOptions, pageCount: number): ResolvedMenuOptions {
  if (!Number.isInteger(pageCount) || pageCount < 1) {
    throw new ConfigurationError('menu requires at least one page');
  }

  const timeoutSeconds = options.timeoutSeconds ?? DEFAULT_MENU_TIMEOUT_SECONDS;
  assertPositiveSeconds(timeoutSeconds, 'timeoutSeconds');

  const idleTimeoutSeconds = options.idleTimeoutSeconds ?? null;
  if (idleTimeoutSeconds !== null) assertPositiveSeconds(idleTimeoutSeconds, 'idleTimeoutSeconds');

  const jumpPromptSeconds = options.jumpPromptSeconds ?? DEFAULT_JUMP_PROMPT_SECONDS;
  assertPositiveSeconds(jumpPromptSeconds, 'jumpPromptSeconds');

  const startPage = options.startPage ?? 0;
  if (!Number.isInteger(startPage) || startPage < 0 || startPage >= pageCount) {
    throw new ConfigurationError(`startPage ${String(startPage)} is out of bounds for ${pageCount} page(s)`);
  }

  const acceptRemovals = options.acceptRemovals ?? false;
  const removeUserReactions = options.removeUserReactions ?? !acceptRemovals;
  if (acceptRemovals && removeUserReactions) {
    throw new ConfigurationError('acceptRemovals and removeUserReactions cannot both be set');
  }

  const map = options.navigation ?? DEFAULT_NAVIGATION;
  const navigation: Array<{ role: NavigationRole; emoji: EmojiId }> = [];
  for (const role of NAVIGATION_ORDER) {
    const emoji = map[role];
    if (emoji !== undefined) navigation.push({ role, emoji });
  }
  validateEmojiSet(navigation.map((n) => n.emoji), 'navigation');

  return {
    timeoutSeconds,
    idleTimeoutSeconds,
    navigation,
    nonBlocking: options.nonBlocking ?? false,
    pageNumberIndicator: options.pageNumberIndicator ?? false,
    onFinish: options.onFinish ?? 'remove-reactions',
    startPage,
    message: options.message ?? null,
    acceptRemovals,
    removeUserReactions,
    jumpPromptSeconds,
    render: options.render ?? identityRenderer,
  };
}

export function withPageIndicator(payload: MessagePayload, position: PagePosition): MessagePayload {
  const label = `Page ${position.index + 1}/${position.total}`;
  return {
    ...payload,
    content: payload.content ? `${payload.content}\n\n${label}` : label,
  };
}

import type { InteractionDeps } from '../deps.js';
import { ConfigurationError } from '../errors.js';
import { Deadline, assertPositiveSeconds } from '../events/deadline.js';
import { reactionFilter } from '../events/filters.js';
import { raceEvent } from '../events/race.js';
import type { EmojiId, MessageRef } from '../platform/types.js';
import type { AttachMode } from '../reactions/reaction-manager.js';

export type PromptOutcome =
  | { kind: 'selected'; index: number; emoji: EmojiId }
  | { kind: 'timedOut' }
  | { kind: 'cancelled' };

export type PromptCleanup = 'remove-reactions' | 'leave-as-is';

export type ReactionPromptParams = {
  /** The bot message to attach the choices to. */
  message: MessageRef;
  /** Only this user's reactions count. */
  userId: string;
  /** Ordered choices; the outcome's `index` is a position in this list. */
  emojis: readonly EmojiId[];
  timeoutSeconds: number;
  /** External abort (e.g. bot shutdown). Resolves the prompt as `cancelled`. */
  signal?: AbortSignal;
  /** Defaults to `background`: the wait starts before every choice is attached. */
  attachMode?: AttachMode;
  /** Defaults to `remove-reactions`. */
  cleanup?: PromptCleanup;
};

export const YES_EMOJI = '✅';
export const NO_EMOJI = '❌';

export function validateEmojiSet(emojis: readonly EmojiId[], name = 'emojis'): void {
  if (!Array.isArray(emojis) || emojis.length === 0) {
    throw new ConfigurationError(`${name} must contain at least one emoji`);
  }
  const seen = new Set<string>();
  for (const emoji of emojis) {
    if (typeof emoji !== 'string' || !emoji.trim()) {
      throw new ConfigurationError(`${name}: each entry must be a non-empty emoji string`);
    }
    if (seen.has(emoji)) {
      throw new ConfigurationError(`${name}: duplicate emoji "${emoji}"`);
    }
    seen.add(emoji);
  }
}

/**
 * Attach `emojis` to `message` and wait for `userId` to add one of them.
 *
 * Resolves exactly once per call: `selected` with the chosen emoji's position
 * in `emojis`, `timedOut` when the deadline passes first, or `cancelled` when
 * `signal` aborts. Cleanup runs in every case and never changes the outcome.
 * The timeout starts once `attach` returns: after the last reaction for a
 * blocking attach, at once for a background one.
 *
 * Throws `ConfigurationError` for invalid input (before any platform call),
 * `PlatformUnavailableError` when the event stream is closed, and
 * `TransientActionError` when a blocking attach fails.
 */
export async function reactionPrompt(
  deps: InteractionDeps,
  params: ReactionPromptParams,
): Promise<PromptOutcome> {
  const { message, userId, emojis, timeoutSeconds, signal } = params;
  validateEmojiSet(emojis);
  assertPositiveSeconds(timeoutSeconds, 'timeoutSeconds');
  if (signal?.aborted) return { kind: 'cancelled' };

  const attachMode = params.attachMode ?? 'background';
  const cleanup = params.cleanup ?? 'remove-reactions';

  // Subscribe before attaching so an early click is not missed.
  const subscription = deps.reactionEvents.subscribe(
    reactionFilter(message.messageId, userId, emojis),
  );
  const stopAttach = new AbortController();
  let deadline: Deadline | undefined;

  let outcome: PromptOutcome;
  try {
    try {
      await deps.reactions.attach(message, emojis, attachMode, stopAttach.signal);
    } catch (err) {
      deps.log?.warn({ err, ...message }, 'reaction-prompt:attach failed');
      if (cleanup === 'remove-reactions') await deps.reactions.clear(message);
      throw err;
    }

    deadline = Deadline.after(timeoutSeconds);
    const result = await raceEvent(subscription, { deadlines: [deadline], signal });
    if (result.kind === 'event') {
      const index = emojis.indexOf(result.event.emoji);
      outcome = { kind: 'selected', index, emoji: emojis[index] ?? result.event.emoji };
    } else if (result.kind === 'timeout') {
      outcome = { kind: 'timedOut' };
    } else {
      outcome = { kind: 'cancelled' };
    }
  } finally {
    subscription.cancel();
    deadline?.cancel();
    stopAttach.abort();
  }

  deps.log?.debug({ ...message, userId, outcome: outcome.kind }, 'reaction-prompt:resolved');

  if (cleanup === 'remove-reactions') {
    await deps.reactions.settle(message);
    await deps.reactions.clear(message);
  }
  return outcome;
}

/**
 * Two-choice prompt: ✅ resolves `true`, ❌ resolves `false`, a timeout or
 * abort resolves `null`.
 */
export async function yesOrNoPrompt(
  deps: InteractionDeps,
  params: Omit<ReactionPromptParams, 'emojis'>,
): Promise<boolean | null> {
  const outcome = await reactionPrompt(deps, { ...params, emojis: [YES_EMOJI, NO_EMOJI] });
  if (outcome.kind !== 'selected') return null;
  return outcome.index === 0;
}

import type { InteractionDeps } from '../deps.js';
import { ConfigurationError, TransientActionError } from '../errors.js';
import { Deadline } from '../events/deadline.js';
import { reactionFilter } from '../events/filters.js';
import { raceEvent } from '../events/race.js';
import type { Subscription } from '../events/subscription.js';
import type { EmojiId, MessagePayload, MessageRef, ReactionEvent } from '../platform/types.js';
import { messagePrompt } from '../prompt/message-prompt.js';
import type { AttachMode } from '../reactions/reaction-manager.js';
import { resolveMenuOptions, withPageIndicator } from './options.js';
import type { MenuOptions, NavigationRole, ResolvedMenuOptions } from './options.js';

export type MenuState = 'quit' | 'timedOut' | 'cancelled';

export type MenuOutcome = {
  state: MenuState;
  /** The menu message, or null when it was deleted on finish (or never sent). */
  message: MessageRef | null;
  /** Index of the page shown last. */
  page: number;
};

export type MenuParams = {
  /** Channel the menu is sent to (ignored for sending when `options.message` is set). */
  channelId: string;
  /** The only user whose reactions navigate the menu. */
  userId: string;
  pages: readonly MessagePayload[];
  options?: MenuOptions;
  signal?: AbortSignal;
};

/**
 * A reaction-navigated, paginated message.
 *
 * `run()` renders the start page, attaches the navigation reactions, then
 * loops: wait for a navigation reaction from the user, move, redraw when the
 * page changed. It stops on quit, on timeout, or when the signal aborts, and
 * applies `onFinish` the same way in all three cases.
 *
 * One instance runs once. Its state (page index, live message, subscription)
 * is private to the run.
 */
export class ReactionMenu {
  private readonly options: ResolvedMenuOptions;
  private readonly roles: Map<EmojiId, NavigationRole>;
  private index: number;
  private renderedIndex: number | null = null;
  private message: MessageRef | null;
  private subscription: Subscription<ReactionEvent> | null = null;
  private idle: Deadline | null = null;
  private started = false;

  constructor(
    private readonly deps: InteractionDeps,
    private readonly params: MenuParams,
  ) {
    this.options = resolveMenuOptions(params.options ?? {}, params.pages.length);
    this.roles = new Map(this.options.navigation.map((n) => [n.emoji, n.role]));
    if (this.emojiFor('jump') !== undefined && !deps.messageEvents) {
      throw new ConfigurationError('the jump control requires a message event source');
    }
    this.index = this.options.startPage;
    this.message = this.options.message;
  }

  get currentPage(): number {
    return this.index;
  }

  async run(): Promise<MenuOutcome> {
    if (this.started) throw new ConfigurationError('a menu can only be run once');
    this.started = true;

    if (this.params.signal?.aborted) {
      return { state: 'cancelled', message: this.message, page: this.index };
    }

    const session = Deadline.after(this.options.timeoutSeconds);
    if (this.options.idleTimeoutSeconds !== null) {
      this.idle = Deadline.after(this.options.idleTimeoutSeconds, 'idleTimeoutSeconds');
    }
    const stopAttach = new AbortController();

    let state: MenuState;
    try {
      state = await this.loop(session, stopAttach.signal);
    } catch (err) {
      this.stopListening(session, stopAttach);
      if (this.message) {
        await this.deps.reactions.settle(this.message);
        await this.deps.reactions.clear(this.message);
      }
      throw err;
    }
    this.stopListening(session, stopAttach);

    const message = await this.finish();
    this.deps.log?.info(
      { channelId: this.params.channelId, userId: this.params.userId, state, page: this.index },
      'menu:finished',
    );
    return { state, message, page: this.index };
  }

  private async loop(session: Deadline, attachSignal: AbortSignal): Promise<MenuState> {
    // An existing message can be listened to before the first render.
    if (this.message) this.subscription = this.subscribe(this.message);
    const message = await this.render();
    const subscription = this.subscription ?? this.subscribe(message);
    this.subscription = subscription;

    await this.deps.reactions.attach(
      message,
      this.options.navigation.map((n) => n.emoji),
      this.attachMode,
      attachSignal,
    );

    for (;;) {
      const deadlines = this.idle ? [session, this.idle] : [session];
      const result = await raceEvent(subscription, {
        deadlines,
        signal: this.params.signal,
        retainDeadlines: true,
      });
      if (result.kind === 'timeout') return 'timedOut';
      if (result.kind === 'cancelled') return 'cancelled';

      const { event } = result;
      const role = this.roles.get(event.emoji);
      if (!role) continue;
      if (role === 'quit') return 'quit';

      if (event.action === 'add' && this.options.removeUserReactions) {
        void this.deps.reactions.detach(message, event.emoji, event.userId, 'background');
      }
      const idleSeconds = this.options.idleTimeoutSeconds;
      if (this.idle && idleSeconds !== null) {
        this.idle.cancel();
        this.idle = Deadline.after(idleSeconds, 'idleTimeoutSeconds');
      }

      const target = role === 'jump' ? await this.askForPage(session) : this.step(role);
      if (target === null || target === this.index) continue;
      this.deps.log?.debug({ ...message, from: this.index, to: target, role }, 'menu:navigate');
      this.index = target;
      await this.render();
    }
  }

  /** Target index for a relative/absolute move, clamped to the page range. */
  private step(role: Exclude<NavigationRole, 'quit' | 'jump'>): number {
    const last = this.params.pages.length - 1;
    switch (role) {
      case 'first':
        return 0;
      case 'previous':
        return Math.max(0, this.index - 1);
      case 'next':
        return Math.min(last, this.index + 1);
      case 'last':
        return last;
    }
  }

  /**
   * Ask the user for a page number by message, within what is left of the
   * session budget. Returns null for no answer or an out-of-range answer.
   */
  private async askForPage(session: Deadline): Promise<number | null> {
    const total = this.params.pages.length;
    const seconds = Math.min(this.options.jumpPromptSeconds, session.remainingMs() / 1000);
    if (seconds <= 0) return null;

    let question: MessageRef;
    try {
      question = await this.deps.actions.send(this.params.channelId, {
        content: `Which page? Reply with a number from 1 to ${total}.`,
      });
    } catch (err) {
      this.deps.log?.warn({ err, channelId: this.params.channelId }, 'menu:jump prompt send failed');
      return null;
    }

    const reply = await messagePrompt(this.deps, {
      channelId: this.params.channelId,
      userId: this.params.userId,
      timeoutSeconds: seconds,
      signal: this.params.signal,
    });
    await this.deps.reactions.deleteMessage(question);
    if (!reply) return null;
    await this.deps.reactions.deleteMessage({ channelId: reply.channelId, messageId: reply.id });

    const text = reply.content.trim();
    if (!/^\d+$/.test(text)) return null;
    const n = Number(text);
    if (n < 1 || n > total) return null;
    return n - 1;
  }

  private async render(): Promise<MessageRef> {
    const current = this.message;
    if (current && this.renderedIndex === this.index) return current;

    const page = this.params.pages[this.index] ?? {};
    const position = { index: this.index, total: this.params.pages.length };
    let payload = this.options.render(page, position);
    if (this.options.pageNumberIndicator) payload = withPageIndicator(payload, position);

    let rendered: MessageRef;
    if (current) {
      try {
        await this.deps.actions.edit(current, payload);
      } catch (err) {
        throw new TransientActionError('edit menu message', err);
      }
      rendered = current;
    } else {
      try {
        rendered = await this.deps.actions.send(this.params.channelId, payload);
      } catch (err) {
        throw new TransientActionError('send menu message', err);
      }
      this.message = rendered;
    }
    this.renderedIndex = this.index;
    return rendered;
  }

  private stopListening(session: Deadline, stopAttach: AbortController): void {
    this.subscription?.cancel();
    this.idle?.cancel();
    session.cancel();
    stopAttach.abort();
  }

  private subscribe(message: MessageRef): Subscription<ReactionEvent> {
    return this.deps.reactionEvents.subscribe(
      reactionFilter(
        message.messageId,
        this.params.userId,
        this.roles.keys(),
        this.options.acceptRemovals,
      ),
    );
  }

  private async finish(): Promise<MessageRef | null> {
    const message = this.message;
    if (!message) return null;
    await this.deps.reactions.settle(message);
    switch (this.options.onFinish) {
      case 'delete-message':
        return (await this.deps.reactions.deleteMessage(message)) ? null : message;
      case 'remove-reactions':
        await this.deps.reactions.clear(message);
        return message;
      case 'leave-as-is':
        return message;
    }
  }

  private get attachMode(): AttachMode {
    return this.options.nonBlocking ? 'background' : 'blocking';
  }

  private emojiFor(role: NavigationRole): EmojiId | undefined {
    return this.options.navigation.find((n) => n.role === role)?.emoji;
  }
}

export async function runMenu(deps: InteractionDeps, params: MenuParams): Promise<MenuOutcome> {
  return new ReactionMenu(deps, params).run();
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { BotConfig } from '../config.js';
import { createMessageHub, createReactionHub } from '../events/hub.js';
import { createInteractions } from '../interactions.js';
import { FakePlatform, flush, makeLog, reaction } from '../testing/fake-platform.js';
import { handleCommand } from './commands.js';
import type { CommandDeps } from './commands.js';

const USER = '100';

function makeConfig(overrides: Partial<BotConfig> = {}): BotConfig {
  return {
    token: 'test-token',
    allowUserIds: new Set([USER]),
    commandPrefix: '~',
    promptTimeoutSeconds: 30,
    menuTimeoutSeconds: 30,
    menuNonBlocking: false,
    menuPageIndicator: false,
    menuOnFinish: 'remove-reactions',
    ...overrides,
  };
}

function setup(opts: { config?: Partial<BotConfig>; signal?: AbortSignal } = {}) {
  const platform = new FakePlatform();
  const log = makeLog();
  const reactionHub = createReactionHub();
  const messageHub = createMessageHub();
  const interactions = createInteractions({
    actions: platform,
    reactionEvents: reactionHub,
    messageEvents: messageHub,
    log,
  });
  const deps: CommandDeps = { interactions, config: makeConfig(opts.config), log, signal: opts.signal };
  return { platform, log, reactionHub, messageHub, deps };
}

function userMessage(content: string, authorId = USER) {
  return { id: 'in1', channelId: 'c1', authorId, content };
}

function sentTexts(platform: FakePlatform): Array<string | undefined> {
  return platform.callsOf('send').map((c) => c.payload.content);
}

beforeEach(() => {
  vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
});

afterEach(() => {
  vi.useRealTimers();
});

describe('handleCommand routing', () => {
  it('ignores messages without the prefix', async () => {
    const { deps, platform } = setup();
    await expect(handleCommand(deps, userMessage('pet'))).resolves.toBe(false);
    expect(platform.calls).toEqual([]);
  });

  it('ignores users outside the allowlist', async () => {
    const { deps, platform } = setup();
    await expect(handleCommand(deps, userMessage('~pet', '999'))).resolves.toBe(false);
    expect(platform.calls).toEqual([]);
  });

  it('ignores unknown commands', async () => {
    const { deps, log } = setup();
    await expect(handleCommand(deps, userMessage('~dance'))).resolves.toBe(false);
    expect(log.info).not.toHaveBeenCalled();
  });

  it('honours a custom prefix', async () => {
    const { deps, platform } = setup({ config: { commandPrefix: '!' } });
    await expect(handleCommand(deps, userMessage('~paginate'))).resolves.toBe(false);
    await expect(handleCommand(deps, userMessage('!paginate'))).resolves.toBe(true);
    expect(sentTexts(platform)).toEqual(['Usage: !paginate <text>']);
  });
});

describe('pet', () => {
  it('answers with the other pet', async () => {
    const { deps, platform, reactionHub, log } = setup();
    const pending = handleCommand(deps, userMessage('~pet'));
    await flush();

    reactionHub.dispatch(reaction({ channelId: 'c1', messageId: 'm1' }, USER, '🐶'));

    await expect(pending).resolves.toBe(true);
    expect(sentTexts(platform)).toEqual(['Do you like dogs or cats more? React below!', 'I like 🐱 more!']);
    expect(log.info).toHaveBeenCalledWith({ command: 'pet', channelId: 'c1', userId: USER }, 'command:start');
  });

  it('says something when nobody answers', async () => {
    const { deps, platform } = setup({ config: { promptTimeoutSeconds: 5 } });
    const pending = handleCommand(deps, userMessage('~pet'));
    await flush();
    await vi.advanceTimersByTimeAsync(5000);

    await pending;
    expect(sentTexts(platform).at(-1)).toBe('No answer? Both are great then.');
  });

  it('stays quiet when cancelled by shutdown', async () => {
    const controller = new AbortController();
    const { deps, platform } = setup({ signal: controller.signal });
    const pending = handleCommand(deps, userMessage('~pet'));
    await flush();
    controller.abort();

    await pending;
    expect(sentTexts(platform)).toEqual(['Do you like dogs or cats more? React below!']);
  });
});

describe('confirm', () => {
  it.each([
    ['✅', 'Confirmed.'],
    ['❌', 'Cancelled.'],
  ])('replies to %s with %s', async (emoji, reply) => {
    const { deps, platform, reactionHub } = setup();
    const pending = handleCommand(deps, userMessage('~confirm the deploy'));
    await flush();

    reactionHub.dispatch(reaction({ channelId: 'c1', messageId: 'm1' }, USER, emoji));

    await pending;
    expect(sentTexts(platform)).toEqual(['Are you sure about the deploy?', reply]);
  });

  it('asks about "this" without arguments and stays quiet on timeout', async () => {
    const { deps, platform } = setup({ config: { promptTimeoutSeconds: 1 } });
    const pending = handleCommand(deps, userMessage('~confirm'));
    await flush();
    await vi.advanceTimersByTimeAsync(1000);

    await pending;
    expect(sentTexts(platform)).toEqual(['Are you sure about this?']);
  });
});

describe('colour', () => {
  it('echoes the reply', async () => {
    const { deps, platform, messageHub } = setup();
    const pending = handleCommand(deps, userMessage('~colour'));
    await flush();

    messageHub.dispatch({ id: 'in2', channelId: 'c1', authorId: USER, content: ' blue ' });

    await pending;
    expect(sentTexts(platform)).toEqual(['What is your favourite colour?', 'blue is my favourite too!']);
  });

  it('falls back when nobody replies', async () => {
    const { deps, platform } = setup({ config: { promptTimeoutSeconds: 2 } });
    const pending = handleCommand(deps, userMessage('~colour'));
    await flush();
    await vi.advanceTimersByTimeAsync(2000);

    await pending;
    expect(sentTexts(platform).at(-1)).toBe('I like red!');
  });
});

describe('scoreboard', () => {
  it('runs a menu over the scores with the full control set', async () => {
    const { deps, platform, reactionHub } = setup();
    const pending = handleCommand(deps, userMessage('~SCOREBOARD'));
    await flush();

    const menu = { channelId: 'c1', messageId: 'm1' };
    reactionHub.dispatch(reaction(menu, USER, '⏩'));
    await flush();
    reactionHub.dispatch(reaction(menu, USER, '❌'));

    await expect(pending).resolves.toBe(true);
    expect(platform.callsOf('send').map((c) => c.payload)).toEqual([
      { content: 'Player A!', embeds: [{ description: 'Player A scored 10 points!' }] },
    ]);
    expect(platform.callsOf('edit').map((c) => c.payload)).toEqual([
      { content: 'Player C!', embeds: [{ description: 'Player C scored 8 points!' }] },
    ]);
    expect(platform.callsOf('addReaction').map((c) => c.emoji)).toEqual(['⏪', '◀️', '❌', '▶️', '⏩']);
  });
});

describe('paginate', () => {
  it('shows the text as a menu with page numbers', async () => {
    const { deps, platform, reactionHub } = setup();
    const pending = handleCommand(deps, userMessage('~paginate hello world'));
    await flush();

    reactionHub.dispatch(reaction({ channelId: 'c1', messageId: 'm1' }, USER, '❌'));

    await pending;
    expect(sentTexts(platform)).toEqual(['hello world\n\nPage 1/1']);
  });

  it('prints usage without text', async () => {
    const { deps, platform } = setup();
    await handleCommand(deps, userMessage('~paginate'));
    expect(sentTexts(platform)).toEqual(['Usage: ~paginate <text>']);
  });
});

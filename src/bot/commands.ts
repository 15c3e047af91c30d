import type { BotConfig } from '../config.js';
import { isAllowlisted } from '../config.js';
import { pagify } from '../formatting/pagify.js';
import type { Interactions } from '../interactions.js';
import type { LoggerLike } from '../logging/logger-like.js';
import { FULL_NAVIGATION } from '../menu/options.js';
import type { MenuOptions } from '../menu/options.js';
import type { MessageEvent, MessagePayload } from '../platform/types.js';

export type CommandDeps = {
  interactions: Interactions;
  config: BotConfig;
  log?: LoggerLike;
  /** Aborted on shutdown; every prompt and menu started by a command listens to it. */
  signal?: AbortSignal;
};

type CommandContext = {
  deps: CommandDeps;
  msg: MessageEvent;
  args: string;
};

type Command = (ctx: CommandContext) => Promise<void>;

export const PET_CHOICES = ['🐶', '🐱'] as const;

const SCOREBOARD: ReadonlyArray<{ player: string; points: number }> = [
  { player: 'Player A', points: 10 },
  { player: 'Player B', points: 5 },
  { player: 'Player C', points: 8 },
];

async function say(deps: CommandDeps, channelId: string, content: string) {
  return deps.interactions.deps.actions.send(channelId, { content });
}

function menuOptions(config: BotConfig): MenuOptions {
  return {
    timeoutSeconds: config.menuTimeoutSeconds,
    idleTimeoutSeconds: config.menuIdleTimeoutSeconds,
    nonBlocking: config.menuNonBlocking,
    pageNumberIndicator: config.menuPageIndicator,
    onFinish: config.menuOnFinish,
  };
}

const pet: Command = async ({ deps, msg }) => {
  const question = await say(deps, msg.channelId, 'Do you like dogs or cats more? React below!');
  const outcome = await deps.interactions.reactionPrompt({
    message: question,
    userId: msg.authorId,
    emojis: PET_CHOICES,
    timeoutSeconds: deps.config.promptTimeoutSeconds,
    signal: deps.signal,
  });
  if (outcome.kind === 'selected') {
    const other = PET_CHOICES[outcome.index === 0 ? 1 : 0];
    await say(deps, msg.channelId, `I like ${other} more!`);
  } else if (outcome.kind === 'timedOut') {
    await say(deps, msg.channelId, 'No answer? Both are great then.');
  }
};

const confirm: Command = async ({ deps, msg, args }) => {
  const what = args || 'this';
  const question = await say(deps, msg.channelId, `Are you sure about ${what}?`);
  const answer = await deps.interactions.yesOrNoPrompt({
    message: question,
    userId: msg.authorId,
    timeoutSeconds: deps.config.promptTimeoutSeconds,
    signal: deps.signal,
  });
  if (answer === null) return;
  await say(deps, msg.channelId, answer ? 'Confirmed.' : 'Cancelled.');
};

const colour: Command = async ({ deps, msg }) => {
  await say(deps, msg.channelId, 'What is your favourite colour?');
  const reply = await deps.interactions.messagePromptContent({
    channelId: msg.channelId,
    userId: msg.authorId,
    timeoutSeconds: deps.config.promptTimeoutSeconds,
    signal: deps.signal,
  });
  await say(deps, msg.channelId, reply ? `${reply.trim()} is my favourite too!` : 'I like red!');
};

const scoreboard: Command = async ({ deps, msg }) => {
  const pages: MessagePayload[] = SCOREBOARD.map(({ player, points }) => ({
    content: `${player}!`,
    embeds: [{ description: `${player} scored ${points} points!` }],
  }));
  await deps.interactions.runMenu({
    channelId: msg.channelId,
    userId: msg.authorId,
    pages,
    options: { ...menuOptions(deps.config), navigation: FULL_NAVIGATION },
    signal: deps.signal,
  });
};

const paginate: Command = async ({ deps, msg, args }) => {
  if (!args) {
    await say(deps, msg.channelId, `Usage: ${deps.config.commandPrefix}paginate <text>`);
    return;
  }
  const pages = pagify(args, { pageLength: 400, shortenBy: 0 }).map((content) => ({ content }));
  await deps.interactions.runMenu({
    channelId: msg.channelId,
    userId: msg.authorId,
    pages,
    options: { ...menuOptions(deps.config), pageNumberIndicator: true },
    signal: deps.signal,
  });
};

export const COMMANDS: ReadonlyMap<string, Command> = new Map([
  ['pet', pet],
  ['confirm', confirm],
  ['colour', colour],
  ['scoreboard', scoreboard],
  ['paginate', paginate],
]);

/**
 * Run the command in `msg`, if it is one and the author is allowlisted.
 * Returns true when a command ran.
 */
export async function handleCommand(deps: CommandDeps, msg: MessageEvent): Promise<boolean> {
  const prefix = deps.config.commandPrefix;
  if (!msg.content.startsWith(prefix)) return false;
  if (!isAllowlisted(deps.config.allowUserIds, msg.authorId)) return false;

  const body = msg.content.slice(prefix.length).trim();
  const space = body.search(/\s/);
  const name = (space === -1 ? body : body.slice(0, space)).toLowerCase();
  const command = COMMANDS.get(name);
  if (!command) return false;

  const args = space === -1 ? '' : body.slice(space + 1).trim();
  deps.log?.info({ command: name, channelId: msg.channelId, userId: msg.authorId }, 'command:start');
  await command({ deps, msg, args });
  return true;
}

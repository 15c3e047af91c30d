import 'dotenv/config';
import pino from 'pino';
import { Client, GatewayIntentBits, Partials } from 'discord.js';

import { handleCommand } from './bot/commands.js';
import { parseConfig } from './config.js';
import { bindDiscordEvents, toMessageEvent } from './discord/event-binding.js';
import { DiscordPlatformActions } from './discord/platform-actions.js';
import { createMessageHub, createReactionHub } from './events/hub.js';
import { createInteractions } from './interactions.js';

const log = pino({ level: process.env.LOG_LEVEL ?? 'info' });

let parsedConfig: ReturnType<typeof parseConfig>;
try {
  parsedConfig = parseConfig(process.env);
} catch (err) {
  log.error({ err }, 'Invalid configuration');
  process.exit(1);
}
for (const warning of parsedConfig.warnings) {
  log.warn(warning);
}
for (const info of parsedConfig.infos) {
  log.info(info);
}
const cfg = parsedConfig.config;

const client = new Client({
  intents: [
    GatewayIntentBits.Guilds,
    GatewayIntentBits.GuildMessages,
    GatewayIntentBits.GuildMessageReactions,
    GatewayIntentBits.MessageContent,
    GatewayIntentBits.DirectMessages,
    GatewayIntentBits.DirectMessageReactions,
  ],
  // Reactions on uncached messages still arrive as partials.
  partials: [Partials.Message, Partials.Channel, Partials.Reaction, Partials.User],
});

const reactionHub = createReactionHub(log);
const messageHub = createMessageHub(log);
const unbind = bindDiscordEvents(client, { reactions: reactionHub, messages: messageHub }, log);

const interactions = createInteractions({
  actions: new DiscordPlatformActions(client),
  reactionEvents: reactionHub,
  messageEvents: messageHub,
  log,
});

const shutdownController = new AbortController();

client.on('messageCreate', (msg) => {
  if (msg.author.bot) return;
  const event = toMessageEvent(msg);
  if (!event) return;
  handleCommand({ interactions, config: cfg, log, signal: shutdownController.signal }, event).catch((err: unknown) => {
    log.error({ err, channelId: event.channelId }, 'command:failed');
  });
});

client.once('ready', (c) => {
  log.info({ user: c.user.tag, prefix: cfg.commandPrefix }, 'discord:ready');
});

let shuttingDown = false;
async function shutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  log.info({ signal }, 'shutdown:start');
  shutdownController.abort();
  unbind();
  await interactions.drain();
  await client.destroy();
  log.info('shutdown:complete');
  process.exit(0);
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).catch((err: unknown) => {
      log.error({ err }, 'shutdown:failed');
      process.exit(1);
    });
  });
}

await client.login(cfg.token);

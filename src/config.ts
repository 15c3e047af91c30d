import type { FinishAction } from './menu/options.js';

export const DEFAULT_COMMAND_PREFIX = '~';
export const DEFAULT_PROMPT_TIMEOUT_SECONDS = 30;
export const DEFAULT_MENU_TIMEOUT_SECONDS = 30;

const FINISH_ACTIONS: readonly FinishAction[] = ['delete-message', 'remove-reactions', 'leave-as-is'];

type ParseResult = {
  config: BotConfig;
  warnings: string[];
  infos: string[];
};

export type BotConfig = {
  token: string;
  allowUserIds: Set<string>;
  commandPrefix: string;

  promptTimeoutSeconds: number;

  menuTimeoutSeconds: number;
  menuIdleTimeoutSeconds?: number;
  menuNonBlocking: boolean;
  menuPageIndicator: boolean;
  menuOnFinish: FinishAction;
};

function parseBoolean(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: boolean,
): boolean {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  if (normalized === '1' || normalized === 'true') return true;
  if (normalized === '0' || normalized === 'false') return false;
  throw new Error(`${name} must be "0"/"1" or "true"/"false", got "${raw}"`);
}

function parsePositiveNumber(
  env: NodeJS.ProcessEnv,
  name: string,
  defaultValue: number,
): number {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const n = Number(raw);
  if (!Number.isFinite(n) || n <= 0) {
    throw new Error(`${name} must be a positive number, got "${raw}"`);
  }
  return n;
}

function parseOptionalPositiveNumber(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return undefined;
  return parsePositiveNumber(env, name, 0);
}

function parseTrimmedString(
  env: NodeJS.ProcessEnv,
  name: string,
): string | undefined {
  const raw = env[name];
  if (raw == null) return undefined;
  const trimmed = raw.trim();
  return trimmed || undefined;
}

function parseEnum<T extends string>(
  env: NodeJS.ProcessEnv,
  name: string,
  validValues: readonly T[],
  defaultValue: T,
): T {
  const raw = env[name];
  if (raw == null || raw.trim() === '') return defaultValue;
  const normalized = raw.trim().toLowerCase();
  const match = validValues.find((v) => v.toLowerCase() === normalized);
  if (!match) {
    throw new Error(`${name} must be one of ${validValues.join('|')}, got "${raw}"`);
  }
  return match;
}

/** Comma/whitespace separated snowflakes; anything non-numeric is dropped. */
export function parseUserIds(raw: string | undefined): Set<string> {
  const out = new Set<string>();
  for (const part of String(raw ?? '').split(/[,\s]+/g)) {
    const v = part.trim();
    if (/^\d+$/.test(v)) out.add(v);
  }
  return out;
}

export function isAllowlisted(allow: Set<string>, userId: string): boolean {
  // Fail closed: an empty allowlist admits nobody.
  if (allow.size === 0) return false;
  return allow.has(userId);
}

export function parseConfig(env: NodeJS.ProcessEnv): ParseResult {
  const warnings: string[] = [];
  const infos: string[] = [];

  const token = parseTrimmedString(env, 'DISCORD_TOKEN');
  if (!token) {
    throw new Error('Missing DISCORD_TOKEN');
  }

  const allowUserIdsRaw = env.DISCORD_ALLOW_USER_IDS;
  const allowUserIds = parseUserIds(allowUserIdsRaw);
  if ((allowUserIdsRaw ?? '').trim().length > 0 && allowUserIds.size === 0) {
    warnings.push('DISCORD_ALLOW_USER_IDS was set but no valid IDs were parsed: bot will respond to nobody (fail closed)');
  } else if (allowUserIds.size === 0) {
    warnings.push('DISCORD_ALLOW_USER_IDS is empty: bot will respond to nobody (fail closed)');
  }

  const commandPrefix = parseTrimmedString(env, 'BOT_COMMAND_PREFIX') ?? DEFAULT_COMMAND_PREFIX;

  const promptTimeoutSeconds = parsePositiveNumber(env, 'PROMPT_TIMEOUT_SECONDS', DEFAULT_PROMPT_TIMEOUT_SECONDS);
  const menuTimeoutSeconds = parsePositiveNumber(env, 'MENU_TIMEOUT_SECONDS', DEFAULT_MENU_TIMEOUT_SECONDS);
  const menuIdleTimeoutSeconds = parseOptionalPositiveNumber(env, 'MENU_IDLE_TIMEOUT_SECONDS');
  if (menuIdleTimeoutSeconds !== undefined && menuIdleTimeoutSeconds >= menuTimeoutSeconds) {
    warnings.push(
      `MENU_IDLE_TIMEOUT_SECONDS (${menuIdleTimeoutSeconds}) is not shorter than MENU_TIMEOUT_SECONDS ` +
      `(${menuTimeoutSeconds}): the idle timeout will never trigger`,
    );
  }

  const menuNonBlocking = parseBoolean(env, 'MENU_NON_BLOCKING', false);
  if (menuNonBlocking) {
    infos.push('MENU_NON_BLOCKING=1: navigation reactions are attached in the background after the first page renders');
  }
  const menuPageIndicator = parseBoolean(env, 'MENU_PAGE_INDICATOR', false);
  const menuOnFinish = parseEnum(env, 'MENU_ON_FINISH', FINISH_ACTIONS, 'remove-reactions');

  return {
    config: {
      token,
      allowUserIds,
      commandPrefix,
      promptTimeoutSeconds,
      menuTimeoutSeconds,
      menuIdleTimeoutSeconds,
      menuNonBlocking,
      menuPageIndicator,
      menuOnFinish,
    },
    warnings,
    infos,
  };
}

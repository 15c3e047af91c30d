import { ConfigurationError } from '../errors.js';

export type PagifyOptions = {
  /** Where pages may break. Default `['\n', ' ']`; empty means hard breaks at `pageLength`. */
  delims?: readonly string[];
  /** Insert a zero-width space into `@everyone` / `@here`. Default true. */
  escapeMassMentions?: boolean;
  /** Subtracted from `pageLength`, e.g. to leave room for a code fence. Default 8. */
  shortenBy?: number;
  /** Default 2000, Discord's message limit. */
  pageLength?: number;
  /**
   * Break at the first delimiter (in `delims` order) found in the window
   * instead of the last possible one. Default false.
   */
  priority?: boolean;
};

const ZERO_WIDTH_SPACE = '\u200b';

export function escapeMassMentions(text: string): string {
  return text
    .replaceAll('@everyone', `@${ZERO_WIDTH_SPACE}everyone`)
    .replaceAll('@here', `@${ZERO_WIDTH_SPACE}here`);
}

function countOccurrences(text: string, needle: string): number {
  return text.split(needle).length - 1;
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/** Moves a cut off the middle of a surrogate pair: back if it can, else forward. */
function safeCut(text: string, cut: number): number {
  if (!isHighSurrogate(text.charCodeAt(cut - 1)) || !isLowSurrogate(text.charCodeAt(cut))) return cut;
  return cut > 1 ? cut - 1 : cut + 1;
}

/** Split long text into chunks no longer than the page length. */
export function pagify(text: string, options: PagifyOptions = {}): string[] {
  const delims = options.delims ?? ['\n', ' '];
  const escape = options.escapeMassMentions ?? true;
  const pageLength = (options.pageLength ?? 2000) - (options.shortenBy ?? 8);
  if (!Number.isInteger(pageLength) || pageLength < 1) {
    throw new ConfigurationError('pagify: pageLength minus shortenBy must be a positive integer');
  }

  const pages: string[] = [];
  let rest = text;
  while (rest.length > pageLength) {
    let thisPageLength = pageLength;
    if (escape) {
      // Each escape adds one character to the page.
      const head = rest.slice(0, pageLength);
      thisPageLength -= countOccurrences(head, '@here') + countOccurrences(head, '@everyone');
      thisPageLength = Math.max(1, thisPageLength);
    }

    const window = rest.slice(1, thisPageLength);
    const breaks = delims
      .map((d) => (d ? window.lastIndexOf(d) : -1))
      .filter((i) => i !== -1)
      .map((i) => i + 1);
    const breakAt = options.priority
      ? breaks.find((i) => i > 1)
      : breaks.length > 0 ? Math.max(...breaks) : undefined;
    const cut = safeCut(rest, breakAt ?? thisPageLength);

    const page = rest.slice(0, cut);
    if (page) pages.push(escape ? escapeMassMentions(page) : page);
    rest = rest.slice(cut);
  }

  if (rest.trim()) pages.push(escape ? escapeMassMentions(rest) : rest);
  return pages;
}

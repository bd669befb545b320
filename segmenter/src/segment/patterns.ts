/**
 * Patterns and character tables shared by every language.
 * Patterns carrying the `g` flag are only consumed through matchAll,
 * which never touches their lastIndex.
 */

export type QuotePair = readonly [open: string, close: string];

export const QUOTE_PAIRS: readonly QuotePair[] = [
  ['"', '"'],
  [" '", "'"],
  ['«', '»'],
  ['‹', '›'],
  ['“', '”'],
  ['„', '“'],
  ['„', '”'],
  ['‘', '’'],
  ['‚', '‘'],
  ['「', '」'],
  ['『', '』'],
  ['《', '》'],
  ['〈', '〉'],
];

export const PARAGRAPH_BREAK = '\n\n';

export const CONSECUTIVE_NEWLINES = /\n{2,}/;

export const NUMBERED_REFERENCE = /^(?:\[\d+\])+/;

/** Opening brackets of a parenthetical; `<` has no closer of its own */
export const BRACKET_OPENERS: ReadonlySet<string> = new Set(['(', '（', '<', '{', '[']);

export const BRACKET_CLOSERS: ReadonlySet<string> = new Set([')', ']', '}', '）']);

function escapeClassCharacter(character: string): string {
  return character.replace(/[\\\]^-]/g, '\\$&');
}

/**
 * One-or-more run of any of the given characters
 */
export function terminatorPattern(terminators: Iterable<string>): RegExp {
  const characterClass = Array.from(new Set(terminators), escapeClassCharacter).join('');
  return new RegExp(`[${characterClass}]+`, 'gu');
}

import type { SkipRange } from '../types.js';
import { BRACKET_CLOSERS, BRACKET_OPENERS, QUOTE_PAIRS, type QuotePair } from './patterns.js';

const EMAIL_LOCAL = /[A-Za-z0-9._%+-]/;
const EMAIL_DOMAIN = /[A-Za-z0-9.-]/;
const EMAIL_TLD = /[A-Za-z]/;
const MAX_TLD_LENGTH = 7;

/**
 * Skip ranges by kind. Each list is sorted and its ranges do not overlap.
 */
export interface SkipRangeSets {
  quotes: SkipRange[];
  parentheticals: SkipRange[];
  emails: SkipRange[];
}

interface QuoteScan {
  open: string;
  close: string;
  /** Next opener at or after the scan position that still has a closer, -1 once none does */
  openAt: number;
  closeAt: number;
}

function advanceQuoteScan(text: string, scan: QuoteScan, position: number): void {
  if (scan.openAt >= position) {
    return;
  }
  scan.openAt = text.indexOf(scan.open, position);
  if (scan.openAt === -1) {
    return;
  }
  const bodyStart = scan.openAt + scan.open.length;
  if (scan.closeAt < bodyStart) {
    scan.closeAt = text.indexOf(scan.close, bodyStart);
  }
  if (scan.closeAt === -1) {
    scan.openAt = -1;
  }
}

/**
 * Each quotation runs from its opener to the first matching closer and may span
 * newlines. The leftmost opener wins; on a tie, the earlier pair in `pairs`.
 */
export function findQuotedRanges(
  text: string,
  pairs: readonly QuotePair[] = QUOTE_PAIRS,
): SkipRange[] {
  let scans: QuoteScan[] = pairs.map(([open, close]) => ({
    open,
    close,
    openAt: -1,
    closeAt: -1,
  }));
  const ranges: SkipRange[] = [];
  let position = 0;

  while (scans.length > 0) {
    let best: QuoteScan | undefined;
    for (const scan of scans) {
      advanceQuoteScan(text, scan, position);
      if (scan.openAt !== -1 && (!best || scan.openAt < best.openAt)) {
        best = scan;
      }
    }
    // A pair whose closer no longer occurs cannot match again
    scans = scans.filter((scan) => scan.openAt !== -1);
    if (!best) {
      break;
    }

    const end = best.closeAt + best.close.length;
    ranges.push({ start: best.openAt, end });
    position = end;
  }

  return ranges;
}

/** First closing bracket or newline at or after `from` */
function findBracketStop(text: string, from: number): number {
  let index = from;
  while (index < text.length) {
    const character = text.charAt(index);
    if (character === '\n' || BRACKET_CLOSERS.has(character)) {
      break;
    }
    index++;
  }
  return index;
}

/**
 * A parenthetical runs from an opening bracket to the first closing bracket of
 * any kind on the same line. Nested and escaped openers are part of its body.
 */
export function findParentheticalRanges(text: string): SkipRange[] {
  const ranges: SkipRange[] = [];
  let stop = -1;
  let index = 0;

  while (index < text.length) {
    if (!BRACKET_OPENERS.has(text.charAt(index))) {
      index++;
      continue;
    }
    if (stop <= index) {
      stop = findBracketStop(text, index + 1);
    }
    if (BRACKET_CLOSERS.has(text.charAt(stop))) {
      ranges.push({ start: index, end: stop + 1 });
      index = stop + 1;
    } else {
      index++;
    }
  }

  return ranges;
}

/**
 * End of `local@host.tld` for the `@` at `at`: the longest host still followed by
 * a dot and two to seven letters.
 */
function findEmailEnd(text: string, at: number): number | undefined {
  const domainStart = at + 1;
  let domainEnd = domainStart;
  while (domainEnd < text.length && EMAIL_DOMAIN.test(text.charAt(domainEnd))) {
    domainEnd++;
  }

  for (let dot = domainEnd - 3; dot > domainStart; dot--) {
    if (text.charAt(dot) !== '.') {
      continue;
    }
    let tldEnd = dot + 1;
    while (tldEnd <= dot + MAX_TLD_LENGTH && EMAIL_TLD.test(text.charAt(tldEnd))) {
      tldEnd++;
    }
    if (tldEnd - dot > 2) {
      return tldEnd;
    }
  }
  return undefined;
}

export function findEmailRanges(text: string): SkipRange[] {
  const ranges: SkipRange[] = [];
  let matchedUpTo = 0;
  let at = text.indexOf('@');

  while (at !== -1) {
    let start = at;
    while (start > matchedUpTo && EMAIL_LOCAL.test(text.charAt(start - 1))) {
      start--;
    }

    const end = start < at ? findEmailEnd(text, at) : undefined;
    if (end !== undefined) {
      ranges.push({ start, end });
      matchedUpTo = end;
    }
    at = text.indexOf('@', Math.max(at + 1, matchedUpTo));
  }

  return ranges;
}

export function findSkipRangeSets(
  text: string,
  quotePairs: readonly QuotePair[] = QUOTE_PAIRS,
): SkipRangeSets {
  return {
    quotes: findQuotedRanges(text, quotePairs),
    parentheticals: findParentheticalRanges(text),
    emails: findEmailRanges(text),
  };
}

/**
 * Spans inside which a terminator is not a sentence boundary:
 * quotations, parentheticals and email addresses, in that order.
 *
 * Ranges of different kinds may overlap; they are neither merged nor sorted.
 */
export function findSkipRanges(
  text: string,
  quotePairs: readonly QuotePair[] = QUOTE_PAIRS,
): SkipRange[] {
  const { quotes, parentheticals, emails } = findSkipRangeSets(text, quotePairs);
  return [...quotes, ...parentheticals, ...emails];
}

function findInSorted(ranges: readonly SkipRange[], offset: number): SkipRange | undefined {
  let low = 0;
  let high = ranges.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if ((ranges[mid]?.start ?? Infinity) < offset) {
      low = mid + 1;
    } else {
      high = mid;
    }
  }
  const range = low > 0 ? ranges[low - 1] : undefined;
  return range && offset < range.end ? range : undefined;
}

/**
 * First range that strictly contains `offset`, looking at quotations first,
 * then parentheticals, then email addresses
 */
export function findContainingRange(
  sets: SkipRangeSets,
  offset: number,
): SkipRange | undefined {
  return (
    findInSorted(sets.quotes, offset) ??
    findInSorted(sets.parentheticals, offset) ??
    findInSorted(sets.emails, offset)
  );
}

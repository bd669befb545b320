/**
 * Boundary resolution: turns terminator matches into sentence boundaries.
 */

import type { Language } from '../languages/language.js';
import type { BoundaryCandidate, FoundBoundary } from '../types.js';
import { GraphemeCursor } from './grapheme-cursor.js';
import { CONSECUTIVE_NEWLINES, PARAGRAPH_BREAK } from './patterns.js';
import { findContainingRange, findSkipRangeSets } from './skip-ranges.js';

/**
 * Decide what a single terminator match contributes, before skip ranges apply.
 * Returns null when the match is not a boundary.
 */
export function findBoundary(
  language: Language,
  text: string,
  cursor: GraphemeCursor,
  candidate: BoundaryCandidate,
): FoundBoundary | null {
  const nextOffset = cursor.next(candidate.start);
  if (nextOffset === undefined) {
    return null;
  }

  const head = text.slice(0, candidate.start);
  const tail = text.slice(nextOffset);

  const reference = language.numberedReferencePattern().exec(tail);
  if (reference) {
    return { offset: nextOffset + reference[0].length, forced: true };
  }

  if (language.continueInNextWord(tail)) {
    return null;
  }

  const separator = cursor.graphemeAt(candidate.start) ?? '';
  if (language.isAbbreviation(head, separator)) {
    return null;
  }
  if (language.isExclamationWord(head, separator)) {
    return null;
  }

  return { offset: candidate.end, forced: false };
}

/**
 * Resolved boundaries of one paragraph, starting with 0 and strictly increasing.
 * Every offset is a grapheme-cluster start of `paragraph` or its length.
 */
export function findBoundaries(language: Language, paragraph: string): number[] {
  const cursor = GraphemeCursor.fromText(paragraph);
  const skipRanges = findSkipRangeSets(paragraph, language.quotePairs());
  const boundaries = [0];

  for (const match of paragraph.matchAll(language.sentenceBreakPattern())) {
    const start = match.index ?? 0;
    const found = findBoundary(language, paragraph, cursor, {
      start,
      end: start + match[0].length,
    });
    if (!found) {
      continue;
    }

    let boundary: number | null = found.offset;
    if (!found.forced) {
      const range = findContainingRange(skipRanges, boundary);
      if (range) {
        const snaps =
          cursor.next(boundary) === range.end && language.isPunctuationBetweenQuotes();
        boundary = snaps ? range.end : null;
      }
    }

    if (boundary === null) {
      continue;
    }
    // A combining mark after the terminator belongs to its cluster
    if (!cursor.has(boundary)) {
      boundary = cursor.next(boundary) ?? paragraph.length;
    }

    const previous = boundaries[boundaries.length - 1] ?? 0;
    if (boundary > previous && boundary < paragraph.length) {
      boundaries.push(boundary);
    }
  }

  return boundaries;
}

/**
 * Sentences of one paragraph, trimmed of spaces, empties dropped
 */
export function splitParagraph(language: Language, paragraph: string): string[] {
  const boundaries = findBoundaries(language, paragraph);
  const sentences: string[] = [];

  boundaries.forEach((start, index) => {
    const end = boundaries[index + 1] ?? paragraph.length;
    const sentence = trimSpaces(paragraph.slice(start, end));
    if (sentence) {
      sentences.push(sentence);
    }
  });

  return sentences;
}

function trimSpaces(text: string): string {
  let start = 0;
  let end = text.length;
  while (start < end && text[start] === ' ') start++;
  while (end > start && text[end - 1] === ' ') end--;
  return text.slice(start, end);
}

/**
 * Split `text` into sentences with the rules of `language`.
 * Paragraphs (separated by two or more newlines) are split independently and
 * joined with a standalone "\n\n" entry. The entry only ever sits between two
 * sentences: paragraphs with no sentences, including blank text before the
 * first or after the last paragraph, add no marker, so "A.\n\n" yields ["A."].
 */
export function segmentText(language: Language, text: string): string[] {
  const sentences: string[] = [];

  for (const paragraph of text.split(CONSECUTIVE_NEWLINES)) {
    const paragraphSentences = splitParagraph(language, paragraph);
    if (paragraphSentences.length === 0) {
      continue;
    }
    if (sentences.length > 0) {
      sentences.push(PARAGRAPH_BREAK);
    }
    sentences.push(...paragraphSentences);
  }

  return sentences;
}

/**
 * Rule-based sentence segmentation for many languages.
 */

import { resolveLanguage } from './languages/registry.js';
import { segmentText } from './segment/boundaries.js';

export { InteractiveModeError, LanguageDataMissingError, LanguageNotSupportedError } from './errors.js';
export { getLanguageData, parseFallbackTable, parseLanguageData } from './languages/data.js';
export { Language, StandardLanguage } from './languages/language.js';
export {
  createLanguageResolver,
  getRegistry,
  type LanguageResolver,
  type LanguageResolverOptions,
  resolveLanguage,
  supportedLanguages,
} from './languages/registry.js';
export { findBoundaries, findBoundary, segmentText, splitParagraph } from './segment/boundaries.js';
export { GraphemeCursor } from './segment/grapheme-cursor.js';
export { PARAGRAPH_BREAK, QUOTE_PAIRS, type QuotePair } from './segment/patterns.js';
export {
  findContainingRange,
  findSkipRangeSets,
  findSkipRanges,
  type SkipRangeSets,
} from './segment/skip-ranges.js';
export type {
  BoundaryCandidate,
  FallbackTable,
  FoundBoundary,
  LanguageData,
  LanguageDataEntry,
  SkipRange,
} from './types.js';

/**
 * Split `text` into sentences using the rules for `languageCode`.
 *
 * @throws LanguageNotSupportedError when neither the code nor any of its
 *   fallbacks is registered
 */
export function segment(languageCode: string, text: string): string[] {
  return segmentText(resolveLanguage(languageCode), text);
}

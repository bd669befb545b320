/**
 * Core TypeScript interfaces for the sentence segmenter
 */

/**
 * Per-language configuration as stored in data/languages.json
 */
export interface LanguageDataEntry {
  abbreviation_char: string;
  abbreviations: string[];
  exclamation_words: string[];
}

/**
 * Language configuration after loading, with lookups as sets
 */
export interface LanguageData {
  abbreviationChar: string;
  abbreviations: ReadonlySet<string>;
  exclamationWords: ReadonlySet<string>;
}

/**
 * Fallback configuration as stored in data/fallbacks.json
 */
export interface FallbackTable {
  /** Consulted when an identifier has no entry of its own */
  default: string[];
  languages: Record<string, string[]>;
}

/**
 * Half-open interval [start, end) in UTF-16 code units
 */
export interface SkipRange {
  start: number;
  end: number;
}

/**
 * A match of a language's terminator pattern
 */
export interface BoundaryCandidate {
  start: number;
  end: number;
}

/**
 * Outcome of inspecting one candidate.
 * `forced` boundaries come from numbered references and skip the range checks.
 */
export interface FoundBoundary {
  offset: number;
  forced: boolean;
}

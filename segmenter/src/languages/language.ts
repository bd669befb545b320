import {
  NUMBERED_REFERENCE,
  QUOTE_PAIRS,
  type QuotePair,
  terminatorPattern,
} from '../segment/patterns.js';
import type { LanguageData } from '../types.js';
import { getGlobalTerminators, getLanguageData } from './data.js';

let globalSentenceBreak: RegExp | null = null;

export function getGlobalSentenceBreak(): RegExp {
  globalSentenceBreak = globalSentenceBreak ?? terminatorPattern(getGlobalTerminators());
  return globalSentenceBreak;
}

const CONTINUATION = /^[0-9a-z]/;
const WORD_DELIMITER = /[\s.]/;

/**
 * Sentence-boundary rules of one language.
 *
 * The defaults cover most languages; a variant overrides only the hooks where
 * its script or conventions differ. Instances are stateless and shared.
 */
export abstract class Language {
  abstract readonly code: string;

  private cachedData: LanguageData | null = null;

  protected get data(): LanguageData {
    this.cachedData = this.cachedData ?? getLanguageData(this.code);
    return this.cachedData;
  }

  get abbreviationChar(): string {
    return this.data.abbreviationChar;
  }

  get abbreviations(): ReadonlySet<string> {
    return this.data.abbreviations;
  }

  get exclamationWords(): ReadonlySet<string> {
    return this.data.exclamationWords;
  }

  /**
   * Runs of characters that may end a sentence
   */
  sentenceBreakPattern(): RegExp {
    return getGlobalSentenceBreak();
  }

  /**
   * Opening/closing pairs that delimit quotations
   */
  quotePairs(): readonly QuotePair[] {
    return QUOTE_PAIRS;
  }

  numberedReferencePattern(): RegExp {
    return NUMBERED_REFERENCE;
  }

  /**
   * Last whitespace- or period-delimited token of `text`.
   * Empty when `text` ends in a delimiter.
   */
  lastWord(text: string): string {
    let start = text.length;
    while (start > 0 && !WORD_DELIMITER.test(text.charAt(start - 1))) {
      start--;
    }
    return text.slice(start);
  }

  /**
   * Whether the sentence runs on into `textAfterBoundary`
   */
  continueInNextWord(textAfterBoundary: string): boolean {
    return CONTINUATION.test(textAfterBoundary);
  }

  isAbbreviation(head: string, separator: string): boolean {
    if (separator !== this.abbreviationChar) {
      return false;
    }

    const lastWord = this.lastWord(head);
    if (!lastWord) {
      return false;
    }

    const [first = ''] = lastWord;
    const normalized = first.toLowerCase() + lastWord.slice(first.length);
    const abbreviations = this.abbreviations;
    return (
      abbreviations.has(lastWord) ||
      abbreviations.has(normalized) ||
      abbreviations.has(lastWord.toLowerCase()) ||
      abbreviations.has(lastWord.toUpperCase())
    );
  }

  isExclamationWord(head: string, separator: string): boolean {
    const lastWord = this.lastWord(head);
    if (!lastWord) {
      return false;
    }
    return this.exclamationWords.has(`${lastWord}${separator}`);
  }

  /**
   * Whether a terminator right before a closing quote ends the sentence
   */
  isPunctuationBetweenQuotes(): boolean {
    return false;
  }
}

/**
 * A language that keeps every default rule
 */
export class StandardLanguage extends Language {
  readonly code: string;

  constructor(code: string) {
    super();
    this.code = code;
  }
}

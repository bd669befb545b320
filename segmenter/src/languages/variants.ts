/**
 * Languages whose rules differ from the defaults.
 */

import { terminatorPattern } from '../segment/patterns.js';
import { getGlobalTerminators, getMonthNames } from './data.js';
import { Language } from './language.js';

const CYRILLIC_CONTINUATION = /^[0-9a-zа-я]/;
/** Skips leading non-word characters (Unicode-aware, like `\W*`) */
const CONTINUATION_AFTER_PUNCTUATION = /^[^\p{Alphabetic}\p{M}\p{Nd}\p{Pc}]*[0-9a-z]/u;
const CYRILLIC_CONTINUATION_AFTER_PUNCTUATION =
  /^[^\p{Alphabetic}\p{M}\p{Nd}\p{Pc}]*[0-9a-zа-я]/u;
const TERMINATOR_EDGES = /^[?!.]+|[?!.]+$/g;
/** Longer than any month name */
const WORD_LOOKAHEAD = 64;

let wordSegmenter: Intl.Segmenter | null = null;

function firstWord(text: string): string | undefined {
  wordSegmenter = wordSegmenter ?? new Intl.Segmenter(undefined, { granularity: 'word' });
  // Segmenting copies its input, so only look at the start of the text
  for (const part of wordSegmenter.segment(text.trimStart().slice(0, WORD_LOOKAHEAD))) {
    return part.segment;
  }
  return undefined;
}

function toTitleCase(text: string): string {
  const [first = ''] = text;
  return first.toUpperCase() + text.slice(first.length);
}

let greekBreak: RegExp | null = null;
let armenianBreak: RegExp | null = null;
let burmeseBreak: RegExp | null = null;

export class RussianLanguage extends Language {
  readonly code = 'ru';

  continueInNextWord(textAfterBoundary: string): boolean {
    return CYRILLIC_CONTINUATION.test(textAfterBoundary);
  }
}

export class DanishLanguage extends Language {
  readonly code = 'da';

  continueInNextWord(textAfterBoundary: string): boolean {
    return CYRILLIC_CONTINUATION_AFTER_PUNCTUATION.test(textAfterBoundary);
  }
}

export class KazakhLanguage extends Language {
  readonly code = 'kk';

  continueInNextWord(textAfterBoundary: string): boolean {
    return CYRILLIC_CONTINUATION_AFTER_PUNCTUATION.test(textAfterBoundary);
  }
}

/**
 * Keeps "den 3. Januar 2020"-style dates in one sentence:
 * a period followed by a month name does not end the sentence.
 */
abstract class MonthAwareLanguage extends Language {
  private months: ReadonlySet<string> | null = null;

  protected get monthNames(): ReadonlySet<string> {
    this.months = this.months ?? new Set(getMonthNames(this.code));
    return this.months;
  }

  continueInNextWord(textAfterBoundary: string): boolean {
    if (CONTINUATION_AFTER_PUNCTUATION.test(textAfterBoundary)) {
      return true;
    }

    const word = firstWord(textAfterBoundary)?.replace(TERMINATOR_EDGES, '');
    if (!word) {
      return false;
    }
    return this.monthNames.has(word) || this.monthNames.has(toTitleCase(word));
  }
}

export class GermanLanguage extends MonthAwareLanguage {
  readonly code = 'de';

  isPunctuationBetweenQuotes(): boolean {
    return true;
  }
}

export class FinnishLanguage extends MonthAwareLanguage {
  readonly code = 'fi';
}

export class SlovakLanguage extends MonthAwareLanguage {
  readonly code = 'sk';
}

export class GreekLanguage extends Language {
  readonly code = 'el';

  sentenceBreakPattern(): RegExp {
    greekBreak = greekBreak ?? terminatorPattern([...getGlobalTerminators(), ';']);
    return greekBreak;
  }
}

export class ArmenianLanguage extends Language {
  readonly code = 'hy';

  sentenceBreakPattern(): RegExp {
    armenianBreak =
      armenianBreak ??
      terminatorPattern([
        ...getGlobalTerminators().filter((terminator) => terminator !== '.'),
        '։',
        '՜',
        ':',
      ]);
    return armenianBreak;
  }
}

export class BurmeseLanguage extends Language {
  readonly code = 'my';

  sentenceBreakPattern(): RegExp {
    burmeseBreak = burmeseBreak ?? terminatorPattern([...getGlobalTerminators(), '၏']);
    return burmeseBreak;
  }
}

export class ItalianLanguage extends Language {
  readonly code = 'it';

  /** Drops an elided article: "dell'art" -> "art" */
  lastWord(text: string): string {
    const word = super.lastWord(text);
    const elision = word.lastIndexOf("l'");
    return elision === -1 ? word : word.slice(elision + 2);
  }
}

import { describe, expect, it } from 'vitest';
import { LanguageDataMissingError } from '../src/errors.js';
import { getLanguageData, parseFallbackTable, parseLanguageData } from '../src/languages/data.js';
import { StandardLanguage } from '../src/languages/language.js';
import { supportedLanguages } from '../src/languages/registry.js';
import {
  ArmenianLanguage,
  BurmeseLanguage,
  DanishLanguage,
  FinnishLanguage,
  GermanLanguage,
  GreekLanguage,
  ItalianLanguage,
  KazakhLanguage,
  RussianLanguage,
  SlovakLanguage,
} from '../src/languages/variants.js';

function terminatorRuns(pattern: RegExp, text: string): string[] {
  return Array.from(text.matchAll(pattern), (match) => match[0]);
}

const english = new StandardLanguage('en');

describe('language data', () => {
  it('has an entry for every registered language', () => {
    for (const code of supportedLanguages()) {
      expect(getLanguageData(code).abbreviationChar).toBe('.');
    }
  });

  it('exposes abbreviations and exclamation words as sets', () => {
    const data = getLanguageData('en');

    expect(data.abbreviations.has('dr')).toBe(true);
    expect(data.exclamationWords.has('Yahoo!')).toBe(true);
  });

  it('rejects malformed entries with the offending code', () => {
    expect(() =>
      parseLanguageData({ en: { abbreviation_char: '.', abbreviations: 'dr' } }),
    ).toThrow('Malformed language data for `en`');
  });

  it('rejects a fallback table without a default chain', () => {
    expect(() => parseFallbackTable({ languages: {} })).toThrow(
      'Fallback table must have a `default` list and a `languages` map',
    );
  });

  it('fails lookups for a language without data', () => {
    const unknown = new StandardLanguage('qq');

    expect(() => unknown.isAbbreviation('Dr', '.')).toThrow(LanguageDataMissingError);
  });
});

describe('default rules', () => {
  it('continues the sentence before a lowercase letter or digit', () => {
    expect(english.continueInNextWord('and then')).toBe(true);
    expect(english.continueInNextWord('9 items')).toBe(true);
    expect(english.continueInNextWord(' and then')).toBe(false);
    expect(english.continueInNextWord('Then')).toBe(false);
  });

  it('takes the last word after whitespace and periods', () => {
    expect(english.lastWord('I work for the U.S')).toBe('S');
    expect(english.lastWord('ends with space ')).toBe('');
    expect(english.lastWord('tab\tand\u00a0nbsp')).toBe('nbsp');
    expect(english.lastWord('single')).toBe('single');
    expect(english.lastWord('')).toBe('');
  });

  it('recognises abbreviations in any of the checked casings', () => {
    expect(english.isAbbreviation('Ask Dr', '.')).toBe(true);
    expect(english.isAbbreviation('Ask DR', '.')).toBe(true);
    expect(english.isAbbreviation('Etc', '.')).toBe(true);
    expect(english.isAbbreviation('the end', '.')).toBe(false);
  });

  it('only treats the abbreviation marker as an abbreviation separator', () => {
    expect(english.isAbbreviation('Ask Dr', '!')).toBe(false);
    expect(english.isAbbreviation('word ', '.')).toBe(false);
  });

  it('matches exclamation words together with their terminator', () => {
    expect(english.isExclamationWord('I searched on Yahoo', '!')).toBe(true);
    expect(english.isExclamationWord('I searched on Yahoo', '.')).toBe(false);
    expect(english.isExclamationWord('Hello', '!')).toBe(false);
  });

  it('does not end sentences at punctuation before a closing quote', () => {
    expect(english.isPunctuationBetweenQuotes()).toBe(false);
  });

  it('matches runs of terminators', () => {
    expect(terminatorRuns(english.sentenceBreakPattern(), 'Really?! Yes. 好。')).toEqual([
      '?!',
      '.',
      '。',
    ]);
  });
});

describe('language variants', () => {
  it('continues before lowercase Cyrillic in Russian', () => {
    const russian = new RussianLanguage();

    expect(russian.continueInNextWord('привет')).toBe(true);
    expect(russian.continueInNextWord('Привет')).toBe(false);
    expect(english.continueInNextWord('привет')).toBe(false);
  });

  it('skips leading punctuation before checking the next word in Kazakh and Danish', () => {
    expect(new KazakhLanguage().continueInNextWord(' ещё')).toBe(true);
    expect(new DanishLanguage().continueInNextWord(' næste')).toBe(true);
    expect(new DanishLanguage().continueInNextWord(' Næste')).toBe(false);
  });

  it('keeps a German date together across the ordinal period', () => {
    const german = new GermanLanguage();

    expect(german.continueInNextWord(' Januar 2020')).toBe(true);
    expect(german.continueInNextWord(' März.')).toBe(true);
    expect(german.continueInNextWord(' januar')).toBe(true);
    expect(german.continueInNextWord(' Montag')).toBe(false);
  });

  it('uses Finnish and Slovak month names', () => {
    expect(new FinnishLanguage().continueInNextWord(' tammikuuta')).toBe(true);
    expect(new SlovakLanguage().continueInNextWord(' Januára 2021')).toBe(true);
    expect(new SlovakLanguage().continueInNextWord(' Potom')).toBe(false);
  });

  it('ends German sentences at punctuation before a closing quote', () => {
    expect(new GermanLanguage().isPunctuationBetweenQuotes()).toBe(true);
  });

  it('adds the semicolon as a Greek question mark', () => {
    expect(terminatorRuns(new GreekLanguage().sentenceBreakPattern(), 'Τι; Καλά.')).toEqual([
      ';',
      '.',
    ]);
    expect(terminatorRuns(english.sentenceBreakPattern(), 'Τι; Καλά.')).toEqual(['.']);
  });

  it('replaces the period with Armenian punctuation', () => {
    expect(terminatorRuns(new ArmenianLanguage().sentenceBreakPattern(), 'ա.բ։գ՜դ:')).toEqual([
      '։',
      '՜',
      ':',
    ]);
  });

  it('adds the Burmese genitive mark', () => {
    expect(terminatorRuns(new BurmeseLanguage().sentenceBreakPattern(), 'က၏ခ။')).toEqual([
      '၏',
      '။',
    ]);
  });

  it('drops an elided Italian article from the last word', () => {
    const italian = new ItalianLanguage();

    expect(italian.lastWord("vedi dell'art")).toBe('art');
    expect(italian.isAbbreviation("vedi dell'art", '.')).toBe(true);
    expect(italian.lastWord('vedi pag')).toBe('pag');
    expect(italian.lastWord("dall'l'ultimo")).toBe('ultimo');
  });
});

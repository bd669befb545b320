/**
 * Registry of supported languages and fallback resolution for the rest.
 */

import { LanguageNotSupportedError } from '../errors.js';
import type { FallbackTable } from '../types.js';
import { getFallbackTable } from './data.js';
import { Language, StandardLanguage } from './language.js';
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
} from './variants.js';

/** Languages with no rule of their own beyond their data table */
const STANDARD_LANGUAGES = [
  'am',
  'ar',
  'bg',
  'bn',
  'ca',
  'en',
  'es',
  'fr',
  'gu',
  'hi',
  'kn',
  'ml',
  'mr',
  'nl',
  'or',
  'pa',
  'pl',
  'pt',
  'ta',
  'te',
];

function buildRegistry(): ReadonlyMap<string, Language> {
  const languages: Language[] = [
    ...STANDARD_LANGUAGES.map((code) => new StandardLanguage(code)),
    new ArmenianLanguage(),
    new BurmeseLanguage(),
    new DanishLanguage(),
    new FinnishLanguage(),
    new GermanLanguage(),
    new GreekLanguage(),
    new ItalianLanguage(),
    new KazakhLanguage(),
    new RussianLanguage(),
    new SlovakLanguage(),
  ];
  return new Map(languages.map((language) => [language.code, language]));
}

export interface LanguageResolverOptions {
  registry: ReadonlyMap<string, Language>;
  fallbacks: FallbackTable;
}

export type LanguageResolver = (code: string) => Language;

/**
 * Build a resolver over an explicit registry and fallback table.
 *
 * An unregistered code is retried through its own fallback chain, or the
 * default chain when it has none. Codes already being resolved further up the
 * chain count as unresolvable, so a cyclic table fails instead of recursing.
 */
export function createLanguageResolver({
  registry,
  fallbacks,
}: LanguageResolverOptions): LanguageResolver {
  function lookup(code: string, visiting: Set<string>): Language | undefined {
    const language = registry.get(code);
    if (language) {
      return language;
    }
    if (visiting.has(code)) {
      return undefined;
    }

    visiting.add(code);
    const chain = Object.hasOwn(fallbacks.languages, code)
      ? fallbacks.languages[code]
      : fallbacks.default;
    for (const fallback of chain) {
      const resolved = lookup(fallback, visiting);
      if (resolved) {
        return resolved;
      }
    }
    visiting.delete(code);
    return undefined;
  }

  return (code) => {
    const language = lookup(code, new Set());
    if (!language) {
      throw new LanguageNotSupportedError(code);
    }
    return language;
  };
}

let registry: ReadonlyMap<string, Language> | null = null;
let defaultResolver: LanguageResolver | null = null;

export function getRegistry(): ReadonlyMap<string, Language> {
  registry = registry ?? buildRegistry();
  return registry;
}

/**
 * Resolve a language code against the built-in registry and fallback table
 */
export function resolveLanguage(code: string): Language {
  defaultResolver =
    defaultResolver ??
    createLanguageResolver({ registry: getRegistry(), fallbacks: getFallbackTable() });
  return defaultResolver(code);
}

export function supportedLanguages(): string[] {
  return [...getRegistry().keys()].sort();
}

/**
 * Static language configuration loaded from the JSON tables in data/.
 * Each table is read once, on first use, and never modified afterwards.
 */

import { readFileSync } from 'node:fs';
import { LanguageDataMissingError } from '../errors.js';
import type { FallbackTable, LanguageData, LanguageDataEntry } from '../types.js';

const DATA_DIR = new URL('../../data/', import.meta.url);

let languageData: ReadonlyMap<string, LanguageData> | null = null;
let fallbackTable: FallbackTable | null = null;
let terminators: readonly string[] | null = null;
let monthNames: Readonly<Record<string, readonly string[]>> | null = null;

function readDataFile(name: string): unknown {
  return JSON.parse(readFileSync(new URL(name, DATA_DIR), 'utf-8'));
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLanguageDataEntry(value: unknown): value is LanguageDataEntry {
  return (
    isRecord(value) &&
    typeof value.abbreviation_char === 'string' &&
    isStringArray(value.abbreviations) &&
    isStringArray(value.exclamation_words)
  );
}

/**
 * Parse the raw languages.json document.
 * Entries that do not have the expected shape are rejected with the offending code.
 */
export function parseLanguageData(raw: unknown): Map<string, LanguageData> {
  if (!isRecord(raw)) {
    throw new Error('Language data must be an object keyed by language code');
  }

  const parsed = new Map<string, LanguageData>();
  for (const [code, entry] of Object.entries(raw)) {
    if (!isLanguageDataEntry(entry)) {
      throw new Error(`Malformed language data for \`${code}\``);
    }
    parsed.set(code, {
      abbreviationChar: entry.abbreviation_char,
      abbreviations: new Set(entry.abbreviations),
      exclamationWords: new Set(entry.exclamation_words),
    });
  }
  return parsed;
}

export function parseFallbackTable(raw: unknown): FallbackTable {
  if (!isRecord(raw) || !isStringArray(raw.default) || !isRecord(raw.languages)) {
    throw new Error('Fallback table must have a `default` list and a `languages` map');
  }

  const languages: Record<string, string[]> = {};
  for (const [code, chain] of Object.entries(raw.languages)) {
    if (!isStringArray(chain)) {
      throw new Error(`Malformed fallback chain for \`${code}\``);
    }
    languages[code] = chain;
  }
  return { default: raw.default, languages };
}

export function getLanguageData(code: string): LanguageData {
  languageData = languageData ?? parseLanguageData(readDataFile('languages.json'));
  const entry = languageData.get(code);
  if (!entry) {
    throw new LanguageDataMissingError(code);
  }
  return entry;
}

export function getFallbackTable(): FallbackTable {
  fallbackTable = fallbackTable ?? parseFallbackTable(readDataFile('fallbacks.json'));
  return fallbackTable;
}

/**
 * Characters that may end a sentence in any language
 */
export function getGlobalTerminators(): readonly string[] {
  if (terminators === null) {
    const raw = readDataFile('terminators.json');
    if (!isStringArray(raw)) {
      throw new Error('terminators.json must be a list of strings');
    }
    terminators = raw;
  }
  return terminators;
}

export function getMonthNames(code: string): readonly string[] {
  if (monthNames === null) {
    const raw = readDataFile('months.json');
    if (!isRecord(raw)) {
      throw new Error('months.json must be an object keyed by language code');
    }
    const parsed: Record<string, readonly string[]> = {};
    for (const [language, names] of Object.entries(raw)) {
      if (!isStringArray(names)) {
        throw new Error(`Malformed month names for \`${language}\``);
      }
      parsed[language] = names;
    }
    monthNames = parsed;
  }
  return monthNames[code] ?? [];
}

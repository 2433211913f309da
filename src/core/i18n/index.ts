// Copyright 2025 Roni Tervo
// SPDX-License-Identifier: Apache-2.0
import enUS from './locales/en-US.json';
import hiIN from './locales/hi-IN.json';
import esES from './locales/es-ES.json';
import { DEFAULT_LANGUAGE_CODE } from '../config/languages';
import { getBaseSubtag } from '../../shared/utils/languageUtils';

export type TranslationReplacements = Record<string, string | number>;
export type TranslationTable = Record<string, string>;
export type Translations = Record<string, TranslationTable>;

/**
 * Languages without a table of their own resolve through the default table.
 * The default table holds every key.
 */
export const TRANSLATIONS: Translations = {
  'en-US': enUS,
  'hi-IN': hiIN,
  'es-ES': esES,
};

export type TranslationKey = keyof typeof enUS;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

const hasOwn = (record: object, key: string) => Object.prototype.hasOwnProperty.call(record, key);

/** Own string entry only; inherited members such as "constructor" never count. */
const lookup = (table: TranslationTable, key: string): string | undefined => {
  if (!hasOwn(table, key)) return undefined;
  const candidate: unknown = table[key];
  return typeof candidate === 'string' && candidate !== '' ? candidate : undefined;
};

/**
 * Tables to consult for a language code, most specific first:
 * the exact table, then any table sharing the base subtag ("es-MX" -> "es-ES"),
 * then the default table.
 */
const resolveTables = (languageCode: string): TranslationTable[] => {
  const tables: TranslationTable[] = [];
  if (hasOwn(TRANSLATIONS, languageCode)) tables.push(TRANSLATIONS[languageCode]);

  const base = getBaseSubtag(languageCode);
  if (base) {
    Object.keys(TRANSLATIONS).forEach(code => {
      if (code !== languageCode && getBaseSubtag(code) === base) {
        tables.push(TRANSLATIONS[code]);
      }
    });
  }

  tables.push(TRANSLATIONS[DEFAULT_LANGUAGE_CODE]);
  return tables;
};

/** Total over every input: falls back to the default language, then to the key itself. */
export const translate = (
  languageCode: string,
  key: string,
  replacements?: TranslationReplacements
): string => {
  let translation = key;
  for (const table of resolveTables(languageCode)) {
    const candidate = lookup(table, key);
    if (candidate !== undefined) {
      translation = candidate;
      break;
    }
  }

  if (replacements) {
    Object.keys(replacements).forEach(rKey => {
      const value = String(replacements[rKey]);
      translation = translation.replace(new RegExp(`\\{${escapeRegExp(rKey)}\\}`, 'g'), () => value);
    });
  }
  return translation;
};

export type TranslationFunction = (key: string, replacements?: TranslationReplacements) => string;

/**
 * Category Normalization
 *
 * Maps free-text categorical values onto the catalog's vocabulary. Used by the
 * cleaning pipeline for service rows and by the engine for incoming
 * preferences, so both sides land on the same spelling.
 */

import {
  PRICE_CATEGORIES,
  type CategoricalField,
  type PriceCategory,
} from '../models/service.js';
import type { PreferenceRecord } from '../models/preference.js';

const PRICE_SYNONYMS: Record<string, PriceCategory> = {
  low: 'Low',
  cheap: 'Low',
  affordable: 'Low',
  medium: 'Medium',
  med: 'Medium',
  high: 'High',
  expensive: 'High',
};

const LANGUAGE_SYNONYMS: Record<string, string> = {
  hindi: 'Hindi',
  english: 'English',
  both: 'Both',
  bilingual: 'Both',
  'hindi/english': 'Both',
  'english/hindi': 'Both',
};

const LOCATION_SYNONYMS: Record<string, string> = {
  Online: 'Remote',
  Virtual: 'Remote',
  Anywhere: 'Remote',
};

function lookup<T>(table: Record<string, T>, key: string): T | undefined {
  return Object.hasOwn(table, key) ? table[key] : undefined;
}

/**
 * Key used to compare categorical values: trimmed, single-spaced, lower case
 */
export function normalizeCategoryKey(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Title-cases every run of letters ("real estate" -> "Real Estate")
 */
export function toTitleCase(value: string): string {
  return value
    .toLowerCase()
    .replace(/(^|[^a-z])([a-z])/g, (_match, boundary: string, letter: string) => boundary + letter.toUpperCase());
}

export function standardizeBusinessType(value: string): string {
  return toTitleCase(value.trim().replace(/\s+/g, ' '));
}

export function standardizePriceCategory(value: string): string {
  const key = normalizeCategoryKey(value);
  return lookup(PRICE_SYNONYMS, key) ?? toTitleCase(key);
}

export function standardizeLanguageSupport(value: string): string {
  const key = normalizeCategoryKey(value);
  return lookup(LANGUAGE_SYNONYMS, key) ?? toTitleCase(key);
}

export function standardizeLocationArea(value: string): string {
  const titled = toTitleCase(value.trim().replace(/\s+/g, ' '));
  return lookup(LOCATION_SYNONYMS, titled) ?? titled;
}

const STANDARDIZERS: Record<CategoricalField, (value: string) => string> = {
  businessType: standardizeBusinessType,
  priceCategory: standardizePriceCategory,
  languageSupport: standardizeLanguageSupport,
  locationArea: standardizeLocationArea,
};

export function standardizeCategory(field: CategoricalField, value: string): string {
  return STANDARDIZERS[field](value);
}

/**
 * Coerces every field of a preference onto the catalog's spelling
 */
export function standardizePreference(preference: PreferenceRecord): PreferenceRecord {
  return {
    businessType: standardizeBusinessType(preference.businessType),
    priceCategory: standardizePriceCategory(preference.priceCategory),
    languageSupport: standardizeLanguageSupport(preference.languageSupport),
    locationArea: standardizeLocationArea(preference.locationArea),
  };
}

/**
 * Ordinal position of a price category (Low = 0), or -1 when it is not one
 */
export function priceRank(value: string): number {
  const standardized = standardizePriceCategory(value);
  return PRICE_CATEGORIES.findIndex((category) => category === standardized);
}

export function isRemoteLocation(value: string): boolean {
  return normalizeCategoryKey(standardizeLocationArea(value)) === 'remote';
}

export function isBilingual(value: string): boolean {
  return standardizeLanguageSupport(value) === 'Both';
}

/**
 * Explanation Generator
 *
 * Produces the plain-language justification attached to each recommendation.
 * Wording is keyed by quality tier so confidence is stated honestly, and the
 * opening line rotates on a hash of the inputs so the same request always
 * reads the same way.
 *
 * @tested tests/property/explanation.property.test.ts
 */

import {
  QualityTier,
  isBilingual,
  isRemoteLocation,
  priceRank,
  type PreferenceRecord,
  type ServiceRecord,
} from '@service-match/shared';

import {
  FieldVerdict,
  compareFields,
  isPerfectMatch,
  type FieldComparison,
} from './field-comparator.js';

export const TemplateKey = {
  PERFECT: 'perfect',
  HIGH: 'high',
  MEDIUM: 'medium',
  LOW: 'low',
} as const;

export type TemplateKey = (typeof TemplateKey)[keyof typeof TemplateKey];

/**
 * Opening sentences per template set. Low openings never claim a strong match.
 */
export const OPENING_TEMPLATES: Record<TemplateKey, readonly string[]> = {
  perfect: [
    'A complete match for everything you asked for.',
    'Every one of your requirements is covered by this service.',
    'This service lines up with all of your preferences.',
  ],
  high: [
    'A strong fit for your requirements.',
    'This service closely matches what you are looking for.',
    'Well suited to your stated preferences.',
  ],
  medium: [
    'A reasonable option that covers most of your requirements.',
    'This service fits several of your key preferences.',
    'Worth a look: it meets a good part of your brief.',
  ],
  low: [
    'A possible alternative, though it only partly fits your needs.',
    'This service may be worth considering, with some compromises.',
    'A weaker match that could still be relevant.',
  ],
};

/**
 * Descriptions longer than this are cut back to a word boundary
 */
export const DESCRIPTION_LIMIT = 100;

export interface MatchExplanation {
  templateKey: TemplateKey;
  opening: string;
  comparisons: FieldComparison[];
  highlights: string[];
  text: string;
}

const FNV_OFFSET_BASIS = 0x811c9dc5;
const FNV_PRIME = 0x01000193;

/**
 * 32-bit FNV-1a hash of a string's UTF-16 code units
 */
export function fnv1a(input: string): number {
  let hash = FNV_OFFSET_BASIS;
  for (let i = 0; i < input.length; i++) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, FNV_PRIME);
  }
  return hash >>> 0;
}

/**
 * Joins items as "a", "a and b" or "a, b, and c"
 */
export function joinList(items: readonly string[]): string {
  if (items.length <= 1) {
    return items.join('');
  }
  if (items.length === 2) {
    return `${items[0]} and ${items[1]}`;
  }
  return `${items.slice(0, -1).join(', ')}, and ${items[items.length - 1]}`;
}

export function selectTemplateKey(quality: QualityTier, comparisons: readonly FieldComparison[]): TemplateKey {
  switch (quality) {
    case QualityTier.HIGH:
      return isPerfectMatch(comparisons) ? TemplateKey.PERFECT : TemplateKey.HIGH;
    case QualityTier.MEDIUM:
      return TemplateKey.MEDIUM;
    default:
      return TemplateKey.LOW;
  }
}

/**
 * Picks an opening from a template set using a hash of the service id,
 * quality and score
 */
export function selectOpening(
  key: TemplateKey,
  serviceId: string,
  quality: QualityTier,
  score: number
): string {
  const templates = OPENING_TEMPLATES[key];
  const index = fnv1a(`${serviceId}|${quality}|${score.toFixed(4)}`) % templates.length;
  return templates[index] ?? templates[0] ?? '';
}

/**
 * Cuts a description at the last word boundary within the limit
 */
export function summarizeDescription(description: string, limit = DESCRIPTION_LIMIT): string {
  const text = description.trim();
  if (text.length <= limit) {
    return /[.!?]$/.test(text) ? text : `${text}.`;
  }

  const head = text.slice(0, limit + 1);
  const boundary = head.lastIndexOf(' ');
  const cut = boundary > 0 ? head.slice(0, boundary) : text.slice(0, limit);
  return `${cut.replace(/[\s.,!?-]+$/, '')}...`;
}

function partialNote(comparison: FieldComparison): string {
  switch (comparison.field) {
    case 'priceCategory':
      return `its ${comparison.serviceValue} price tier is one step from your ${comparison.preferenceValue} budget`;
    case 'languageSupport':
      return 'it supports both Hindi and English';
    case 'locationArea':
      return 'it is delivered remotely';
    default:
      return `its ${comparison.label} is close to yours`;
  }
}

function describeMatches(comparisons: readonly FieldComparison[], quality: QualityTier): string[] {
  const sentences: string[] = [];

  const exact = comparisons.filter((c) => c.verdict === FieldVerdict.EXACT);
  const partial = comparisons.filter((c) => c.verdict === FieldVerdict.PARTIAL);
  const mismatched = comparisons.filter((c) => c.verdict === FieldVerdict.MISMATCH);

  if (exact.length === 1) {
    const [only] = exact;
    if (only) {
      const lead = quality === QualityTier.LOW ? 'It only matches' : 'Matches';
      sentences.push(`${lead} your ${only.label} (${only.serviceValue}).`);
    }
  } else if (exact.length > 1) {
    const lead = quality === QualityTier.LOW ? 'It only matches' : 'Matches';
    sentences.push(`${lead} your ${joinList(exact.map((c) => c.label))}.`);
  }

  if (partial.length > 0) {
    sentences.push(`Close on the rest: ${joinList(partial.map(partialNote))}.`);
  }

  if (mismatched.length > 0) {
    const details = mismatched.map((c) => `${c.label} (${c.serviceValue})`);
    sentences.push(`Differs on ${joinList(details)}.`);
  }

  return sentences;
}

/**
 * Short selling points derived from the service's own attributes
 */
export function generateHighlights(preference: PreferenceRecord, service: ServiceRecord): string[] {
  const highlights: string[] = [];

  const rank = priceRank(service.priceCategory);
  if (rank === 0) {
    highlights.push('cost-effective option');
  } else if (rank === 2) {
    highlights.push('premium service');
  }

  if (isBilingual(service.languageSupport)) {
    highlights.push('bilingual support');
  }

  if (isRemoteLocation(service.locationArea)) {
    highlights.push('remote delivery');
  } else if (service.locationArea.trim().toLowerCase() === preference.locationArea.trim().toLowerCase()) {
    highlights.push(`local service in ${service.locationArea}`);
  }

  return highlights;
}

/**
 * Builds the full explanation with its parts
 */
export function explainMatch(
  preference: PreferenceRecord,
  service: ServiceRecord,
  score: number,
  quality: QualityTier
): MatchExplanation {
  const comparisons = compareFields(preference, service);
  const templateKey = selectTemplateKey(quality, comparisons);
  const opening = selectOpening(templateKey, service.id, quality, score);
  const highlights = generateHighlights(preference, service);

  const parts = [opening, ...describeMatches(comparisons, quality)];
  if (service.description.trim() !== '') {
    parts.push(summarizeDescription(service.description));
  }
  if (highlights.length > 0) {
    parts.push(`Highlights: ${highlights.join(', ')}.`);
  }

  return {
    templateKey,
    opening,
    comparisons,
    highlights,
    text: parts.join(' '),
  };
}

export function explain(
  preference: PreferenceRecord,
  service: ServiceRecord,
  score: number,
  quality: QualityTier
): string {
  return explainMatch(preference, service, score, quality).text;
}

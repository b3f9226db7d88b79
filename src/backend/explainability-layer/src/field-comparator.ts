/**
 * Field Comparator
 *
 * Compares each categorical field of a preference against a service and
 * assigns a verdict. Works on the original records, never on encoded vectors.
 *
 * @tested tests/property/explanation.property.test.ts
 */

import {
  CATEGORICAL_FIELDS,
  FIELD_LABELS,
  UNKNOWN_CATEGORY,
  isBilingual,
  isRemoteLocation,
  normalizeCategoryKey,
  priceRank,
  standardizeCategory,
  type CategoricalField,
  type PreferenceRecord,
  type ServiceRecord,
} from '@service-match/shared';

export const FieldVerdict = {
  EXACT: 'exact',
  PARTIAL: 'partial',
  MISMATCH: 'mismatch',
} as const;

export type FieldVerdict = (typeof FieldVerdict)[keyof typeof FieldVerdict];

export interface FieldComparison {
  field: CategoricalField;
  label: string;
  verdict: FieldVerdict;
  preferenceValue: string;
  serviceValue: string;
}

const UNKNOWN_KEY = normalizeCategoryKey(UNKNOWN_CATEGORY);

function comparisonKey(field: CategoricalField, value: string): string {
  return normalizeCategoryKey(standardizeCategory(field, value));
}

/**
 * Closeness that earns a partial verdict: adjacent price tiers, a service
 * covering both languages, or a service delivered remotely
 */
function isPartialMatch(field: CategoricalField, preferenceValue: string, serviceValue: string): boolean {
  switch (field) {
    case 'priceCategory': {
      const wanted = priceRank(preferenceValue);
      const offered = priceRank(serviceValue);
      return wanted >= 0 && offered >= 0 && Math.abs(wanted - offered) === 1;
    }
    case 'languageSupport':
      return isBilingual(serviceValue);
    case 'locationArea':
      return isRemoteLocation(serviceValue);
    default:
      return false;
  }
}

export function compareField(
  field: CategoricalField,
  preferenceValue: string,
  serviceValue: string
): FieldComparison {
  const wantedKey = comparisonKey(field, preferenceValue);
  const offeredKey = comparisonKey(field, serviceValue);

  let verdict: FieldVerdict = FieldVerdict.MISMATCH;
  if (wantedKey === offeredKey && wantedKey !== UNKNOWN_KEY) {
    verdict = FieldVerdict.EXACT;
  } else if (isPartialMatch(field, preferenceValue, serviceValue)) {
    verdict = FieldVerdict.PARTIAL;
  }

  return {
    field,
    label: FIELD_LABELS[field],
    verdict,
    preferenceValue,
    serviceValue,
  };
}

/**
 * Per-field verdicts in the fixed field order
 */
export function compareFields(preference: PreferenceRecord, service: ServiceRecord): FieldComparison[] {
  return CATEGORICAL_FIELDS.map((field) => compareField(field, preference[field], service[field]));
}

export function isPerfectMatch(comparisons: readonly FieldComparison[]): boolean {
  return comparisons.length > 0 && comparisons.every((c) => c.verdict === FieldVerdict.EXACT);
}

export function countVerdicts(comparisons: readonly FieldComparison[]): Record<FieldVerdict, number> {
  const counts: Record<FieldVerdict, number> = { exact: 0, partial: 0, mismatch: 0 };
  for (const comparison of comparisons) {
    counts[comparison.verdict] += 1;
  }
  return counts;
}

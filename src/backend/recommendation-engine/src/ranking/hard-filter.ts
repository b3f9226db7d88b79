/**
 * Business Type Filter
 *
 * Optional hard filter applied before scoring. When it would leave no
 * candidates it is bypassed and the whole catalog is ranked instead.
 */

import { normalizeCategoryKey, standardizeBusinessType, type PreferenceRecord } from '@service-match/shared';

import type { EncodedService } from '../encoding/encoded-catalog.js';

export interface FilterResult {
  candidates: readonly EncodedService[];
  applied: boolean;
  bypassed: boolean;
  explanation: string;
}

export function businessTypeMatches(preferenceValue: string, serviceValue: string): boolean {
  return (
    normalizeCategoryKey(standardizeBusinessType(preferenceValue)) ===
    normalizeCategoryKey(standardizeBusinessType(serviceValue))
  );
}

export function applyBusinessTypeFilter(
  preference: PreferenceRecord,
  services: readonly EncodedService[],
  enabled: boolean
): FilterResult {
  if (!enabled) {
    return {
      candidates: services,
      applied: false,
      bypassed: false,
      explanation: 'Business type filter disabled',
    };
  }

  const matching = services.filter((entry) =>
    businessTypeMatches(preference.businessType, entry.service.businessType)
  );

  if (matching.length === 0 && services.length > 0) {
    return {
      candidates: services,
      applied: false,
      bypassed: true,
      explanation: `No services target ${preference.businessType}; ranking the full catalog`,
    };
  }

  return {
    candidates: matching,
    applied: true,
    bypassed: false,
    explanation: `${matching.length} of ${services.length} services target ${preference.businessType}`,
  };
}

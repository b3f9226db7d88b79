/**
 * Preference Record Model
 *
 * A transient value object produced once per recommendation request.
 * It carries the same categorical fields as a service, minus id, name and
 * description.
 */

import { z } from 'zod';

import { PreferenceValidationError, formatValidationErrors } from '../errors/errors.js';

const requiredCategory = (field: string) =>
  z
    .string({ required_error: `${field} is required` })
    .trim()
    .min(1, `${field} must not be empty`)
    .max(100);

export const PreferenceRecordSchema = z.object({
  businessType: requiredCategory('businessType'),
  priceCategory: requiredCategory('priceCategory'),
  languageSupport: requiredCategory('languageSupport'),
  locationArea: requiredCategory('locationArea'),
});

export type PreferenceRecord = z.infer<typeof PreferenceRecordSchema>;

/**
 * Validates a preference record, raising a PreferenceValidationError with
 * field-level details when a required field is missing or blank
 */
export function validatePreference(data: unknown): PreferenceRecord {
  const result = PreferenceRecordSchema.safeParse(data);
  if (!result.success) {
    throw new PreferenceValidationError(
      'Preference record is invalid',
      formatValidationErrors(result.error)
    );
  }
  return result.data;
}

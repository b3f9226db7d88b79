/**
 * Service Record Models and Zod Schemas
 *
 * Defines the canonical schema for catalog services. Services are produced
 * once per dataset load by the preprocessing pipeline and are read-only for
 * the engine's lifetime.
 *
 * @tested tests/property/feature-encoding.property.test.ts
 */

import { z } from 'zod';

/**
 * Categorical fields compared between a preference and a service, in the
 * order every encoded vector uses.
 */
export const CATEGORICAL_FIELDS = [
  'businessType',
  'priceCategory',
  'languageSupport',
  'locationArea',
] as const;

export type CategoricalField = (typeof CATEGORICAL_FIELDS)[number];

/**
 * Price categories in ascending order
 */
export const PRICE_CATEGORIES = ['Low', 'Medium', 'High'] as const;

export type PriceCategory = (typeof PRICE_CATEGORIES)[number];

export const LANGUAGE_OPTIONS = ['Hindi', 'English', 'Both'] as const;

/**
 * Placeholder category used when a value could not be imputed
 */
export const UNKNOWN_CATEGORY = 'Unknown';

/**
 * Human-readable labels for each categorical field
 */
export const FIELD_LABELS: Record<CategoricalField, string> = {
  businessType: 'business type',
  priceCategory: 'price tier',
  languageSupport: 'language support',
  locationArea: 'location',
};

/**
 * Service record schema
 *
 * @edgecase description may be short but never empty after cleaning
 */
export const ServiceRecordSchema = z.object({
  id: z.string().trim().min(1).max(100),
  name: z.string().trim().min(1).max(200),
  businessType: z.string().trim().min(1).max(100),
  priceCategory: z.string().trim().min(1).max(50),
  languageSupport: z.string().trim().min(1).max(50),
  locationArea: z.string().trim().min(1).max(100),
  description: z.string().trim().min(1).max(2000),
});

export type ServiceRecord = z.infer<typeof ServiceRecordSchema>;

/**
 * Catalog schema: a list of services whose ids are unique
 */
export const ServiceCatalogSchema = z.array(ServiceRecordSchema).superRefine((services, ctx) => {
  const seen = new Set<string>();
  services.forEach((service, index) => {
    if (seen.has(service.id)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Duplicate service id: ${service.id}`,
        path: [index, 'id'],
      });
    }
    seen.add(service.id);
  });
});

/**
 * Safely validates a whole catalog, returning a result object instead of throwing
 */
export function safeValidateServiceCatalog(
  data: unknown
): z.SafeParseReturnType<unknown, ServiceRecord[]> {
  return ServiceCatalogSchema.safeParse(data);
}

/**
 * Counts produced by one cleaning run
 */
export interface CleaningReport {
  originalRecords: number;
  finalRecords: number;
  recordsRemoved: number;
  duplicatesRemoved: number;
  missingValuesHandled: number;
  invalidRecordsRemoved: number;
}

/**
 * Feature Encoder
 *
 * Fits a per-field vocabulary over the catalog and turns records into
 * integer code vectors and one-hot metric vectors.
 *
 * Codes are assigned in sorted order of the normalized value, so the same
 * catalog always yields the same model regardless of row order. Each field
 * reserves code k (one past its last known value) for values never seen at
 * fit time; the reserved code never equals a real category's code.
 *
 * @tested tests/property/feature-encoding.property.test.ts
 */

import { z } from 'zod';

import {
  CATEGORICAL_FIELDS,
  CatalogValidationError,
  UNKNOWN_CATEGORY,
  formatValidationErrors,
  normalizeCategoryKey,
  standardizeCategory,
  type CategoricalField,
  type ServiceRecord,
} from '@service-match/shared';

export const ENCODING_MODEL_VERSION = 1;

export const FieldVocabularySchema = z
  .object({
    codes: z.record(z.number().int().nonnegative()),
    labels: z.array(z.string()),
    unknownCode: z.number().int().nonnegative(),
  })
  .refine((v) => v.unknownCode === v.labels.length, {
    message: 'unknownCode must equal the number of known values',
    path: ['unknownCode'],
  })
  .refine((v) => Object.values(v.codes).every((code) => code < v.unknownCode), {
    message: 'Known codes must be below unknownCode',
    path: ['codes'],
  });

export type FieldVocabulary = z.infer<typeof FieldVocabularySchema>;

export const EncodingModelSchema = z.object({
  version: z.literal(ENCODING_MODEL_VERSION),
  fields: z.object({
    businessType: FieldVocabularySchema,
    priceCategory: FieldVocabularySchema,
    languageSupport: FieldVocabularySchema,
    locationArea: FieldVocabularySchema,
  }),
});

export type EncodingModel = z.infer<typeof EncodingModelSchema>;

/**
 * One integer code per categorical field, in CATEGORICAL_FIELDS order
 */
export type EncodedVector = readonly number[];

/**
 * Concatenated one-hot blocks of width k + 1 per field
 */
export type MetricVector = readonly number[];

export type CategoricalRecord = Pick<ServiceRecord, CategoricalField>;

const UNKNOWN_KEY = normalizeCategoryKey(UNKNOWN_CATEGORY);

/**
 * Key a value is looked up by: standardized spelling, then case and
 * whitespace folded
 */
export function encodingKey(field: CategoricalField, value: string): string {
  return normalizeCategoryKey(standardizeCategory(field, value));
}

function fitField(catalog: readonly ServiceRecord[], field: CategoricalField): FieldVocabulary {
  const labelsByKey = new Map<string, string>();

  for (const service of catalog) {
    const label = standardizeCategory(field, service[field]);
    const key = normalizeCategoryKey(label);
    // placeholder values stay on the unknown code
    if (key === '' || key === UNKNOWN_KEY) {
      continue;
    }
    const existing = labelsByKey.get(key);
    if (existing === undefined || label < existing) {
      labelsByKey.set(key, label);
    }
  }

  const keys = [...labelsByKey.keys()].sort();
  const codes: Record<string, number> = Object.fromEntries(keys.map((key, code) => [key, code]));
  const labels = keys.map((key) => labelsByKey.get(key) ?? key);

  return { codes, labels, unknownCode: keys.length };
}

/**
 * Builds the encoding model for a catalog
 */
export function fitEncoder(catalog: readonly ServiceRecord[]): EncodingModel {
  return {
    version: ENCODING_MODEL_VERSION,
    fields: {
      businessType: fitField(catalog, 'businessType'),
      priceCategory: fitField(catalog, 'priceCategory'),
      languageSupport: fitField(catalog, 'languageSupport'),
      locationArea: fitField(catalog, 'locationArea'),
    },
  };
}

/**
 * Code of one value; unseen values get the field's unknown code
 */
export function encodeValue(model: EncodingModel, field: CategoricalField, value: string): number {
  const vocabulary = model.fields[field];
  const key = encodingKey(field, value);
  if (Object.hasOwn(vocabulary.codes, key)) {
    return vocabulary.codes[key] ?? vocabulary.unknownCode;
  }
  return vocabulary.unknownCode;
}

/**
 * Encodes a service or preference record. Never throws on unknown values.
 */
export function encodeRecord(record: CategoricalRecord, model: EncodingModel): EncodedVector {
  return CATEGORICAL_FIELDS.map((field) => encodeValue(model, field, record[field]));
}

export function isUnknownCode(model: EncodingModel, field: CategoricalField, code: number): boolean {
  return code >= model.fields[field].unknownCode;
}

/**
 * Length of the metric vector: sum of k + 1 over every field
 */
export function metricDimension(model: EncodingModel): number {
  return CATEGORICAL_FIELDS.reduce((total, field) => total + model.fields[field].unknownCode + 1, 0);
}

/**
 * One-hot form of an encoded vector, for distance and similarity metrics
 */
export function toMetricVector(vector: EncodedVector, model: EncodingModel): MetricVector {
  const metric = new Array<number>(metricDimension(model)).fill(0);
  let offset = 0;

  CATEGORICAL_FIELDS.forEach((field, index) => {
    const width = model.fields[field].unknownCode + 1;
    const code = vector[index] ?? model.fields[field].unknownCode;
    metric[offset + Math.min(code, width - 1)] = 1;
    offset += width;
  });

  return metric;
}

/**
 * 1 for slots holding a known value, 0 for each field's unknown slot
 */
export function knownSlotMask(model: EncodingModel): MetricVector {
  const mask: number[] = [];
  for (const field of CATEGORICAL_FIELDS) {
    const { unknownCode } = model.fields[field];
    for (let code = 0; code <= unknownCode; code++) {
      mask.push(code === unknownCode ? 0 : 1);
    }
  }
  return mask;
}

/**
 * Decodes a code back to its label, or UNKNOWN_CATEGORY
 */
export function decodeValue(model: EncodingModel, field: CategoricalField, code: number): string {
  return model.fields[field].labels[code] ?? UNKNOWN_CATEGORY;
}

export function serializeEncodingModel(model: EncodingModel): string {
  return JSON.stringify(model);
}

/**
 * Reads a model written by serializeEncodingModel
 *
 * @throws CatalogValidationError when the text is not a valid model
 */
export function deserializeEncodingModel(text: string): EncodingModel {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new CatalogValidationError('Encoding model is not valid JSON', [
      {
        field: 'model',
        message: error instanceof Error ? error.message : String(error),
        code: 'invalid_json',
      },
    ]);
  }

  const result = EncodingModelSchema.safeParse(raw);
  if (!result.success) {
    throw new CatalogValidationError('Encoding model is invalid', formatValidationErrors(result.error));
  }
  return result.data;
}

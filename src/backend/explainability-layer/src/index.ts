/**
 * Explainability Layer
 *
 * Field-by-field comparison, natural-language explanations and summary
 * insight for recommendation results.
 */

export const VERSION = '1.0.0';

// Field Comparator
export {
  FieldVerdict,
  compareField,
  compareFields,
  countVerdicts,
  isPerfectMatch,
  type FieldComparison,
} from './field-comparator.js';

// Explanation Generator
export {
  DESCRIPTION_LIMIT,
  OPENING_TEMPLATES,
  TemplateKey,
  explain,
  explainMatch,
  fnv1a,
  generateHighlights,
  joinList,
  selectOpening,
  selectTemplateKey,
  summarizeDescription,
  type MatchExplanation,
} from './explanation-generator.js';

// Summary Insight
export {
  GOOD_AVERAGE,
  STRONG_AVERAGE,
  generateSummaryInsight,
  summarizeRecommendations,
  type RecommendationSummary,
  type TopRecommendation,
} from './summary-insight.js';

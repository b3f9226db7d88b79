/**
 * Strategy Registry
 *
 * The table the ranking engine dispatches through. Adding a strategy means
 * adding an entry here and its name to STRATEGY_NAMES.
 */

import {
  ConfigurationError,
  STRATEGY_NAMES,
  StrategyNameSchema,
  type StrategyName,
} from '@service-match/shared';

import { cosineStrategy } from './cosine-scorer.js';
import { knnStrategy } from './knn-scorer.js';
import type { ScoringStrategy } from './types.js';
import { weightedStrategy } from './weighted-scorer.js';

export const SCORING_STRATEGIES: Readonly<Record<StrategyName, ScoringStrategy>> = {
  weighted: weightedStrategy,
  cosine: cosineStrategy,
  knn: knnStrategy,
};

/**
 * Looks up a strategy by name
 *
 * @throws ConfigurationError for a name outside the table
 */
export function resolveStrategy(name: string): ScoringStrategy {
  const parsed = StrategyNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new ConfigurationError(`Unknown scoring strategy: ${name}`, [
      {
        field: 'strategy',
        message: `Expected one of ${STRATEGY_NAMES.join(', ')}`,
        code: 'invalid_enum_value',
      },
    ]);
  }
  return SCORING_STRATEGIES[parsed.data];
}

/**
 * Computational Predictor Scorer
 *
 * Averages the contributions of every predictor that was present and
 * parseable. More negative = more evidence of deleteriousness.
 */

import type { ColumnMapping, PredictorContribution, VariantRow } from '@/types';
import { getCell } from '@/lib/tabular';
import { type PredictorRuleConfig, evaluatePredictorRule, getDefaultPredictorRules } from './rules';

export {
  type PredictorRuleConfig,
  type NumericPredictorRule,
  type CategoricalPredictorRule,
  type PredictorThreshold,
  type PredictorCode,
  type PredictorEvaluator,
  DEFAULT_PREDICTOR_RULES,
  evaluatePredictorRule,
  evaluateNumericPredictor,
  evaluateCategoricalPredictor,
  parsePredictorValue,
  getDefaultPredictorRules,
} from './rules';

// ============================================
// Types
// ============================================

export interface PredictorScoreResult {
  score: number;
  contributions: PredictorContribution[];
}

// ============================================
// Constants
// ============================================

export const MIN_PREDICTOR_SCORE = -2;
export const MAX_PREDICTOR_SCORE = 1;

// ============================================
// Scoring
// ============================================

/**
 * Evaluate every enabled rule against the row's predictor columns
 */
export function evaluateAllPredictors(
  row: VariantRow,
  predictorColumns: ColumnMapping['predictors'],
  rules: PredictorRuleConfig[] = getDefaultPredictorRules()
): PredictorContribution[] {
  const contributions: PredictorContribution[] = [];

  for (const rule of rules) {
    const contribution = evaluatePredictorRule(rule, getCell(row, predictorColumns[rule.predictor]));
    if (contribution) {
      contributions.push(contribution);
    }
  }

  return contributions;
}

/**
 * Score a row's predictors: sum of contributions over the number of
 * predictors that contributed, or 0 when none did
 */
export function scorePredictors(
  row: VariantRow,
  predictorColumns: ColumnMapping['predictors'],
  rules?: PredictorRuleConfig[]
): PredictorScoreResult {
  const contributions = evaluateAllPredictors(row, predictorColumns, rules);

  if (contributions.length === 0) {
    return { score: 0, contributions };
  }

  const sum = contributions.reduce((total, c) => total + c.points, 0);
  return { score: sum / contributions.length, contributions };
}

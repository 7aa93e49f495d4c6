/**
 * Predictor Rules - Threshold rules for computational predictors
 *
 * Each rule reads one predictor column and returns a PredictorContribution,
 * or null when the value is missing or unparseable (the predictor is then
 * left out of the average entirely).
 */

import type { PredictorContribution, PredictorName } from '@/types';

// ============================================
// Types
// ============================================

export type ThresholdComparison = 'gte' | 'gt' | 'lt';

export interface PredictorThreshold {
  comparison: ThresholdComparison;
  value: number;
  points: number;
}

export interface PredictorCode {
  code: string;
  points: number;
  meaning: string;
}

interface BasePredictorRule {
  predictor: PredictorName;
  name: string;
  description: string;
  enabled: boolean;
}

/** Thresholds are checked in order; the first match decides the points */
export interface NumericPredictorRule extends BasePredictorRule {
  kind: 'numeric';
  thresholds: PredictorThreshold[];
}

/** Codes are searched for anywhere in the raw value, in order */
export interface CategoricalPredictorRule extends BasePredictorRule {
  kind: 'categorical';
  codes: PredictorCode[];
}

export type PredictorRuleConfig = NumericPredictorRule | CategoricalPredictorRule;

export type PredictorEvaluator<R extends PredictorRuleConfig> = (
  rule: R,
  rawValue: string | undefined
) => PredictorContribution | null;

// ============================================
// Default Rule Configurations
// ============================================

export const DEFAULT_PREDICTOR_RULES: PredictorRuleConfig[] = [
  {
    predictor: 'cadd',
    kind: 'numeric',
    name: 'CADD phred',
    description: 'Variant deleteriousness severity',
    enabled: true,
    thresholds: [
      { comparison: 'gte', value: 25, points: -2 },
      { comparison: 'gte', value: 20, points: -1 },
    ],
  },
  {
    predictor: 'sift',
    kind: 'numeric',
    name: 'SIFT',
    description: 'Substitution tolerance',
    enabled: true,
    thresholds: [{ comparison: 'lt', value: 0.05, points: -1 }],
  },
  {
    predictor: 'gerp',
    kind: 'numeric',
    name: 'GERP++ RS',
    description: 'Evolutionary constraint',
    enabled: true,
    thresholds: [{ comparison: 'gt', value: 4.4, points: -1 }],
  },
  {
    predictor: 'phylop',
    kind: 'numeric',
    name: 'phyloP placental',
    description: 'Conservation across placental mammals',
    enabled: true,
    thresholds: [{ comparison: 'gt', value: 2.0, points: -1 }],
  },
  {
    predictor: 'metasvm',
    kind: 'categorical',
    name: 'MetaSVM',
    description: 'Ensemble deleteriousness call',
    enabled: true,
    codes: [
      { code: 'D', points: -1, meaning: 'damaging' },
      { code: 'T', points: 1, meaning: 'tolerated' },
    ],
  },
];

// ============================================
// Helper Functions
// ============================================

const NUMERIC_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const COMPARISON_SYMBOLS: Record<ThresholdComparison, string> = {
  gte: '>=',
  gt: '>',
  lt: '<',
};

/**
 * Parse a predictor value as a decimal number.
 * Returns null for missing values, "." and any non-numeric text.
 */
export function parsePredictorValue(rawValue: string | undefined): number | null {
  if (rawValue === undefined) {
    return null;
  }

  const trimmed = rawValue.trim();
  if (!NUMERIC_PATTERN.test(trimmed)) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
}

function meetsThreshold(value: number, threshold: PredictorThreshold): boolean {
  switch (threshold.comparison) {
    case 'gte':
      return value >= threshold.value;
    case 'gt':
      return value > threshold.value;
    case 'lt':
      return value < threshold.value;
  }
}

// ============================================
// Rule Evaluators
// ============================================

export const evaluateNumericPredictor: PredictorEvaluator<NumericPredictorRule> = (rule, rawValue) => {
  const value = parsePredictorValue(rawValue);
  if (value === null || rawValue === undefined) {
    return null;
  }

  const hit = rule.thresholds.find(threshold => meetsThreshold(value, threshold));

  return {
    predictor: rule.predictor,
    rawValue,
    points: hit ? hit.points : 0,
    reason: hit
      ? `${rule.name} ${value} ${COMPARISON_SYMBOLS[hit.comparison]} ${hit.value}`
      : `${rule.name} ${value} within neutral range`,
  };
};

export const evaluateCategoricalPredictor: PredictorEvaluator<CategoricalPredictorRule> = (rule, rawValue) => {
  if (rawValue === undefined) {
    return null;
  }

  const trimmed = rawValue.trim();
  if (trimmed === '' || trimmed === '.') {
    return null;
  }

  const hit = rule.codes.find(code => trimmed.includes(code.code));

  return {
    predictor: rule.predictor,
    rawValue,
    points: hit ? hit.points : 0,
    reason: hit
      ? `${rule.name} call ${hit.code} (${hit.meaning})`
      : `${rule.name} call "${trimmed}" not recognized`,
  };
};

/**
 * Evaluate a single rule against its raw column value
 */
export function evaluatePredictorRule(
  rule: PredictorRuleConfig,
  rawValue: string | undefined
): PredictorContribution | null {
  if (!rule.enabled) {
    return null;
  }

  switch (rule.kind) {
    case 'numeric':
      return evaluateNumericPredictor(rule, rawValue);
    case 'categorical':
      return evaluateCategoricalPredictor(rule, rawValue);
  }
}

/**
 * Get default rules as a fresh array
 */
export function getDefaultPredictorRules(): PredictorRuleConfig[] {
  return [...DEFAULT_PREDICTOR_RULES];
}

/**
 * Composite Ranker - Hierarchical priority ordering for variant records
 *
 * Each row is scored independently on four signals:
 *   classification tier > consensus tier > confidence score > predictor score
 * and the batch is then sorted once on that key, lexicographically.
 * A lower key sorts first. Exact ties keep input order.
 */

import type { ColumnMapping, PriorityKey, RankedVariant, VariantRow, VariantScore, VariantTable } from '@/types';
import {
  UNKNOWN_CLASSIFICATION_TIER,
  isPathogenicTier,
  resolveClassificationTier,
} from '@/lib/classification';
import { DOMINANT_CONSENSUS_TIER, WORST_CONSENSUS_TIER, resolveConsensusTier } from '@/lib/consensus';
import { MAX_CONFIDENCE_SCORE, MIN_CONFIDENCE_SCORE, scoreConfidenceBreakdown } from '@/lib/confidence';
import {
  MAX_PREDICTOR_SCORE,
  MIN_PREDICTOR_SCORE,
  type PredictorRuleConfig,
  scorePredictors,
} from '@/lib/predictors';
import { DEFAULT_COLUMN_MAPPING } from '@/lib/config';
import { getCell, hasColumn } from '@/lib/tabular';
import { RankingConfigurationError } from './errors';

// ============================================
// Types
// ============================================

/**
 * Options for scoring and ranking
 */
export interface RankingOptions {
  /** Column mapping (default: DEFAULT_COLUMN_MAPPING) */
  columns?: ColumnMapping;
  /** Predictor rules (default: DEFAULT_PREDICTOR_RULES) */
  predictorRules?: PredictorRuleConfig[];
}

export interface RankingResult {
  /** Same columns as the input, rows reordered */
  table: VariantTable;
  /** Rows paired with their scores, in ranked order */
  ranked: RankedVariant[];
}

// ============================================
// Helper Functions
// ============================================

/**
 * Force the consensus tier to the best value for pathogenic calls so the
 * external database cannot demote them.
 */
export function applyDominanceOverride(
  classificationTier: number,
  consensusTier: number
): { effectiveConsensusTier: number; dominanceApplied: boolean } {
  if (isPathogenicTier(classificationTier)) {
    return { effectiveConsensusTier: DOMINANT_CONSENSUS_TIER, dominanceApplied: true };
  }
  return { effectiveConsensusTier: consensusTier, dominanceApplied: false };
}

/**
 * Strict lexicographic comparison over the four key positions
 */
export function comparePriorityKeys(a: PriorityKey, b: PriorityKey): number {
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) {
      return a[i] < b[i] ? -1 : 1;
    }
  }
  return 0;
}

// ============================================
// Main Scoring Functions
// ============================================

/**
 * Score a single row. Never throws on field content: every missing or
 * malformed value resolves to its default.
 */
export function scoreVariant(
  row: VariantRow,
  inputIndex: number,
  options: RankingOptions = {}
): VariantScore {
  const { columns = DEFAULT_COLUMN_MAPPING, predictorRules } = options;

  const classificationTier = resolveClassificationTier(getCell(row, columns.classification));
  const consensusTier = resolveConsensusTier(getCell(row, columns.consensus));
  const confidenceScore = scoreConfidenceBreakdown(getCell(row, columns.confidence));
  const predictors = scorePredictors(row, columns.predictors, predictorRules);

  const { effectiveConsensusTier, dominanceApplied } = applyDominanceOverride(
    classificationTier,
    consensusTier
  );

  return {
    inputIndex,
    classificationTier,
    consensusTier,
    effectiveConsensusTier,
    dominanceApplied,
    confidenceScore,
    predictorScore: predictors.score,
    predictorContributions: predictors.contributions,
    priorityKey: [classificationTier, effectiveConsensusTier, confidenceScore, predictors.score],
  };
}

/**
 * Rank every row of a table. The header must contain the classification
 * column; other signal columns may be absent.
 *
 * @throws RankingConfigurationError when the classification column is missing
 */
export function rankVariants(table: VariantTable, options: RankingOptions = {}): RankingResult {
  const columns = options.columns ?? DEFAULT_COLUMN_MAPPING;

  if (!hasColumn(table, columns.classification)) {
    throw new RankingConfigurationError(
      'MISSING_CLASSIFICATION_COLUMN',
      `Required classification column "${columns.classification}" not found in input`
    );
  }

  const ranked = table.rows.map((row, index) => ({
    row,
    score: scoreVariant(row, index, { ...options, columns }),
  }));

  // Array.prototype.sort is stable, which keeps exact ties in input order
  ranked.sort((a, b) => comparePriorityKeys(a.score.priorityKey, b.score.priorityKey));

  return {
    table: { columns: [...table.columns], rows: ranked.map(r => r.row) },
    ranked,
  };
}

// ============================================
// Validation and Display
// ============================================

/**
 * Check that a score respects the range invariants of each signal
 */
export function isValidVariantScore(score: VariantScore): boolean {
  if (!Number.isInteger(score.classificationTier)) return false;
  if (score.classificationTier < 1 || score.classificationTier > UNKNOWN_CLASSIFICATION_TIER) {
    return false;
  }

  if (!Number.isInteger(score.effectiveConsensusTier)) return false;
  if (score.effectiveConsensusTier < DOMINANT_CONSENSUS_TIER || score.effectiveConsensusTier > WORST_CONSENSUS_TIER) {
    return false;
  }
  if (isPathogenicTier(score.classificationTier) && score.effectiveConsensusTier !== DOMINANT_CONSENSUS_TIER) {
    return false;
  }

  if (score.confidenceScore < MIN_CONFIDENCE_SCORE || score.confidenceScore > MAX_CONFIDENCE_SCORE) {
    return false;
  }

  if (score.predictorScore < MIN_PREDICTOR_SCORE || score.predictorScore > MAX_PREDICTOR_SCORE) {
    return false;
  }

  return true;
}

function formatSigned(value: number): string {
  const fixed = value.toFixed(2);
  return value > 0 ? `+${fixed}` : fixed;
}

/**
 * Format a variant score for display
 */
export function formatVariantScore(score: VariantScore): string {
  const consensusLine = score.dominanceApplied
    ? `Consensus Tier: ${score.consensusTier} (overridden to ${score.effectiveConsensusTier}: pathogenic classification)`
    : `Consensus Tier: ${score.consensusTier}`;

  const lines: string[] = [
    `Row: ${score.inputIndex}`,
    `Classification Tier: ${score.classificationTier}`,
    consensusLine,
    `Confidence Score: ${formatSigned(score.confidenceScore)}`,
    `Predictor Score: ${formatSigned(score.predictorScore)}`,
  ];

  if (score.predictorContributions.length > 0) {
    lines.push('');
    lines.push('Predictor Contributions:');
    for (const c of score.predictorContributions) {
      lines.push(`  - ${c.predictor}: ${c.points > 0 ? '+' : ''}${c.points} (${c.reason})`);
    }
  } else {
    lines.push('');
    lines.push('No usable predictors.');
  }

  return lines.join('\n');
}

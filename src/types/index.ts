// Shared types for the variant prioritization engine

// ============================================
// Tabular Data
// ============================================

/**
 * Header position of each column name. A name repeated in the header maps
 * to its first position.
 */
export type ColumnIndex = ReadonlyMap<string, number>;

/**
 * One input row: its cells in header order plus the header lookup shared by
 * every row of its table. `cells` is shorter than the header when the source
 * line was.
 */
export interface VariantRow {
  readonly index: ColumnIndex;
  readonly cells: readonly string[];
}

/**
 * A parsed table: the header in file order plus its rows in file order
 */
export interface VariantTable {
  columns: string[];
  rows: VariantRow[];
}

// ============================================
// Column Mapping
// ============================================

/**
 * Names of the computational predictors the engine understands
 */
export type PredictorName = 'cadd' | 'sift' | 'gerp' | 'phylop' | 'metasvm';

/**
 * Which table columns feed which signal
 */
export interface ColumnMapping {
  classification: string;
  consensus: string;
  confidence: string;
  predictors: Record<PredictorName, string>;
  /** Columns shown for top variants in the summary */
  display: string[];
}

// ============================================
// Derived Scores (scratch state, never persisted)
// ============================================

/**
 * Lexicographic sort key: classification tier, adjusted consensus tier,
 * confidence score, predictor score. Lower sorts first.
 */
export type PriorityKey = readonly [number, number, number, number];

export interface PredictorContribution {
  predictor: PredictorName;
  rawValue: string;
  points: number;
  reason: string;
}

export interface VariantScore {
  /** Position of the row in the input table */
  inputIndex: number;
  classificationTier: number;
  /** Consensus tier as resolved from its own field */
  consensusTier: number;
  /** Consensus tier after the pathogenic dominance override */
  effectiveConsensusTier: number;
  dominanceApplied: boolean;
  confidenceScore: number;
  predictorScore: number;
  predictorContributions: PredictorContribution[];
  priorityKey: PriorityKey;
}

export interface RankedVariant {
  row: VariantRow;
  score: VariantScore;
}

/**
 * Confidence Breakdown Scorer
 *
 * Parses a submission breakdown such as "Pathogenic(1)|Benign(10)" into the
 * count-weighted mean of per-label weights. Pathogenic labels weigh negative,
 * benign labels positive, anything else 0.
 */

// ============================================
// Types
// ============================================

export interface ConfidenceEntry {
  label: string;
  count: number;
}

// ============================================
// Constants
// ============================================

export const CONFIDENCE_WEIGHTS: Readonly<Record<string, number>> = Object.freeze({
  'Pathogenic': -10,
  'Likely_pathogenic': -8,
  'Pathogenic\\x2c_low_penetrance': -7,
  'Likely_risk_allele': -6,
  'Uncertain_significance': 0,
  'Uncertain_risk_allele': 0,
  'Likely_benign': 5,
  'Benign': 8,
});

export const MIN_CONFIDENCE_SCORE = -10;
export const MAX_CONFIDENCE_SCORE = 8;

const ENTRY_PATTERN = /([^|(]+)\((\d+)\)/g;

// ============================================
// Parsing
// ============================================

/**
 * Extract every `label(count)` pair in field order. Repeated labels are kept
 * as separate entries; a count too large to represent is dropped.
 */
export function parseConfidenceBreakdown(field: string | null | undefined): ConfidenceEntry[] {
  if (!field) {
    return [];
  }

  const entries: ConfidenceEntry[] = [];
  for (const match of field.matchAll(ENTRY_PATTERN)) {
    const count = parseInt(match[2], 10);
    if (!Number.isFinite(count)) {
      continue;
    }
    entries.push({ label: match[1].trim(), count });
  }
  return entries;
}

export function getConfidenceWeight(label: string): number {
  return Object.prototype.hasOwnProperty.call(CONFIDENCE_WEIGHTS, label)
    ? CONFIDENCE_WEIGHTS[label]
    : 0;
}

// ============================================
// Scoring
// ============================================

/**
 * Score a confidence breakdown field. Missing, empty or unparseable input
 * scores 0, as does a total count of zero or one that overflows.
 */
export function scoreConfidenceBreakdown(field: string | null | undefined): number {
  const entries = parseConfidenceBreakdown(field);

  let total = 0;
  let weighted = 0;
  for (const entry of entries) {
    total += entry.count;
    weighted += getConfidenceWeight(entry.label) * entry.count;
  }

  if (total === 0 || !Number.isFinite(total) || !Number.isFinite(weighted)) {
    return 0;
  }

  return weighted / total;
}

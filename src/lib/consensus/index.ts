/**
 * Consensus Label Resolver
 *
 * Maps the external database (ClinVar) significance field to a tier. The field
 * may list several submissions separated by "|"; the best (lowest) recognized
 * tier wins.
 */

// ============================================
// Constants
// ============================================

export const UNKNOWN_CONSENSUS_TIER = 6;

/** Best possible consensus tier, used by the pathogenic dominance override */
export const DOMINANT_CONSENSUS_TIER = 0;

/** Worst tier any recognized consensus label maps to */
export const WORST_CONSENSUS_TIER = 8;

export const CONSENSUS_PREFIX = 'clinvar: ';

export const CONSENSUS_TIERS: Readonly<Record<string, number>> = Object.freeze({
  // Pathogenic
  'Pathogenic': 1,
  'Pathogenic/Likely_pathogenic': 1,
  'Pathogenic/Likely_pathogenic/Likely_risk_allele': 1,
  'Pathogenic/Likely_pathogenic/Pathogenic\\x2c_low_penetrance': 1,
  'Pathogenic/Likely_risk_allele': 1,
  'Pathogenic/Pathogenic\\x2c_low_penetrance': 1,

  // Likely pathogenic
  'Likely_pathogenic': 2,
  'Likely_pathogenic/Likely_risk_allele': 2,
  'Likely_pathogenic\\x2c_low_penetrance': 2,
  'Likely_risk_allele': 2,

  // Conflicting
  'Conflicting_classifications_of_pathogenicity': 3,

  // Uncertain
  'Uncertain_significance': 4,
  'Uncertain_significance/Uncertain_risk_allele': 4,
  'Uncertain_risk_allele': 4,

  // Functional annotations
  'Affects': 5,
  'association': 5,
  'drug_response': 5,
  'confers_sensitivity': 5,
  'risk_factor': 5,
  'protective': 5,

  // Unknown / missing
  'not_provided': 6,
  'no_classification_for_the_single_variant': 6,
  'no_classifications_from_unflagged_records': 6,
  'other': 6,
  'UNK': 6,
  '': 6,
  '.': 6,

  // Likely benign
  'Likely_benign': 7,
  'Benign/Likely_benign': 7,

  // Benign
  'Benign': 8,
});

// ============================================
// Resolver
// ============================================

function lookupConsensusTier(label: string): number | undefined {
  return Object.prototype.hasOwnProperty.call(CONSENSUS_TIERS, label)
    ? CONSENSUS_TIERS[label]
    : undefined;
}

/**
 * Resolve a consensus field to the minimum tier among its recognized parts,
 * or UNKNOWN_CONSENSUS_TIER when nothing is recognized
 */
export function resolveConsensusTier(field: string | null | undefined): number {
  if (field === null || field === undefined) {
    return UNKNOWN_CONSENSUS_TIER;
  }

  const cleaned = field.split(CONSENSUS_PREFIX).join('').trim();

  let best: number | undefined;
  for (const part of cleaned.split('|')) {
    const tier = lookupConsensusTier(part.trim());
    if (tier !== undefined && (best === undefined || tier < best)) {
      best = tier;
    }
  }

  return best ?? UNKNOWN_CONSENSUS_TIER;
}

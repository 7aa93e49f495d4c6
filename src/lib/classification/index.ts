/**
 * Classification Tier Resolver
 *
 * Maps a primary clinical significance label (ACMG style) to an integer tier.
 * Lower tier = higher clinical priority. Every input maps to a tier; anything
 * unrecognized falls to UNKNOWN_CLASSIFICATION_TIER.
 */

// ============================================
// Constants
// ============================================

export const UNKNOWN_CLASSIFICATION_TIER = 9;

/** Tiers at or below this value are pathogenic / likely pathogenic calls */
export const PATHOGENIC_TIER_CUTOFF = 2;

export const CLASSIFICATION_TIERS: Readonly<Record<string, number>> = Object.freeze({
  'Pathogenic': 1,
  'Likely pathogenic': 2,
  'Vus H': 3,
  'VUS H': 3,
  'VUS h': 3,
  'VUS_H': 3,
  'Vus M': 4,
  'VUS M': 4,
  'VUS m': 4,
  'VUS_M': 4,
  'Vus C': 5,
  'VUS C': 5,
  'VUS c': 5,
  'VUS_C': 5,
  'VUS': 6,
  'Vus': 6,
  'Uncertain significance': 6,
  'Likely benign': 7,
  'Benign': 8,
  'UNK': 9,
  '': 9,
  '.': 9,
});

const LOWERCASE_TIERS: ReadonlyMap<string, number> = buildLowercaseIndex(CLASSIFICATION_TIERS);

/**
 * Strength qualifiers for unlisted VUS labels, checked in order.
 * Single letters are matched anywhere in the label, so this is best-effort
 * (e.g. "vus unusual strength" hits "h").
 */
const VUS_QUALIFIERS: ReadonlyArray<{ markers: readonly string[]; tier: number }> = [
  { markers: ['h', 'high'], tier: 3 },
  { markers: ['m', 'medium'], tier: 4 },
  { markers: ['c', 'cold'], tier: 5 },
];

const VUS_DEFAULT_TIER = 6;

// ============================================
// Helper Functions
// ============================================

function buildLowercaseIndex(table: Readonly<Record<string, number>>): Map<string, number> {
  const index = new Map<string, number>();
  for (const [label, tier] of Object.entries(table)) {
    const key = label.toLowerCase();
    // first entry wins, same as a linear scan of the table
    if (!index.has(key)) {
      index.set(key, tier);
    }
  }
  return index;
}

function inferVusTier(lowered: string): number {
  for (const qualifier of VUS_QUALIFIERS) {
    if (qualifier.markers.some(marker => lowered.includes(marker))) {
      return qualifier.tier;
    }
  }
  return VUS_DEFAULT_TIER;
}

// ============================================
// Resolver
// ============================================

/**
 * Resolve a classification label to its tier (1..9)
 */
export function resolveClassificationTier(label: string | null | undefined): number {
  if (label === null || label === undefined) {
    return UNKNOWN_CLASSIFICATION_TIER;
  }

  const trimmed = label.trim();

  if (Object.prototype.hasOwnProperty.call(CLASSIFICATION_TIERS, trimmed)) {
    return CLASSIFICATION_TIERS[trimmed];
  }

  const lowered = trimmed.toLowerCase();
  const caseless = LOWERCASE_TIERS.get(lowered);
  if (caseless !== undefined) {
    return caseless;
  }

  if (lowered.includes('vus')) {
    return inferVusTier(lowered);
  }

  return UNKNOWN_CLASSIFICATION_TIER;
}

export function isPathogenicTier(tier: number): boolean {
  return tier <= PATHOGENIC_TIER_CUTOFF;
}

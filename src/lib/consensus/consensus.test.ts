/**
 * Tests for the consensus label resolver
 */

import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { CONSENSUS_TIERS, UNKNOWN_CONSENSUS_TIER, resolveConsensusTier } from './index';

const knownLabelArbitrary = fc.constantFrom(...Object.keys(CONSENSUS_TIERS));

describe('resolveConsensusTier', () => {
  it('looks up single values', () => {
    expect(resolveConsensusTier('Pathogenic')).toBe(1);
    expect(resolveConsensusTier('Likely_risk_allele')).toBe(2);
    expect(resolveConsensusTier('Conflicting_classifications_of_pathogenicity')).toBe(3);
    expect(resolveConsensusTier('Uncertain_significance')).toBe(4);
    expect(resolveConsensusTier('drug_response')).toBe(5);
    expect(resolveConsensusTier('not_provided')).toBe(6);
    expect(resolveConsensusTier('Benign/Likely_benign')).toBe(7);
    expect(resolveConsensusTier('Benign')).toBe(8);
  });

  it('keeps escaped commas as literal text', () => {
    expect(resolveConsensusTier('Pathogenic/Pathogenic\\x2c_low_penetrance')).toBe(1);
    expect(resolveConsensusTier('Likely_pathogenic\\x2c_low_penetrance')).toBe(2);
  });

  it('returns the default tier for missing or unrecognized values', () => {
    expect(resolveConsensusTier(undefined)).toBe(UNKNOWN_CONSENSUS_TIER);
    expect(resolveConsensusTier(null)).toBe(UNKNOWN_CONSENSUS_TIER);
    expect(resolveConsensusTier('')).toBe(UNKNOWN_CONSENSUS_TIER);
    expect(resolveConsensusTier('Something_else')).toBe(UNKNOWN_CONSENSUS_TIER);
    expect(resolveConsensusTier('foo|bar')).toBe(UNKNOWN_CONSENSUS_TIER);
    expect(resolveConsensusTier('constructor')).toBe(UNKNOWN_CONSENSUS_TIER);
  });

  it('is case-sensitive', () => {
    expect(resolveConsensusTier('benign')).toBe(UNKNOWN_CONSENSUS_TIER);
  });

  it('takes the minimum tier across piped values', () => {
    expect(resolveConsensusTier('Benign|Pathogenic')).toBe(resolveConsensusTier('Pathogenic'));
    expect(resolveConsensusTier('Likely_benign|Benign')).toBe(7);
  });

  it('ignores unrecognized parts of a piped value', () => {
    expect(resolveConsensusTier('Benign|not_a_label')).toBe(8);
  });

  it('strips the database prefix and whitespace', () => {
    expect(resolveConsensusTier('clinvar: Likely_benign')).toBe(7);
    expect(resolveConsensusTier('clinvar: Benign|Uncertain_significance')).toBe(4);
    expect(resolveConsensusTier(' Benign | Likely_pathogenic ')).toBe(2);
  });

  it('piped lists resolve to the best tier of their members', () => {
    fc.assert(
      fc.property(fc.array(knownLabelArbitrary, { minLength: 1, maxLength: 6 }), labels => {
        const expected = Math.min(...labels.map(label => CONSENSUS_TIERS[label]));
        expect(resolveConsensusTier(labels.join('|'))).toBe(expected);
      }),
      { numRuns: 200 }
    );
  });
});

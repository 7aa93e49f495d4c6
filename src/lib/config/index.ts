// Configuration - Column mapping and run settings from the environment

import { z } from "zod";
import type { ColumnMapping } from "@/types";

// ============================================
// Defaults
// ============================================

export const DEFAULT_COLUMN_MAPPING: ColumnMapping = {
  classification: "ACMG",
  // header carries a trailing space in annotated exports
  consensus: "clinvar: Clinvar ",
  confidence: "CLNSIGCONF",
  predictors: {
    cadd: "CADD_phred",
    sift: "SIFT_score",
    gerp: "GERP++_RS",
    phylop: "phyloP46way_placental",
    metasvm: "MetaSVM_score",
  },
  display: ["#Chr", "Start", "Ref", "Alt", "Ref.Gene", "ACMG", "clinvar: Clinvar "],
};

export const DEFAULT_SUMMARY_TOP_N = 10;

// ============================================
// Types
// ============================================

export interface PrioritizerConfig {
  columns: ColumnMapping;
  summaryTopN: number;
}

export class ConfigurationError extends Error {
  readonly code = "INVALID_CONFIGURATION";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

// ============================================
// Validation Schema
// ============================================

const columnName = z.string().min(1, "column name must not be empty");

/**
 * Environment overrides; anything unset keeps its default.
 * Column names are taken verbatim (no trimming) since headers may carry spaces.
 */
const envSchema = z.object({
  VARIANT_CLASSIFICATION_COLUMN: columnName.optional(),
  VARIANT_CONSENSUS_COLUMN: columnName.optional(),
  VARIANT_CONFIDENCE_COLUMN: columnName.optional(),
  VARIANT_CADD_COLUMN: columnName.optional(),
  VARIANT_SIFT_COLUMN: columnName.optional(),
  VARIANT_GERP_COLUMN: columnName.optional(),
  VARIANT_PHYLOP_COLUMN: columnName.optional(),
  VARIANT_METASVM_COLUMN: columnName.optional(),
  SUMMARY_TOP_N: z.coerce.number().int().min(0).optional(),
});

// ============================================
// Loading
// ============================================

/**
 * Build the run configuration from environment variables
 * (process.env by default; dotenv is loaded by the entry script)
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): PrioritizerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  const defaults = DEFAULT_COLUMN_MAPPING;
  const classification = values.VARIANT_CLASSIFICATION_COLUMN ?? defaults.classification;
  const consensus = values.VARIANT_CONSENSUS_COLUMN ?? defaults.consensus;

  return {
    columns: {
      classification,
      consensus,
      confidence: values.VARIANT_CONFIDENCE_COLUMN ?? defaults.confidence,
      predictors: {
        cadd: values.VARIANT_CADD_COLUMN ?? defaults.predictors.cadd,
        sift: values.VARIANT_SIFT_COLUMN ?? defaults.predictors.sift,
        gerp: values.VARIANT_GERP_COLUMN ?? defaults.predictors.gerp,
        phylop: values.VARIANT_PHYLOP_COLUMN ?? defaults.predictors.phylop,
        metasvm: values.VARIANT_METASVM_COLUMN ?? defaults.predictors.metasvm,
      },
      // keep the summary pointed at the renamed signal columns
      display: defaults.display.map(column => {
        if (column === defaults.classification) return classification;
        if (column === defaults.consensus) return consensus;
        return column;
      }),
    },
    summaryTopN: values.SUMMARY_TOP_N ?? DEFAULT_SUMMARY_TOP_N,
  };
}

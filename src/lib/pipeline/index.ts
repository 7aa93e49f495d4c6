/**
 * Prioritization Pipeline
 *
 * Reads a variant table, ranks it, and writes it back with the same columns.
 * Derived scores are never written out.
 */

import { type PrioritizerConfig, DEFAULT_COLUMN_MAPPING, DEFAULT_SUMMARY_TOP_N } from "@/lib/config";
import type { PredictorRuleConfig } from "@/lib/predictors";
import { rankVariants } from "@/lib/scoring";
import { type PrioritizationSummary, summarizePrioritization } from "@/lib/summary";
import { readVariantTable, writeVariantTable } from "@/lib/tabular";

// ============================================
// Types
// ============================================

export interface PipelineOptions {
  config?: PrioritizerConfig;
  predictorRules?: PredictorRuleConfig[];
}

export interface PipelineResult {
  variantCount: number;
  summary: PrioritizationSummary;
}

// ============================================
// Logging
// ============================================

export function log(level: "info" | "warn" | "error", message: string, data?: Record<string, unknown>): void {
  const timestamp = new Date().toISOString();
  const logData = data ? ` ${JSON.stringify(data)}` : "";
  const line = `[${timestamp}] [${level.toUpperCase()}] ${message}${logData}`;
  if (level === "error") {
    console.error(line);
  } else {
    console.log(line);
  }
}

// ============================================
// Pipeline
// ============================================

export async function prioritizeVariantFile(
  inputPath: string,
  outputPath: string,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  const {
    config = { columns: DEFAULT_COLUMN_MAPPING, summaryTopN: DEFAULT_SUMMARY_TOP_N },
    predictorRules,
  } = options;
  const startTime = Date.now();

  log("info", "Reading variants", { inputPath });
  const table = await readVariantTable(inputPath);
  log("info", "Loaded variants", { count: table.rows.length, columns: table.columns.length });

  const result = rankVariants(table, { columns: config.columns, predictorRules });

  log("info", "Saving prioritized variants", { outputPath });
  await writeVariantTable(outputPath, result.table);

  log("info", "Prioritization completed", {
    count: result.table.rows.length,
    durationMs: Date.now() - startTime,
  });

  return {
    variantCount: result.table.rows.length,
    summary: summarizePrioritization(result.table, config.columns, config.summaryTopN),
  };
}

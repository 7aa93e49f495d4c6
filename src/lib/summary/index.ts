/**
 * Prioritization Summary - Label distribution and top variants of a ranked table
 */

import type { ColumnMapping, VariantTable } from "@/types";
import { DEFAULT_SUMMARY_TOP_N } from "@/lib/config";
import { getCell } from "@/lib/tabular";

// ============================================
// Types
// ============================================

export interface LabelCount {
  label: string;
  count: number;
}

export interface PrioritizationSummary {
  totalVariants: number;
  classificationColumn: string;
  labelDistribution: LabelCount[];
  /** Display columns present in the table, in configured order */
  displayColumns: string[];
  /** Top rows projected onto displayColumns */
  topVariants: string[][];
}

// ============================================
// Constants
// ============================================

export const MISSING_LABEL = "(missing)";

// ============================================
// Summary
// ============================================

/**
 * Count raw classification labels, most frequent first.
 * Equal counts keep the order in which labels first appear.
 */
export function countLabels(table: VariantTable, column: string): LabelCount[] {
  const counts = new Map<string, number>();
  for (const row of table.rows) {
    const raw = getCell(row, column);
    const label = raw === undefined || raw === "" ? MISSING_LABEL : raw;
    counts.set(label, (counts.get(label) ?? 0) + 1);
  }

  return Array.from(counts, ([label, count]) => ({ label, count })).sort(
    (a, b) => b.count - a.count
  );
}

export function summarizePrioritization(
  ranked: VariantTable,
  columns: ColumnMapping,
  topN: number = DEFAULT_SUMMARY_TOP_N
): PrioritizationSummary {
  const displayColumns = columns.display.filter(
    (column, i) => ranked.columns.includes(column) && columns.display.indexOf(column) === i
  );

  return {
    totalVariants: ranked.rows.length,
    classificationColumn: columns.classification,
    labelDistribution: countLabels(ranked, columns.classification),
    displayColumns,
    topVariants: ranked.rows
      .slice(0, topN)
      .map(row => displayColumns.map(column => getCell(row, column) ?? "")),
  };
}

export function formatPrioritizationSummary(summary: PrioritizationSummary): string {
  const lines: string[] = [
    "Prioritization Summary:",
    "-".repeat(50),
    `Total variants: ${summary.totalVariants}`,
    "",
    `${summary.classificationColumn} Classification Distribution:`,
  ];

  if (summary.labelDistribution.length === 0) {
    lines.push("  (none)");
  }
  for (const { label, count } of summary.labelDistribution) {
    lines.push(`  ${label}: ${count}`);
  }

  lines.push("");
  lines.push(`Top ${summary.topVariants.length} prioritized variants:`);
  if (summary.displayColumns.length > 0) {
    lines.push(summary.displayColumns.join("\t"));
    for (const cells of summary.topVariants) {
      lines.push(cells.join("\t"));
    }
  }

  return lines.join("\n");
}

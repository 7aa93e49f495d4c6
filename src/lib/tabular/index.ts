// Tabular I/O - Tab-separated variant tables
// Cells are carried verbatim; only row order is ever changed by callers.

import { readFile, writeFile } from "fs/promises";
import type { ColumnIndex, VariantRow, VariantTable } from "@/types";

// ============================================
// Errors
// ============================================

export type TabularFormatErrorCode = "EMPTY_INPUT" | "ROW_TOO_WIDE";

export class TabularFormatError extends Error {
  readonly code: TabularFormatErrorCode;

  constructor(code: TabularFormatErrorCode, message: string) {
    super(message);
    this.name = "TabularFormatError";
    this.code = code;
  }
}

// ============================================
// Helper Functions
// ============================================

/**
 * Map each column name to its header position. Repeated names resolve to
 * their first position.
 */
export function indexColumns(columns: readonly string[]): ColumnIndex {
  const index = new Map<string, number>();
  columns.forEach((column, i) => {
    if (!index.has(column)) {
      index.set(column, i);
    }
  });
  return index;
}

/**
 * Read a cell by column name. Absent cells come back as undefined.
 */
export function getCell(row: VariantRow, column: string): string | undefined {
  const position = row.index.get(column);
  if (position === undefined || position >= row.cells.length) {
    return undefined;
  }
  return row.cells[position];
}

export function hasColumn(table: VariantTable, column: string): boolean {
  return table.columns.includes(column);
}

/**
 * Build a single row whose header is the record's defined keys, in key order
 */
export function createVariantRow(values: Readonly<Record<string, string | undefined>>): VariantRow {
  const columns: string[] = [];
  const cells: string[] = [];
  for (const [column, value] of Object.entries(values)) {
    if (value !== undefined) {
      columns.push(column);
      cells.push(value);
    }
  }
  return { index: indexColumns(columns), cells };
}

/**
 * Build a table from records. Each record is laid out along `columns`;
 * columns a record lacks get an empty cell.
 */
export function createVariantTable(
  columns: string[],
  records: ReadonlyArray<Readonly<Record<string, string | undefined>>>
): VariantTable {
  const index = indexColumns(columns);
  return {
    columns,
    rows: records.map(record => ({
      index,
      cells: columns.map(column =>
        Object.prototype.hasOwnProperty.call(record, column) ? record[column] ?? "" : ""
      ),
    })),
  };
}

// ============================================
// Parsing and Serialization
// ============================================

/**
 * Parse tab-separated text. The first non-blank line is the header.
 */
export function parseVariantTable(text: string): VariantTable {
  const lines = text.split(/\r?\n/);

  let lineIndex = lines.findIndex(line => line.length > 0);
  if (lineIndex === -1) {
    throw new TabularFormatError("EMPTY_INPUT", "Input has no header line");
  }

  const columns = lines[lineIndex].split("\t");
  const index = indexColumns(columns);
  const rows: VariantRow[] = [];

  for (lineIndex += 1; lineIndex < lines.length; lineIndex++) {
    const line = lines[lineIndex];
    if (line.length === 0) {
      continue;
    }

    const cells = line.split("\t");
    if (cells.length > columns.length) {
      throw new TabularFormatError(
        "ROW_TOO_WIDE",
        `Line ${lineIndex + 1} has ${cells.length} cells but the header has ${columns.length}`
      );
    }

    rows.push({ index, cells });
  }

  return { columns, rows };
}

export function serializeVariantTable(table: VariantTable): string {
  const lines = [table.columns.join("\t")];
  for (const row of table.rows) {
    lines.push(table.columns.map((_, i) => (i < row.cells.length ? row.cells[i] : "")).join("\t"));
  }
  return lines.join("\n") + "\n";
}

export async function readVariantTable(path: string): Promise<VariantTable> {
  const text = await readFile(path, "utf8");
  return parseVariantTable(text);
}

export async function writeVariantTable(path: string, table: VariantTable): Promise<void> {
  await writeFile(path, serializeVariantTable(table), "utf8");
}

/**
 * Tabular I/O Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import path from "path";
import {
  TabularFormatError,
  createVariantRow,
  createVariantTable,
  getCell,
  parseVariantTable,
  readVariantTable,
  serializeVariantTable,
  writeVariantTable,
} from "./index";

describe("parseVariantTable", () => {
  it("reads the header and rows", () => {
    const table = parseVariantTable("A\tB\n1\t2\n3\t4\n");
    expect(table.columns).toEqual(["A", "B"]);
    expect(table.rows.map(row => row.cells)).toEqual([
      ["1", "2"],
      ["3", "4"],
    ]);
    expect(getCell(table.rows[1], "B")).toBe("4");
  });

  it("accepts CRLF line endings", () => {
    expect(parseVariantTable("A\tB\r\n1\t2\r\n").rows[0].cells).toEqual(["1", "2"]);
  });

  it("skips blank lines", () => {
    const table = parseVariantTable("\nA\n\n1\n\n");
    expect(table.rows.map(row => row.cells)).toEqual([["1"]]);
  });

  it("keeps cells verbatim", () => {
    const table = parseVariantTable("clinvar: Clinvar \tCADD_phred\n Benign \t\"25.0\"\n");
    expect(table.columns).toEqual(["clinvar: Clinvar ", "CADD_phred"]);
    expect(getCell(table.rows[0], "clinvar: Clinvar ")).toBe(" Benign ");
    expect(getCell(table.rows[0], "CADD_phred")).toBe("\"25.0\"");
  });

  it("leaves trailing cells of short rows missing", () => {
    const table = parseVariantTable("A\tB\tC\nx\n");
    expect(table.rows[0].cells).toEqual(["x"]);
    expect(getCell(table.rows[0], "A")).toBe("x");
    expect(getCell(table.rows[0], "B")).toBeUndefined();
  });

  it("keeps every cell under repeated header names", () => {
    const table = parseVariantTable("ACMG\tGene\tGene\nPathogenic\tBRCA1\tBRCA2\n");
    expect(table.rows[0].cells).toEqual(["Pathogenic", "BRCA1", "BRCA2"]);
    expect(getCell(table.rows[0], "Gene")).toBe("BRCA1");
  });

  it("keeps cells under a __proto__ header", () => {
    const table = parseVariantTable("__proto__\tACMG\nx\tBenign\n");
    expect(getCell(table.rows[0], "__proto__")).toBe("x");
    expect(getCell(table.rows[0], "ACMG")).toBe("Benign");
  });

  it("rejects rows wider than the header", () => {
    expect(() => parseVariantTable("A\n1\t2\n")).toThrow("Line 2 has 2 cells but the header has 1");
    try {
      parseVariantTable("A\n1\t2\n");
    } catch (error) {
      expect(error).toBeInstanceOf(TabularFormatError);
      if (error instanceof TabularFormatError) {
        expect(error.code).toBe("ROW_TOO_WIDE");
      }
    }
  });

  it("rejects input without a header", () => {
    expect(() => parseVariantTable("")).toThrow(TabularFormatError);
    expect(() => parseVariantTable("\n\n")).toThrow("Input has no header line");
  });
});

describe("getCell", () => {
  it("does not read inherited properties", () => {
    const row = createVariantRow({ A: "1" });
    expect(getCell(row, "constructor")).toBeUndefined();
    expect(getCell(row, "A")).toBe("1");
  });
});

describe("createVariantTable", () => {
  it("lays records out along the columns", () => {
    const table = createVariantTable(["A", "B", "C"], [{ C: "3", A: "1" }, { B: "2" }]);
    expect(table.rows.map(row => row.cells)).toEqual([
      ["1", "", "3"],
      ["", "2", ""],
    ]);
    expect(table.rows[0].index).toBe(table.rows[1].index);
  });
});

describe("serializeVariantTable", () => {
  it("writes the header then rows in order", () => {
    const text = serializeVariantTable(
      createVariantTable(["A", "B"], [{ A: "3", B: "4" }, { A: "1", B: "2" }])
    );
    expect(text).toBe("A\tB\n3\t4\n1\t2\n");
  });

  it("writes missing cells as empty strings", () => {
    expect(serializeVariantTable(parseVariantTable("A\tB\tC\nx\n"))).toBe("A\tB\tC\nx\t\t\n");
  });

  it("writes rows with repeated or __proto__ headers back unchanged", () => {
    const duplicated = "ACMG\tGene\tGene\nPathogenic\tBRCA1\tBRCA2\n";
    expect(serializeVariantTable(parseVariantTable(duplicated))).toBe(duplicated);

    const proto = "__proto__\tACMG\nx\tBenign\n";
    expect(serializeVariantTable(parseVariantTable(proto))).toBe(proto);
  });

  it("writes a header-only table", () => {
    expect(serializeVariantTable({ columns: ["A"], rows: [] })).toBe("A\n");
  });
});

describe("file round trip", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "variant-tabular-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads and writes tables through the filesystem", async () => {
    const inputPath = path.join(dir, "in.tsv");
    const outputPath = path.join(dir, "out.tsv");
    await writeFile(inputPath, "#Chr\tStart\n1\t100\n2\t200\n", "utf8");

    const table = await readVariantTable(inputPath);
    await writeVariantTable(outputPath, { ...table, rows: [...table.rows].reverse() });

    expect(await readFile(outputPath, "utf8")).toBe("#Chr\tStart\n2\t200\n1\t100\n");
  });
});

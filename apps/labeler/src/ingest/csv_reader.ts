import fs from "node:fs";
import Papa from "papaparse";

import { LabelerError } from "../errors";

export type CsvRow = Record<string, string>;

export type CsvTable = {
  file: string;
  headers: string[];
  rows: CsvRow[];
  lineNumbers: number[]; // 1-based file line each row starts on
};

const BOM = "\uFEFF";

function newlineCount(cells: ReadonlyArray<string>): number {
  let n = 0;
  for (const c of cells) n += c.split("\n").length - 1;
  return n;
}

function isBlankLine(cells: ReadonlyArray<string>): boolean {
  return cells.length === 1 && cells[0] === "";
}

/**
 * Parses CSV text with a header row. Cells stay strings; depth parsing
 * happens in the records so errors can name the line.
 *
 * Blank lines are skipped but still counted, as are line breaks inside
 * quoted cells. Short rows are kept (missing cells read as ""). Broken
 * quoting is fatal.
 */
export function parseCsvText(text: string, file: string): CsvTable {
  const body = text.startsWith(BOM) ? text.slice(BOM.length) : text;
  const parsed = Papa.parse<string[]>(body, {
    header: false,
    skipEmptyLines: false,
    dynamicTyping: false
  });

  const startLines: number[] = [];
  let line = 1;
  for (const cells of parsed.data) {
    startLines.push(line);
    line += 1 + newlineCount(cells);
  }

  const quoting = parsed.errors.find((e) => e.type === "Quotes");
  if (quoting) {
    const at = quoting.row === undefined ? undefined : startLines[quoting.row];
    throw new LabelerError("INPUT_INVALID", quoting.message, at === undefined ? file : `${file}:${at}`);
  }

  let headers: string[] | null = null;
  const rows: CsvRow[] = [];
  const lineNumbers: number[] = [];
  for (const [i, cells] of parsed.data.entries()) {
    if (isBlankLine(cells)) continue;
    if (headers === null) {
      headers = cells;
      continue;
    }
    const row: CsvRow = {};
    for (const [col, h] of headers.entries()) {
      const v = cells[col];
      if (v !== undefined) row[h] = v;
    }
    rows.push(row);
    lineNumbers.push(startLines[i]);
  }

  return { file, headers: headers ?? [], rows, lineNumbers };
}

export function readCsvFile(filePath: string): CsvTable {
  if (!fs.existsSync(filePath)) {
    throw new LabelerError("INPUT_MISSING", "file not found", filePath);
  }
  return parseCsvText(fs.readFileSync(filePath, "utf8"), filePath);
}

export function requireColumns(table: CsvTable, columns: Iterable<string>): void {
  const missing = [...columns].filter((c) => !table.headers.includes(c));
  if (missing.length > 0) {
    throw new LabelerError("INPUT_INVALID", `missing column(s): ${missing.map((c) => `"${c}"`).join(", ")}`, table.file);
  }
}

export function cell(row: CsvRow, column: string): string {
  return row[column] ?? "";
}

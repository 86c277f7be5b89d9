import { existsSync, readFileSync } from "node:fs";

import { IOFailureError, describeError } from "./errors.js";
import type { MetricValues, RowIdentity } from "./metric-record.js";

export const TABLE_COLUMNS = [
  "graph",
  "k",
  "runtime_seconds",
  "memory_bytes",
  "edge_cut",
  "cut_ratio"
] as const;

export const TABLE_HEADER = TABLE_COLUMNS.join(",");

export const DEFAULT_FLOAT_PRECISION = 6;

export type TableRow = RowIdentity &
  MetricValues & {
    /** Cells exactly as persisted, so untouched rows are rewritten verbatim. */
    cells: readonly string[];
  };

const needsQuoting = (value: string): boolean => /[",\r\n]/.test(value);

const quoteCell = (value: string): string =>
  needsQuoting(value) ? `"${value.replace(/"/g, '""')}"` : value;

export const formatRowCells = (
  row: RowIdentity & MetricValues,
  precision = DEFAULT_FLOAT_PRECISION
): string[] => [
  row.graph,
  String(row.k),
  row.runtimeSeconds.toFixed(precision),
  String(row.memoryBytes),
  String(row.edgeCut),
  row.cutRatio.toFixed(precision)
];

export const formatTable = (rows: ReadonlyArray<Pick<TableRow, "cells">>): string => {
  const lines = [TABLE_HEADER, ...rows.map((row) => row.cells.map(quoteCell).join(","))];
  return `${lines.join("\n")}\n`;
};

const splitRecords = (text: string): string[][] => {
  const records: string[][] = [];
  let record: string[] = [];
  let cell = "";
  let inQuotes = false;

  for (let i = 0; i < text.length; i += 1) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        cell += char;
      }
      continue;
    }
    if (char === '"' && cell.length === 0) {
      inQuotes = true;
    } else if (char === ",") {
      record.push(cell);
      cell = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") {
        i += 1;
      }
      record.push(cell);
      records.push(record);
      record = [];
      cell = "";
    } else {
      cell += char;
    }
  }

  if (inQuotes) {
    throw new Error("unterminated quoted field");
  }
  if (cell.length > 0 || record.length > 0) {
    record.push(cell);
    records.push(record);
  }
  return records;
};

const parseNumberCell = (value: string, integer: boolean): number | undefined => {
  const pattern = integer ? /^\d+$/ : /^\d+(\.\d+)?([eE][+-]?\d+)?$/;
  if (!pattern.test(value)) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

const parseRow = (cells: string[], lineNumber: number): TableRow => {
  if (cells.length !== TABLE_COLUMNS.length) {
    throw new Error(
      `row ${lineNumber} has ${cells.length} fields, expected ${TABLE_COLUMNS.length}`
    );
  }
  const [graph, kCell, runtimeCell, memoryCell, edgeCutCell, ratioCell] = cells;
  const k = parseNumberCell(kCell, true);
  const runtimeSeconds = parseNumberCell(runtimeCell, false);
  const memoryBytes = parseNumberCell(memoryCell, true);
  const edgeCut = parseNumberCell(edgeCutCell, true);
  const cutRatio = parseNumberCell(ratioCell, false);

  if (graph.length === 0) {
    throw new Error(`row ${lineNumber} has an empty graph`);
  }
  if (k === undefined || k < 1) {
    throw new Error(`row ${lineNumber} has invalid k "${kCell}"`);
  }
  if (
    runtimeSeconds === undefined ||
    memoryBytes === undefined ||
    edgeCut === undefined ||
    cutRatio === undefined ||
    cutRatio > 1
  ) {
    throw new Error(`row ${lineNumber} has invalid metric values`);
  }

  return { graph, k, runtimeSeconds, memoryBytes, edgeCut, cutRatio, cells };
};

export const parseTable = (text: string): TableRow[] => {
  const [header, ...records] = splitRecords(text);
  if (!header || header.join(",") !== TABLE_HEADER) {
    throw new Error(`unexpected header (expected ${TABLE_HEADER})`);
  }

  const rows: TableRow[] = [];
  const seen = new Set<string>();
  records.forEach((cells, index) => {
    const row = parseRow(cells, index + 2);
    const key = `${row.graph}\u0000${row.k}`;
    if (seen.has(key)) {
      throw new Error(`duplicate row for graph ${row.graph} k=${row.k}`);
    }
    seen.add(key);
    rows.push(row);
  });
  return rows;
};

/** Loads a table; a missing file is an empty table. */
export const readTable = (tablePath: string): TableRow[] => {
  if (!existsSync(tablePath)) {
    return [];
  }
  let text: string;
  try {
    text = readFileSync(tablePath, "utf8");
  } catch (error) {
    throw new IOFailureError(tablePath, `Failed to read result table (${describeError(error)})`, {
      cause: error
    });
  }
  try {
    return parseTable(text);
  } catch (error) {
    throw new IOFailureError(tablePath, `Result table is not readable (${describeError(error)})`, {
      cause: error
    });
  }
};

import { basename, dirname } from "node:path";

import { readTable, type TableRow } from "../results/table-codec.js";

export type TableReportModel = {
  table_path: string;
  table_name: string;
  row_count: number;
  graphs: string[];
  k_values: number[];
  mean_runtime_seconds: number | null;
  max_memory_bytes: number | null;
  mean_cut_ratio: number | null;
  rows: Array<Omit<TableRow, "cells">>;
};

const mean = (values: number[]): number | null =>
  values.length === 0 ? null : values.reduce((sum, value) => sum + value, 0) / values.length;

export const buildTableReport = (tablePath: string): TableReportModel => {
  const rows = readTable(tablePath);
  const graphs = Array.from(new Set(rows.map((row) => row.graph)));
  const kValues = Array.from(new Set(rows.map((row) => row.k))).sort((a, b) => a - b);

  return {
    table_path: tablePath,
    table_name: basename(tablePath, ".csv"),
    row_count: rows.length,
    graphs,
    k_values: kValues,
    mean_runtime_seconds: mean(rows.map((row) => row.runtimeSeconds)),
    max_memory_bytes: rows.reduce<number | null>(
      (max, row) => (max === null || row.memoryBytes > max ? row.memoryBytes : max),
      null
    ),
    mean_cut_ratio: mean(rows.map((row) => row.cutRatio)),
    rows: rows.map(({ cells: _cells, ...values }) => values)
  };
};

const formatOptional = (value: number | null, digits: number): string =>
  value === null ? "n/a" : value.toFixed(digits);

export const formatTableReportText = (model: TableReportModel): string => {
  const lines: string[] = [];
  lines.push(`Table: ${model.table_name}`);
  lines.push(`Location: ${dirname(model.table_path)}`);
  lines.push(`Rows: ${model.row_count} | graphs ${model.graphs.length} | k ${model.k_values.join(", ") || "none"}`);
  lines.push(
    `Mean runtime: ${formatOptional(model.mean_runtime_seconds, 3)}s | max memory ${model.max_memory_bytes ?? "n/a"} | mean cut ratio ${formatOptional(model.mean_cut_ratio, 4)}`
  );
  for (const row of model.rows) {
    lines.push(
      `  ${row.graph} k=${row.k}: ${row.runtimeSeconds.toFixed(3)}s, ${row.memoryBytes} bytes, cut ${row.edgeCut} (${row.cutRatio.toFixed(4)})`
    );
  }
  return `${lines.join("\n")}\n`;
};

export const formatTableReportJson = (model: TableReportModel): string =>
  `${JSON.stringify(model, null, 2)}\n`;

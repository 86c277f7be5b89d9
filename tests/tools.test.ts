import { writeFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { mergeRecord } from "../src/results/aggregator.js";
import { createMetricRecord } from "../src/results/metric-record.js";
import { lockPathFor } from "../src/results/table-lock.js";
import { buildTableReport, formatTableReportText } from "../src/tools/report-table.js";
import { formatVerifyReport, verifyTable } from "../src/tools/verify-table.js";
import { makeTempDir, removeDir } from "./helpers.js";

const add = (tablePath: string, graph: string, k: number, runtimeSeconds: number, cutRatio: number): void => {
  mergeRecord(
    tablePath,
    createMetricRecord(
      { graph, k, algorithm: "heistream", params: "default" },
      { runtimeSeconds, memoryBytes: k * 100, edgeCut: k, cutRatio }
    )
  );
};

describe("table tools", () => {
  let dir: string;
  let tablePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    tablePath = join(dir, "heistream_default.csv");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("summarizes a table", () => {
    add(tablePath, "g1", 8, 1, 0.5);
    add(tablePath, "g1", 4, 3, 0.25);
    add(tablePath, "g2", 4, 2, 0);

    const model = buildTableReport(tablePath);
    expect(model).toMatchObject({
      table_name: "heistream_default",
      row_count: 3,
      graphs: ["g1", "g2"],
      k_values: [4, 8],
      mean_runtime_seconds: 2,
      max_memory_bytes: 800,
      mean_cut_ratio: 0.25
    });
    expect(model.rows[0]).toEqual({
      graph: "g1",
      k: 8,
      runtimeSeconds: 1,
      memoryBytes: 800,
      edgeCut: 8,
      cutRatio: 0.5
    });

    const text = formatTableReportText(model);
    expect(text.split("\n")[0]).toBe("Table: heistream_default");
    expect(text.split("\n")[2]).toBe("Rows: 3 | graphs 2 | k 4, 8");
    expect(text.split("\n")[4]).toBe("  g1 k=8: 1.000s, 800 bytes, cut 8 (0.5000)");
  });

  it("reports an empty table without metric summaries", () => {
    writeFileSync(tablePath, "graph,k,runtime_seconds,memory_bytes,edge_cut,cut_ratio\n");
    expect(buildTableReport(tablePath)).toMatchObject({
      row_count: 0,
      mean_runtime_seconds: null,
      max_memory_bytes: null,
      mean_cut_ratio: null
    });
  });

  it("passes a well-formed table", () => {
    add(tablePath, "g1", 4, 1, 0.1);
    const report = verifyTable(tablePath);
    expect(report.ok).toBe(true);
    expect(formatVerifyReport(report)).toBe("OK heistream_default.csv: 1 rows");
  });

  it("fails a table with a broken row and flags a leftover lock", () => {
    writeFileSync(tablePath, "graph,k,runtime_seconds,memory_bytes,edge_cut,cut_ratio\ng1,4\n");
    writeFileSync(lockPathFor(tablePath), "1\n");

    const report = verifyTable(tablePath);
    expect(report.ok).toBe(false);
    expect(report.results.map((result) => result.status)).toEqual(["FAIL", "WARN"]);
    expect(report.results[0].detail).toContain("row 2 has 2 fields");
  });

  it("fails a missing table", () => {
    expect(formatVerifyReport(verifyTable(join(dir, "none.csv")))).toBe("FAIL none.csv: not found");
  });
});

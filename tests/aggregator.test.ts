import { existsSync, readFileSync, readdirSync, utimesSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { mergeRecord } from "../src/results/aggregator.js";
import { IOFailureError } from "../src/results/errors.js";
import { createMetricRecord, type MetricRecord } from "../src/results/metric-record.js";
import { TABLE_HEADER } from "../src/results/table-codec.js";
import { lockPathFor } from "../src/results/table-lock.js";
import { captureError, makeTempDir, removeDir } from "./helpers.js";

const record = (
  graph: string,
  k: number,
  values: Partial<Pick<MetricRecord, "runtimeSeconds" | "memoryBytes" | "edgeCut" | "cutRatio">> = {}
): MetricRecord =>
  createMetricRecord(
    { graph, k, algorithm: "cuttana", params: "subp=16" },
    {
      runtimeSeconds: values.runtimeSeconds ?? 12.5,
      memoryBytes: values.memoryBytes ?? 2048,
      edgeCut: values.edgeCut ?? 37,
      cutRatio: values.cutRatio ?? 0.12
    }
  );

const fastLock = { timeoutMs: 200, retryMs: 5, staleMs: 60_000 };

describe("mergeRecord", () => {
  let dir: string;
  let tablePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    tablePath = join(dir, "109", "natural", "4", "cuttana_subp=16.csv");
  });

  afterEach(() => {
    removeDir(dir);
  });

  it("creates the table and its directories on first write", () => {
    expect(mergeRecord(tablePath, record("g1", 4))).toBe("appended");
    expect(readFileSync(tablePath, "utf8")).toBe(
      `${TABLE_HEADER}\ng1,4,12.500000,2048,37,0.120000\n`
    );
    expect(existsSync(lockPathFor(tablePath))).toBe(false);
  });

  it("refuses a record whose row identity could not be read back", () => {
    mergeRecord(tablePath, record("g1", 4));
    const before = readFileSync(tablePath, "utf8");

    expect(captureError(() => mergeRecord(tablePath, record("g1", 0)))).toMatchObject({
      kind: "InvalidPathComponent",
      component: "k"
    });
    expect(captureError(() => mergeRecord(tablePath, record("", 4)))).toMatchObject({
      kind: "InvalidPathComponent",
      component: "graph"
    });
    expect(readFileSync(tablePath, "utf8")).toBe(before);
    expect(mergeRecord(tablePath, record("g1", 8))).toBe("appended");
  });

  it("leaves the table byte-identical when skipping an existing row", () => {
    mergeRecord(tablePath, record("g1", 4));
    mergeRecord(tablePath, record("g1", 8));
    const before = readFileSync(tablePath);

    expect(mergeRecord(tablePath, record("g1", 4))).toBe("skipped");
    expect(mergeRecord(tablePath, record("g1", 4, { edgeCut: 1 }))).toBe("skipped");
    expect(readFileSync(tablePath).equals(before)).toBe(true);
  });

  it("replaces only the matching row in place when overwriting", () => {
    mergeRecord(tablePath, record("g1", 4));
    mergeRecord(tablePath, record("g2", 4, { runtimeSeconds: 1 }));
    mergeRecord(tablePath, record("g3", 4, { runtimeSeconds: 2 }));

    const outcome = mergeRecord(
      tablePath,
      record("g2", 4, { runtimeSeconds: 9.75, memoryBytes: 4096, edgeCut: 50, cutRatio: 0.25 }),
      { policy: "Overwrite" }
    );

    expect(outcome).toBe("replaced");
    expect(readFileSync(tablePath, "utf8")).toBe(
      [
        TABLE_HEADER,
        "g1,4,12.500000,2048,37,0.120000",
        "g2,4,9.750000,4096,50,0.250000",
        "g3,4,2.000000,2048,37,0.120000",
        ""
      ].join("\n")
    );
  });

  it("keeps existing rows verbatim when appending with another precision", () => {
    mergeRecord(tablePath, record("g1", 4), { precision: 2 });
    mergeRecord(tablePath, record("g1", 8), { precision: 4 });
    expect(readFileSync(tablePath, "utf8")).toBe(
      `${TABLE_HEADER}\ng1,4,12.50,2048,37,0.12\ng1,8,12.5000,2048,37,0.1200\n`
    );
  });

  it("refuses to merge into a table with an unexpected schema", () => {
    mergeRecord(tablePath, record("g1", 4));
    writeFileSync(tablePath, "alg_name,graph,seed\nx,g1,0\n");

    const error = captureError(() => mergeRecord(tablePath, record("g2", 4)));
    expect(error).toBeInstanceOf(IOFailureError);
    expect(error).toMatchObject({ kind: "IOFailure", path: tablePath });
    expect(readFileSync(tablePath, "utf8")).toBe("alg_name,graph,seed\nx,g1,0\n");
  });

  it("keeps the previous complete table when the write is interrupted", () => {
    mergeRecord(tablePath, record("g1", 4));
    const before = readFileSync(tablePath, "utf8");

    const error = captureError(() =>
      mergeRecord(tablePath, record("g1", 8), {
        write: {
          rename: () => {
            throw new Error("simulated crash");
          }
        }
      })
    );

    expect(error).toBeInstanceOf(IOFailureError);
    expect(readFileSync(tablePath, "utf8")).toBe(before);
    expect(readdirSync(join(dir, "109", "natural", "4"))).toEqual(["cuttana_subp=16.csv"]);
  });

  it("times out while another writer holds the lock", () => {
    mergeRecord(tablePath, record("g1", 4));
    writeFileSync(lockPathFor(tablePath), "4242\n");

    const error = captureError(() => mergeRecord(tablePath, record("g1", 8), { lock: fastLock }));
    expect(error).toBeInstanceOf(IOFailureError);
    expect(readFileSync(tablePath, "utf8")).toBe(
      `${TABLE_HEADER}\ng1,4,12.500000,2048,37,0.120000\n`
    );
    expect(existsSync(lockPathFor(tablePath))).toBe(true);
  });

  it("takes over a stale lock", () => {
    mergeRecord(tablePath, record("g1", 4));
    const lockPath = lockPathFor(tablePath);
    writeFileSync(lockPath, "4242\n");
    const old = new Date(Date.now() - 5 * 60_000);
    utimesSync(lockPath, old, old);

    expect(mergeRecord(tablePath, record("g1", 8), { lock: fastLock })).toBe("appended");
    expect(existsSync(lockPath)).toBe(false);
  });
});

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { tableFromArrays, tableToIPC } from "apache-arrow";

import type { RunMetadata } from "../src/results/metric-record.js";

export const makeTempDir = (): string => mkdtempSync(join(tmpdir(), "partbench-"));

export const removeDir = (dir: string): void => {
  rmSync(dir, { recursive: true, force: true });
};

export const baseMetadata = (overrides: Partial<RunMetadata> = {}): RunMetadata => ({
  server: "109",
  ordering: "natural",
  coreCount: 4,
  graph: "g1",
  k: 4,
  params: [["sbuf", "32768"]],
  ...overrides
});

export type ArtifactColumns = Parameters<typeof tableFromArrays>[0];

export const writeArrowArtifact = (path: string, columns: ArtifactColumns): string => {
  writeFileSync(path, tableToIPC(tableFromArrays(columns), "file"));
  return path;
};

export const writePartitionLog = (
  path: string,
  values: { totalTime: number; maxRss: bigint; edgeCut: number; graph?: string; k?: number }
): string =>
  writeArrowArtifact(path, {
    total_time: new Float64Array([values.totalTime]),
    max_rss: new BigInt64Array([values.maxRss]),
    edge_cut: new Int32Array([values.edgeCut]),
    graph: [values.graph ?? "g1"],
    k: new Int32Array([values.k ?? 4])
  });

export const captureError = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
};

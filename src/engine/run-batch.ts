import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";

import { assertValid, validateRunBatch } from "../config/schema-validation.js";
import type { RunBatchEntry } from "../config/types.js";
import type { RawRunOutput, RunRequest } from "./ingest.js";

const toOutput = (entry: RunBatchEntry, index: number, baseDir: string): RawRunOutput => {
  const sources = [entry.artifact_path, entry.output_line, entry.output_path].filter(
    (value) => value !== undefined
  );
  if (sources.length !== 1) {
    return {
      kind: "unresolved",
      reason: `runs/${index}: exactly one of artifact_path, output_line, output_path is required`
    };
  }
  if (entry.artifact_path !== undefined) {
    return { kind: "artifact", path: resolve(baseDir, entry.artifact_path) };
  }
  if (entry.output_path !== undefined) {
    return { kind: "line-file", path: resolve(baseDir, entry.output_path) };
  }
  return { kind: "line", line: entry.output_line ?? "" };
};

export const toRunRequest = (
  entry: RunBatchEntry,
  index: number,
  options: { baseDir: string; defaultServer: string }
): RunRequest => ({
  algorithm: entry.algorithm,
  metadata: {
    server: entry.server ?? options.defaultServer,
    ordering: entry.ordering,
    coreCount: entry.core_count,
    graph: entry.graph,
    k: entry.k,
    params: entry.params,
    graphEdgeCount: entry.graph_edge_count
  },
  output: toOutput(entry, index, options.baseDir)
});

/**
 * Reads a run batch written by the experiment driver. Relative output paths
 * are resolved against the batch file's directory. An entry without exactly
 * one output source is kept and fails when it is ingested.
 */
export const loadRunBatch = (batchPath: string, defaultServer: string): RunRequest[] => {
  const raw = readFileSync(batchPath, "utf8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Run batch is not valid JSON (${batchPath}): ${message}`);
  }
  const batch = assertValid("run batch", validateRunBatch, parsed);
  const baseDir = dirname(resolve(batchPath));
  return batch.runs.map((entry, index) => toRunRequest(entry, index, { baseDir, defaultServer }));
};

import type { MergePolicy } from "../results/aggregator.js";
import type { ParamValue } from "../results/metric-record.js";

/** Contents of partbench.config.json; every field is optional. */
export interface PartbenchConfigFile {
  results_root?: string;
  server?: string;
  policy?: MergePolicy;
  precision?: number;
  log_path?: string;
  lock?: {
    timeout_ms?: number;
    retry_ms?: number;
    stale_ms?: number;
  };
}

export interface RunBatchEntry {
  algorithm: string;
  server?: string;
  ordering: string;
  core_count: number;
  graph: string;
  k: number;
  params: Array<[string, ParamValue]>;
  graph_edge_count?: number;
  artifact_path?: string;
  output_line?: string;
  output_path?: string;
}

export interface RunBatchFile {
  runs: RunBatchEntry[];
}

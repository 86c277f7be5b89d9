import type { AlgorithmFamily, OutputFormat } from "../results/format.js";
import type { MergeOutcome } from "../results/aggregator.js";
import type { PartbenchErrorKind } from "../results/errors.js";

export type RunRef = {
  algorithm: string;
  graph: string;
  k: number;
};

export type RunIngestedPayload = RunRef & {
  family: AlgorithmFamily;
  format: OutputFormat;
  table_path: string;
  outcome: Exclude<MergeOutcome, "skipped">;
};

export type RunSkippedPayload = RunRef & {
  table_path: string;
};

export type RunFailedPayload = RunRef & {
  error: string;
  error_kind?: PartbenchErrorKind;
};

export type WarningRaisedPayload = {
  message: string;
  source?: string;
  recorded_at: string;
};

export type BatchCompletedPayload = {
  total: number;
  appended: number;
  replaced: number;
  skipped: number;
  failed: number;
  elapsed_ms: number;
};

export type Event =
  | { type: "run.ingested"; payload: RunIngestedPayload }
  | { type: "run.skipped"; payload: RunSkippedPayload }
  | { type: "run.failed"; payload: RunFailedPayload }
  | { type: "warning.raised"; payload: WarningRaisedPayload }
  | { type: "batch.completed"; payload: BatchCompletedPayload };

export type EventType = Event["type"];

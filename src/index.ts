export { classifyFamily, classifyFormat } from "./results/format.js";
export type { AlgorithmFamily, OutputFormat } from "./results/format.js";
export { parseFbsArtifact, readArtifactDetails } from "./results/fbs-artifact.js";
export type { ArtifactDetails, ParseFbsArtifactOptions } from "./results/fbs-artifact.js";
export { parseLineOutput, readLineOutputFile } from "./results/line-output.js";
export { assertRowIdentity, buildTableKey, buildTablePath, serializeParams, EMPTY_PARAMS_LABEL } from "./results/table-key.js";
export type { TableKey, TableKeyInput, TablePathInput } from "./results/table-key.js";
export { mergeRecord } from "./results/aggregator.js";
export type { MergeOptions, MergeOutcome, MergePolicy } from "./results/aggregator.js";
export {
  DEFAULT_FLOAT_PRECISION,
  TABLE_COLUMNS,
  TABLE_HEADER,
  formatTable,
  parseTable,
  readTable
} from "./results/table-codec.js";
export type { TableRow } from "./results/table-codec.js";
export { withTableLock } from "./results/table-lock.js";
export type { TableLockOptions } from "./results/table-lock.js";
export { createMetricRecord } from "./results/metric-record.js";
export type { MetricRecord, ParamSet, ParamValue, RowIdentity, RunMetadata } from "./results/metric-record.js";
export * from "./results/errors.js";
export { ingestBatch, ingestRun, RunIngestError } from "./engine/ingest.js";
export type { BatchSummary, IngestContext, IngestResult, RawRunOutput, RunRequest } from "./engine/ingest.js";
export { loadRunBatch } from "./engine/run-batch.js";
export { resolveHarvestConfig } from "./config/resolve-config.js";
export type { HarvestConfig } from "./config/resolve-config.js";
export { EventBus } from "./events/event-bus.js";
export { ExecutionLogger } from "./ui/execution-log.js";

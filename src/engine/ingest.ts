import type { EventBus } from "../events/event-bus.js";
import type { HarvestConfig } from "../config/resolve-config.js";
import { mergeRecord, type MergeOutcome, type MergePolicy } from "../results/aggregator.js";
import {
  MalformedArtifactError,
  MalformedLineError,
  PartbenchError,
  describeError,
  type PartbenchErrorKind
} from "../results/errors.js";
import { parseFbsArtifact } from "../results/fbs-artifact.js";
import { classifyFamily, classifyFormat, type AlgorithmFamily, type OutputFormat } from "../results/format.js";
import { parseLineOutput, readLineOutputFile } from "../results/line-output.js";
import type { MetricRecord, RunMetadata } from "../results/metric-record.js";
import { buildTableKey } from "../results/table-key.js";
import type { WarningSink } from "../utils/warnings.js";

export type RawRunOutput =
  | { kind: "artifact"; path: string }
  | { kind: "line"; line: string }
  | { kind: "line-file"; path: string }
  /** A batch entry whose output source could not be determined. */
  | { kind: "unresolved"; reason: string };

export interface RunRequest {
  algorithm: string;
  metadata: RunMetadata;
  output: RawRunOutput;
}

export interface IngestContext {
  config: Pick<HarvestConfig, "resultsRoot" | "policy" | "precision" | "lock">;
  /** Overrides `config.policy` for this call. */
  policy?: MergePolicy;
  bus?: EventBus;
  warnings?: WarningSink;
}

export interface IngestResult {
  outcome: MergeOutcome;
  tablePath: string;
  family: AlgorithmFamily;
  format: OutputFormat;
  record: MetricRecord;
}

/** A failure of one run, carrying enough context to log it and move on. */
export class RunIngestError extends Error {
  readonly algorithm: string;
  readonly graph: string;
  readonly k: number;
  readonly kind?: PartbenchErrorKind;

  constructor(request: RunRequest, cause: unknown) {
    super(
      `${request.algorithm} ${request.metadata.graph} k=${request.metadata.k}: ${describeError(cause)}`,
      { cause }
    );
    this.name = "RunIngestError";
    this.algorithm = request.algorithm;
    this.graph = request.metadata.graph;
    this.k = request.metadata.k;
    this.kind = cause instanceof PartbenchError ? cause.kind : undefined;
  }
}

const parseRecord = (
  request: RunRequest,
  format: OutputFormat,
  warnings: WarningSink | undefined
): MetricRecord => {
  const { algorithm, metadata, output } = request;
  if (output.kind === "unresolved") {
    throw format === "FbsBased"
      ? new MalformedArtifactError("(none)", output.reason)
      : new MalformedLineError("", output.reason);
  }
  if (format === "FbsBased") {
    if (output.kind !== "artifact") {
      throw new MalformedArtifactError(
        "(none)",
        `${algorithm} writes a result artifact, but the run supplied an output line`
      );
    }
    return parseFbsArtifact(output.path, metadata, algorithm, {
      onWarning: warnings ? (message) => warnings.warn(message, "artifact") : undefined
    });
  }

  if (output.kind === "artifact") {
    throw new MalformedLineError(
      "",
      `${algorithm} prints a result line, but the run supplied an artifact (${output.path})`
    );
  }
  const line = output.kind === "line" ? output.line : readLineOutputFile(output.path);
  return parseLineOutput(line, metadata, algorithm);
};

const runIngest = (request: RunRequest, context: IngestContext): IngestResult => {
  const format = classifyFormat(request.algorithm);
  const family = classifyFamily(request.algorithm);
  const record = parseRecord(request, format, context.warnings);

  const { metadata } = request;
  const { tablePath } = buildTableKey(context.config.resultsRoot, {
    server: metadata.server,
    ordering: metadata.ordering,
    coreCount: metadata.coreCount,
    algorithm: request.algorithm,
    params: metadata.params,
    graph: metadata.graph,
    k: metadata.k
  });

  const outcome = mergeRecord(tablePath, record, {
    policy: context.policy ?? context.config.policy,
    precision: context.config.precision,
    lock: context.config.lock
  });

  return { outcome, tablePath, family, format, record };
};

const emitResult = (bus: EventBus, request: RunRequest, result: IngestResult): void => {
  const ref = { algorithm: request.algorithm, graph: request.metadata.graph, k: request.metadata.k };
  if (result.outcome === "skipped") {
    bus.emit({ type: "run.skipped", payload: { ...ref, table_path: result.tablePath } });
    return;
  }
  bus.emit({
    type: "run.ingested",
    payload: {
      ...ref,
      family: result.family,
      format: result.format,
      table_path: result.tablePath,
      outcome: result.outcome
    }
  });
};

/**
 * Classifies, parses and merges one run. Any failure is rethrown as a
 * `RunIngestError` naming the run.
 */
export const ingestRun = (request: RunRequest, context: IngestContext): IngestResult => {
  let result: IngestResult;
  try {
    result = runIngest(request, context);
  } catch (error) {
    const wrapped = new RunIngestError(request, error);
    context.bus?.emit({
      type: "run.failed",
      payload: {
        algorithm: wrapped.algorithm,
        graph: wrapped.graph,
        k: wrapped.k,
        error: describeError(error),
        error_kind: wrapped.kind
      }
    });
    throw wrapped;
  }
  if (context.bus) {
    emitResult(context.bus, request, result);
  }
  return result;
};

export type BatchEntryResult =
  | { request: RunRequest; ok: true; result: IngestResult }
  | { request: RunRequest; ok: false; error: RunIngestError };

export interface BatchSummary {
  entries: BatchEntryResult[];
  counts: Record<MergeOutcome | "failed", number>;
  elapsedMs: number;
}

/** Ingests runs in order; a failing run is recorded and the batch continues. */
export const ingestBatch = (
  requests: readonly RunRequest[],
  context: IngestContext,
  now: () => number = Date.now
): BatchSummary => {
  const startedAt = now();
  const counts: BatchSummary["counts"] = { appended: 0, replaced: 0, skipped: 0, failed: 0 };
  const entries: BatchEntryResult[] = [];

  for (const request of requests) {
    try {
      const result = ingestRun(request, context);
      counts[result.outcome] += 1;
      entries.push({ request, ok: true, result });
    } catch (error) {
      if (!(error instanceof RunIngestError)) {
        throw error;
      }
      counts.failed += 1;
      entries.push({ request, ok: false, error });
    }
  }

  const elapsedMs = now() - startedAt;
  context.bus?.emit({
    type: "batch.completed",
    payload: {
      total: requests.length,
      appended: counts.appended,
      replaced: counts.replaced,
      skipped: counts.skipped,
      failed: counts.failed,
      elapsed_ms: elapsedMs
    }
  });

  return { entries, counts, elapsedMs };
};

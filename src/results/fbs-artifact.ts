import { readFileSync } from "node:fs";

import { tableFromIPC, type Table } from "apache-arrow";

import { MalformedArtifactError, MissingGraphMetadataError, describeError } from "./errors.js";
import { createMetricRecord, type MetricRecord, type RunMetadata } from "./metric-record.js";
import { serializeParams } from "./table-key.js";

export type ArtifactColumn = "total_time" | "max_rss" | "edge_cut" | "graph" | "k";

/** Values carried by a partition log besides the metrics. */
export interface ArtifactDetails {
  graph?: string;
  k?: number;
}

export type ArtifactWarning = (message: string) => void;

export interface ParseFbsArtifactOptions {
  onWarning?: ArtifactWarning;
}

const loadTable = (artifactPath: string): Table => {
  let bytes: Buffer;
  try {
    bytes = readFileSync(artifactPath);
  } catch (error) {
    throw new MalformedArtifactError(artifactPath, `cannot read file (${describeError(error)})`, {
      cause: error
    });
  }
  try {
    return tableFromIPC(bytes);
  } catch (error) {
    throw new MalformedArtifactError(artifactPath, `cannot decode (${describeError(error)})`, {
      cause: error
    });
  }
};

const readCell = (table: Table, column: ArtifactColumn): unknown => {
  const vector = table.getChild(column);
  if (!vector) {
    return undefined;
  }
  const value: unknown = vector.get(0);
  return value;
};

const toNumber = (value: unknown): number | undefined => {
  if (typeof value === "bigint") {
    return value <= BigInt(Number.MAX_SAFE_INTEGER) && value >= BigInt(Number.MIN_SAFE_INTEGER)
      ? Number(value)
      : undefined;
  }
  if (typeof value === "number" && Number.isFinite(value)) {
    return value;
  }
  return undefined;
};

const requireNumber = (
  artifactPath: string,
  table: Table,
  column: ArtifactColumn,
  integer: boolean
): number => {
  const cell = readCell(table, column);
  if (cell === undefined || cell === null) {
    throw new MalformedArtifactError(artifactPath, `missing field ${column}`);
  }
  const value = toNumber(cell);
  if (value === undefined) {
    throw new MalformedArtifactError(artifactPath, `field ${column} is not numeric`);
  }
  if (value < 0) {
    throw new MalformedArtifactError(artifactPath, `field ${column} is negative`);
  }
  if (integer && !Number.isInteger(value)) {
    throw new MalformedArtifactError(artifactPath, `field ${column} is not an integer`);
  }
  return value;
};

export const readArtifactDetails = (table: Table): ArtifactDetails => {
  const graph = readCell(table, "graph");
  return {
    graph: typeof graph === "string" && graph.length > 0 ? graph : undefined,
    k: toNumber(readCell(table, "k"))
  };
};

const requireEdgeCount = (metadata: RunMetadata): number => {
  const edges = metadata.graphEdgeCount;
  if (edges === undefined) {
    throw new MissingGraphMetadataError(metadata.graph);
  }
  if (!Number.isInteger(edges) || edges <= 0) {
    throw new MissingGraphMetadataError(
      metadata.graph,
      `graph edge count must be a positive integer, got ${edges}`
    );
  }
  return edges;
};

/**
 * Reads a partition log written as an Arrow IPC file and derives the cut ratio
 * from the driver-supplied edge count.
 */
export const parseFbsArtifact = (
  artifactPath: string,
  metadata: RunMetadata,
  algorithm: string,
  options: ParseFbsArtifactOptions = {}
): MetricRecord => {
  const table = loadTable(artifactPath);
  if (table.numRows < 1) {
    throw new MalformedArtifactError(artifactPath, "no rows");
  }

  const runtimeSeconds = requireNumber(artifactPath, table, "total_time", false);
  const memoryBytes = requireNumber(artifactPath, table, "max_rss", true);
  const edgeCut = requireNumber(artifactPath, table, "edge_cut", true);

  const edgeCount = requireEdgeCount(metadata);
  if (edgeCut > edgeCount) {
    throw new MalformedArtifactError(
      artifactPath,
      `edge cut ${edgeCut} exceeds graph edge count ${edgeCount}`
    );
  }

  const details = readArtifactDetails(table);
  if (options.onWarning) {
    if (details.k !== undefined && details.k !== metadata.k) {
      options.onWarning(`${artifactPath} reports k=${details.k}, run metadata says k=${metadata.k}`);
    }
    if (details.graph !== undefined && details.graph !== metadata.graph) {
      options.onWarning(
        `${artifactPath} reports graph ${details.graph}, run metadata says ${metadata.graph}`
      );
    }
  }

  return createMetricRecord(
    {
      graph: metadata.graph,
      k: metadata.k,
      algorithm,
      params: serializeParams(metadata.params)
    },
    { runtimeSeconds, memoryBytes, edgeCut, cutRatio: edgeCut / edgeCount }
  );
};

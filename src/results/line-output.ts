import { readFileSync } from "node:fs";

import { MalformedLineError, describeError } from "./errors.js";
import { createMetricRecord, type MetricRecord, type RunMetadata } from "./metric-record.js";
import { serializeParams } from "./table-key.js";

const FLOAT_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const INTEGER_PATTERN = /^[+-]?\d+$/;

// runtime memory edge_cut edge_cut_ratio
const FIELD_NAMES = ["runtime", "memory", "edge cut", "edge-cut ratio"] as const;

const parseFloatField = (line: string, name: string, raw: string): number => {
  if (!FLOAT_PATTERN.test(raw)) {
    throw new MalformedLineError(line, `${name} "${raw}" is not a number`);
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new MalformedLineError(line, `${name} must be a finite non-negative number`);
  }
  return value;
};

const parseIntegerField = (line: string, name: string, raw: string): number => {
  if (!INTEGER_PATTERN.test(raw)) {
    throw new MalformedLineError(line, `${name} "${raw}" is not an integer`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new MalformedLineError(line, `${name} must be a non-negative integer`);
  }
  return value;
};

/**
 * Parses the single result line printed by line-based partitioners.
 * The reported ratio is kept as-is; it is never recomputed from the edge cut.
 */
export const parseLineOutput = (
  rawLine: string,
  metadata: RunMetadata,
  algorithm: string
): MetricRecord => {
  const line = rawLine.trim();
  const fields = line.length > 0 ? line.split(/\s+/) : [];
  if (fields.length !== FIELD_NAMES.length) {
    throw new MalformedLineError(
      line,
      `expected ${FIELD_NAMES.length} fields, got ${fields.length}`
    );
  }

  const [runtimeRaw, memoryRaw, edgeCutRaw, ratioRaw] = fields;
  const runtimeSeconds = parseFloatField(line, FIELD_NAMES[0], runtimeRaw);
  const memoryBytes = parseIntegerField(line, FIELD_NAMES[1], memoryRaw);
  const edgeCut = parseIntegerField(line, FIELD_NAMES[2], edgeCutRaw);
  const cutRatio = parseFloatField(line, FIELD_NAMES[3], ratioRaw);
  if (cutRatio > 1) {
    throw new MalformedLineError(line, `${FIELD_NAMES[3]} ${cutRatio} is outside [0, 1]`);
  }

  return createMetricRecord(
    {
      graph: metadata.graph,
      k: metadata.k,
      algorithm,
      params: serializeParams(metadata.params)
    },
    { runtimeSeconds, memoryBytes, edgeCut, cutRatio }
  );
};

/** Returns the first non-empty line of a captured stdout file. */
export const readLineOutputFile = (path: string): string => {
  let raw: string;
  try {
    raw = readFileSync(path, "utf8");
  } catch (error) {
    throw new MalformedLineError("", `cannot read ${path}: ${describeError(error)}`);
  }
  const line = raw.split(/\r?\n/).find((candidate) => candidate.trim().length > 0);
  if (line === undefined) {
    throw new MalformedLineError("", `${path} is empty`);
  }
  return line;
};

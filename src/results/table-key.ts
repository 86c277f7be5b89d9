import { join } from "node:path";

import { InvalidPathComponentError } from "./errors.js";
import type { ParamSet, ParamValue, RowIdentity } from "./metric-record.js";

export const EMPTY_PARAMS_LABEL = "default";

export interface TableKeyInput {
  server: string;
  ordering: string;
  coreCount: number;
  algorithm: string;
  params: ParamSet;
  graph: string;
  k: number;
}

export interface TableKey {
  tablePath: string;
  rowIdentity: RowIdentity;
  /** Serialized parameter signature, also used as the record's `params`. */
  params: string;
}

const isPairList = (
  params: ParamSet
): params is ReadonlyArray<readonly [string, ParamValue]> => Array.isArray(params);

const isParamMap = (params: ParamSet): params is ReadonlyMap<string, ParamValue> =>
  params instanceof Map;

// Plain objects enumerate array-index keys first, whatever order they were written in.
const isIndexLikeKey = (key: string): boolean => /^(0|[1-9]\d*)$/.test(key);

const toEntries = (params: ParamSet): Array<[string, ParamValue]> => {
  if (isPairList(params)) {
    return params.map(([key, value]): [string, ParamValue] => [key, value]);
  }
  if (isParamMap(params)) {
    return Array.from(params.entries());
  }
  const entries = Object.entries(params);
  const indexKey = entries.find(([key]) => isIndexLikeKey(key));
  if (indexKey) {
    throw new InvalidPathComponentError(
      "params",
      indexKey[0],
      "numeric parameter names lose their order in a plain object; pass pairs or a Map"
    );
  }
  return entries;
};

const formatParamValue = (value: ParamValue): string =>
  typeof value === "string" ? value : String(value);

// "_" separates parameters and the first "=" separates a name from its value.
const assertParamEntry = (key: string, value: string): void => {
  if (key.length === 0) {
    throw new InvalidPathComponentError("params", key, "parameter name must not be empty");
  }
  if (key.includes("_") || key.includes("=")) {
    throw new InvalidPathComponentError("params", key, 'parameter name must not contain "_" or "="');
  }
  if (value.includes("_")) {
    throw new InvalidPathComponentError("params", `${key}=${value}`, 'parameter value must not contain "_"');
  }
};

export const serializeParams = (params: ParamSet): string => {
  const parts = toEntries(params).map(([key, value]) => {
    const text = formatParamValue(value);
    assertParamEntry(key, text);
    return text === "" ? key : `${key}=${text}`;
  });
  return parts.length > 0 ? parts.join("_") : EMPTY_PARAMS_LABEL;
};

/** Graph and k identify a row: graph non-empty, k a positive integer. */
export const assertRowIdentity = (identity: RowIdentity): void => {
  if (identity.graph.length === 0) {
    throw new InvalidPathComponentError("graph", identity.graph, "must not be empty");
  }
  if (!Number.isSafeInteger(identity.k) || identity.k < 1) {
    throw new InvalidPathComponentError("k", String(identity.k), "must be a positive integer");
  }
};

const assertPathComponent = (component: string, value: string): void => {
  if (value.length === 0) {
    throw new InvalidPathComponentError(component, value, "must not be empty");
  }
  if (value.includes("/") || value.includes("\\")) {
    throw new InvalidPathComponentError(component, value, "must not contain a path separator");
  }
  if (value === "." || value === "..") {
    throw new InvalidPathComponentError(component, value, "must not be a relative directory");
  }
};

export type TablePathInput = Omit<TableKeyInput, "graph" | "k">;

/** Derives the table file for a configuration, independent of any row. */
export const buildTablePath = (
  resultsRoot: string,
  input: TablePathInput
): Omit<TableKey, "rowIdentity"> => {
  if (!Number.isInteger(input.coreCount) || input.coreCount < 1) {
    throw new InvalidPathComponentError(
      "core_count",
      String(input.coreCount),
      "must be a positive integer"
    );
  }
  const coreCount = String(input.coreCount);
  const params = serializeParams(input.params);

  assertPathComponent("server", input.server);
  assertPathComponent("ordering", input.ordering);
  assertPathComponent("core_count", coreCount);
  assertPathComponent("algorithm", input.algorithm);
  assertPathComponent("params", params);

  return {
    tablePath: join(
      resultsRoot,
      input.server,
      input.ordering,
      coreCount,
      `${input.algorithm}_${params}.csv`
    ),
    params
  };
};

export const buildTableKey = (resultsRoot: string, input: TableKeyInput): TableKey => {
  const { tablePath, params } = buildTablePath(resultsRoot, input);
  const rowIdentity = { graph: input.graph, k: input.k };
  assertRowIdentity(rowIdentity);
  return { tablePath, rowIdentity, params };
};

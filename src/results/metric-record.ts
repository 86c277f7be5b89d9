export type ParamValue = string | number | boolean;

/**
 * Ordered parameter collection as it appears in the experiment configuration.
 * Pair arrays, maps and plain objects with the same insertion order are equivalent.
 */
export type ParamSet =
  | ReadonlyArray<readonly [string, ParamValue]>
  | ReadonlyMap<string, ParamValue>
  | Readonly<Record<string, ParamValue>>;

export interface RunMetadata {
  server: string;
  ordering: string;
  coreCount: number;
  graph: string;
  k: number;
  params: ParamSet;
  /** Edge count of the input graph; only the artifact path needs it. */
  graphEdgeCount?: number;
}

export interface MetricRecord {
  readonly graph: string;
  readonly k: number;
  readonly algorithm: string;
  readonly params: string;
  readonly runtimeSeconds: number;
  readonly memoryBytes: number;
  readonly edgeCut: number;
  readonly cutRatio: number;
}

export type RowIdentity = {
  graph: string;
  k: number;
};

export type MetricValues = Pick<
  MetricRecord,
  "runtimeSeconds" | "memoryBytes" | "edgeCut" | "cutRatio"
>;

export const createMetricRecord = (
  identity: Pick<MetricRecord, "graph" | "k" | "algorithm" | "params">,
  values: MetricValues
): MetricRecord =>
  Object.freeze({
    graph: identity.graph,
    k: identity.k,
    algorithm: identity.algorithm,
    params: identity.params,
    runtimeSeconds: values.runtimeSeconds,
    memoryBytes: values.memoryBytes,
    edgeCut: values.edgeCut,
    cutRatio: values.cutRatio
  });

export const rowIdentityOf = (record: Pick<MetricRecord, "graph" | "k">): RowIdentity => ({
  graph: record.graph,
  k: record.k
});

export const sameRowIdentity = (a: RowIdentity, b: RowIdentity): boolean =>
  a.graph === b.graph && a.k === b.k;

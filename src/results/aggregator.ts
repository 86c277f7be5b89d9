import { IOFailureError, describeError, isPartbenchError } from "./errors.js";
import { rowIdentityOf, sameRowIdentity, type MetricRecord } from "./metric-record.js";
import { DEFAULT_FLOAT_PRECISION, formatRowCells, formatTable, readTable, type TableRow } from "./table-codec.js";
import { assertRowIdentity } from "./table-key.js";
import { withTableLock, type TableLockOptions } from "./table-lock.js";
import { ensureParentDir, writeTextAtomic, type AtomicWriteHooks } from "../artifacts/io.js";

export type MergePolicy = "SkipExisting" | "Overwrite";

export type MergeOutcome = "appended" | "replaced" | "skipped";

export interface MergeOptions {
  policy?: MergePolicy;
  /** Decimal places for runtime_seconds and cut_ratio. */
  precision?: number;
  lock?: TableLockOptions;
  write?: AtomicWriteHooks;
}

const toTableRow = (record: MetricRecord, precision: number): TableRow => ({
  graph: record.graph,
  k: record.k,
  runtimeSeconds: record.runtimeSeconds,
  memoryBytes: record.memoryBytes,
  edgeCut: record.edgeCut,
  cutRatio: record.cutRatio,
  cells: formatRowCells(record, precision)
});

const wrapIO = <T>(tablePath: string, action: string, task: () => T): T => {
  try {
    return task();
  } catch (error) {
    if (isPartbenchError(error)) {
      throw error;
    }
    throw new IOFailureError(tablePath, `${action} (${describeError(error)})`, { cause: error });
  }
};

/**
 * Merges one record into the table at `tablePath` under an exclusive lock.
 * A skipped merge leaves the file untouched.
 */
export const mergeRecord = (
  tablePath: string,
  record: MetricRecord,
  options: MergeOptions = {}
): MergeOutcome => {
  const policy = options.policy ?? "SkipExisting";
  const precision = options.precision ?? DEFAULT_FLOAT_PRECISION;

  assertRowIdentity(rowIdentityOf(record));
  wrapIO(tablePath, "Failed to create table directory", () => ensureParentDir(tablePath));

  return withTableLock(
    tablePath,
    () => {
      const rows = readTable(tablePath);
      const identity = rowIdentityOf(record);
      const index = rows.findIndex((row) => sameRowIdentity(row, identity));

      let outcome: MergeOutcome;
      if (index < 0) {
        rows.push(toTableRow(record, precision));
        outcome = "appended";
      } else if (policy === "Overwrite") {
        rows[index] = toTableRow(record, precision);
        outcome = "replaced";
      } else {
        return "skipped";
      }

      wrapIO(tablePath, "Failed to write result table", () =>
        writeTextAtomic(tablePath, formatTable(rows), options.write)
      );
      return outcome;
    },
    options.lock
  );
};

import { existsSync, readdirSync } from "node:fs";
import { basename, dirname } from "node:path";

import { lockPathFor } from "../results/table-lock.js";
import { readTable } from "../results/table-codec.js";
import { describeError } from "../results/errors.js";

export type VerifyStatus = "OK" | "WARN" | "FAIL";

export type VerifyResult = {
  status: VerifyStatus;
  label: string;
  detail?: string;
};

export type VerifyReport = {
  results: VerifyResult[];
  ok: boolean;
};

const addResult = (
  results: VerifyResult[],
  status: VerifyStatus,
  label: string,
  detail?: string
): void => {
  results.push({ status, label, detail });
};

const leftoverTempFiles = (tablePath: string): string[] => {
  const prefix = `.${basename(tablePath)}.`;
  return readdirSync(dirname(tablePath)).filter(
    (name) => name.startsWith(prefix) && name.endsWith(".tmp")
  );
};

export const verifyTable = (tablePath: string): VerifyReport => {
  const results: VerifyResult[] = [];

  if (!existsSync(tablePath)) {
    addResult(results, "FAIL", basename(tablePath), "not found");
    return { results, ok: false };
  }

  try {
    const rows = readTable(tablePath);
    addResult(results, "OK", basename(tablePath), `${rows.length} rows`);
  } catch (error) {
    addResult(results, "FAIL", basename(tablePath), describeError(error));
  }

  if (existsSync(lockPathFor(tablePath))) {
    addResult(results, "WARN", "lock", "lock file present (writer active or crashed)");
  }
  const temps = leftoverTempFiles(tablePath);
  if (temps.length > 0) {
    addResult(results, "WARN", "temp files", temps.join(", "));
  }

  const ok = !results.some((result) => result.status === "FAIL");
  return { results, ok };
};

export const formatVerifyReport = (report: VerifyReport): string =>
  report.results
    .map((result) => {
      const detail = result.detail ? `: ${result.detail}` : "";
      return `${result.status} ${result.label}${detail}`;
    })
    .join("\n");

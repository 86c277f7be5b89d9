#!/usr/bin/env node
import "dotenv/config";

import { resolve } from "node:path";

import { resolveHarvestConfig, type HarvestConfig } from "../config/resolve-config.js";
import { writeJsonAtomic } from "../artifacts/io.js";
import { EventBus } from "../events/event-bus.js";
import { ingestBatch, ingestRun, type RawRunOutput, type RunRequest } from "../engine/ingest.js";
import { loadRunBatch } from "../engine/run-batch.js";
import type { MergePolicy } from "../results/aggregator.js";
import { classifyFamily, classifyFormat } from "../results/format.js";
import type { ParamValue } from "../results/metric-record.js";
import { buildTablePath } from "../results/table-key.js";
import { buildTableReport, formatTableReportJson, formatTableReportText } from "../tools/report-table.js";
import { formatVerifyReport, verifyTable } from "../tools/verify-table.js";
import { ExecutionLogger } from "../ui/execution-log.js";
import { createConsoleWarningSink, createEventWarningSink } from "../utils/warnings.js";

const printUsage = (): void => {
  console.log("Usage:");
  console.log(
    "  partbench ingest --algorithm <id> --ordering <name> --cores N --graph <name> --k N [--params k=v,...] (--artifact <path> [--edges N] | --line <text> | --output-file <path>) [--server <name>] [--overwrite]"
  );
  console.log("  partbench ingest-batch <runs.json> [--overwrite] [--summary <path>]");
  console.log("  partbench key --algorithm <id> --ordering <name> --cores N [--params k=v,...] [--server <name>]");
  console.log("  partbench report <table.csv> [--format text|json]");
  console.log("  partbench verify <table.csv>");
  console.log("  partbench validate [config.json]");
  console.log("Common flags: --config <path> --log <path>");
};

type ParsedArgs = {
  positional: string[];
  flags: Record<string, string | boolean>;
};

const parseArgs = (args: string[]): ParsedArgs => {
  const positional: string[] = [];
  const flags: Record<string, string | boolean> = {};
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const next = args[i + 1];
      if (next !== undefined && !next.startsWith("--")) {
        flags[arg] = next;
        i += 1;
      } else {
        flags[arg] = true;
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
};

const getFlag = (flags: ParsedArgs["flags"], name: string): string | undefined => {
  const value = flags[name];
  return typeof value === "string" ? value : undefined;
};

const hasFlag = (flags: ParsedArgs["flags"], name: string): boolean => Boolean(flags[name]);

const requireFlag = (flags: ParsedArgs["flags"], name: string): string => {
  const value = getFlag(flags, name);
  if (value === undefined) {
    throw new Error(`Missing required flag ${name}`);
  }
  return value;
};

const requireIntegerFlag = (flags: ParsedArgs["flags"], name: string): number => {
  const raw = requireFlag(flags, name);
  const parsed = Number(raw);
  if (!Number.isInteger(parsed)) {
    throw new Error(`${name} expects an integer, got "${raw}"`);
  }
  return parsed;
};

// "a=1,b,c=x" keeps its order; a bare name is a flag-style parameter.
const parseParamsFlag = (value: string | undefined): Array<[string, ParamValue]> => {
  if (!value) {
    return [];
  }
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part): [string, ParamValue] => {
      const eq = part.indexOf("=");
      return eq < 0 ? [part, ""] : [part.slice(0, eq), part.slice(eq + 1)];
    });
};

const resolvePolicy = (flags: ParsedArgs["flags"], config: HarvestConfig): MergePolicy =>
  hasFlag(flags, "--overwrite") ? "Overwrite" : config.policy;

const reportConfigWarnings = (warnings: string[]): void => {
  const sink = createConsoleWarningSink();
  warnings.forEach((warning) => sink.warn(warning, "config"));
};

const loadConfigForCli = (parsed: ParsedArgs): HarvestConfig => {
  const result = resolveHarvestConfig({ configPath: getFlag(parsed.flags, "--config") });
  reportConfigWarnings(result.warnings);
  return result.config;
};

const createBus = (
  parsed: ParsedArgs,
  config: HarvestConfig
): { bus: EventBus; logger: ExecutionLogger | null } => {
  const bus = new EventBus();
  const logPath = getFlag(parsed.flags, "--log") ?? config.logPath;
  const logger = logPath ? new ExecutionLogger(resolve(process.cwd(), logPath)) : null;
  logger?.attach(bus);
  bus.subscribe("run.failed", (payload) => {
    console.warn(`FAILED ${payload.algorithm} ${payload.graph} k=${payload.k}: ${payload.error}`);
  });
  bus.subscribe("warning.raised", (payload) => {
    console.warn(`warn: ${payload.message}`);
  });
  return { bus, logger };
};

const readOutputFlags = (flags: ParsedArgs["flags"]): RawRunOutput => {
  const artifact = getFlag(flags, "--artifact");
  const line = getFlag(flags, "--line");
  const outputFile = getFlag(flags, "--output-file");
  const given = [artifact, line, outputFile].filter((value) => value !== undefined);
  if (given.length !== 1) {
    throw new Error("Use exactly one of --artifact, --line, --output-file.");
  }
  if (artifact !== undefined) {
    return { kind: "artifact", path: resolve(process.cwd(), artifact) };
  }
  if (outputFile !== undefined) {
    return { kind: "line-file", path: resolve(process.cwd(), outputFile) };
  }
  return { kind: "line", line: line ?? "" };
};

const runIngest = (parsed: ParsedArgs): void => {
  const config = loadConfigForCli(parsed);
  const edges = getFlag(parsed.flags, "--edges");
  const request: RunRequest = {
    algorithm: requireFlag(parsed.flags, "--algorithm"),
    metadata: {
      server: getFlag(parsed.flags, "--server") ?? config.server,
      ordering: requireFlag(parsed.flags, "--ordering"),
      coreCount: requireIntegerFlag(parsed.flags, "--cores"),
      graph: requireFlag(parsed.flags, "--graph"),
      k: requireIntegerFlag(parsed.flags, "--k"),
      params: parseParamsFlag(getFlag(parsed.flags, "--params")),
      graphEdgeCount: edges === undefined ? undefined : requireIntegerFlag(parsed.flags, "--edges")
    },
    output: readOutputFlags(parsed.flags)
  };

  const { bus, logger } = createBus(parsed, config);
  try {
    const result = ingestRun(request, {
      config,
      policy: resolvePolicy(parsed.flags, config),
      bus,
      warnings: createEventWarningSink(bus)
    });
    console.log(`${result.outcome}: ${result.tablePath}`);
  } finally {
    logger?.detach();
  }
};

const runIngestBatch = (parsed: ParsedArgs): void => {
  const batchPath = parsed.positional[0];
  if (!batchPath) {
    throw new Error("Usage: partbench ingest-batch <runs.json>");
  }
  const config = loadConfigForCli(parsed);
  const requests = loadRunBatch(resolve(process.cwd(), batchPath), config.server);

  const { bus, logger } = createBus(parsed, config);
  try {
    const summary = ingestBatch(requests, {
      config,
      policy: resolvePolicy(parsed.flags, config),
      bus,
      warnings: createEventWarningSink(bus)
    });
    const { appended, replaced, skipped, failed } = summary.counts;
    console.log(
      `Ingested ${requests.length} runs: ${appended} appended, ${replaced} replaced, ${skipped} skipped, ${failed} failed (${summary.elapsedMs}ms)`
    );

    const summaryPath = getFlag(parsed.flags, "--summary");
    if (summaryPath) {
      writeJsonAtomic(resolve(process.cwd(), summaryPath), {
        counts: summary.counts,
        elapsed_ms: summary.elapsedMs,
        runs: summary.entries.map((entry) => ({
          algorithm: entry.request.algorithm,
          graph: entry.request.metadata.graph,
          k: entry.request.metadata.k,
          ...(entry.ok
            ? { outcome: entry.result.outcome, table_path: entry.result.tablePath }
            : { outcome: "failed", error: entry.error.message, error_kind: entry.error.kind })
        }))
      });
    }
    if (failed > 0) {
      process.exitCode = 1;
    }
  } finally {
    logger?.detach();
  }
};

const runKey = (parsed: ParsedArgs): void => {
  const config = loadConfigForCli(parsed);
  const algorithm = requireFlag(parsed.flags, "--algorithm");
  const key = buildTablePath(config.resultsRoot, {
    server: getFlag(parsed.flags, "--server") ?? config.server,
    ordering: requireFlag(parsed.flags, "--ordering"),
    coreCount: requireIntegerFlag(parsed.flags, "--cores"),
    algorithm,
    params: parseParamsFlag(getFlag(parsed.flags, "--params"))
  });
  console.log(key.tablePath);
  console.log(`format: ${classifyFormat(algorithm)} (family ${classifyFamily(algorithm)})`);
};

const runReport = (parsed: ParsedArgs): void => {
  const tablePath = parsed.positional[0];
  if (!tablePath) {
    throw new Error("Usage: partbench report <table.csv>");
  }
  const format = getFlag(parsed.flags, "--format") ?? "text";
  if (format !== "text" && format !== "json") {
    throw new Error("Invalid --format (expected text|json)");
  }
  const model = buildTableReport(resolve(process.cwd(), tablePath));
  process.stdout.write(format === "json" ? formatTableReportJson(model) : formatTableReportText(model));
};

const runVerify = (parsed: ParsedArgs): void => {
  const tablePath = parsed.positional[0];
  if (!tablePath) {
    throw new Error("Usage: partbench verify <table.csv>");
  }
  const report = verifyTable(resolve(process.cwd(), tablePath));
  console.log(formatVerifyReport(report));
  if (!report.ok) {
    process.exitCode = 1;
  }
};

const runValidate = (parsed: ParsedArgs): void => {
  const configPath = getFlag(parsed.flags, "--config") ?? parsed.positional[0];
  const result = resolveHarvestConfig({ configPath });
  reportConfigWarnings(result.warnings);
  console.log(`Config OK: ${result.configPath ?? "(defaults)"}`);
  console.log(`  results_root: ${result.config.resultsRoot}`);
  console.log(`  server: ${result.config.server}`);
  console.log(`  policy: ${result.config.policy} | precision ${result.config.precision}`);
};

const main = (): void => {
  const args = process.argv.slice(2);
  if (args.length === 0 || args.includes("--help") || args.includes("-h")) {
    printUsage();
    process.exit(0);
  }

  const command = args[0];
  const parsed = parseArgs(args.slice(1));

  try {
    if (command === "ingest") {
      runIngest(parsed);
      return;
    }
    if (command === "ingest-batch") {
      runIngestBatch(parsed);
      return;
    }
    if (command === "key") {
      runKey(parsed);
      return;
    }
    if (command === "report") {
      runReport(parsed);
      return;
    }
    if (command === "verify") {
      runVerify(parsed);
      return;
    }
    if (command === "validate") {
      runValidate(parsed);
      return;
    }

    printUsage();
    process.exit(1);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exit(1);
  }
};

main();

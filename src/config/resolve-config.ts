import { existsSync, readFileSync } from "node:fs";
import { homedir, hostname } from "node:os";
import { join, resolve } from "node:path";

import { assertValid, validateConfigFile } from "./schema-validation.js";
import type { PartbenchConfigFile } from "./types.js";
import type { MergePolicy } from "../results/aggregator.js";
import { DEFAULT_FLOAT_PRECISION } from "../results/table-codec.js";
import { DEFAULT_TABLE_LOCK, type TableLockOptions } from "../results/table-lock.js";

export const DEFAULT_CONFIG_PATH = "partbench.config.json";

export interface HarvestConfig {
  resultsRoot: string;
  server: string;
  policy: MergePolicy;
  precision: number;
  logPath?: string;
  lock: Readonly<Required<Omit<TableLockOptions, "now">>>;
}

export interface ResolveHarvestConfigOptions {
  /** Explicit config file; it must exist. Without it, `partbench.config.json` in rootDir is used if present. */
  configPath?: string;
  rootDir?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  hostname?: string;
}

export interface ResolveHarvestConfigResult {
  config: Readonly<HarvestConfig>;
  configPath?: string;
  warnings: string[];
}

const readJsonFile = (path: string): unknown => {
  const raw = readFileSync(path, "utf8");
  try {
    return JSON.parse(raw) as unknown;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Config is not valid JSON (${path}): ${message}`);
  }
};

const expandHome = (path: string, homeDir: string): string => {
  if (path === "~") {
    return homeDir;
  }
  if (path.startsWith("~/")) {
    return join(homeDir, path.slice(2));
  }
  return path;
};

// Benchmark hosts are told apart by the last three characters of their name.
export const defaultServerName = (host: string): string => host.slice(-3) || "local";

const locateConfigFile = (options: ResolveHarvestConfigOptions, rootDir: string): string | undefined => {
  if (options.configPath) {
    const explicit = resolve(rootDir, options.configPath);
    if (!existsSync(explicit)) {
      throw new Error(`Config not found: ${explicit}`);
    }
    return explicit;
  }
  const implicit = resolve(rootDir, DEFAULT_CONFIG_PATH);
  return existsSync(implicit) ? implicit : undefined;
};

export const resolveHarvestConfig = (
  options: ResolveHarvestConfigOptions = {}
): ResolveHarvestConfigResult => {
  const rootDir = options.rootDir ?? process.cwd();
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? homedir();
  const warnings: string[] = [];

  const configPath = locateConfigFile(options, rootDir);
  const file: PartbenchConfigFile = configPath
    ? assertValid("config", validateConfigFile, readJsonFile(configPath))
    : {};

  const envRoot = env.PARTBENCH_RESULTS_ROOT?.trim();
  const envServer = env.PARTBENCH_SERVER?.trim();
  if (envRoot && file.results_root) {
    warnings.push(`PARTBENCH_RESULTS_ROOT overrides results_root from ${configPath ?? "config"}`);
  }

  const resultsRoot = resolve(
    rootDir,
    expandHome(envRoot || file.results_root || "~/results/processed_results", homeDir)
  );
  const server = envServer || file.server || defaultServerName(options.hostname ?? hostname());

  const config: HarvestConfig = {
    resultsRoot,
    server,
    policy: file.policy ?? "SkipExisting",
    precision: file.precision ?? DEFAULT_FLOAT_PRECISION,
    logPath: file.log_path ? resolve(rootDir, expandHome(file.log_path, homeDir)) : undefined,
    lock: Object.freeze({
      timeoutMs: file.lock?.timeout_ms ?? DEFAULT_TABLE_LOCK.timeoutMs,
      retryMs: file.lock?.retry_ms ?? DEFAULT_TABLE_LOCK.retryMs,
      staleMs: file.lock?.stale_ms ?? DEFAULT_TABLE_LOCK.staleMs
    })
  };

  return { config: Object.freeze(config), configPath, warnings };
};

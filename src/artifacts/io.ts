import { mkdirSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import { randomBytes } from "node:crypto";

export interface AtomicWriteHooks {
  /** Replaces the final rename; tests use it to simulate a crash before the swap. */
  rename?: (from: string, to: string) => void;
}

const tempPathFor = (path: string): string =>
  join(dirname(path), `.${basename(path)}.${process.pid}.${randomBytes(4).toString("hex")}.tmp`);

export const ensureParentDir = (path: string): void => {
  mkdirSync(dirname(path), { recursive: true });
};

/**
 * Writes the whole file next to its target and renames it into place, so
 * readers only ever see the previous or the new complete content.
 */
export const writeTextAtomic = (path: string, text: string, hooks: AtomicWriteHooks = {}): void => {
  const tmpPath = tempPathFor(path);
  const rename = hooks.rename ?? renameSync;
  try {
    writeFileSync(tmpPath, text, "utf8");
    rename(tmpPath, path);
  } catch (error) {
    rmSync(tmpPath, { force: true });
    throw error;
  }
};

export const writeJsonAtomic = (path: string, data: unknown): void => {
  writeTextAtomic(path, `${JSON.stringify(data, null, 2)}\n`);
};

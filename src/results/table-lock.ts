import { randomBytes } from "node:crypto";
import {
  closeSync,
  linkSync,
  openSync,
  readFileSync,
  renameSync,
  rmSync,
  statSync,
  writeSync,
  type Stats
} from "node:fs";

import { IOFailureError, describeError } from "./errors.js";

export interface TableLockOptions {
  timeoutMs?: number;
  retryMs?: number;
  /** A lock file older than this is treated as left behind by a crashed writer. */
  staleMs?: number;
  now?: () => number;
}

export const DEFAULT_TABLE_LOCK: Required<Omit<TableLockOptions, "now">> = {
  timeoutMs: 10_000,
  retryMs: 25,
  staleMs: 60_000
};

const sleepSync = (ms: number): void => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

const isErrnoException = (error: unknown): error is NodeJS.ErrnoException =>
  error instanceof Error && "code" in error;

export const lockPathFor = (tablePath: string): string => `${tablePath}.lock`;

const newOwnerToken = (): string => `${process.pid}:${randomBytes(4).toString("hex")}`;

const tryCreateLock = (lockPath: string, token: string): boolean => {
  let fd: number;
  try {
    fd = openSync(lockPath, "wx");
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      return false;
    }
    throw new IOFailureError(lockPath, `Failed to create table lock (${describeError(error)})`, {
      cause: error
    });
  }
  try {
    writeSync(fd, `${token}\n`);
  } finally {
    closeSync(fd);
  }
  return true;
};

const statLock = (lockPath: string): Stats | undefined => {
  try {
    return statSync(lockPath);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return undefined;
    }
    throw new IOFailureError(lockPath, `Failed to inspect table lock (${describeError(error)})`, {
      cause: error
    });
  }
};

const sameLockFile = (a: Stats, b: Stats): boolean =>
  a.ino === b.ino && a.dev === b.dev && a.mtimeMs === b.mtimeMs;

/**
 * Moves the stale lock aside under a unique name. When another waiter has
 * already replaced it with a fresh lock, that lock is linked back into place.
 */
const clearStaleLock = (lockPath: string, stale: Stats): void => {
  const tombstone = `${lockPath}.${process.pid}.${randomBytes(4).toString("hex")}.stale`;
  try {
    renameSync(lockPath, tombstone);
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    throw new IOFailureError(lockPath, `Failed to clear stale table lock (${describeError(error)})`, {
      cause: error
    });
  }
  try {
    if (!sameLockFile(statSync(tombstone), stale)) {
      try {
        linkSync(tombstone, lockPath);
      } catch (error) {
        if (!(isErrnoException(error) && error.code === "EEXIST")) {
          throw error;
        }
      }
    }
  } catch (error) {
    throw new IOFailureError(lockPath, `Failed to restore table lock (${describeError(error)})`, {
      cause: error
    });
  } finally {
    rmSync(tombstone, { force: true });
  }
};

const acquireTableLock = (tablePath: string, token: string, options: TableLockOptions): string => {
  const timeoutMs = options.timeoutMs ?? DEFAULT_TABLE_LOCK.timeoutMs;
  const retryMs = options.retryMs ?? DEFAULT_TABLE_LOCK.retryMs;
  const staleMs = options.staleMs ?? DEFAULT_TABLE_LOCK.staleMs;
  const now = options.now ?? Date.now;
  const lockPath = lockPathFor(tablePath);
  const deadline = now() + timeoutMs;

  for (;;) {
    if (tryCreateLock(lockPath, token)) {
      return lockPath;
    }
    const current = statLock(lockPath);
    if (current && now() - current.mtimeMs > staleMs) {
      clearStaleLock(lockPath, current);
      continue;
    }
    if (now() >= deadline) {
      throw new IOFailureError(tablePath, `Timed out after ${timeoutMs}ms waiting for table lock`);
    }
    sleepSync(retryMs);
  }
};

// A lock that was taken over while the task ran belongs to its new owner.
const releaseTableLock = (lockPath: string, token: string): void => {
  let holder: string;
  try {
    holder = readFileSync(lockPath, "utf8").trim();
  } catch (error) {
    if (isErrnoException(error) && error.code === "ENOENT") {
      return;
    }
    throw new IOFailureError(lockPath, `Failed to release table lock (${describeError(error)})`, {
      cause: error
    });
  }
  if (holder === token) {
    rmSync(lockPath, { force: true });
  }
};

/**
 * Runs `task` while holding an exclusive lock file beside `tablePath`.
 * The parent directory must already exist.
 */
export const withTableLock = <T>(
  tablePath: string,
  task: () => T,
  options: TableLockOptions = {}
): T => {
  const token = newOwnerToken();
  const lockPath = acquireTableLock(tablePath, token, options);
  try {
    return task();
  } finally {
    releaseTableLock(lockPath, token);
  }
};

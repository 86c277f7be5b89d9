import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import type { EventBus } from "../events/event-bus.js";

/**
 * Appends one timestamped line per ingest event to a log file. Writes are
 * synchronous so the log is complete when the CLI exits.
 */
export class ExecutionLogger {
  private readonly logPath: string;
  private readonly clock: () => Date;
  private unsubs: Array<() => void> = [];

  constructor(logPath: string, clock: () => Date = () => new Date()) {
    this.logPath = logPath;
    this.clock = clock;
    mkdirSync(dirname(logPath), { recursive: true });
  }

  private append(line: string): void {
    appendFileSync(this.logPath, `${this.clock().toISOString()} ${line}\n`, "utf8");
  }

  attach(bus: EventBus): void {
    const onError = (eventType: string, error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Execution log subscriber error (${eventType}): ${message}`);
    };

    this.unsubs.push(
      bus.subscribeSafe(
        "run.ingested",
        (payload) => {
          this.append(
            `${payload.outcome} ${payload.algorithm} ${payload.graph} k=${payload.k} (${payload.family}, ${payload.format}) -> ${payload.table_path}`
          );
        },
        (error) => onError("run.ingested", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "run.skipped",
        (payload) => {
          this.append(
            `skipped ${payload.algorithm} ${payload.graph} k=${payload.k}: row exists in ${payload.table_path}`
          );
        },
        (error) => onError("run.skipped", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "run.failed",
        (payload) => {
          const kind = payload.error_kind ? ` [${payload.error_kind}]` : "";
          this.append(`failed ${payload.algorithm} ${payload.graph} k=${payload.k}${kind}: ${payload.error}`);
        },
        (error) => onError("run.failed", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "warning.raised",
        (payload) => {
          this.append(`warning ${payload.source ? `[${payload.source}] ` : ""}${payload.message}`);
        },
        (error) => onError("warning.raised", error)
      )
    );

    this.unsubs.push(
      bus.subscribeSafe(
        "batch.completed",
        (payload) => {
          this.append(
            `batch complete: ${payload.total} runs, ${payload.appended} appended, ${payload.replaced} replaced, ${payload.skipped} skipped, ${payload.failed} failed, ${payload.elapsed_ms}ms`
          );
        },
        (error) => onError("batch.completed", error)
      )
    );
  }

  detach(): void {
    this.unsubs.forEach((unsubscribe) => unsubscribe());
    this.unsubs = [];
  }
}

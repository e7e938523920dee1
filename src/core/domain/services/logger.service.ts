import type { RunStats } from "../entities/file-record.entity.js";

export type LogFields = Record<string, string | number | boolean | undefined>;

export type LogCategory = "status" | "error" | "upload.stats";

export interface ILogger {
  init(runId: string): void;
  /** Batch start/end and other progress messages. */
  status(message: string, fields?: LogFields): void;
  /** Per-file or per-subtree failures. */
  error(message: string, fields?: LogFields): void;
  /** One summary message per run. */
  stats(stats: RunStats): void;
  debug(message: string): void;
  close(): void | Promise<void>;
}

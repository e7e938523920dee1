import { createWriteStream, mkdirSync, existsSync, type WriteStream } from "node:fs";
import { join } from "node:path";
import type { RunStats } from "../../core/domain/entities/file-record.entity.js";
import type {
  ILogger,
  LogCategory,
  LogFields,
} from "../../core/domain/services/logger.service.js";

/**
 * Event log for the telemetry side: one JSON object per line in
 * `<logDir>/events_<runId>.jsonl`.
 */
export class JsonLogger implements ILogger {
  private logStream: WriteStream | null = null;
  private runId = "";
  private path: string | null = null;
  private writeError: Error | null = null;

  constructor(
    private logDir: string,
    private defaultFields: LogFields = {},
  ) {}

  init(runId: string): void {
    if (!existsSync(this.logDir)) mkdirSync(this.logDir, { recursive: true });
    this.runId = runId;
    this.path = join(this.logDir, `events_${runId}.jsonl`);
    const stream = createWriteStream(this.path, { flags: "a" });
    // A failed append (disk full, unwritable dir) disables the event log.
    stream.on("error", (e) => {
      this.writeError = e;
      if (this.logStream === stream) this.logStream = null;
    });
    this.logStream = stream;
  }

  /** Set once the event log has stopped accepting lines. */
  getWriteError(): Error | null {
    return this.writeError;
  }

  getPath(): string | null {
    return this.path;
  }

  status(message: string, fields?: LogFields): void {
    this.write("status", message, fields);
  }

  error(message: string, fields?: LogFields): void {
    this.write("error", message, fields);
  }

  stats(stats: RunStats): void {
    this.write("upload.stats", "Run complete", {
      files_scanned: stats.filesScanned,
      files_skipped: JSON.stringify(stats.filesSkipped),
      transferred_count: stats.filesUploaded,
      total_bytes: stats.bytesUploaded,
      errors: stats.errors,
      dry_run: stats.dryRun,
      interrupted: stats.interrupted,
    });
  }

  debug(_message: string): void {}

  /** Resolves once buffered lines are flushed. */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    if (!stream || stream.destroyed) return Promise.resolve();
    return new Promise((resolve) => {
      stream.once("error", () => resolve());
      stream.end(() => resolve());
    });
  }

  private write(category: LogCategory, message: string, fields?: LogFields): void {
    if (!this.logStream?.writable) return;
    const line = {
      timestamp: new Date().toISOString(),
      runId: this.runId,
      category,
      message,
      ...this.defaultFields,
      ...fields,
    };
    this.logStream.write(JSON.stringify(line) + "\n");
  }
}

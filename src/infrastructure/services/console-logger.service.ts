import { type RunStats, totalSkipped } from "../../core/domain/entities/file-record.entity.js";
import type { ILogger, LogFields } from "../../core/domain/services/logger.service.js";
import { formatBytes } from "../utils/format.utils.js";

type Sink = (line: string) => void;

export class ConsoleLogger implements ILogger {
  private runId = "";

  constructor(
    private debugEnabled = false,
    private out: Sink = (line) => console.log(line),
    private err: Sink = (line) => console.error(line),
  ) {}

  init(runId: string): void {
    this.runId = runId;
    this.debug(`Run ${runId} started`);
  }

  status(message: string, fields?: LogFields): void {
    this.out(`${timestamp()} INFO ${message}${formatFields(fields)}`);
  }

  error(message: string, fields?: LogFields): void {
    this.err(`${timestamp()} ERROR ${message}${formatFields(fields)}`);
  }

  debug(message: string): void {
    if (this.debugEnabled) this.out(`${timestamp()} DEBUG ${message}`);
  }

  stats(stats: RunStats): void {
    const lines = [
      "",
      `Run Summary (${stats.runId})${stats.dryRun ? " [dry run]" : ""}`,
      "------------",
      `Scanned: ${stats.filesScanned}`,
      `Uploaded: ${stats.filesUploaded} (${formatBytes(stats.bytesUploaded)})`,
      `Skipped: ${totalSkipped(stats)}`,
    ];
    for (const [reason, count] of Object.entries(stats.filesSkipped)) {
      if (count > 0) lines.push(`  ${reason}: ${count}`);
    }
    lines.push(`Errors: ${stats.errors}`);
    if (stats.interrupted) lines.push("Interrupted before the batch completed.");
    this.out(lines.join("\n"));
  }

  close(): void {
    this.debug(`Run ${this.runId} closed`);
  }
}

function timestamp(): string {
  return new Date().toISOString();
}

function formatFields(fields?: LogFields): string {
  if (!fields) return "";
  const parts = Object.entries(fields)
    .filter(([, v]) => v !== undefined)
    .map(([k, v]) => `${k}=${String(v)}`);
  return parts.length ? ` (${parts.join(", ")})` : "";
}

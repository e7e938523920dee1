import {
  closeSync,
  existsSync,
  fsyncSync,
  mkdirSync,
  openSync,
  readFileSync,
  writeSync,
} from "node:fs";
import { join } from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import type {
  LedgerEntry,
  SkippedEntry,
  UploadedEntry,
} from "../../core/domain/entities/file-record.entity.js";
import { LedgerReadError, LedgerWriteError, formatError } from "../../core/domain/errors.js";
import type { ILedger } from "../../core/domain/repositories/ledger.repository.js";

export const UPLOADED_CSV = "uploaded_files.csv";
export const SKIPPED_CSV = "skipped_files.csv";

/** Column order is part of the on-disk format; existing ledgers depend on it. */
export const UPLOADED_COLUMNS = [
  "original_path",
  "filename_at_upload",
  "size_bytes",
  "last_modified_timestamp_source",
  "upload_timestamp_utc",
  "metadata_sent_json",
  "upload_status",
] as const;

export const SKIPPED_COLUMNS = [
  "file_path",
  "reason_skipped",
  "size_bytes",
  "last_modified_timestamp_source",
  "log_timestamp_utc",
] as const;

const UPLOAD_SUCCESS = "success";

const RowsSchema = z.array(z.array(z.string()));

const MetadataJsonSchema = z.string().transform((raw, ctx) => {
  try {
    return z.record(z.string()).parse(JSON.parse(raw));
  } catch {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "expected a JSON object of strings",
    });
    return z.NEVER;
  }
});

const UploadedRowSchema = z.object({
  original_path: z.string().min(1),
  filename_at_upload: z.string(),
  size_bytes: z.coerce.number().int().nonnegative(),
  last_modified_timestamp_source: z.coerce.number(),
  upload_timestamp_utc: z.string().min(1),
  metadata_sent_json: MetadataJsonSchema,
  upload_status: z.string(),
});

const SkippedRowSchema = z.object({
  file_path: z.string().min(1),
  reason_skipped: z.string(),
  size_bytes: z.coerce.number().int().nonnegative(),
  last_modified_timestamp_source: z.coerce.number(),
  log_timestamp_utc: z.string().min(1),
});

/**
 * Ledger kept as two append-only CSV logs in the state directory. Every
 * write is flushed to disk before the returned promise settles.
 */
export class CsvLedgerRepository implements ILedger {
  private index = new Map<string, LedgerEntry>();
  readonly uploadedPath: string;
  readonly skippedPath: string;

  constructor(private stateDir: string) {
    this.uploadedPath = join(stateDir, UPLOADED_CSV);
    this.skippedPath = join(stateDir, SKIPPED_CSV);
  }

  async load(): Promise<void> {
    try {
      mkdirSync(this.stateDir, { recursive: true });
    } catch (e) {
      throw new LedgerWriteError(this.stateDir, { cause: e });
    }
    this.index.clear();

    for (const row of this.readRows(this.uploadedPath, UPLOADED_COLUMNS)) {
      const parsed = UploadedRowSchema.safeParse(row.values);
      if (!parsed.success) {
        throw new LedgerReadError(
          this.uploadedPath,
          `Invalid row ${row.line}: ${describeIssues(parsed.error)}`,
        );
      }
      const r = parsed.data;
      if (r.upload_status !== UPLOAD_SUCCESS) continue;
      this.merge({
        status: "uploaded",
        path: r.original_path,
        filenameAtUpload: r.filename_at_upload,
        sizeBytes: r.size_bytes,
        mtimeMs: Math.round(r.last_modified_timestamp_source * 1000),
        timestamp: r.upload_timestamp_utc,
        metadata: r.metadata_sent_json,
      });
    }

    for (const row of this.readRows(this.skippedPath, SKIPPED_COLUMNS)) {
      const parsed = SkippedRowSchema.safeParse(row.values);
      if (!parsed.success) {
        throw new LedgerReadError(
          this.skippedPath,
          `Invalid row ${row.line}: ${describeIssues(parsed.error)}`,
        );
      }
      const r = parsed.data;
      this.merge({
        status: "skipped",
        path: r.file_path,
        reason: r.reason_skipped,
        sizeBytes: r.size_bytes,
        mtimeMs: Math.round(r.last_modified_timestamp_source * 1000),
        timestamp: r.log_timestamp_utc,
      });
    }
  }

  has(path: string): boolean {
    return this.index.has(path);
  }

  get(path: string): LedgerEntry | undefined {
    return this.index.get(path);
  }

  entries(): LedgerEntry[] {
    return [...this.index.values()];
  }

  get size(): number {
    return this.index.size;
  }

  async recordUploaded(
    entry: Omit<UploadedEntry, "status">,
  ): Promise<UploadedEntry> {
    const existing = this.index.get(entry.path);
    if (existing?.status === "uploaded") return existing;

    const full: UploadedEntry = { status: "uploaded", ...entry };
    this.appendRow(this.uploadedPath, UPLOADED_COLUMNS, [
      full.path,
      full.filenameAtUpload,
      full.sizeBytes,
      full.mtimeMs / 1000,
      full.timestamp,
      JSON.stringify(full.metadata),
      UPLOAD_SUCCESS,
    ]);
    this.index.set(full.path, full);
    return full;
  }

  async recordSkipped(
    entry: Omit<SkippedEntry, "status">,
  ): Promise<SkippedEntry> {
    const full: SkippedEntry = { status: "skipped", ...entry };
    this.appendRow(this.skippedPath, SKIPPED_COLUMNS, [
      full.path,
      full.reason,
      full.sizeBytes,
      full.mtimeMs / 1000,
      full.timestamp,
    ]);
    this.index.set(full.path, full);
    return full;
  }

  /** Later timestamp wins; on a tie an upload outranks a skip. */
  private merge(entry: LedgerEntry): void {
    const existing = this.index.get(entry.path);
    if (
      !existing ||
      entry.timestamp > existing.timestamp ||
      (entry.timestamp === existing.timestamp && entry.status === "uploaded")
    ) {
      this.index.set(entry.path, entry);
    }
  }

  private readRows(
    file: string,
    columns: readonly string[],
  ): { line: number; values: Record<string, string> }[] {
    if (!existsSync(file)) {
      this.appendRaw(file, stringify([columns]));
      return [];
    }

    let rows: string[][];
    try {
      const raw = readFileSync(file, "utf-8");
      if (!raw.trim()) {
        this.appendRaw(file, stringify([columns]));
        return [];
      }
      rows = RowsSchema.parse(parse(raw, { skip_empty_lines: true }));
    } catch (e) {
      if (e instanceof LedgerWriteError) throw e;
      throw new LedgerReadError(file, formatError(e), { cause: e });
    }

    const [header, ...body] = rows;
    if (header.join(",") !== columns.join(",")) {
      throw new LedgerReadError(
        file,
        `Unexpected header "${header.join(",")}", expected "${columns.join(",")}".`,
      );
    }
    return body.map((cells, i) => {
      const values: Record<string, string> = {};
      columns.forEach((col, c) => {
        values[col] = cells[c] ?? "";
      });
      return { line: i + 2, values };
    });
  }

  private appendRow(
    file: string,
    columns: readonly string[],
    row: (string | number)[],
  ): void {
    const prefix = existsSync(file) ? "" : stringify([columns]);
    this.appendRaw(file, prefix + stringify([row]));
  }

  private appendRaw(file: string, text: string): void {
    let fd: number | undefined;
    try {
      fd = openSync(file, "a");
      writeSync(fd, text);
      fsyncSync(fd);
    } catch (e) {
      throw new LedgerWriteError(file, { cause: e });
    } finally {
      if (fd !== undefined) closeSync(fd);
    }
  }
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
}

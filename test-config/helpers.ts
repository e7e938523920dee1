import { mkdirSync, mkdtempSync, rmSync, utimesSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import yaml from "js-yaml";
import type {
  FileRecord,
  LedgerEntry,
  RunStats,
  SkippedEntry,
  UploadedEntry,
} from "../src/core/domain/entities/file-record.entity.js";
import { LedgerWriteError } from "../src/core/domain/errors.js";
import type { ILedger } from "../src/core/domain/repositories/ledger.repository.js";
import type { ILogger, LogFields } from "../src/core/domain/services/logger.service.js";
import type {
  IUploader,
  UploadRequest,
  UploadResult,
} from "../src/core/domain/services/uploader.service.js";

/** 2023-11-14T22:13:20Z, a fixed base for mtimes. */
export const BASE_MTIME_SEC = 1_700_000_000;

export const TEST_METADATA = {
  upload_name: "test-upload",
  site: "test-site",
  sensor: "test-sensor",
  project: "test-project",
  creator: "tester",
};

export function makeTempDir(prefix = "forager-test-"): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/** Writes a file (creating parents) and pins its mtime, in epoch seconds. */
export function writeFileAt(
  root: string,
  relativePath: string,
  content: string | Buffer,
  mtimeSec = BASE_MTIME_SEC,
): string {
  const full = join(root, relativePath);
  mkdirSync(dirname(full), { recursive: true });
  writeFileSync(full, content);
  utimesSync(full, mtimeSec, mtimeSec);
  return full;
}

export function writeMetadata(stateDir: string, fields: Record<string, unknown>): void {
  mkdirSync(stateDir, { recursive: true });
  writeFileSync(join(stateDir, "metadata.yaml"), yaml.dump(fields));
}

export function fileRecord(path: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    path,
    name: basename(path),
    sizeBytes: 10,
    mtimeMs: BASE_MTIME_SEC * 1000,
    isSymlink: false,
    ...overrides,
  };
}

export class RecordingLogger implements ILogger {
  runId = "";
  statuses: { message: string; fields?: LogFields }[] = [];
  errors: { message: string; fields?: LogFields }[] = [];
  debugs: string[] = [];
  statsMessages: RunStats[] = [];
  closed = false;

  init(runId: string): void {
    this.runId = runId;
  }
  status(message: string, fields?: LogFields): void {
    this.statuses.push({ message, fields });
  }
  error(message: string, fields?: LogFields): void {
    this.errors.push({ message, fields });
  }
  stats(stats: RunStats): void {
    this.statsMessages.push(structuredClone(stats));
  }
  debug(message: string): void {
    this.debugs.push(message);
  }
  close(): void {
    this.closed = true;
  }
}

export class FakeUploader implements IUploader {
  calls: UploadRequest[] = [];
  /** Paths whose upload reports failure. */
  failing = new Set<string>();
  /** Paths whose upload throws. */
  throwing = new Set<string>();
  onUpload?: (request: UploadRequest) => void;

  async upload(request: UploadRequest): Promise<UploadResult> {
    this.calls.push(request);
    this.onUpload?.(request);
    if (this.throwing.has(request.filePath)) {
      throw new Error("connection reset");
    }
    if (this.failing.has(request.filePath)) {
      return { success: false, error: "remote rejected" };
    }
    return { success: true, location: `fake://${request.objectName}` };
  }

  uploadedPaths(): string[] {
    return this.calls.map((c) => c.filePath);
  }
}

export class MemoryLedger implements ILedger {
  private index = new Map<string, LedgerEntry>();
  writes: LedgerEntry[] = [];
  failWrites = false;

  constructor(initial: LedgerEntry[] = []) {
    for (const e of initial) this.index.set(e.path, e);
  }

  async load(): Promise<void> {}

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

  async recordUploaded(entry: Omit<UploadedEntry, "status">): Promise<UploadedEntry> {
    if (this.failWrites) throw new LedgerWriteError("memory", { cause: new Error("disk full") });
    const existing = this.index.get(entry.path);
    if (existing?.status === "uploaded") return existing;
    const full: UploadedEntry = { status: "uploaded", ...entry };
    this.index.set(full.path, full);
    this.writes.push(full);
    return full;
  }

  async recordSkipped(entry: Omit<SkippedEntry, "status">): Promise<SkippedEntry> {
    if (this.failWrites) throw new LedgerWriteError("memory", { cause: new Error("disk full") });
    const full: SkippedEntry = { status: "skipped", ...entry };
    this.index.set(full.path, full);
    this.writes.push(full);
    return full;
  }
}

export const noSleep = async (): Promise<void> => {};

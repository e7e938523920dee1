/**
 * A file seen by one scan. Built fresh each time and never persisted;
 * only the outcome of processing it reaches the ledger.
 */
export interface FileRecord {
  /** Absolute path, the identity key within one watched root. */
  path: string;
  name: string;
  sizeBytes: number;
  mtimeMs: number;
  isSymlink: boolean;
}

export type LedgerStatus = "uploaded" | "skipped";

export interface UploadedEntry {
  status: "uploaded";
  path: string;
  filenameAtUpload: string;
  sizeBytes: number;
  mtimeMs: number;
  timestamp: string;
  metadata: Record<string, string>;
}

export interface SkippedEntry {
  status: "skipped";
  path: string;
  reason: string;
  sizeBytes: number;
  mtimeMs: number;
  timestamp: string;
}

export type LedgerEntry = UploadedEntry | SkippedEntry;

export type SkipReason =
  | "already_processed"
  | "oversized"
  | "recently_modified"
  | "batch_limit";

export interface RunStats {
  runId: string;
  startedAt: string;
  finishedAt?: string;
  filesScanned: number;
  filesSkipped: Record<SkipReason, number>;
  filesUploaded: number;
  bytesUploaded: number;
  errors: number;
  dryRun: boolean;
  interrupted: boolean;
}

export function createRunStats(runId: string, dryRun: boolean): RunStats {
  return {
    runId,
    startedAt: new Date().toISOString(),
    filesScanned: 0,
    filesSkipped: {
      already_processed: 0,
      oversized: 0,
      recently_modified: 0,
      batch_limit: 0,
    },
    filesUploaded: 0,
    bytesUploaded: 0,
    errors: 0,
    dryRun,
    interrupted: false,
  };
}

export function totalSkipped(stats: RunStats): number {
  return Object.values(stats.filesSkipped).reduce((a, n) => a + n, 0);
}

import type {
  LedgerEntry,
  SkippedEntry,
  UploadedEntry,
} from "../entities/file-record.entity.js";

/**
 * Durable record of per-file outcomes; the cross-run dedup source of truth.
 * Exclusively owned by one running instance per watched directory.
 */
export interface ILedger {
  /** Rebuilds the membership index from persisted rows. */
  load(): Promise<void>;
  has(path: string): boolean;
  get(path: string): LedgerEntry | undefined;
  /**
   * Persists an upload before resolving. A path that is already recorded as
   * uploaded is left untouched and its existing entry returned.
   */
  recordUploaded(entry: Omit<UploadedEntry, "status">): Promise<UploadedEntry>;
  recordSkipped(entry: Omit<SkippedEntry, "status">): Promise<SkippedEntry>;
  entries(): LedgerEntry[];
  readonly size: number;
}

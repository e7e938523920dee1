import type { RunStats } from "../entities/file-record.entity.js";

export interface RunHistoryEntry {
  runId: string;
  startedAt: string;
  finishedAt: string;
  filesScanned: number;
  filesSkipped: Record<string, number>;
  filesUploaded: number;
  bytesUploaded: number;
  errors: number;
  dryRun: boolean;
  interrupted: boolean;
}

export interface IRunHistoryRepository {
  appendRun(stats: RunStats): Promise<void>;
  /** Newest first. */
  getRecentRuns(limit: number): Promise<RunHistoryEntry[]>;
  close(): void;
}

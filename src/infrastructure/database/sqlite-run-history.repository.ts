import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { z } from "zod";
import type { RunStats } from "../../core/domain/entities/file-record.entity.js";
import type {
  IRunHistoryRepository,
  RunHistoryEntry,
} from "../../core/domain/repositories/run-history.repository.js";

export const RUN_HISTORY_DB = "run-history.db";

const RunRowSchema = z.object({
  runId: z.string(),
  startedAt: z.string(),
  finishedAt: z.string(),
  filesScanned: z.number(),
  filesSkipped: z.string(),
  filesUploaded: z.number(),
  bytesUploaded: z.number(),
  errors: z.number(),
  dryRun: z.number(),
  interrupted: z.number(),
});

const SkippedCountsSchema = z.record(z.number());

export class SqliteRunHistoryRepository implements IRunHistoryRepository {
  private _db: Database.Database | null = null;

  /** `:memory:` keeps the history in process. */
  constructor(private dbPath: string) {}

  private getDb(): Database.Database {
    if (this._db) return this._db;
    if (this.dbPath !== ":memory:") {
      mkdirSync(dirname(this.dbPath), { recursive: true });
    }
    const db = new Database(this.dbPath);
    db.pragma("journal_mode = DELETE");
    db.pragma("synchronous = FULL");
    db.pragma("busy_timeout = 5000");
    db.exec(`
      CREATE TABLE IF NOT EXISTS tbl_run_history (
        runId         TEXT PRIMARY KEY,
        startedAt     TEXT NOT NULL,
        finishedAt    TEXT NOT NULL,
        filesScanned  INTEGER NOT NULL,
        filesSkipped  TEXT NOT NULL,
        filesUploaded INTEGER NOT NULL,
        bytesUploaded INTEGER NOT NULL,
        errors        INTEGER NOT NULL,
        dryRun        INTEGER NOT NULL,
        interrupted   INTEGER NOT NULL
      )
    `);
    this._db = db;
    return db;
  }

  async appendRun(stats: RunStats): Promise<void> {
    this.getDb()
      .prepare(
        `INSERT INTO tbl_run_history
           (runId, startedAt, finishedAt, filesScanned, filesSkipped,
            filesUploaded, bytesUploaded, errors, dryRun, interrupted)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
         ON CONFLICT(runId) DO UPDATE SET
           finishedAt    = excluded.finishedAt,
           filesScanned  = excluded.filesScanned,
           filesSkipped  = excluded.filesSkipped,
           filesUploaded = excluded.filesUploaded,
           bytesUploaded = excluded.bytesUploaded,
           errors        = excluded.errors,
           interrupted   = excluded.interrupted`,
      )
      .run(
        stats.runId,
        stats.startedAt,
        stats.finishedAt ?? new Date().toISOString(),
        stats.filesScanned,
        JSON.stringify(stats.filesSkipped),
        stats.filesUploaded,
        stats.bytesUploaded,
        stats.errors,
        stats.dryRun ? 1 : 0,
        stats.interrupted ? 1 : 0,
      );
  }

  async getRecentRuns(limit: number): Promise<RunHistoryEntry[]> {
    const rows = this.getDb()
      .prepare(
        "SELECT * FROM tbl_run_history ORDER BY startedAt DESC, rowid DESC LIMIT ?",
      )
      .all(Math.max(0, limit));
    return z
      .array(RunRowSchema)
      .parse(rows)
      .map((r) => ({
        runId: r.runId,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt,
        filesScanned: r.filesScanned,
        filesSkipped: SkippedCountsSchema.parse(JSON.parse(r.filesSkipped)),
        filesUploaded: r.filesUploaded,
        bytesUploaded: r.bytesUploaded,
        errors: r.errors,
        dryRun: r.dryRun === 1,
        interrupted: r.interrupted === 1,
      }));
  }

  close(): void {
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }
}

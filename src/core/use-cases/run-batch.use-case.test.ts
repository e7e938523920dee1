import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { RunConfig } from "../domain/entities/config.entity.js";
import type { RunStats } from "../domain/entities/file-record.entity.js";
import { LedgerWriteError } from "../domain/errors.js";
import type {
  IRunHistoryRepository,
  RunHistoryEntry,
} from "../domain/repositories/run-history.repository.js";
import {
  CsvLedgerRepository,
  UPLOADED_COLUMNS,
} from "../../infrastructure/database/csv-ledger.repository.js";
import { RunBatchUseCase } from "./run-batch.use-case.js";
import {
  BASE_MTIME_SEC,
  FakeUploader,
  MemoryLedger,
  RecordingLogger,
  TEST_METADATA,
  makeTempDir,
  noSleep,
  removeDir,
  writeFileAt,
} from "../../../test-config/helpers.js";

class RecordingHistory implements IRunHistoryRepository {
  runs: RunStats[] = [];
  async appendRun(stats: RunStats): Promise<void> {
    this.runs.push(structuredClone(stats));
  }
  async getRecentRuns(): Promise<RunHistoryEntry[]> {
    return [];
  }
  close(): void {}
}

describe("RunBatchUseCase", () => {
  let source: string;
  let stateDir: string;
  let a: string;
  let b: string;
  let c: string;

  beforeEach(() => {
    source = makeTempDir();
    stateDir = join(source, ".forager");
    a = writeFileAt(source, "a.txt", "aaa", BASE_MTIME_SEC);
    b = writeFileAt(source, "b.txt", "bb", BASE_MTIME_SEC + 10);
    c = writeFileAt(source, "c.txt", "c", BASE_MTIME_SEC + 20);
  });

  afterEach(() => {
    removeDir(source);
  });

  function config(overrides: Partial<RunConfig> = {}): RunConfig {
    return {
      source,
      stateDir,
      recursive: false,
      followSymlinks: false,
      maxFileSize: 0,
      skipLastN: 1,
      sortKey: "mtime",
      numFiles: 10,
      sleepSeconds: 0,
      prefix: "",
      suffix: "",
      dryRun: false,
      deleteFiles: false,
      debug: false,
      metadata: TEST_METADATA,
      s3: { bucket: "test-bucket", region: "us-east-1", prefix: "" },
      ...overrides,
    };
  }

  async function runOnce(
    overrides: Partial<RunConfig> = {},
    uploader = new FakeUploader(),
  ) {
    const logger = new RecordingLogger();
    const history = new RecordingHistory();
    const { stats } = await new RunBatchUseCase({
      ledger: new CsvLedgerRepository(stateDir),
      logger,
      uploader,
      runHistory: history,
      sleep: noSleep,
    }).execute({ runId: "run_test", config: config(overrides) });
    return { stats, logger, uploader, history };
  }

  it("never uploads the same file twice across runs", async () => {
    const first = await runOnce();
    expect(first.uploader.uploadedPaths()).toEqual([a, b]);
    expect(first.stats.filesScanned).toBe(3);
    expect(first.stats.filesSkipped.recently_modified).toBe(1);

    const second = await runOnce();
    expect(second.uploader.uploadedPaths()).toEqual([]);
    expect(second.stats.filesSkipped.already_processed).toBe(2);
    expect(second.stats.filesSkipped.recently_modified).toBe(1);

    writeFileAt(source, "d.txt", "dddd", BASE_MTIME_SEC + 30);
    const third = await runOnce();
    expect(third.uploader.uploadedPaths()).toEqual([c]);
  });

  it("records each upload in the ledger with its metadata", async () => {
    await runOnce({ prefix: "pre_" });

    const ledger = new CsvLedgerRepository(stateDir);
    await ledger.load();
    expect(ledger.get(a)).toMatchObject({
      status: "uploaded",
      filenameAtUpload: "pre_a.txt",
      sizeBytes: 3,
      mtimeMs: BASE_MTIME_SEC * 1000,
      metadata: { ...TEST_METADATA, original_path: a, filename: "a.txt" },
    });
    expect(ledger.has(c)).toBe(false);
  });

  it("leaves the ledger untouched on a dry run", async () => {
    const { stats, logger, uploader, history } = await runOnce({ dryRun: true });

    expect(uploader.calls).toEqual([]);
    expect(stats.filesUploaded).toBe(2);
    expect(logger.statuses.map((s) => s.message)).toContain(`[Dry Run] Would upload: ${a}`);
    expect(readFileSync(join(stateDir, "uploaded_files.csv"), "utf-8")).toBe(
      UPLOADED_COLUMNS.join(",") + "\n",
    );
    expect(history.runs).toEqual([]);

    const live = await runOnce();
    expect(live.uploader.uploadedPaths()).toEqual([a, b]);
  });

  it("rejects oversized files for good", async () => {
    const first = await runOnce({ maxFileSize: 2, skipLastN: 0 });
    expect(first.uploader.uploadedPaths()).toEqual([b, c]);
    expect(first.stats.filesSkipped.oversized).toBe(1);
    expect(first.logger.errors[0].message).toBe(`Skipped ${a} reason: oversized`);

    const second = await runOnce({ maxFileSize: 0, skipLastN: 0 });
    expect(second.uploader.uploadedPaths()).toEqual([]);
    expect(second.stats.filesSkipped.already_processed).toBe(3);
  });

  it("retries a failed upload on the next run", async () => {
    const failing = new FakeUploader();
    failing.failing.add(b);
    const first = await runOnce({}, failing);
    expect(first.stats.errors).toBe(1);
    expect(first.stats.filesUploaded).toBe(1);

    const second = await runOnce();
    expect(second.uploader.uploadedPaths()).toEqual([b]);
  });

  it("honours the batch size", async () => {
    const { stats, uploader } = await runOnce({ numFiles: 1, skipLastN: 0 });
    expect(uploader.uploadedPaths()).toEqual([a]);
    expect(stats.filesSkipped.batch_limit).toBe(2);
  });

  it("stops before the first file when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const logger = new RecordingLogger();
    const uploader = new FakeUploader();

    const { stats } = await new RunBatchUseCase({
      ledger: new CsvLedgerRepository(stateDir),
      logger,
      uploader,
      sleep: noSleep,
    }).execute({ runId: "run_test", config: config(), signal: controller.signal });

    expect(stats.interrupted).toBe(true);
    expect(uploader.calls).toEqual([]);
    expect(logger.statuses.map((s) => s.message)).toContain(
      "Interrupted; 2 selected file(s) left for the next run",
    );
  });

  it("reports stats and closes the logger when the ledger cannot be written", async () => {
    const ledger = new MemoryLedger();
    ledger.failWrites = true;
    const logger = new RecordingLogger();
    const history = new RecordingHistory();

    await expect(
      new RunBatchUseCase({
        ledger,
        logger,
        uploader: new FakeUploader(),
        runHistory: history,
        sleep: noSleep,
      }).execute({ runId: "run_test", config: config() }),
    ).rejects.toBeInstanceOf(LedgerWriteError);

    expect(logger.statsMessages).toHaveLength(1);
    expect(logger.statsMessages[0].filesUploaded).toBe(0);
    expect(logger.closed).toBe(true);
    expect(history.runs).toHaveLength(1);
  });

  it("keeps its own state directory out of the scan", async () => {
    await runOnce();
    const { stats } = await runOnce();
    expect(existsSync(join(stateDir, "uploaded_files.csv"))).toBe(true);
    expect(stats.filesScanned).toBe(3);
  });
});

import type { RunConfig } from "../domain/entities/config.entity.js";
import {
  type FileRecord,
  type RunStats,
  createRunStats,
} from "../domain/entities/file-record.entity.js";
import { formatError } from "../domain/errors.js";
import type { ILedger } from "../domain/repositories/ledger.repository.js";
import type { IRunHistoryRepository } from "../domain/repositories/run-history.repository.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type { IUploader } from "../domain/services/uploader.service.js";
import { DispatchFilesUseCase } from "./dispatch-files.use-case.js";
import { ScanFilesUseCase } from "./scan-files.use-case.js";
import { SelectFilesUseCase } from "./select-files.use-case.js";

export interface RunBatchDependencies {
  ledger: ILedger;
  logger: ILogger;
  uploader?: IUploader;
  runHistory?: IRunHistoryRepository;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  removeFile?: (path: string) => Promise<void>;
}

export interface RunBatchRequest {
  runId: string;
  config: RunConfig;
  signal?: AbortSignal;
}

export interface RunBatchResult {
  stats: RunStats;
  selected: FileRecord[];
}

/**
 * One invocation: scan, select, dispatch a bounded batch, then report.
 * Runs to completion; periodic re-invocation belongs to an outside scheduler.
 */
export class RunBatchUseCase {
  private scanner = new ScanFilesUseCase();

  constructor(private deps: RunBatchDependencies) {}

  async execute(request: RunBatchRequest): Promise<RunBatchResult> {
    const { config, runId, signal } = request;
    const { ledger, logger } = this.deps;
    const stats = createRunStats(runId, config.dryRun);
    const selected: FileRecord[] = [];

    logger.init(runId);
    try {
      await ledger.load();
      logger.debug(`Ledger loaded with ${ledger.size} entries`);
      logger.status("Batch started", { source: config.source, dry_run: config.dryRun });

      const files = this.scanner.execute({
        root: config.source,
        glob: config.glob,
        recursive: config.recursive,
        followSymlinks: config.followSymlinks,
        excludeDirs: [config.stateDir],
        onError: (e) => {
          stats.errors++;
          logger.error(e.message, { path: e.path });
        },
      });

      const selection = await new SelectFilesUseCase(ledger).execute({
        files,
        maxFileSize: config.maxFileSize,
        sortKey: config.sortKey,
        skipLastN: config.skipLastN,
        numFiles: config.numFiles,
        dryRun: config.dryRun,
      });
      selected.push(...selection.selected);

      stats.filesScanned = selection.scanned;
      stats.filesSkipped.already_processed = selection.alreadyProcessed;
      stats.filesSkipped.oversized = selection.oversized.length;
      stats.filesSkipped.recently_modified = selection.deferred.length;
      stats.filesSkipped.batch_limit = selection.overBatch;

      for (const file of selection.oversized) {
        logger.error(`Skipped ${file.path} reason: oversized`, {
          path: file.path,
          size_bytes: file.sizeBytes,
        });
      }
      if (selection.deferred.length > 0) {
        logger.debug(`Deferring ${selection.deferred.length} recently modified file(s)`);
      }

      logger.status(`Found ${selection.selected.length} file(s) to process`, {
        scanned: selection.scanned,
      });

      await new DispatchFilesUseCase({
        uploader: this.deps.uploader,
        ledger,
        logger,
        sleep: this.deps.sleep,
        removeFile: this.deps.removeFile,
      }).execute({ files: selection.selected, config, stats, signal });

      logger.status("Batch complete", {
        uploaded: stats.filesUploaded,
        errors: stats.errors,
      });
    } finally {
      stats.finishedAt = new Date().toISOString();
      logger.stats(stats);
      await this.recordHistory(stats);
      await logger.close();
    }

    return { stats, selected };
  }

  private async recordHistory(stats: RunStats): Promise<void> {
    if (!this.deps.runHistory || stats.dryRun) return;
    try {
      await this.deps.runHistory.appendRun(stats);
    } catch (e) {
      this.deps.logger.error(`Failed to record run history: ${formatError(e)}`);
    }
  }
}

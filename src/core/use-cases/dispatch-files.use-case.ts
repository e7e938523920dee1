import { unlink } from "node:fs/promises";
import type { RunConfig } from "../domain/entities/config.entity.js";
import type { FileRecord, RunStats } from "../domain/entities/file-record.entity.js";
import { StartupConfigError, UploadError, formatError } from "../domain/errors.js";
import type { ILedger } from "../domain/repositories/ledger.repository.js";
import type { ILogger } from "../domain/services/logger.service.js";
import type {
  IUploader,
  UploadResult,
} from "../domain/services/uploader.service.js";
import {
  applyFilenameModifiers,
  isoUtc,
} from "../../infrastructure/utils/format.utils.js";
import { pause } from "../../infrastructure/utils/time.utils.js";

/** Metadata key holding the absolute source path of every upload. */
export const ORIGINAL_PATH_KEY = "original_path";

export type DispatchConfig = Pick<
  RunConfig,
  "dryRun" | "deleteFiles" | "sleepSeconds" | "prefix" | "suffix" | "metadata"
>;

export type FileOutcome = "uploaded" | "upload_failed" | "dry_run";

export interface DispatchFilesRequest {
  files: FileRecord[];
  config: DispatchConfig;
  stats: RunStats;
  /** Checked between files; the in-flight file always completes. */
  signal?: AbortSignal;
}

export interface DispatchFilesResult {
  outcomes: { file: FileRecord; outcome: FileOutcome }[];
}

export interface DispatchDependencies {
  /** May be omitted for dry runs only. */
  uploader?: IUploader;
  ledger: ILedger;
  logger: ILogger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  removeFile?: (path: string) => Promise<void>;
}

export function buildUploadMetadata(
  base: Readonly<Record<string, string>>,
  file: FileRecord,
): Record<string, string> {
  return {
    ...base,
    [ORIGINAL_PATH_KEY]: file.path,
    filename: file.name,
    size_bytes: String(file.sizeBytes),
    last_modified_timestamp_source: isoUtc(file.mtimeMs),
  };
}

export class DispatchFilesUseCase {
  private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;
  private removeFile: (path: string) => Promise<void>;

  constructor(private deps: DispatchDependencies) {
    this.sleep = deps.sleep ?? pause;
    this.removeFile = deps.removeFile ?? unlink;
  }

  async execute(request: DispatchFilesRequest): Promise<DispatchFilesResult> {
    const { files, config, stats, signal } = request;
    const uploader = this.deps.uploader;
    if (!config.dryRun && !uploader && files.length > 0) {
      throw new StartupConfigError("No uploader configured for a live run.");
    }

    const outcomes: DispatchFilesResult["outcomes"] = [];
    for (let i = 0; i < files.length; i++) {
      if (i > 0) await this.sleep(config.sleepSeconds * 1000, signal);
      if (signal?.aborted) {
        stats.interrupted = true;
        this.deps.logger.status(
          `Interrupted; ${files.length - i} selected file(s) left for the next run`,
        );
        break;
      }
      const file = files[i];
      const outcome = await this.processFile(file, config, stats, uploader);
      outcomes.push({ file, outcome });
    }
    return { outcomes };
  }

  private async processFile(
    file: FileRecord,
    config: DispatchConfig,
    stats: RunStats,
    uploader: IUploader | undefined,
  ): Promise<FileOutcome> {
    const { ledger, logger } = this.deps;
    const objectName = applyFilenameModifiers(file.name, config.prefix, config.suffix);
    const metadata = buildUploadMetadata(config.metadata, file);

    if (config.dryRun) {
      logger.status(`[Dry Run] Would upload: ${file.path}`);
      stats.filesUploaded++;
      stats.bytesUploaded += file.sizeBytes;
      return "dry_run";
    }

    if (!uploader) throw new StartupConfigError("No uploader configured.");

    logger.debug(`Uploading ${objectName}`);
    let result: UploadResult;
    try {
      result = await uploader.upload({
        filePath: file.path,
        objectName,
        metadata,
        sizeBytes: file.sizeBytes,
        mtimeMs: file.mtimeMs,
      });
    } catch (e) {
      result = { success: false, error: formatError(e) };
    }

    if (!result.success) {
      const failure = new UploadError(file.path, `Failed to upload ${file.name}`);
      stats.errors++;
      logger.error(failure.message, { path: failure.path, error: result.error });
      return "upload_failed";
    }

    // A LedgerWriteError ends the run; nothing is deleted before this resolves.
    await ledger.recordUploaded({
      path: file.path,
      filenameAtUpload: objectName,
      sizeBytes: file.sizeBytes,
      mtimeMs: file.mtimeMs,
      timestamp: new Date().toISOString(),
      metadata,
    });
    stats.filesUploaded++;
    stats.bytesUploaded += file.sizeBytes;

    if (config.deleteFiles) {
      try {
        await this.removeFile(file.path);
      } catch (e) {
        stats.errors++;
        logger.error(`Uploaded but could not delete ${file.name}`, {
          path: file.path,
          error: formatError(e),
        });
      }
    }

    logger.debug(`Uploaded ${objectName}`);
    return "uploaded";
  }
}

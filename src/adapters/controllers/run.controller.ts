import { existsSync } from "node:fs";
import { join, resolve } from "node:path";
import type {
  RunConfig,
  S3TargetConfig,
} from "../../core/domain/entities/config.entity.js";
import {
  StartupConfigError,
  formatError,
  isFatalRunError,
} from "../../core/domain/errors.js";
import type { IUploader } from "../../core/domain/services/uploader.service.js";
import { RunBatchUseCase } from "../../core/use-cases/run-batch.use-case.js";
import { CsvLedgerRepository } from "../../infrastructure/database/csv-ledger.repository.js";
import {
  RUN_HISTORY_DB,
  SqliteRunHistoryRepository,
} from "../../infrastructure/database/sqlite-run-history.repository.js";
import { AwsS3UploaderService } from "../../infrastructure/services/aws-s3-uploader.service.js";
import { ConsoleLogger } from "../../infrastructure/services/console-logger.service.js";
import { FanoutLogger } from "../../infrastructure/services/fanout-logger.service.js";
import { JsonLogger } from "../../infrastructure/services/json-logger.service.js";
import {
  DEFAULT_SOURCE,
  STATE_DIR_NAME,
  buildRunConfig,
} from "../../infrastructure/utils/config.utils.js";
import { formatBytes } from "../../infrastructure/utils/format.utils.js";
import { runId } from "../../infrastructure/utils/id.utils.js";
import {
  HistoryCommandSchema,
  RunCommandSchema,
  describeIssues,
  toRunOptions,
} from "../validation.js";

export const LOG_DIR_NAME = "logs";

export interface RunControllerOptions {
  env?: Record<string, string | undefined>;
  out?: (line: string) => void;
  err?: (line: string) => void;
  createUploader?: (target: S3TargetConfig) => IUploader;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Command handlers for the CLI. Each returns the process exit code. */
export class RunController {
  private env: Record<string, string | undefined>;
  private out: (line: string) => void;
  private err: (line: string) => void;
  private createUploader: (target: S3TargetConfig) => IUploader;

  constructor(private options: RunControllerOptions = {}) {
    this.env = options.env ?? process.env;
    this.out = options.out ?? ((line) => console.log(line));
    this.err = options.err ?? ((line) => console.error(line));
    this.createUploader =
      options.createUploader ?? ((target) => new AwsS3UploaderService(target));
  }

  async run(rawOptions: unknown, signal?: AbortSignal): Promise<number> {
    let config: RunConfig;
    try {
      const parsed = RunCommandSchema.safeParse(rawOptions);
      if (!parsed.success) {
        throw new StartupConfigError(`Validation failed:\n${describeIssues(parsed.error)}`);
      }
      config = buildRunConfig(toRunOptions(parsed.data), this.env);
    } catch (e) {
      this.err(`Startup failed: ${formatError(e)}`);
      return 1;
    }

    const id = runId();
    const logger = new FanoutLogger([
      new ConsoleLogger(config.debug, this.out, this.err),
      new JsonLogger(join(config.stateDir, LOG_DIR_NAME), {
        device_name: config.metadata.device_name ?? "unknown",
      }),
    ]);
    const runHistory = new SqliteRunHistoryRepository(join(config.stateDir, RUN_HISTORY_DB));
    const useCase = new RunBatchUseCase({
      ledger: new CsvLedgerRepository(config.stateDir),
      logger,
      uploader: config.s3 ? this.createUploader(config.s3) : undefined,
      runHistory,
      sleep: this.options.sleep,
    });

    try {
      await useCase.execute({ runId: id, config, signal });
      return 0;
    } catch (e) {
      const kind = isFatalRunError(e) ? e.name : "Unexpected error";
      this.err(`Run failed (${kind}): ${formatError(e)}`);
      return 1;
    } finally {
      runHistory.close();
    }
  }

  async history(rawOptions: unknown): Promise<number> {
    const parsed = HistoryCommandSchema.safeParse(rawOptions);
    if (!parsed.success) {
      this.err(`Validation failed:\n${describeIssues(parsed.error)}`);
      return 1;
    }
    const opts = parsed.data;
    const stateDir = resolve(opts.stateDir ?? join(opts.source ?? DEFAULT_SOURCE, STATE_DIR_NAME));
    const dbPath = join(stateDir, RUN_HISTORY_DB);
    if (!existsSync(dbPath)) {
      this.out(`No runs recorded in ${stateDir}.`);
      return 0;
    }

    const repo = new SqliteRunHistoryRepository(dbPath);
    try {
      const runs = await repo.getRecentRuns(opts.limit);
      if (runs.length === 0) {
        this.out(`No runs recorded in ${stateDir}.`);
        return 0;
      }
      for (const r of runs) {
        const skipped = Object.values(r.filesSkipped).reduce((a, n) => a + n, 0);
        this.out(
          `${r.startedAt}  ${r.runId}  scanned=${r.filesScanned} uploaded=${r.filesUploaded} ` +
            `(${formatBytes(r.bytesUploaded)}) skipped=${skipped} errors=${r.errors}` +
            (r.interrupted ? " interrupted" : ""),
        );
      }
      return 0;
    } catch (e) {
      this.err(`Failed to read run history: ${formatError(e)}`);
      return 1;
    } finally {
      repo.close();
    }
  }
}

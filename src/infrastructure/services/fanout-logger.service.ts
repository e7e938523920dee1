import type { RunStats } from "../../core/domain/entities/file-record.entity.js";
import type { ILogger, LogFields } from "../../core/domain/services/logger.service.js";

export class FanoutLogger implements ILogger {
  constructor(private loggers: ILogger[]) {}

  init(runId: string): void {
    for (const l of this.loggers) l.init(runId);
  }
  status(message: string, fields?: LogFields): void {
    for (const l of this.loggers) l.status(message, fields);
  }
  error(message: string, fields?: LogFields): void {
    for (const l of this.loggers) l.error(message, fields);
  }
  stats(stats: RunStats): void {
    for (const l of this.loggers) l.stats(stats);
  }
  debug(message: string): void {
    for (const l of this.loggers) l.debug(message);
  }
  async close(): Promise<void> {
    await Promise.all(this.loggers.map((l) => l.close()));
  }
}

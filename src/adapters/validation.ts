import { z } from "zod";
import type { RunOptions } from "../infrastructure/utils/config.utils.js";

/**
 * Schemas for the option bags commander hands to each command. Numeric
 * options arrive already parsed; NaN from a bad value is rejected here.
 */

export const RunCommandSchema = z.object({
  source: z.string().min(1).optional(),
  glob: z.string().optional(),
  recursive: z.boolean().optional(),
  skipLastFile: z.number().int().min(0).optional(),
  sortKey: z.enum(["mtime", "name"]).optional(),
  maxFileSize: z.number().int().min(0).optional(),
  numFiles: z.number().int().min(0).optional(),
  sleep: z.number().min(0).optional(),
  prefix: z.string().optional(),
  suffix: z.string().optional(),
  dryRun: z.boolean().optional(),
  deleteFiles: z.boolean().optional(),
  transferSymlinks: z.boolean().optional(),
  stateDir: z.string().min(1).optional(),
  debug: z.boolean().optional(),
});

export type RunCommandOptions = z.infer<typeof RunCommandSchema>;

export const HistoryCommandSchema = z.object({
  source: z.string().min(1).optional(),
  stateDir: z.string().min(1).optional(),
  limit: z.number().int().min(1).max(1000).default(20),
});

export type HistoryCommandOptions = z.infer<typeof HistoryCommandSchema>;

export function toRunOptions(cli: RunCommandOptions): RunOptions {
  return {
    source: cli.source,
    stateDir: cli.stateDir,
    glob: cli.glob,
    recursive: cli.recursive,
    followSymlinks: cli.transferSymlinks,
    maxFileSize: cli.maxFileSize,
    skipLastN: cli.skipLastFile,
    sortKey: cli.sortKey,
    numFiles: cli.numFiles,
    sleepSeconds: cli.sleep,
    prefix: cli.prefix,
    suffix: cli.suffix,
    dryRun: cli.dryRun,
    deleteFiles: cli.deleteFiles,
    debug: cli.debug,
  };
}

/**
 * Commander option parser. The whole string must be numeric (`1e9` is
 * accepted, `10abc` is not); the schemas then reject NaN, fractions where
 * an integer is needed, and negatives.
 */
export function parseNumberOption(value: string): number {
  return value.trim() === "" ? Number.NaN : Number(value);
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "options"}: ${issue.message}`)
    .join("\n");
}

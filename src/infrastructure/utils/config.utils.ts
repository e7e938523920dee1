import { readFileSync, statSync } from "node:fs";
import { join, resolve } from "node:path";
import yaml from "js-yaml";
import { config as loadEnv } from "dotenv";
import { z } from "zod";
import {
  REQUIRED_METADATA_FIELDS,
  type RunConfig,
  type S3TargetConfig,
  type UploadMetadata,
} from "../../core/domain/entities/config.entity.js";
import { StartupConfigError, formatError } from "../../core/domain/errors.js";

export const DEFAULT_SOURCE = "/data/";
export const STATE_DIR_NAME = ".forager";
export const METADATA_FILE = "metadata.yaml";
export const DEFAULT_MAX_FILE_SIZE = 1024 * 1024 * 1024;
export const DEFAULT_S3_REGION = "us-east-1";

type Env = Record<string, string | undefined>;

export const RunOptionsSchema = z.object({
  source: z.string().min(1).default(DEFAULT_SOURCE),
  stateDir: z.string().min(1).optional(),
  glob: z.string().optional(),
  recursive: z.boolean().default(false),
  followSymlinks: z.boolean().default(false),
  maxFileSize: z.number().int().min(0).default(DEFAULT_MAX_FILE_SIZE),
  skipLastN: z.number().int().min(0).default(1),
  sortKey: z.enum(["mtime", "name"]).default("mtime"),
  numFiles: z.number().int().min(0).default(10),
  sleepSeconds: z.number().min(0).default(3),
  prefix: z.string().default(""),
  suffix: z.string().default(""),
  dryRun: z.boolean().default(false),
  deleteFiles: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type RunOptions = z.input<typeof RunOptionsSchema>;

/** Loads `.env` into `process.env` without overriding what is already set. */
export function loadEnvironment(path?: string): void {
  loadEnv(path ? { path } : undefined);
}

export function substituteEnv(value: unknown, env: Env = process.env): unknown {
  if (typeof value === "string" && value.startsWith("${") && value.endsWith("}")) {
    const key = value.slice(2, -1);
    return env[key] ?? value;
  }
  if (Array.isArray(value)) return value.map((v) => substituteEnv(v, env));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(value)) out[k] = substituteEnv(v, env);
    return out;
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

export function validateMetadata(
  raw: Record<string, unknown>,
  metadataPath: string,
): UploadMetadata {
  const missing: string[] = [];
  for (const field of REQUIRED_METADATA_FIELDS) {
    if (typeof raw[field] !== "string" || !raw[field]) missing.push(field);
  }
  const invalid = Object.entries(raw)
    .filter(([k, v]) => typeof v !== "string" && !missing.includes(k))
    .map(([k]) => `${k} (must be a string)`);
  const problems = [...missing, ...invalid];
  if (problems.length > 0) {
    throw new StartupConfigError(
      `Invalid metadata at ${metadataPath}. Missing or invalid: ${problems.join(", ")}.`,
    );
  }
  const metadata: Record<string, string> = {};
  for (const [k, v] of Object.entries(raw)) {
    if (typeof v === "string") metadata[k] = v;
  }
  return Object.freeze(metadata);
}

export function loadMetadata(metadataPath: string, env: Env = process.env): UploadMetadata {
  let raw: string;
  try {
    raw = readFileSync(metadataPath, "utf-8");
  } catch (e) {
    throw new StartupConfigError(`Failed to load metadata from ${metadataPath}. ${formatError(e)}`, {
      cause: e,
    });
  }
  let parsed: unknown;
  try {
    parsed = yaml.load(raw);
  } catch (e) {
    throw new StartupConfigError(`Invalid YAML in ${metadataPath}. ${formatError(e)}`, {
      cause: e,
    });
  }
  const withEnv = substituteEnv(parsed, env);
  if (!isRecord(withEnv)) {
    throw new StartupConfigError(`Metadata at ${metadataPath} must be a YAML mapping.`);
  }
  return validateMetadata(withEnv, metadataPath);
}

export function loadS3Target(env: Env, dryRun: boolean): S3TargetConfig | undefined {
  const bucket = env.S3_BUCKET?.trim();
  if (!bucket) {
    if (dryRun) return undefined;
    throw new StartupConfigError("S3_BUCKET is required unless --dry-run is set.");
  }
  return {
    bucket,
    region: env.S3_REGION?.trim() || env.AWS_REGION?.trim() || DEFAULT_S3_REGION,
    prefix: env.S3_PREFIX?.trim() ?? "",
  };
}

/**
 * Validates every option once and returns a frozen RunConfig. Fails before
 * any scan when a required field is missing.
 */
export function buildRunConfig(options: RunOptions, env: Env = process.env): RunConfig {
  const parsed = RunOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("\n");
    throw new StartupConfigError(`Validation failed:\n${issues}`);
  }
  const opts = parsed.data;
  const source = resolve(opts.source);

  let isDir = false;
  try {
    isDir = statSync(source).isDirectory();
  } catch (e) {
    throw new StartupConfigError(`Source directory ${source} does not exist.`, { cause: e });
  }
  if (!isDir) throw new StartupConfigError(`Source ${source} is not a directory.`);

  const stateDir = resolve(opts.stateDir ?? join(source, STATE_DIR_NAME));
  // The scan skips the state directory as a subdirectory only.
  if (stateDir === source) {
    throw new StartupConfigError(
      `State directory ${stateDir} must not be the source directory itself.`,
    );
  }
  const metadata = loadMetadata(join(stateDir, METADATA_FILE), env);
  const s3 = loadS3Target(env, opts.dryRun);

  return Object.freeze({
    source,
    stateDir,
    glob: opts.glob,
    recursive: opts.recursive,
    followSymlinks: opts.followSymlinks,
    maxFileSize: opts.maxFileSize,
    skipLastN: opts.skipLastN,
    sortKey: opts.sortKey,
    numFiles: opts.numFiles,
    sleepSeconds: opts.sleepSeconds,
    prefix: opts.prefix,
    suffix: opts.suffix,
    dryRun: opts.dryRun,
    deleteFiles: opts.deleteFiles,
    debug: opts.debug,
    metadata,
    s3: s3 ? Object.freeze(s3) : undefined,
  });
}

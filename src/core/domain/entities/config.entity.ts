export type SortKey = "mtime" | "name";

/** Static key/value pairs attached to every upload (site, sensor, ...). */
export type UploadMetadata = Readonly<Record<string, string>>;

export interface S3TargetConfig {
  bucket: string;
  region: string;
  prefix: string;
}

export interface RunConfig {
  readonly source: string;
  /** Directory holding the ledger, metadata.yaml and run logs. */
  readonly stateDir: string;
  readonly glob?: string;
  readonly recursive: boolean;
  readonly followSymlinks: boolean;
  /** Bytes. 0 disables the size policy. */
  readonly maxFileSize: number;
  readonly skipLastN: number;
  readonly sortKey: SortKey;
  /** Batch size. 0 means no limit. */
  readonly numFiles: number;
  readonly sleepSeconds: number;
  readonly prefix: string;
  readonly suffix: string;
  readonly dryRun: boolean;
  readonly deleteFiles: boolean;
  readonly debug: boolean;
  readonly metadata: UploadMetadata;
  /** Absent only for dry runs. */
  readonly s3?: S3TargetConfig;
}

export const REQUIRED_METADATA_FIELDS = [
  "upload_name",
  "site",
  "sensor",
  "project",
  "creator",
] as const;

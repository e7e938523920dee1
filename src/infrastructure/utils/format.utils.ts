import { extname } from "node:path";

/** ISO-8601 UTC for an epoch in milliseconds. */
export function isoUtc(epochMs: number): string {
  return new Date(epochMs).toISOString();
}

/** `data.txt` + `pre_` / `_suf` -> `pre_data_suf.txt`. */
export function applyFilenameModifiers(
  filename: string,
  prefix: string,
  suffix: string,
): string {
  const ext = extname(filename);
  const base = ext ? filename.slice(0, -ext.length) : filename;
  return `${prefix}${base}${suffix}${ext}`;
}

export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ["KB", "MB", "GB", "TB"];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(2)} ${units[unit]}`;
}

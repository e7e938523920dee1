import type { SortKey } from "../domain/entities/config.entity.js";
import type { FileRecord } from "../domain/entities/file-record.entity.js";
import type { ILedger } from "../domain/repositories/ledger.repository.js";

export const OVERSIZED_REASON = "oversized";

export interface SelectFilesRequest {
  files: Iterable<FileRecord>;
  /** 0 disables the size policy. */
  maxFileSize: number;
  sortKey: SortKey;
  skipLastN: number;
  /** 0 means no batch limit. */
  numFiles: number;
  /** Dry runs leave the ledger untouched, oversized files included. */
  dryRun: boolean;
}

export interface SelectFilesResult {
  selected: FileRecord[];
  scanned: number;
  alreadyProcessed: number;
  oversized: FileRecord[];
  /** Held back by skip-last-N as possibly still being written. */
  deferred: FileRecord[];
  /** Eligible but beyond the batch size; picked up by a later run. */
  overBatch: number;
}

function compareStrings(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Total order: the sort key first, then the path. */
export function compareRecords(
  sortKey: SortKey,
): (a: FileRecord, b: FileRecord) => number {
  if (sortKey === "mtime") {
    return (a, b) => a.mtimeMs - b.mtimeMs || compareStrings(a.path, b.path);
  }
  return (a, b) => compareStrings(a.name, b.name) || compareStrings(a.path, b.path);
}

export class SelectFilesUseCase {
  constructor(private ledger: ILedger) {}

  async execute(request: SelectFilesRequest): Promise<SelectFilesResult> {
    let scanned = 0;
    let alreadyProcessed = 0;
    const oversized: FileRecord[] = [];
    const candidates: FileRecord[] = [];

    for (const file of request.files) {
      scanned++;
      if (this.ledger.has(file.path)) {
        alreadyProcessed++;
        continue;
      }
      if (request.maxFileSize > 0 && file.sizeBytes > request.maxFileSize) {
        oversized.push(file);
        if (!request.dryRun) {
          await this.ledger.recordSkipped({
            path: file.path,
            reason: OVERSIZED_REASON,
            sizeBytes: file.sizeBytes,
            mtimeMs: file.mtimeMs,
            timestamp: new Date().toISOString(),
          });
        }
        continue;
      }
      candidates.push(file);
    }

    candidates.sort(compareRecords(request.sortKey));

    const skip = Math.max(0, request.skipLastN);
    const keep = Math.max(0, candidates.length - skip);
    const eligible = candidates.slice(0, keep);
    const deferred = candidates.slice(keep);

    const limit = request.numFiles > 0 ? request.numFiles : eligible.length;
    const selected = eligible.slice(0, limit);

    return {
      selected,
      scanned,
      alreadyProcessed,
      oversized,
      deferred,
      overBatch: eligible.length - selected.length,
    };
  }
}

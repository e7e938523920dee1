import {
  type Dirent,
  type Stats,
  lstatSync,
  readdirSync,
  realpathSync,
  statSync,
} from "node:fs";
import { join, resolve } from "node:path";
import type { FileRecord } from "../domain/entities/file-record.entity.js";
import { ScanSubtreeError } from "../domain/errors.js";
import { createNameMatcher } from "../../infrastructure/utils/glob.utils.js";

export interface ScanFilesRequest {
  root: string;
  glob?: string;
  recursive: boolean;
  followSymlinks: boolean;
  /** Directories never entered, e.g. the ledger's own state directory. */
  excludeDirs?: string[];
  onError?: (error: ScanSubtreeError) => void;
}

interface WalkContext {
  recursive: boolean;
  followSymlinks: boolean;
  matches: (name: string) => boolean;
  excluded: Set<string>;
  visited: Set<string>;
  onError: (error: ScanSubtreeError) => void;
}

/**
 * Lazily walks the watched root. Every call re-reads the filesystem; no state
 * is kept between calls.
 */
export class ScanFilesUseCase {
  *execute(request: ScanFilesRequest): Generator<FileRecord> {
    const root = resolve(request.root);
    const ctx: WalkContext = {
      recursive: request.recursive,
      followSymlinks: request.followSymlinks,
      matches: createNameMatcher(request.glob),
      excluded: new Set((request.excludeDirs ?? []).map((d) => resolve(d))),
      visited: new Set(),
      onError: request.onError ?? (() => {}),
    };
    yield* this.walkDir(root, ctx);
  }

  private *walkDir(dir: string, ctx: WalkContext): Generator<FileRecord> {
    let entries: Dirent[];
    try {
      const real = realpathSync(dir);
      if (ctx.visited.has(real)) return;
      ctx.visited.add(real);
      entries = readdirSync(dir, { withFileTypes: true });
    } catch (e) {
      ctx.onError(new ScanSubtreeError(dir, { cause: e }));
      return;
    }

    entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

    for (const entry of entries) {
      const fullPath = join(dir, entry.name);

      if (entry.isSymbolicLink()) {
        if (!ctx.followSymlinks) continue;
        let target: Stats;
        try {
          target = statSync(fullPath);
        } catch (e) {
          // dangling link
          ctx.onError(new ScanSubtreeError(fullPath, { cause: e }));
          continue;
        }
        if (target.isDirectory()) {
          if (ctx.recursive && !ctx.excluded.has(fullPath)) {
            yield* this.walkDir(fullPath, ctx);
          }
        } else if (target.isFile() && ctx.matches(entry.name)) {
          yield toRecord(fullPath, entry.name, target, true);
        }
        continue;
      }

      if (entry.isDirectory()) {
        if (ctx.recursive && !ctx.excluded.has(fullPath)) {
          yield* this.walkDir(fullPath, ctx);
        }
        continue;
      }

      if (!entry.isFile() || !ctx.matches(entry.name)) continue;

      let stats: Stats;
      try {
        stats = lstatSync(fullPath);
      } catch (e) {
        ctx.onError(new ScanSubtreeError(fullPath, { cause: e }));
        continue;
      }
      yield toRecord(fullPath, entry.name, stats, false);
    }
  }
}

function toRecord(
  path: string,
  name: string,
  stats: Stats,
  isSymlink: boolean,
): FileRecord {
  return {
    path,
    name,
    sizeBytes: stats.size,
    mtimeMs: stats.mtimeMs,
    isSymlink,
  };
}

import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LOG_DIR_NAME, RunController } from "./run.controller.js";
import { RunCommandSchema, parseNumberOption } from "../validation.js";
import {
  BASE_MTIME_SEC,
  FakeUploader,
  TEST_METADATA,
  makeTempDir,
  noSleep,
  removeDir,
  writeFileAt,
  writeMetadata,
} from "../../../test-config/helpers.js";

describe("RunController", () => {
  let source: string;
  let stateDir: string;
  let out: string[];
  let err: string[];
  let uploader: FakeUploader;

  beforeEach(() => {
    source = makeTempDir();
    stateDir = join(source, ".forager");
    out = [];
    err = [];
    uploader = new FakeUploader();
    writeFileAt(source, "a.txt", "aaa", BASE_MTIME_SEC);
    writeFileAt(source, "b.txt", "bb", BASE_MTIME_SEC + 10);
    writeFileAt(source, "c.txt", "c", BASE_MTIME_SEC + 20);
  });

  afterEach(() => {
    removeDir(source);
  });

  function controller(env: Record<string, string | undefined> = {}) {
    return new RunController({
      env,
      out: (line) => out.push(line),
      err: (line) => err.push(line),
      createUploader: () => uploader,
      sleep: noSleep,
    });
  }

  it("fails at startup without metadata.yaml", async () => {
    const code = await controller().run({ source, dryRun: true });

    expect(code).toBe(1);
    expect(err).toHaveLength(1);
    expect(err[0]).toMatch(/^Startup failed: Failed to load metadata from /);
    expect(existsSync(join(stateDir, "uploaded_files.csv"))).toBe(false);
  });

  it("fails at startup on a negative batch size", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    const code = await controller().run({ source, numFiles: -1 });

    expect(code).toBe(1);
    expect(err).toEqual([
      "Startup failed: Validation failed:\nnumFiles: Number must be greater than or equal to 0",
    ]);
  });

  it("reads exponent notation as a whole number of bytes", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    const code = await controller().run({
      source,
      dryRun: true,
      maxFileSize: parseNumberOption("1e9"),
    });

    expect(code).toBe(0);
    expect(err).toEqual([]);
    expect(out.filter((l) => l.includes("[Dry Run] Would upload:"))).toHaveLength(2);
  });

  it("rejects numeric options with trailing text or fractions", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    expect(await controller().run({ source, numFiles: parseNumberOption("10abc") })).toBe(1);
    expect(await controller().run({ source, maxFileSize: parseNumberOption("1.5") })).toBe(1);
    expect(err).toEqual([
      "Startup failed: Validation failed:\nnumFiles: Expected number, received nan",
      "Startup failed: Validation failed:\nmaxFileSize: Expected integer, received float",
    ]);
    expect(existsSync(join(stateDir, "skipped_files.csv"))).toBe(false);
  });

  it("requires a bucket for a live run", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    expect(await controller().run({ source })).toBe(1);
    expect(err).toEqual([
      "Startup failed: S3_BUCKET is required unless --dry-run is set.",
    ]);
  });

  it("runs a dry run without S3 settings", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    const code = await controller().run({ source, dryRun: true });

    expect(code).toBe(0);
    expect(uploader.calls).toEqual([]);
    expect(out.some((l) => l.endsWith(`INFO [Dry Run] Would upload: ${join(source, "a.txt")}`))).toBe(true);
    expect(readdirSync(join(stateDir, LOG_DIR_NAME))).toHaveLength(1);
  });

  it("uploads a batch and lists it in the history", async () => {
    writeMetadata(stateDir, TEST_METADATA);

    const code = await controller({ S3_BUCKET: "test-bucket" }).run({ source });

    expect(code).toBe(0);
    expect(uploader.uploadedPaths()).toEqual([join(source, "a.txt"), join(source, "b.txt")]);

    out = [];
    expect(await controller().history({ source })).toBe(0);
    expect(out).toHaveLength(1);
    expect(out[0]).toMatch(
      /  run_\d{8}T\d{6}_[0-9a-z]{4}  scanned=3 uploaded=2 \(5 B\) skipped=1 errors=0$/,
    );
  });

  it("reports an empty history", async () => {
    expect(await controller().history({ source })).toBe(0);
    expect(out).toEqual([`No runs recorded in ${stateDir}.`]);
  });

  it("rejects an out-of-range history limit", async () => {
    expect(await controller().history({ source, limit: 0 })).toBe(1);
    expect(err).toEqual(["Validation failed:\nlimit: Number must be greater than or equal to 1"]);
  });
});

describe("parseNumberOption", () => {
  it("parses the whole string or yields NaN", () => {
    expect(parseNumberOption("1e9")).toBe(1_000_000_000);
    expect(parseNumberOption(" 42 ")).toBe(42);
    expect(parseNumberOption("10abc")).toBeNaN();
    expect(parseNumberOption("")).toBeNaN();
  });

  it("feeds the run schema, which keeps integers only", () => {
    expect(RunCommandSchema.safeParse({ maxFileSize: parseNumberOption("1e9") }).success).toBe(true);
    expect(RunCommandSchema.safeParse({ numFiles: parseNumberOption("10abc") }).success).toBe(false);
    expect(RunCommandSchema.safeParse({ skipLastFile: parseNumberOption("1.5") }).success).toBe(false);
    expect(RunCommandSchema.safeParse({ sleep: parseNumberOption("0.5") }).success).toBe(true);
  });
});

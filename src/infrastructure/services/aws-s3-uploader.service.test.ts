import { PutObjectCommand } from "@aws-sdk/client-s3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { AwsS3UploaderService, toS3Metadata } from "./aws-s3-uploader.service.js";
import { makeTempDir, removeDir, writeFileAt } from "../../../test-config/helpers.js";

describe("toS3Metadata", () => {
  it("normalises keys and percent-encodes non-ASCII values", () => {
    expect(
      toS3Metadata({
        Site: "north",
        "upload name": "batch 1",
        original_path: "/data/café.txt",
      }),
    ).toEqual({
      site: "north",
      upload_name: "batch 1",
      original_path: "%2Fdata%2Fcaf%C3%A9.txt",
    });
  });
});

describe("AwsS3UploaderService", () => {
  let dir: string;
  let filePath: string;

  beforeEach(() => {
    dir = makeTempDir();
    filePath = writeFileAt(dir, "a.txt", "hello");
  });

  afterEach(() => {
    removeDir(dir);
  });

  const request = () => ({
    filePath,
    objectName: "pre_a.txt",
    metadata: { site: "north", original_path: filePath },
    sizeBytes: 5,
    mtimeMs: 0,
  });

  it("puts the object under the configured prefix", async () => {
    const send = vi.fn(async (_command: PutObjectCommand) => ({}));
    const uploader = new AwsS3UploaderService(
      { bucket: "test-bucket", region: "us-east-1", prefix: "incoming" },
      { send },
    );

    const result = await uploader.upload(request());

    expect(result).toEqual({ success: true, location: "s3://test-bucket/incoming/pre_a.txt" });
    expect(send).toHaveBeenCalledTimes(1);
    const input = send.mock.calls[0][0].input;
    expect(input.Bucket).toBe("test-bucket");
    expect(input.Key).toBe("incoming/pre_a.txt");
    expect(input.ContentLength).toBe(5);
    expect(input.Metadata).toEqual({ site: "north", original_path: filePath });
  });

  it("reports a rejected request as a failed upload", async () => {
    const send = vi.fn(async (_command: PutObjectCommand) => {
      throw new Error("AccessDenied");
    });
    const uploader = new AwsS3UploaderService(
      { bucket: "test-bucket", region: "us-east-1", prefix: "" },
      { send },
    );

    expect(await uploader.upload(request())).toEqual({ success: false, error: "AccessDenied" });
  });

  it("builds keys with and without a trailing slash on the prefix", () => {
    const target = { bucket: "b", region: "us-east-1" };
    expect(new AwsS3UploaderService({ ...target, prefix: "" }, { send: vi.fn() }).objectKey("x.txt")).toBe("x.txt");
    expect(new AwsS3UploaderService({ ...target, prefix: "a/" }, { send: vi.fn() }).objectKey("x.txt")).toBe("a/x.txt");
    expect(new AwsS3UploaderService({ ...target, prefix: "/a/b" }, { send: vi.fn() }).objectKey("x.txt")).toBe("a/b/x.txt");
  });
});

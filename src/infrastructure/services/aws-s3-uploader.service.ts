import { createReadStream } from "node:fs";
import { PutObjectCommand, S3Client } from "@aws-sdk/client-s3";
import type { S3TargetConfig } from "../../core/domain/entities/config.entity.js";
import { formatError } from "../../core/domain/errors.js";
import type {
  IUploader,
  UploadRequest,
  UploadResult,
} from "../../core/domain/services/uploader.service.js";

/** The part of S3Client the uploader needs; lets tests pass a stand-in. */
export interface S3Sender {
  send(command: PutObjectCommand): Promise<unknown>;
}

/**
 * S3 user metadata travels as HTTP headers: keys are lower-cased to a safe
 * character set and non-ASCII values are percent-encoded.
 */
export function toS3Metadata(metadata: Record<string, string>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(metadata)) {
    const safeKey = key.toLowerCase().replace(/[^a-z0-9_-]/g, "_");
    out[safeKey] = /^[\x20-\x7e]*$/.test(value) ? value : encodeURIComponent(value);
  }
  return out;
}

export class AwsS3UploaderService implements IUploader {
  private client: S3Sender;

  constructor(
    private target: S3TargetConfig,
    client?: S3Sender,
  ) {
    this.client = client ?? new S3Client({ region: target.region });
  }

  objectKey(objectName: string): string {
    const prefix = this.target.prefix.replace(/^\/+/, "");
    if (!prefix) return objectName;
    return prefix.endsWith("/") ? prefix + objectName : `${prefix}/${objectName}`;
  }

  async upload(request: UploadRequest): Promise<UploadResult> {
    const key = this.objectKey(request.objectName);
    const body = createReadStream(request.filePath);
    let readError: unknown;
    body.once("error", (e) => {
      readError = e;
    });
    try {
      await this.client.send(
        new PutObjectCommand({
          Bucket: this.target.bucket,
          Key: key,
          Body: body,
          ContentLength: request.sizeBytes,
          Metadata: toS3Metadata(request.metadata),
        }),
      );
      if (readError) return { success: false, error: formatError(readError) };
      return { success: true, location: `s3://${this.target.bucket}/${key}` };
    } catch (e) {
      return { success: false, error: formatError(readError ?? e) };
    } finally {
      body.destroy();
    }
  }
}

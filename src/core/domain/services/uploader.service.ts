export interface UploadRequest {
  filePath: string;
  /** Name the file gets at the destination (prefix/suffix applied). */
  objectName: string;
  metadata: Record<string, string>;
  sizeBytes: number;
  mtimeMs: number;
}

export type UploadResult =
  | { success: true; location?: string }
  | { success: false; error: string };

/** Transfers one file to remote storage. Opaque to the engine. */
export interface IUploader {
  upload(request: UploadRequest): Promise<UploadResult>;
}

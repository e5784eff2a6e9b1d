import { randomUUID } from "node:crypto";
import {
  CopyObjectCommand,
  DeleteObjectCommand,
  GetObjectCommand,
  HeadObjectCommand,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from "@aws-sdk/client-s3";
import { ObjectStat, ObjectStore } from "../../domain/ports.js";

export interface S3ObjectStoreOptions {
  bucket: string;
  region: string;
  endpoint: string | null;
  forcePathStyle: boolean;
  accessKeyId: string | null;
  secretAccessKey: string | null;
  timeoutMs: number;
}

/**
 * S3-compatible bucket (AWS, MinIO, Supabase Storage). Uploads land on a
 * unique temporary key first and are then copied onto the target key, so a
 * reader never sees a partially written object.
 */
export class S3ObjectStore implements ObjectStore {
  private readonly client: S3Client;

  constructor(private readonly options: S3ObjectStoreOptions) {
    this.client = new S3Client({
      region: options.region,
      endpoint: options.endpoint ?? undefined,
      forcePathStyle: options.forcePathStyle,
      credentials:
        options.accessKeyId && options.secretAccessKey
          ? {
              accessKeyId: options.accessKeyId,
              secretAccessKey: options.secretAccessKey,
            }
          : undefined,
    });
  }

  get description(): string {
    return `s3://${this.options.bucket}`;
  }

  async get(key: string): Promise<Buffer | null> {
    try {
      const output = await this.client.send(
        new GetObjectCommand({ Bucket: this.options.bucket, Key: key }),
        { abortSignal: this.signal() },
      );
      if (!output.Body) {
        return null;
      }
      return Buffer.from(await output.Body.transformToByteArray());
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(key: string, bytes: Buffer): Promise<void> {
    const tempKey = `${key}.tmp-${randomUUID()}`;
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.options.bucket,
        Key: tempKey,
        Body: bytes,
        ContentType: "application/json",
      }),
      { abortSignal: this.signal() },
    );

    try {
      await this.client.send(
        new CopyObjectCommand({
          Bucket: this.options.bucket,
          Key: key,
          CopySource: `${this.options.bucket}/${encodeKey(tempKey)}`,
          ContentType: "application/json",
          MetadataDirective: "REPLACE",
        }),
        { abortSignal: this.signal() },
      );
    } finally {
      await this.removeTemporary(tempKey);
    }
  }

  async stat(key: string): Promise<ObjectStat | null> {
    try {
      const output = await this.client.send(
        new HeadObjectCommand({ Bucket: this.options.bucket, Key: key }),
        { abortSignal: this.signal() },
      );
      return { sizeBytes: output.ContentLength ?? 0 };
    } catch (error) {
      if (isMissingObject(error)) {
        return null;
      }
      throw error;
    }
  }

  destroy(): void {
    this.client.destroy();
  }

  private signal(): AbortSignal {
    return AbortSignal.timeout(this.options.timeoutMs);
  }

  // Cleanup failures are logged; the upload result stands.
  private async removeTemporary(tempKey: string): Promise<void> {
    try {
      await this.client.send(
        new DeleteObjectCommand({ Bucket: this.options.bucket, Key: tempKey }),
        { abortSignal: this.signal() },
      );
    } catch (error) {
      console.error(
        `[rag] could not remove temporary object ${tempKey}: ${error instanceof Error ? error.message : "unknown error"}`,
      );
    }
  }
}

function isMissingObject(error: unknown): boolean {
  if (!(error instanceof S3ServiceException)) {
    return false;
  }
  return (
    error.name === "NoSuchKey" ||
    error.name === "NotFound" ||
    error.$metadata.httpStatusCode === 404
  );
}

function encodeKey(key: string): string {
  return key.split("/").map(encodeURIComponent).join("/");
}

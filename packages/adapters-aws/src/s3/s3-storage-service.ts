import { createReadStream } from "node:fs";
import { stat } from "node:fs/promises";
import { type S3Client, DeleteObjectCommand } from "@aws-sdk/client-s3";
import { Upload } from "@aws-sdk/lib-storage";
import type { BlobRef, IBlobStorageService } from "@skyforge/adapters-common";
import { classifyAwsError, getAwsErrorName, withAwsErrors } from "../errors/aws-error-classifier";

const MIN_PART_SIZE = 5 * 1024 * 1024;
const MAX_PARTS = 10_000;

/** Smallest part size that keeps a file of `size` bytes within the S3 part limit */
export function multipartPartSize(size: number): number {
  return Math.max(MIN_PART_SIZE, Math.ceil(size / MAX_PARTS));
}

/**
 * Stages raw disk images in an S3 bucket for snapshot import.
 */
export class S3StorageService implements IBlobStorageService {
  constructor(
    private readonly client: S3Client,
    private readonly bucket: string,
  ) {}

  async uploadBlob(key: string, filePath: string): Promise<BlobRef> {
    const { size } = await stat(filePath);

    const upload = new Upload({
      client: this.client,
      params: { Bucket: this.bucket, Key: key, Body: createReadStream(filePath) },
      partSize: multipartPartSize(size),
    });
    await withAwsErrors(`Unable to upload ${filePath} to s3://${this.bucket}/${key}`, () =>
      upload.done(),
    );

    return { bucket: this.bucket, key };
  }

  async deleteBlob(ref: BlobRef): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: ref.bucket, Key: ref.key }));
    } catch (error: unknown) {
      const name = getAwsErrorName(error);
      if (name === "NoSuchKey" || name === "NotFound") return;
      throw classifyAwsError(error, `Unable to delete s3://${ref.bucket}/${ref.key}`);
    }
  }
}

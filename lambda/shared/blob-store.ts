/**
 * Blob Store
 *
 * モデルアーティファクトの取得元 (S3)。
 * ダウンロードは一時ファイルに書き込んでから rename するため、
 * 同じパスを読む他の実行環境が途中までのファイルを見ることはない。
 */

import { GetObjectCommand } from "@aws-sdk/client-s3";
import { mkdir, rename, rm, writeFile } from "fs/promises";
import * as path from "path";
import { RemoteNotFoundError } from "./errors";

export interface BlobStore {
  /** Fetch `s3://bucket/key`, write it byte-for-byte to destinationPath and return the bytes. */
  download(bucket: string, key: string, destinationPath: string): Promise<Buffer>;
}

/** Subset of S3Client used here; S3Client satisfies it. */
export interface GetObjectSender {
  send(command: GetObjectCommand): Promise<{
    Body?: { transformToByteArray(): Promise<Uint8Array> };
  }>;
}

const NOT_FOUND_NAMES = new Set(["NoSuchKey", "NotFound", "NoSuchBucket"]);

export function isNotFoundError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (NOT_FOUND_NAMES.has(error.name)) return true;

  if ("$metadata" in error) {
    const metadata = error.$metadata;
    return (
      typeof metadata === "object" &&
      metadata !== null &&
      "httpStatusCode" in metadata &&
      metadata.httpStatusCode === 404
    );
  }
  return false;
}

export async function writeFileAtomic(destinationPath: string, bytes: Uint8Array): Promise<void> {
  await mkdir(path.dirname(destinationPath), { recursive: true });

  const tempPath = `${destinationPath}.${process.pid}.${Date.now()}.download`;
  try {
    await writeFile(tempPath, bytes);
    await rename(tempPath, destinationPath);
  } catch (error) {
    await rm(tempPath, { force: true });
    throw error;
  }
}

export class S3BlobStore implements BlobStore {
  constructor(private readonly client: GetObjectSender) {}

  async download(bucket: string, key: string, destinationPath: string): Promise<Buffer> {
    let bytes: Buffer;
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: bucket, Key: key }));
      if (!response.Body) {
        throw new RemoteNotFoundError(bucket, key);
      }
      bytes = Buffer.from(await response.Body.transformToByteArray());
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new RemoteNotFoundError(bucket, key, { cause: error });
      }
      throw error;
    }

    await writeFileAtomic(destinationPath, bytes);
    return bytes;
  }
}

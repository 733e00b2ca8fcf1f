/**
 * S3 Media Storage
 * Downloads the requested object into a per-invocation temp directory.
 */

import { GetObjectCommand, NoSuchKey, type GetObjectCommandOutput } from "@aws-sdk/client-s3";
import { createWriteStream } from "fs";
import { mkdir, rm, writeFile } from "fs/promises";
import { pipeline } from "stream/promises";
import { Readable } from "stream";
import { randomUUID } from "crypto";
import path from "path";
import { NotFoundError } from "../../../utils/errors.js";
import type { MediaStorage, StagedMedia } from "./types.js";

/**
 * Local file name for a downloaded object: the key's last path segment,
 * or "media" when the key ends in a slash.
 */
export function stagingFileName(keyName: string): string {
  const normalized = keyName.replace(/\\/g, "/");
  const base = path.posix.basename(normalized);
  if (!base || normalized.endsWith("/") || base === "." || base === "..") {
    return "media";
  }
  return base;
}

/** The part of S3Client this storage uses. */
export interface S3ObjectReader {
  send(command: GetObjectCommand): Promise<GetObjectCommandOutput>;
}

export class S3MediaStorage implements MediaStorage {
  readonly name = "s3";

  constructor(
    private readonly client: S3ObjectReader,
    private readonly tempRoot: string
  ) {}

  async stage(bucketName: string, keyName: string): Promise<StagedMedia> {
    const workDir = path.join(this.tempRoot, randomUUID());
    const filePath = path.join(workDir, stagingFileName(keyName));
    await mkdir(workDir, { recursive: true });

    const cleanup = async (): Promise<void> => {
      try {
        await rm(workDir, { recursive: true, force: true });
      } catch (error) {
        console.warn(`[storage] Failed to remove ${workDir}:`, error);
      }
    };

    try {
      await this.download(bucketName, keyName, filePath);
    } catch (error) {
      await cleanup();
      throw error;
    }

    return { path: filePath, cleanup };
  }

  private async download(bucketName: string, keyName: string, filePath: string): Promise<void> {
    console.log(`[storage] Downloading s3://${bucketName}/${keyName}`);

    const response = await this.client
      .send(new GetObjectCommand({ Bucket: bucketName, Key: keyName }))
      .catch((error: unknown) => {
        if (error instanceof NoSuchKey) {
          throw new NotFoundError("Media object", `s3://${bucketName}/${keyName}`);
        }
        throw error;
      });

    const body = response.Body;
    if (!body) {
      throw new Error(`Empty response body for s3://${bucketName}/${keyName}`);
    }

    if (body instanceof Readable) {
      await pipeline(body, createWriteStream(filePath));
    } else {
      await writeFile(filePath, await body.transformToByteArray());
    }
  }
}

import { getRequiredEnv, MEDIA_TEMP_DIR, STORAGE_BACKEND } from "../../../config/env.js";
import { s3Client } from "../../../config/s3.js";
import { LocalMediaStorage } from "./local.js";
import { S3MediaStorage } from "./s3.js";
import type { MediaStorage } from "./types.js";

export type { MediaStorage, StagedMedia } from "./types.js";

export function createMediaStorage(): MediaStorage {
  if (STORAGE_BACKEND === "local") {
    return new LocalMediaStorage(getRequiredEnv("LOCAL_MEDIA_ROOT"));
  }
  return new S3MediaStorage(s3Client, MEDIA_TEMP_DIR);
}

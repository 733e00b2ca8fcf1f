/**
 * Environment Configuration
 * Validates and exports type-safe environment variables.
 * Fails fast at startup if a variable is set to something unusable.
 */

import path from "path";
import os from "os";

export type StorageBackend = "s3" | "local";

/** Server configuration */
export const PORT = parseInt(process.env.PORT || "3000", 10);
export const NODE_ENV = process.env.NODE_ENV || "development";

/** ffmpeg configuration */
export const FFMPEG_PATH = process.env.FFMPEG_PATH || "ffmpeg";
export const FFMPEG_TIMEOUT_MS = getPositiveIntEnv("FFMPEG_TIMEOUT_MS", 120_000);

/** Media staging configuration */
export const STORAGE_BACKEND = getStorageBackend();
export const LOCAL_MEDIA_ROOT = process.env.LOCAL_MEDIA_ROOT || undefined;
export const MEDIA_TEMP_DIR = process.env.MEDIA_TEMP_DIR || path.join(os.tmpdir(), "noise-detect");

/** S3 configuration (credentials come from the default AWS provider chain) */
export const AWS_REGION = process.env.AWS_REGION || "us-east-1";
export const S3_ENDPOINT = process.env.S3_ENDPOINT || undefined;
export const S3_FORCE_PATH_STYLE = process.env.S3_FORCE_PATH_STYLE === "true";

/**
 * Helper to safely retrieve required environment variables.
 * Throws immediately if variable is missing.
 */
export function getRequiredEnv(key: string): string {
  const value = process.env[key];
  if (!value) {
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

function getPositiveIntEnv(key: string, fallback: number): number {
  const raw = process.env[key];
  if (!raw) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${key} must be a positive integer, got '${raw}'`);
  }
  return value;
}

function getStorageBackend(): StorageBackend {
  const raw = process.env.STORAGE_BACKEND || "s3";
  if (raw !== "s3" && raw !== "local") {
    throw new Error(`STORAGE_BACKEND must be 's3' or 'local', got '${raw}'`);
  }
  return raw;
}

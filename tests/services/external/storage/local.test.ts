import { mkdir, mkdtemp, rm, stat, writeFile } from "fs/promises";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { LocalMediaStorage } from "../../../../src/services/external/storage/local.js";
import { NotFoundError, ValidationError } from "../../../../src/utils/errors.js";

describe("LocalMediaStorage", () => {
  let root: string;
  let storage: LocalMediaStorage;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), "noise-detect-local-"));
    await mkdir(path.join(root, "recordings", "clips"), { recursive: true });
    await writeFile(path.join(root, "recordings", "clips", "take-1.wav"), "not really audio");
    storage = new LocalMediaStorage(root);
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it("resolves <root>/<bucket>/<key> in place", async () => {
    const media = await storage.stage("recordings", "clips/take-1.wav");

    expect(media.path).toBe(path.join(path.resolve(root), "recordings", "clips", "take-1.wav"));
  });

  it("never removes the source file on cleanup", async () => {
    const media = await storage.stage("recordings", "clips/take-1.wav");
    await media.cleanup();

    expect((await stat(media.path)).isFile()).toBe(true);
  });

  it("reports a missing object as not found", async () => {
    const staging = storage.stage("recordings", "clips/missing.wav");

    await expect(staging).rejects.toBeInstanceOf(NotFoundError);
    await expect(staging).rejects.toThrow("Media object 'recordings/clips/missing.wav' not found");
  });

  it("reports a directory key as not found", async () => {
    await expect(storage.stage("recordings", "clips")).rejects.toThrow(
      "Media object 'recordings/clips' not found"
    );
  });

  it("refuses keys that climb out of the bucket", async () => {
    const staging = storage.stage("recordings", "../elsewhere/take-1.wav");

    await expect(staging).rejects.toBeInstanceOf(ValidationError);
    await expect(staging).rejects.toThrow("key_name resolves outside the bucket");
  });

  it("refuses buckets outside the media root", async () => {
    await expect(storage.stage("../elsewhere", "take-1.wav")).rejects.toThrow(
      "bucket_name resolves outside the media root"
    );
  });

  it("accepts bucket names that merely start with two dots", async () => {
    await mkdir(path.join(root, "..media"));
    await writeFile(path.join(root, "..media", "take-1.wav"), "not really audio");

    const media = await storage.stage("..media", "take-1.wav");

    expect(media.path).toBe(path.join(path.resolve(root), "..media", "take-1.wav"));
  });
});

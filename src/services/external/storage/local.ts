/**
 * Local Media Storage
 * Serves objects from a mounted or pre-staged volume laid out as
 * <root>/<bucket>/<key>. Files are read in place and never removed.
 */

import { access, stat } from "fs/promises";
import { constants } from "fs";
import path from "path";
import { NotFoundError, ValidationError } from "../../../utils/errors.js";
import type { MediaStorage, StagedMedia } from "./types.js";

export class LocalMediaStorage implements MediaStorage {
  readonly name = "local";
  private readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  async stage(bucketName: string, keyName: string): Promise<StagedMedia> {
    const filePath = this.resolve(bucketName, keyName);

    try {
      await access(filePath, constants.R_OK);
    } catch {
      throw new NotFoundError("Media object", `${bucketName}/${keyName}`);
    }
    if (!(await stat(filePath)).isFile()) {
      throw new NotFoundError("Media object", `${bucketName}/${keyName}`);
    }

    return { path: filePath, cleanup: async () => {} };
  }

  private resolve(bucketName: string, keyName: string): string {
    const bucketDir = path.resolve(this.root, bucketName);
    if (bucketDir === this.root || escapes(path.relative(this.root, bucketDir))) {
      throw new ValidationError("bucket_name resolves outside the media root");
    }

    const filePath = path.resolve(bucketDir, keyName);
    const relative = path.relative(bucketDir, filePath);
    if (!relative || escapes(relative)) {
      throw new ValidationError("key_name resolves outside the bucket");
    }
    return filePath;
  }
}

/** True when a relative path leaves its base directory. */
function escapes(relative: string): boolean {
  return relative === ".." || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative);
}

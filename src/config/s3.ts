/**
 * S3 Client
 * Source of the media objects the detector analyses. Also works against
 * S3-compatible stores (R2, MinIO) through S3_ENDPOINT.
 */

import { S3Client } from "@aws-sdk/client-s3";
import { AWS_REGION, S3_ENDPOINT, S3_FORCE_PATH_STYLE } from "./env.js";

export const s3Client = new S3Client({
  region: AWS_REGION,
  endpoint: S3_ENDPOINT,
  forcePathStyle: S3_FORCE_PATH_STYLE,
});

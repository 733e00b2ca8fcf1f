/**
 * Noise Detection Service
 * The adapter behind every ingress: validate the request, stage the media
 * object, run ffmpeg silencedetect, classify its output and report.
 *
 * Every failure is converted into a `success: false` response here; nothing
 * thrown below this boundary reaches the caller.
 */

import { detectRequestSchema, type DetectRequest } from "../../middlewares/schemas/detectSchema.js";
import { runSilenceDetect, type CommandRunner } from "../external/ffmpeg.js";
import type { MediaStorage } from "../external/storage/index.js";
import { isNoiseDetected, parseSilenceOutput } from "../../utils/silenceReport.js";
import { ValidationError } from "../../utils/errors.js";
import { describeError } from "../../utils/errorMessages.js";

export type DetectionResponse =
  | { success: true; noise_detected: boolean; error: null }
  | { success: false; noise_detected: null; error: string };

export interface NoiseDetector {
  detect(body: unknown): Promise<DetectionResponse>;
}

export interface NoiseDetectorOptions {
  ffmpegPath: string;
  timeoutMs: number;
  storage: MediaStorage;
  runner?: CommandRunner;
}

/**
 * Decodes and validates a request body. String bodies (API Gateway, raw
 * HTTP) are JSON-decoded first; the first failing field names the error.
 */
export function parseDetectRequest(body: unknown): DetectRequest {
  let candidate = body;
  if (typeof body === "string") {
    try {
      candidate = JSON.parse(body);
    } catch {
      throw new ValidationError("Request body is not valid JSON");
    }
  }

  const result = detectRequestSchema.safeParse(candidate);
  if (!result.success) {
    throw new ValidationError(result.error.issues[0]?.message ?? "Invalid request");
  }
  return result.data;
}

export function createNoiseDetector(options: NoiseDetectorOptions): NoiseDetector {
  const { ffmpegPath, timeoutMs, storage, runner } = options;

  async function analyse(request: DetectRequest): Promise<boolean> {
    const location = `${request.bucket_name}/${request.key_name}`;
    const media = await storage.stage(request.bucket_name, request.key_name);

    try {
      const output = await runSilenceDetect(
        ffmpegPath,
        media.path,
        {
          noiseTolerance: request.noise_tolerance,
          noiseDuration: request.noise_duration,
        },
        { timeoutMs, runner }
      );

      const report = parseSilenceOutput(output);
      const noiseDetected = isNoiseDetected(report);

      console.log(
        `[noise-detect] ${location}: ${report.silences.length} silence interval(s), ` +
          `${report.segments.length} audible segment(s) -> noise_detected=${noiseDetected}`
      );
      return noiseDetected;
    } finally {
      await media.cleanup();
    }
  }

  return {
    async detect(body: unknown): Promise<DetectionResponse> {
      try {
        const request = parseDetectRequest(body);
        const noiseDetected = await analyse(request);
        return { success: true, noise_detected: noiseDetected, error: null };
      } catch (error) {
        const message = describeError(error);
        if (error instanceof ValidationError) {
          console.warn(`[noise-detect] Rejected request: ${message}`);
        } else {
          console.error(`[noise-detect] Detection failed: ${message}`, error);
        }
        return { success: false, noise_detected: null, error: message };
      }
    },
  };
}

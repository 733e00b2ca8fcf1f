/**
 * Application Initialization
 * Wires the noise detector from environment configuration and checks
 * that ffmpeg can be launched.
 */

import { FFMPEG_PATH, FFMPEG_TIMEOUT_MS } from "./env.js";
import { createMediaStorage } from "../services/external/storage/index.js";
import { probeFfmpegVersion } from "../services/external/ffmpeg.js";
import {
  createNoiseDetector,
  type NoiseDetector,
} from "../services/business/noiseDetectionService.js";

/**
 * Builds the detector used by the Lambda handler and the HTTP server.
 */
export function buildNoiseDetector(): NoiseDetector {
  const storage = createMediaStorage();
  console.log(`[init] storage=${storage.name} ffmpeg=${FFMPEG_PATH} timeout=${FFMPEG_TIMEOUT_MS}ms`);

  return createNoiseDetector({
    ffmpegPath: FFMPEG_PATH,
    timeoutMs: FFMPEG_TIMEOUT_MS,
    storage,
  });
}

/**
 * Verifies the ffmpeg binary on startup.
 */
export async function initializeApp(): Promise<void> {
  console.log("Initializing application...");

  try {
    const version = await probeFfmpegVersion(FFMPEG_PATH, { timeoutMs: 10_000 });
    console.log(`✓ ${version}`);
    console.log("✓ Application initialized successfully\n");
  } catch (error) {
    console.error("✗ Application initialization failed:", error);
    throw error;
  }
}

/**
 * Detect File Script
 * Runs silence detection on a local media file and prints the full report.
 *
 * Usage:
 *   npx tsx src/scripts/detectFile.ts <file> [noise_tolerance_db] [noise_duration_sec]
 */

import "dotenv/config";
import { access } from "fs/promises";
import { FFMPEG_PATH, FFMPEG_TIMEOUT_MS } from "../config/env.js";
import { runSilenceDetect } from "../services/external/ffmpeg.js";
import { isNoiseDetected, parseSilenceOutput } from "../utils/silenceReport.js";

const DEFAULT_NOISE_TOLERANCE_DB = -36;
const DEFAULT_NOISE_DURATION_SEC = 0.3;

function parseNumberArg(raw: string | undefined, name: string, fallback: number): number {
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new Error(`${name} must be a number, got '${raw}'`);
  }
  return value;
}

async function main(): Promise<void> {
  const [filePath, toleranceArg, durationArg] = process.argv.slice(2);
  if (!filePath) {
    console.error("Usage: tsx src/scripts/detectFile.ts <file> [noise_tolerance_db] [noise_duration_sec]");
    process.exit(1);
  }

  const noiseTolerance = parseNumberArg(toleranceArg, "noise_tolerance", DEFAULT_NOISE_TOLERANCE_DB);
  const noiseDuration = parseNumberArg(durationArg, "noise_duration", DEFAULT_NOISE_DURATION_SEC);
  if (noiseDuration <= 0) {
    throw new Error("noise_duration must be greater than 0");
  }

  await access(filePath);

  const output = await runSilenceDetect(
    FFMPEG_PATH,
    filePath,
    { noiseTolerance, noiseDuration },
    { timeoutMs: FFMPEG_TIMEOUT_MS }
  );
  const report = parseSilenceOutput(output);

  console.log(JSON.stringify({ ...report, noise_detected: isNoiseDetected(report) }, null, 2));
}

main().catch((error: unknown) => {
  console.error("✗ Detection failed:", error);
  process.exit(1);
});

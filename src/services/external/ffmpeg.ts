/**
 * FFmpeg Service
 * Runs the silencedetect filter and returns ffmpeg's diagnostic output.
 * Parsing happens elsewhere; this module only deals with the subprocess.
 */

import { execa, ExecaError } from "execa";
import { ExecutionError } from "../../utils/errors.js";

export interface SilenceDetectParams {
  /** Loudness threshold in dB below which audio counts as silence */
  noiseTolerance: number;
  /** Minimum length in seconds a quiet span must last */
  noiseDuration: number;
}

export interface CommandResult {
  exitCode: number;
  stderr: string;
  stdout: string;
}

/**
 * Runs an executable to completion and reports its exit code and output.
 * Throws ExecutionError when the process never produces an exit code
 * (launch failure, timeout, signal).
 */
export type CommandRunner = (
  file: string,
  args: string[],
  options: { timeoutMs: number }
) => Promise<CommandResult>;

export interface FfmpegRunOptions {
  timeoutMs: number;
  runner?: CommandRunner;
}

const STDERR_TAIL_LINES = 20;

/**
 * Default runner backed by execa.
 */
export const execaRunner: CommandRunner = async (file, args, { timeoutMs }) => {
  try {
    const result = await execa(file, args, { timeout: timeoutMs, stdin: "ignore" });
    return {
      exitCode: result.exitCode ?? 0,
      stderr: typeof result.stderr === "string" ? result.stderr : "",
      stdout: typeof result.stdout === "string" ? result.stdout : "",
    };
  } catch (error) {
    if (!(error instanceof ExecaError)) throw error;

    if (error.timedOut) {
      throw new ExecutionError(`ffmpeg timed out after ${timeoutMs}ms`);
    }
    if (error.signal) {
      throw new ExecutionError(`ffmpeg was terminated by ${error.signal}`);
    }
    if (error.exitCode === undefined) {
      const reason = error.code ?? error.shortMessage;
      throw new ExecutionError(`Failed to launch ffmpeg at ${file}: ${reason}`);
    }

    return {
      exitCode: error.exitCode,
      stderr: typeof error.stderr === "string" ? error.stderr : "",
      stdout: typeof error.stdout === "string" ? error.stdout : "",
    };
  }
};

/**
 * Renders a number without exponent notation, which ffmpeg's option parser
 * does not accept (1e-7 -> "0.0000001").
 */
export function formatDecimal(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) return text;
  // doubles this large are always integers
  if (Math.abs(value) >= 1) return BigInt(value).toString();
  return value.toFixed(20).replace(/\.?0+$/, "");
}

/**
 * Builds the argument list for a silencedetect pass that decodes the first
 * audio stream and discards the output.
 */
export function buildSilenceDetectArgs(inputPath: string, params: SilenceDetectParams): string[] {
  return [
    "-hide_banner",
    "-nostdin",
    "-i", inputPath,
    "-filter_complex", `[0:a]silencedetect=n=${formatDecimal(params.noiseTolerance)}dB:d=${formatDecimal(params.noiseDuration)}[s0]`,
    "-map", "[s0]",
    "-f", "null",
    "-",
  ];
}

/**
 * Runs ffmpeg silencedetect on a local file.
 * Returns the captured stderr, which is where ffmpeg prints filter diagnostics.
 */
export async function runSilenceDetect(
  ffmpegPath: string,
  inputPath: string,
  params: SilenceDetectParams,
  { timeoutMs, runner = execaRunner }: FfmpegRunOptions
): Promise<string> {
  const args = buildSilenceDetectArgs(inputPath, params);
  console.log(`[ffmpeg] silencedetect n=${params.noiseTolerance}dB d=${params.noiseDuration}s on ${inputPath}`);

  const result = await runner(ffmpegPath, args, { timeoutMs });

  if (result.exitCode !== 0) {
    const tail = lastLines(result.stderr, STDERR_TAIL_LINES);
    console.error(`[ffmpeg] exited with code ${result.exitCode}\n${tail}`);
    const lastLine = lastLines(result.stderr, 1);
    throw new ExecutionError(
      lastLine
        ? `ffmpeg exited with code ${result.exitCode}: ${lastLine}`
        : `ffmpeg exited with code ${result.exitCode}`,
      result.exitCode
    );
  }

  return result.stderr;
}

/**
 * Returns the first line of `ffmpeg -version`, e.g. "ffmpeg version 6.1.1".
 */
export async function probeFfmpegVersion(
  ffmpegPath: string,
  { timeoutMs, runner = execaRunner }: FfmpegRunOptions
): Promise<string> {
  const result = await runner(ffmpegPath, ["-version"], { timeoutMs });
  if (result.exitCode !== 0) {
    throw new ExecutionError(`ffmpeg -version exited with code ${result.exitCode}`, result.exitCode);
  }
  return result.stdout.split(/\r?\n/)[0].trim();
}

function lastLines(text: string, count: number): string {
  return text
    .split(/\r\n|\r|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .slice(-count)
    .join("\n");
}

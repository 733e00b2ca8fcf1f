import { beforeEach, describe, expect, it, vi } from "vitest";
import {
  buildSilenceDetectArgs,
  execaRunner,
  formatDecimal,
  probeFfmpegVersion,
  runSilenceDetect,
  type CommandRunner,
} from "../../../src/services/external/ffmpeg.js";
import { ExecutionError } from "../../../src/utils/errors.js";

describe("ffmpeg service", () => {
  beforeEach(() => {
    vi.restoreAllMocks();
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("builds a silencedetect pass over the first audio stream", () => {
    expect(buildSilenceDetectArgs("/tmp/in.wav", { noiseTolerance: -36, noiseDuration: 0.3 })).toEqual([
      "-hide_banner",
      "-nostdin",
      "-i", "/tmp/in.wav",
      "-filter_complex", "[0:a]silencedetect=n=-36dB:d=0.3[s0]",
      "-map", "[s0]",
      "-f", "null",
      "-",
    ]);
  });

  it("returns stderr from a successful run", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 0,
      stderr: "[silencedetect @ 0x1] silence_start: 1",
      stdout: "",
    }));

    const output = await runSilenceDetect(
      "/opt/bin/ffmpeg",
      "/tmp/in.wav",
      { noiseTolerance: -50, noiseDuration: 2 },
      { timeoutMs: 5000, runner }
    );

    expect(output).toBe("[silencedetect @ 0x1] silence_start: 1");
    expect(runner).toHaveBeenCalledWith(
      "/opt/bin/ffmpeg",
      buildSilenceDetectArgs("/tmp/in.wav", { noiseTolerance: -50, noiseDuration: 2 }),
      { timeoutMs: 5000 }
    );
  });

  it("fails with the last stderr line on a non-zero exit", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 1,
      stderr: "Input #0, wav, from '/tmp/in.wav':\n/tmp/in.wav: Invalid data found when processing input\n",
      stdout: "",
    }));

    const run = runSilenceDetect(
      "ffmpeg",
      "/tmp/in.wav",
      { noiseTolerance: -36, noiseDuration: 0.3 },
      { timeoutMs: 5000, runner }
    );

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toMatchObject({
      message: "ffmpeg exited with code 1: /tmp/in.wav: Invalid data found when processing input",
      exitCode: 1,
      statusCode: 502,
    });
  });

  it("reports the bare exit code when stderr is empty", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({ exitCode: 183, stderr: "", stdout: "" }));

    await expect(
      runSilenceDetect("ffmpeg", "/tmp/in.wav", { noiseTolerance: -36, noiseDuration: 0.3 }, { timeoutMs: 5000, runner })
    ).rejects.toThrow(/^ffmpeg exited with code 183$/);
  });

  it("reads the version line from ffmpeg -version", async () => {
    const runner = vi.fn<CommandRunner>(async () => ({
      exitCode: 0,
      stderr: "",
      stdout: "ffmpeg version 6.1.1 Copyright (c) 2000-2023 the FFmpeg developers\nbuilt with gcc 12\n",
    }));

    await expect(probeFfmpegVersion("ffmpeg", { timeoutMs: 1000, runner })).resolves.toBe(
      "ffmpeg version 6.1.1 Copyright (c) 2000-2023 the FFmpeg developers"
    );
    expect(runner).toHaveBeenCalledWith("ffmpeg", ["-version"], { timeoutMs: 1000 });
  });

  it("turns a missing executable into a launch failure", async () => {
    const run = execaRunner("/nonexistent/ffmpeg-missing", ["-version"], { timeoutMs: 5000 });

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toThrow(/^Failed to launch ffmpeg at \/nonexistent\/ffmpeg-missing: /);
  });

  it("kills a run that outlives its timeout", async () => {
    const run = execaRunner(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], { timeoutMs: 200 });

    await expect(run).rejects.toBeInstanceOf(ExecutionError);
    await expect(run).rejects.toThrow("ffmpeg timed out after 200ms");
  });

  it("writes tiny and huge durations without exponent notation", () => {
    expect(buildSilenceDetectArgs("/tmp/in.wav", { noiseTolerance: -60, noiseDuration: 1e-7 })).toContain(
      "[0:a]silencedetect=n=-60dB:d=0.0000001[s0]"
    );
  });
});

describe("formatDecimal", () => {
  it.each([
    [0.3, "0.3"],
    [-36, "-36"],
    [1e-7, "0.0000001"],
    [-2.5e-7, "-0.00000025"],
    [1e21, "1000000000000000000000"],
  ])("renders %d as %s", (value, expected) => {
    expect(formatDecimal(value)).toBe(expected);
  });
});

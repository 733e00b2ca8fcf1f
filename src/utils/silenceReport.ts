/**
 * Silence Report Parser
 * Turns ffmpeg's silencedetect diagnostics into silence intervals and the
 * audible segments between them. Pure: no I/O, no subprocess.
 */

export interface SilenceInterval {
  start: number;
  /** null when the silence runs to the end of the media without a closing marker */
  end: number | null;
  duration: number | null;
}

export interface AudibleSegment {
  start: number;
  /** null when the media length is unknown and the segment runs to the end */
  end: number | null;
}

export interface SilenceReport {
  silences: SilenceInterval[];
  segments: AudibleSegment[];
  totalDuration: number | null;
}

/** Audible segments at or under this length are treated as rounding noise. */
export const MIN_SEGMENT_SEC = 0.05;

const SILENCE_START_RE = /silence_start: (-?\d+(?:\.\d*)?)\s*$/;
const SILENCE_END_RE = /silence_end: (-?\d+(?:\.\d*)?) \| silence_duration: (\d+(?:\.\d*)?)/;
const PROGRESS_TIME_RE = /size=\s*\S+ time=(\d{2,}):(\d{2}):(\d{2}(?:\.\d+)?) bitrate=/;
const INPUT_DURATION_RE = /^\s*Duration: (\d{2,}):(\d{2}):(\d{2}(?:\.\d+)?),/;

/**
 * Parses the full stderr text of an ffmpeg silencedetect run.
 * ffmpeg rewrites its stats line with bare carriage returns, so `\r` counts
 * as a line break too.
 */
export function parseSilenceOutput(output: string): SilenceReport {
  const silences: SilenceInterval[] = [];
  let open: SilenceInterval | null = null;
  let progressTime: number | null = null;
  let inputDuration: number | null = null;

  for (const line of output.split(/\r\n|\r|\n/)) {
    const startMatch = SILENCE_START_RE.exec(line);
    if (startMatch) {
      open = { start: clampTime(startMatch[1]), end: null, duration: null };
      silences.push(open);
      continue;
    }

    const endMatch = SILENCE_END_RE.exec(line);
    if (endMatch) {
      const end = clampTime(endMatch[1]);
      const duration = parseFloat(endMatch[2]);
      if (open) {
        open.end = end;
        open.duration = duration;
      } else {
        // silence_end with no preceding start: the silence began before the first frame
        silences.push({ start: Math.max(0, end - duration), end, duration });
      }
      open = null;
      continue;
    }

    const progressMatch = PROGRESS_TIME_RE.exec(line);
    if (progressMatch) {
      progressTime = toSeconds(progressMatch[1], progressMatch[2], progressMatch[3]);
      continue;
    }

    const durationMatch = INPUT_DURATION_RE.exec(line);
    if (durationMatch && inputDuration === null) {
      inputDuration = toSeconds(durationMatch[1], durationMatch[2], durationMatch[3]);
    }
  }

  const totalDuration = progressTime ?? inputDuration;

  return {
    silences,
    segments: audibleSegments(silences, totalDuration),
    totalDuration,
  };
}

/**
 * A file counts as noisy when it has no silence at all, or when any audible
 * segment remains between, before or after its silences.
 */
export function isNoiseDetected(report: SilenceReport): boolean {
  if (report.silences.length === 0) {
    return true;
  }
  return report.segments.length > 0;
}

function audibleSegments(
  silences: SilenceInterval[],
  totalDuration: number | null
): AudibleSegment[] {
  const segments: AudibleSegment[] = [];
  let cursor: number | null = 0;

  for (const silence of silences) {
    if (cursor === null) break;
    if (silence.start - cursor > MIN_SEGMENT_SEC) {
      segments.push({ start: cursor, end: silence.start });
    }
    cursor = silence.end === null ? null : Math.max(cursor, silence.end);
  }

  if (cursor !== null) {
    if (totalDuration === null) {
      segments.push({ start: cursor, end: null });
    } else if (totalDuration - cursor > MIN_SEGMENT_SEC) {
      segments.push({ start: cursor, end: totalDuration });
    }
  }

  return segments;
}

function clampTime(raw: string): number {
  return Math.max(0, parseFloat(raw));
}

function toSeconds(hours: string, minutes: string, seconds: string): number {
  return parseInt(hours, 10) * 3600 + parseInt(minutes, 10) * 60 + parseFloat(seconds);
}

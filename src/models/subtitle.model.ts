import { ConfigurationError, SequenceError } from "../lib/errors";
import { err, ok, type Result } from "../lib/result";

/**
 * A single subtitle or caption cue. Times are integer milliseconds.
 * `delayMs` shifts only the displayed start.
 */
export interface Subtitle {
  readonly sequenceId: number;
  readonly startMs: number;
  readonly endMs: number;
  readonly text: readonly string[];
  readonly delayMs: number;
}

export interface SubtitleInput {
  sequenceId: number;
  startMs: number;
  endMs: number;
  text: string | readonly string[];
  delayMs?: number;
}

function assertMillis(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new ConfigurationError(`Subtitle ${field} must be a non-negative integer, got ${value}`);
  }
}

export function createSubtitle(input: SubtitleInput): Subtitle {
  assertMillis(input.startMs, "startMs");
  assertMillis(input.endMs, "endMs");
  assertMillis(input.delayMs ?? 0, "delayMs");
  if (!Number.isInteger(input.sequenceId) || input.sequenceId < 0) {
    throw new ConfigurationError(`Subtitle sequenceId must be a non-negative integer, got ${input.sequenceId}`);
  }
  if (input.endMs <= input.startMs) {
    throw new ConfigurationError(
      `Subtitle ${input.sequenceId} must end after it starts (start=${input.startMs}ms, end=${input.endMs}ms)`
    );
  }

  const lines = typeof input.text === "string" ? input.text.split("\n") : [...input.text];

  return Object.freeze({
    sequenceId: input.sequenceId,
    startMs: input.startMs,
    endMs: input.endMs,
    text: Object.freeze(lines),
    delayMs: input.delayMs ?? 0,
  });
}

/**
 * Order by start time. Array.prototype.sort is stable, so equal starts keep their input order.
 */
export function sortSubtitles(subtitles: readonly Subtitle[]): Subtitle[] {
  return [...subtitles].sort((a, b) => a.startMs - b.startMs);
}

export interface Neighbours {
  previous?: Subtitle;
  next?: Subtitle;
}

export function getNeighbours(subtitles: readonly Subtitle[], index: number): Neighbours {
  return {
    previous: index > 0 ? subtitles[index - 1] : undefined,
    next: index + 1 < subtitles.length ? subtitles[index + 1] : undefined,
  };
}

/**
 * Milliseconds elapsed since `originMs`, clamped at 0
 */
export function toRelativeMs(absoluteMs: number, originMs: number): number {
  return Math.max(0, absoluteMs - originMs);
}

/**
 * Format milliseconds as an ASS timestamp (H:MM:SS.cc), rounding half-up to centiseconds
 */
export function formatAssTimestamp(ms: number): string {
  const totalCs = Math.floor((Math.max(0, ms) + 5) / 10);
  const h = Math.floor(totalCs / 360000);
  const m = Math.floor((totalCs % 360000) / 6000);
  const s = Math.floor((totalCs % 6000) / 100);
  const cs = totalCs % 100;
  return `${h}:${m.toString().padStart(2, "0")}:${s.toString().padStart(2, "0")}.${cs.toString().padStart(2, "0")}`;
}

/**
 * Check that each item's sequence id is exactly one more than the one before it
 */
export function checkContiguity(items: readonly { sequenceId: number }[]): Result<void, SequenceError> {
  for (let i = 1; i < items.length; i++) {
    const prev = items[i - 1].sequenceId;
    const curr = items[i].sequenceId;
    if (curr !== prev + 1) {
      return err(
        new SequenceError(
          `Selection is not contiguous: sequence id ${curr} follows ${prev} at position ${i}`
        )
      );
    }
  }
  return ok(undefined);
}

/**
 * Utility functions to read and write SRT subtitle files
 */

import { createSubtitle, type Subtitle } from "../models/subtitle.model";

const TIMING_PATTERN =
  /(\d+):(\d{1,2}):(\d{1,2})[,.](\d{1,3})\s*-->\s*(\d+):(\d{1,2}):(\d{1,2})[,.](\d{1,3})/;

function toMs(h: string, m: string, s: string, fraction: string): number {
  const millis = parseInt(fraction.padEnd(3, "0"), 10);
  return ((parseInt(h, 10) * 60 + parseInt(m, 10)) * 60 + parseInt(s, 10)) * 1000 + millis;
}

/**
 * Format milliseconds to SRT timestamp (HH:MM:SS,mmm)
 */
export function formatSRTTimestamp(ms: number): string {
  const hours = Math.floor(ms / 3600000);
  const minutes = Math.floor((ms % 3600000) / 60000);
  const secs = Math.floor((ms % 60000) / 1000);
  const millis = ms % 1000;

  return `${hours.toString().padStart(2, "0")}:${minutes.toString().padStart(2, "0")}:${secs.toString().padStart(2, "0")},${millis.toString().padStart(3, "0")}`;
}

/**
 * Strip HTML-like tags and ASS override blocks, split on line breaks
 */
export function toPlainLines(text: string): string[] {
  return text
    .replace(/<[^>]*>/g, "")
    .replace(/\{[^}]*\}/g, "")
    .split(/\\N|\\n|\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

/**
 * Parse SRT content into cues. Blocks without a timing line, without text,
 * or ending before they start are skipped. sequenceId is the position in the result.
 */
export function parseSRT(content: string): Subtitle[] {
  const normalized = content.replace(/^\uFEFF/, "").replace(/\r\n?/g, "\n");
  const blocks = normalized.split(/\n[ \t]*\n/);
  const subtitles: Subtitle[] = [];

  for (const block of blocks) {
    const lines = block.split("\n");
    const timingIndex = lines.findIndex((line) => TIMING_PATTERN.test(line));
    if (timingIndex === -1) continue;

    const match = TIMING_PATTERN.exec(lines[timingIndex]);
    if (!match) continue;

    const startMs = toMs(match[1], match[2], match[3], match[4]);
    const endMs = toMs(match[5], match[6], match[7], match[8]);
    if (endMs <= startMs) continue;

    const text = toPlainLines(lines.slice(timingIndex + 1).join("\n"));
    if (text.length === 0) continue;

    subtitles.push(createSubtitle({ sequenceId: subtitles.length, startMs, endMs, text }));
  }

  return subtitles;
}

/**
 * Convert cues to SRT format
 */
export function formatSRT(subtitles: readonly Subtitle[]): string {
  return subtitles
    .map((subtitle, index) => {
      const startTime = formatSRTTimestamp(subtitle.startMs);
      const endTime = formatSRTTimestamp(subtitle.endMs);
      return `${index + 1}\n${startTime} --> ${endTime}\n${subtitle.text.join("\n")}\n`;
    })
    .join("\n");
}

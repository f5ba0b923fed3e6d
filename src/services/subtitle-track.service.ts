/**
 * Subtitle Track Service
 * Picks a subtitle stream by language and pulls its cues out of the container
 */

import { promises as fs } from "fs";
import * as path from "path";
import { ExtractionError, type ProbeError, type ToolInvocationError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { err, ok, type Result } from "../lib/result";
import { fileExists, withTempDir } from "../lib/temp-dir";
import type { Subtitle } from "../models/subtitle.model";
import { parseSRT } from "../utils/subtitle-converter";
import { FFmpegService, type MediaStream } from "./ffmpeg.service";

const log = createLogger("SUBTITLE_TRACK");

const CLOSED_CAPTION_MARKERS = ["sdh", "cc", "hearing impaired"];

export type SubtitleExtractionError = ExtractionError | ToolInvocationError | ProbeError;

export function isClosedCaptionTitle(title: string | undefined): boolean {
  if (!title) return false;
  const lower = title.toLowerCase();
  return CLOSED_CAPTION_MARKERS.some((marker) => lower.includes(marker));
}

export interface SelectedTrack {
  /** Index among subtitle streams only, as used by -map 0:s:N */
  track: number;
  language: string;
  title?: string;
}

/**
 * First subtitle stream matching the highest-priority language.
 * Track number = absolute stream index minus the number of non-subtitle streams.
 */
export function selectSubtitleTrack(
  streams: readonly MediaStream[],
  languages: readonly string[],
  includeCc = false
): Result<SelectedTrack, ExtractionError> {
  const nonSubtitleCount = streams.filter((stream) => stream.codec_type !== "subtitle").length;
  const subtitleStreams = streams.filter((stream) => stream.codec_type === "subtitle");

  for (const language of languages) {
    const wanted = language.toLowerCase();
    const match = subtitleStreams.find(
      (stream) =>
        stream.tags?.language?.toLowerCase() === wanted && (includeCc || !isClosedCaptionTitle(stream.tags?.title))
    );
    if (match) {
      return ok({ track: match.index - nonSubtitleCount, language, title: match.tags?.title });
    }
  }

  return err(
    new ExtractionError(
      `No subtitle track found for languages [${languages.join(", ")}]` +
        (includeCc ? "" : " (closed caption tracks excluded)")
    )
  );
}

/**
 * Extract subtitle track N and parse it into cues
 */
export async function extractSubtitles(
  inputPath: string,
  track = 0
): Promise<Result<Subtitle[], SubtitleExtractionError>> {
  return withTempDir<Result<Subtitle[], SubtitleExtractionError>>("subtitles", async (dir) => {
    const outputPath = path.join(dir, "subs.srt");

    const extracted = await FFmpegService.extractSubtitleTrack(inputPath, track, outputPath);
    if (!extracted.success) {
      return extracted;
    }
    if (!(await fileExists(outputPath))) {
      return err(new ExtractionError(`Could not extract subtitles from ${inputPath} at subtitle track ${track}`));
    }

    const content = await fs.readFile(outputPath, "utf-8");
    const subtitles = parseSRT(content);
    log.info("EXTRACTED", { inputPath, track, cues: subtitles.length });
    return ok(subtitles);
  });
}

/**
 * Extract the first subtitle track matching the language priority list (ISO 639 codes)
 */
export async function extractSubtitlesByLanguage(
  inputPath: string,
  languages: readonly string[],
  includeCc = false
): Promise<Result<Subtitle[], SubtitleExtractionError>> {
  const streams = await FFmpegService.probeStreams(inputPath);
  if (!streams.success) {
    return streams;
  }

  const selected = selectSubtitleTrack(streams.data, languages, includeCc);
  if (!selected.success) {
    return selected;
  }

  log.debug("TRACK_SELECTED", { inputPath, ...selected.data });
  return extractSubtitles(inputPath, selected.data.track);
}

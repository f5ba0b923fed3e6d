/**
 * Sequence Generator Service
 * Renders a contiguous run of subtitle-bounded segments, joins them and
 * converts the joined clip once, with the caption applied to the whole.
 */

import * as path from "path";
import { MissingArtifactError, SequenceError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { err, ok, type Result } from "../lib/result";
import { fileExists, withTempDir, writeWorkFile } from "../lib/temp-dir";
import type { ClipSettings } from "../models/clip-settings.model";
import { checkContiguity } from "../models/subtitle.model";
import {
  ClipGeneratorService,
  PipelineTracker,
  type ClipGenerationError,
  type GeneratedClip,
  type ProgressListener,
} from "./clip-generator.service";
import { createClipSettings, type ClipSettingsDeps, type ClipSettingsInput } from "./clip-settings.service";
import { FFmpegService } from "./ffmpeg.service";
import { buildSegmentStages, formatFilterGraph } from "./filter-graph.service";

const log = createLogger("SEQUENCE_GENERATOR");

export interface SequenceSegment {
  sequenceId: number;
  startMs: number;
  endMs: number;
  text: readonly string[];
  font?: string;
  fontSize?: number;
}

export interface SequenceRequest {
  /** Shared settings; start and end come from the segments */
  settings: Omit<ClipSettingsInput, "startMs" | "endMs">;
  segments: readonly SequenceSegment[];
  caption?: string;
  onProgress?: ProgressListener;
}

export type SequenceGenerationError = SequenceError | ClipGenerationError;

interface PlannedSegment extends SequenceSegment {
  /** Next segment's start, or the segment's own end for the last one */
  effectiveEndMs: number;
}

export type SequenceSegmentInput = Omit<SequenceSegment, "text"> & { text: string | readonly string[] };

/**
 * Segments as received over the wire: text may be a single newline-separated string
 */
export function normalizeSegments(segments: readonly SequenceSegmentInput[]): SequenceSegment[] {
  return segments.map((segment) => ({
    ...segment,
    text: typeof segment.text === "string" ? segment.text.split("\n") : segment.text,
  }));
}

/**
 * Check contiguity and close the gaps between segments
 */
export function planSegments(segments: readonly SequenceSegment[]): Result<PlannedSegment[], SequenceError> {
  if (segments.length < 2) {
    return err(new SequenceError(`A sequence needs at least 2 segments, got ${segments.length}`));
  }

  const contiguous = checkContiguity(segments);
  if (!contiguous.success) return contiguous;

  const planned: PlannedSegment[] = [];
  for (let i = 0; i < segments.length; i++) {
    const segment = segments[i];
    const effectiveEndMs = i + 1 < segments.length ? segments[i + 1].startMs : segment.endMs;
    if (effectiveEndMs <= segment.startMs) {
      return err(
        new SequenceError(
          `Segment ${segment.sequenceId} starts at ${segment.startMs}ms but the sequence continues at ${effectiveEndMs}ms`
        )
      );
    }
    planned.push({ ...segment, effectiveEndMs });
  }
  return ok(planned);
}

/**
 * One `file '<path>'` line per segment, in output order
 */
export function buildConcatList(paths: readonly string[]): string {
  return paths.map((p) => `file '${p.replace(/'/g, "'\\''")}'`).join("\n") + "\n";
}

export class SequenceGeneratorService {
  /**
   * Throws ConfigurationError for invalid shared settings; every other failure is returned
   */
  static async generateSequence(
    request: SequenceRequest,
    deps: ClipSettingsDeps = {}
  ): Promise<Result<GeneratedClip, SequenceGenerationError>> {
    const plan = planSegments(request.segments);
    if (!plan.success) return plan;

    const segments = plan.data;
    const first = segments[0];
    const last = segments[segments.length - 1];

    const settings = await createClipSettings(
      { ...request.settings, startMs: first.startMs, endMs: last.effectiveEndMs },
      deps
    );

    log.info("GENERATE_SEQUENCE", {
      inputPath: settings.inputPath,
      outputPath: settings.outputPath,
      segments: segments.length,
      startMs: settings.startMs,
      endMs: settings.endMs,
    });

    const pipeline = new PipelineTracker(request.onProgress);
    await pipeline.enter("validated");

    return withTempDir<Result<GeneratedClip, SequenceGenerationError>>("sequence", async (workDir) => {
      const segmentPaths: string[] = [];

      for (const [index, segment] of segments.entries()) {
        const rendered = await SequenceGeneratorService.renderSegment(settings, segment, index, workDir);
        if (!rendered.success) {
          return pipeline.fail(rendered.error);
        }
        segmentPaths.push(rendered.data);
      }

      const listPath = path.join(workDir, "segments.txt");
      const written = await writeWorkFile(listPath, buildConcatList(segmentPaths));
      if (!written.success) {
        return pipeline.fail(written.error);
      }

      const joined = await FFmpegService.concat(listPath, settings.clipPath);
      if (!joined.success) {
        return pipeline.fail(joined.error);
      }
      if (!(await fileExists(settings.clipPath))) {
        return pipeline.fail(new MissingArtifactError(settings.clipPath, "Concat"));
      }
      await pipeline.enter("trimmed");

      // Text was burned in per segment; only the caption is left for the joined clip
      return ClipGeneratorService.renderClip(settings, [], request.caption, workDir, pipeline);
    });
  }

  /**
   * Trim one segment and burn its text in as an MP4 at the final frame size
   */
  private static async renderSegment(
    settings: ClipSettings,
    segment: PlannedSegment,
    index: number,
    workDir: string
  ): Promise<Result<string, ClipGenerationError>> {
    const rawPath = path.join(workDir, `segment-${index}-raw.mp4`);
    const outputPath = path.join(workDir, `segment-${index}.mp4`);
    const encode = { crf: settings.crf, preset: settings.preset };

    const trimmed = await ClipGeneratorService.createTrimmedClip(
      settings.inputPath,
      rawPath,
      segment.startMs,
      segment.effectiveEndMs - segment.startMs,
      encode
    );
    if (!trimmed.success) return trimmed;

    const stages = buildSegmentStages(settings, {
      text: segment.text.join("\n"),
      font: segment.font ?? settings.subtitleStyle.font,
      fontSize: segment.fontSize ?? settings.subtitleStyle.fontSize,
      marginBottom: settings.subtitleStyle.marginV,
    });

    const filtered = await FFmpegService.applyFilterGraph(
      rawPath,
      outputPath,
      formatFilterGraph(stages),
      FFmpegService.outputArgsFor("mp4", { ...encode, dropAudio: false })
    );
    if (!filtered.success) return filtered;
    if (!(await fileExists(outputPath))) {
      return err(new MissingArtifactError(outputPath, `Segment ${segment.sequenceId}`));
    }

    log.debug("SEGMENT_RENDERED", { sequenceId: segment.sequenceId, outputPath });
    return ok(outputPath);
  }
}

/**
 * Clip Generator Service
 * Runs a validated clip request through trim → filter → optional MP4 copy
 */

import * as path from "path";
import { config } from "../config/engine-config";
import {
  MissingArtifactError,
  type ProbeError,
  type ToolInvocationError,
  type WorkspaceError,
} from "../lib/errors";
import { createLogger } from "../lib/logger";
import { err, ok, type Result } from "../lib/result";
import { fileExists, withTempDir, writeWorkFile } from "../lib/temp-dir";
import { clipDurationMs, type ClipSettings } from "../models/clip-settings.model";
import type { Subtitle } from "../models/subtitle.model";
import { buildAssScript } from "./ass-script.service";
import { measureCaptionPadding } from "./caption-layout.service";
import { FFmpegService, type EncodeOptions } from "./ffmpeg.service";
import {
  buildFilterStages,
  captionCueFor,
  formatFilterGraph,
  mirrorCuesForBoomerang,
  withoutPalette,
} from "./filter-graph.service";

const log = createLogger("CLIP_GENERATOR");

export type ClipPipelineState = "validated" | "trimmed" | "filtered" | "mp4-copied" | "done" | "failed";

export type ClipGenerationError = ToolInvocationError | MissingArtifactError | ProbeError | WorkspaceError;

export type ProgressListener = (percent: number) => void | Promise<void>;

export interface ClipGenerationRequest {
  settings: ClipSettings;
  subtitles: readonly Subtitle[];
  /** Caption shown above the video for the whole clip */
  caption?: string;
  onProgress?: ProgressListener;
}

export interface GeneratedClip {
  outputPath: string;
  mp4CopyPath?: string;
  /** Final frame size, caption padding included */
  width: number;
  height: number;
  /** Playback length; doubled under boomerang */
  durationMs: number;
  captionPadding: number;
}

const PROGRESS: Record<Exclude<ClipPipelineState, "failed">, number> = {
  validated: 10,
  trimmed: 40,
  filtered: 80,
  "mp4-copied": 90,
  done: 100,
};

/**
 * Tracks the pipeline state, logs transitions and reports progress
 */
export class PipelineTracker {
  private current: ClipPipelineState = "validated";

  constructor(private readonly onProgress?: ProgressListener) {}

  get state(): ClipPipelineState {
    return this.current;
  }

  async enter(next: Exclude<ClipPipelineState, "failed">): Promise<void> {
    log.info("STATE", { from: this.current, to: next });
    this.current = next;
    await this.onProgress?.(PROGRESS[next]);
  }

  fail<E extends ClipGenerationError>(error: E): { success: false; error: E } {
    log.error("STATE", error, { from: this.current, to: "failed" });
    this.current = "failed";
    return err(error);
  }
}

export class ClipGeneratorService {
  private static logOperation(operation: string, details?: Record<string, unknown>) {
    log.info(operation, details);
  }

  /**
   * Produce the final output (and companion MP4 when requested) for one clip
   */
  static async generateClip(request: ClipGenerationRequest): Promise<Result<GeneratedClip, ClipGenerationError>> {
    const { settings } = request;
    const pipeline = new PipelineTracker(request.onProgress);

    ClipGeneratorService.logOperation("GENERATE_CLIP", {
      inputPath: settings.inputPath,
      outputPath: settings.outputPath,
      format: settings.outputFormat,
      startMs: settings.startMs,
      endMs: settings.endMs,
      cues: request.subtitles.length,
      hasCaption: request.caption !== undefined,
    });

    await pipeline.enter("validated");

    const trimmed = await ClipGeneratorService.createTrimmedClip(
      settings.inputPath,
      settings.clipPath,
      settings.startMs,
      clipDurationMs(settings),
      { crf: settings.crf, preset: settings.preset }
    );
    if (!trimmed.success) {
      return pipeline.fail(trimmed.error);
    }
    await pipeline.enter("trimmed");

    return withTempDir("clip", (workDir) =>
      ClipGeneratorService.renderClip(settings, request.subtitles, request.caption, workDir, pipeline)
    );
  }

  /**
   * Stream-copy trim, re-encoding when the copy came out without video.
   * Stream copy across container boundaries can silently drop the video stream.
   */
  static async createTrimmedClip(
    inputPath: string,
    outputPath: string,
    startMs: number,
    durationMs: number,
    encode: EncodeOptions
  ): Promise<Result<void, ClipGenerationError>> {
    const copied = await FFmpegService.trim(inputPath, outputPath, startMs, durationMs);
    if (!copied.success) return copied;
    if (!(await fileExists(outputPath))) {
      return err(new MissingArtifactError(outputPath, "Trim"));
    }

    const hasVideo = await FFmpegService.hasVideoStream(outputPath);
    if (!hasVideo.success) return hasVideo;
    if (hasVideo.data) {
      return ok(undefined);
    }

    ClipGeneratorService.logOperation("TRIM_REENCODE", { inputPath, outputPath });
    const encoded = await FFmpegService.trim(inputPath, outputPath, startMs, durationMs, encode);
    if (!encoded.success) return encoded;
    if (!(await fileExists(outputPath))) {
      return err(new MissingArtifactError(outputPath, "Trim re-encode"));
    }
    return ok(undefined);
  }

  /**
   * Filter the already-trimmed clip at settings.clipPath into the final output.
   * Cues are absolute source times; settings.startMs maps to 0 in the output.
   */
  static async renderClip(
    settings: ClipSettings,
    subtitles: readonly Subtitle[],
    caption: string | undefined,
    workDir: string,
    pipeline: PipelineTracker = new PipelineTracker()
  ): Promise<Result<GeneratedClip, ClipGenerationError>> {
    const durationMs = clipDurationMs(settings);

    // Cues entirely outside the clip would only produce zero-length dialogues
    let cues = subtitles.filter((cue) => cue.endMs > settings.startMs && cue.startMs < settings.endMs);
    if (settings.boomerang) {
      cues = mirrorCuesForBoomerang(cues, settings.startMs, durationMs);
    }

    const captionText = caption !== undefined && caption.trim().length > 0 ? caption : undefined;

    let captionPadding = 0;
    if (captionText !== undefined) {
      const measured = await measureCaptionPadding(
        captionText,
        settings.captionStyle,
        settings.width,
        settings.height,
        workDir
      );
      if (!measured.success) {
        return pipeline.fail(measured.error);
      }
      // H.264 with yuv420p needs an even frame height
      captionPadding = measured.data % 2 === 0 ? measured.data : measured.data + 1;
    }

    let scriptPath: string | undefined;
    if (cues.length > 0 || captionText !== undefined) {
      scriptPath = path.join(workDir, "sub.ass");
      const script = buildAssScript({
        subtitles: cues,
        clipStartMs: settings.startMs,
        subtitleStyle: settings.subtitleStyle,
        playResX: settings.width,
        playResY: settings.height + captionPadding,
        caption:
          captionText !== undefined
            ? {
                cue: captionCueFor(captionText, settings.startMs, durationMs, settings.boomerang),
                style: settings.captionStyle,
              }
            : undefined,
      });
      const written = await writeWorkFile(scriptPath, script);
      if (!written.success) {
        return pipeline.fail(written.error);
      }
    }

    const stages = buildFilterStages(settings, { scriptPath, captionPadding, fontsDir: config.fontsDir });
    const outputOptions = { crf: settings.crf, preset: settings.preset, dropAudio: settings.boomerang };

    const filtered = await FFmpegService.applyFilterGraph(
      settings.clipPath,
      settings.outputPath,
      formatFilterGraph(stages),
      FFmpegService.outputArgsFor(settings.outputFormat, outputOptions)
    );
    if (!filtered.success) {
      return pipeline.fail(filtered.error);
    }
    if (!(await fileExists(settings.outputPath))) {
      return pipeline.fail(new MissingArtifactError(settings.outputPath, "Filter"));
    }
    await pipeline.enter("filtered");

    let mp4CopyPath: string | undefined;
    if (settings.mp4Copy && settings.mp4CopyPath !== undefined) {
      const copied = await FFmpegService.applyFilterGraph(
        settings.clipPath,
        settings.mp4CopyPath,
        formatFilterGraph(withoutPalette(stages)),
        FFmpegService.outputArgsFor("mp4", outputOptions)
      );
      if (!copied.success) {
        return pipeline.fail(copied.error);
      }
      if (!(await fileExists(settings.mp4CopyPath))) {
        return pipeline.fail(new MissingArtifactError(settings.mp4CopyPath, "MP4 copy"));
      }
      mp4CopyPath = settings.mp4CopyPath;
      await pipeline.enter("mp4-copied");
    }

    await pipeline.enter("done");

    return ok({
      outputPath: settings.outputPath,
      mp4CopyPath,
      width: settings.width,
      height: settings.height + captionPadding,
      durationMs: settings.boomerang ? 2 * durationMs : durationMs,
      captionPadding,
    });
  }
}

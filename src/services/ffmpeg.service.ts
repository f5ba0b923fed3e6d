/**
 * FFmpeg Service
 * Argument vectors for every ffmpeg / ffprobe call the engine makes
 */

import { z } from "zod";
import { config } from "../config/engine-config";
import { ProbeError, type ToolInvocationError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { runProcess } from "../lib/process-runner";
import { err, ok, type Result } from "../lib/result";
import type { VideoFormat, X264Preset } from "../models/clip-settings.model";
import { escapeFilterPath } from "./filter-graph.service";

const log = createLogger("FFMPEG_SERVICE");

export interface VideoDimensions {
  width: number;
  height: number;
}

const streamSchema = z.object({
  index: z.number().int().nonnegative(),
  codec_type: z.string(),
  codec_name: z.string().optional(),
  width: z.number().int().optional(),
  height: z.number().int().optional(),
  tags: z
    .object({
      language: z.string().optional(),
      title: z.string().optional(),
    })
    .passthrough()
    .optional(),
});

const probeOutputSchema = z.object({
  streams: z.array(streamSchema).default([]),
});

export type MediaStream = z.infer<typeof streamSchema>;

export interface EncodeOptions {
  crf: number;
  preset: X264Preset;
}

export interface OutputOptions extends EncodeOptions {
  /** Reversed output carries no audio */
  dropAudio: boolean;
}

// Background of the caption probe frame; anything else in it is caption pixels
export const PROBE_BACKGROUND = "0xFF00FF";

/**
 * Seconds with millisecond precision, as ffmpeg's -ss / -t expect
 */
export function msToSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}

function toProbeError(reason: string, error: ToolInvocationError): ProbeError {
  return new ProbeError(`${reason}: ${error.message}`, { cause: error });
}

export class FFmpegService {
  private static ffmpeg(args: string[]): Promise<Result<void, ToolInvocationError>> {
    return runProcess(config.ffmpegPath, ["-hide_banner", "-y", ...args], {
      timeoutMs: config.ffmpegTimeoutMs,
    }).then((result) => (result.success ? ok(undefined) : result));
  }

  private static ffprobe(args: string[]) {
    return runProcess(config.ffprobePath, ["-v", "error", ...args], { timeoutMs: config.ffprobeTimeoutMs });
  }

  /**
   * Width and height of the first video stream
   */
  static async getDimensions(inputPath: string): Promise<Result<VideoDimensions, ProbeError>> {
    const result = await FFmpegService.ffprobe([
      "-select_streams", "v:0",
      "-show_entries", "stream=width,height",
      "-of", "csv=p=0",
      inputPath,
    ]);
    if (!result.success) {
      return err(toProbeError(`Could not read dimensions of ${inputPath}`, result.error));
    }

    const output = result.data.stdout.toString().trim();
    const match = /^(\d+),(\d+)/.exec(output);
    if (!match) {
      return err(new ProbeError(`Unexpected ffprobe dimensions output for ${inputPath}: "${output}"`));
    }

    const width = parseInt(match[1], 10);
    const height = parseInt(match[2], 10);
    if (width === 0 || height === 0) {
      return err(new ProbeError(`ffprobe reported an empty frame size for ${inputPath}`));
    }

    log.debug("DIMENSIONS", { inputPath, width, height });
    return ok({ width, height });
  }

  /**
   * Every stream in the container, in container order
   */
  static async probeStreams(inputPath: string): Promise<Result<MediaStream[], ProbeError>> {
    const result = await FFmpegService.ffprobe(["-print_format", "json", "-show_streams", inputPath]);
    if (!result.success) {
      return err(toProbeError(`Could not list streams of ${inputPath}`, result.error));
    }

    let json: unknown;
    try {
      json = JSON.parse(result.data.stdout.toString());
    } catch (error) {
      return err(new ProbeError(`ffprobe returned invalid JSON for ${inputPath}`, { cause: error }));
    }

    const parsed = probeOutputSchema.safeParse(json);
    if (!parsed.success) {
      return err(
        new ProbeError(`Unexpected ffprobe stream list for ${inputPath}: ${parsed.error.issues[0]?.message}`, {
          cause: parsed.error,
        })
      );
    }
    return ok(parsed.data.streams);
  }

  static async hasVideoStream(inputPath: string): Promise<Result<boolean, ProbeError>> {
    const streams = await FFmpegService.probeStreams(inputPath);
    if (!streams.success) return streams;
    return ok(streams.data.some((stream) => stream.codec_type === "video"));
  }

  /**
   * Cut [startMs, startMs + durationMs) out of the input.
   * Stream copy by default; libx264 when `encode` is given.
   */
  static trim(
    inputPath: string,
    outputPath: string,
    startMs: number,
    durationMs: number,
    encode?: EncodeOptions
  ): Promise<Result<void, ToolInvocationError>> {
    const codecArgs = encode
      ? ["-c:v", "libx264", "-crf", String(encode.crf), "-preset", encode.preset, "-pix_fmt", "yuv420p", "-c:a", "aac"]
      : ["-c", "copy"];

    log.info("TRIM", { inputPath, outputPath, startMs, durationMs, reencode: encode !== undefined });
    return FFmpegService.ffmpeg([
      "-i", inputPath,
      "-ss", msToSeconds(startMs),
      "-t", msToSeconds(durationMs),
      ...codecArgs,
      outputPath,
    ]);
  }

  /**
   * Encoder arguments for a finished output file
   */
  static outputArgsFor(format: VideoFormat, options: OutputOptions): string[] {
    switch (format) {
      case "gif":
      case "webp":
        return ["-loop", "0"];
      case "mp4":
        return [
          "-c:v", "libx264",
          "-preset", options.preset,
          "-crf", String(options.crf),
          "-pix_fmt", "yuv420p",
          "-movflags", "+faststart",
          ...(options.dropAudio ? ["-an"] : ["-c:a", "aac", "-b:a", "192k"]),
        ];
    }
  }

  static applyFilterGraph(
    inputPath: string,
    outputPath: string,
    filterGraph: string,
    outputArgs: readonly string[]
  ): Promise<Result<void, ToolInvocationError>> {
    log.info("FILTER", { inputPath, outputPath });
    return FFmpegService.ffmpeg(["-i", inputPath, "-filter_complex", filterGraph, ...outputArgs, outputPath]);
  }

  /**
   * One RGBA frame of a solid background with the ASS script burned in
   */
  static renderProbeFrame(
    scriptPath: string,
    width: number,
    height: number,
    outputPath: string
  ): Promise<Result<void, ToolInvocationError>> {
    return FFmpegService.ffmpeg([
      "-f", "lavfi",
      "-i", `color=${PROBE_BACKGROUND}:size=${width}x${height}:duration=1`,
      "-vf", `subtitles=${escapeFilterPath(scriptPath)},format=rgba`,
      "-frames:v", "1",
      outputPath,
    ]);
  }

  /**
   * Join files listed in an ffconcat list without re-encoding
   */
  static concat(listPath: string, outputPath: string): Promise<Result<void, ToolInvocationError>> {
    log.info("CONCAT", { listPath, outputPath });
    return FFmpegService.ffmpeg(["-f", "concat", "-safe", "0", "-i", listPath, "-c", "copy", outputPath]);
  }

  /**
   * Write subtitle track N (counted among subtitle streams only) to a file
   */
  static extractSubtitleTrack(
    inputPath: string,
    track: number,
    outputPath: string
  ): Promise<Result<void, ToolInvocationError>> {
    log.info("EXTRACT_SUBTITLES", { inputPath, track, outputPath });
    return FFmpegService.ffmpeg(["-i", inputPath, "-map", `0:s:${track}`, "-an", "-vn", outputPath]);
  }
}

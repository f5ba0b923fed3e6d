/**
 * Clip Settings Service
 * Validates a raw generation request and derives frame size in a single pass
 */

import * as path from "path";
import { ConfigurationError, ProbeError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import type { Result } from "../lib/result";
import {
  VIDEO_FORMATS,
  X264_PRESETS,
  type ClipSettings,
  type ClipSizing,
  type VideoFormat,
  type X264Preset,
} from "../models/clip-settings.model";
import { CAPTION_STYLE_NAME, createTextStyle, defaultCaptionStyle, type TextStyleInput } from "../models/text-style.model";
import { FFmpegService, type VideoDimensions } from "./ffmpeg.service";

const log = createLogger("CLIP_SETTINGS");

export interface ClipSettingsInput {
  inputPath: string;
  clipPath: string;
  outputPath: string;
  outputFormat: VideoFormat;
  startMs: number;
  endMs: number;
  fps?: number;
  width?: number;
  height?: number;
  resolution?: number;
  subtitleStyle?: TextStyleInput;
  captionStyle?: TextStyleInput;
  crop?: boolean;
  boomerang?: boolean;
  hdGif?: boolean;
  mp4Copy?: boolean;
  mp4CopyPath?: string;
  crf?: number;
  preset?: X264Preset;
}

export interface ClipSettingsDeps {
  probeDimensions?: (inputPath: string) => Promise<Result<VideoDimensions, ProbeError>>;
}

export const DEFAULT_FPS = 20;
export const DEFAULT_CRF = 18;
export const DEFAULT_PRESET: X264Preset = "fast";

function requireInteger(value: number, field: string, min: number, max = Number.MAX_SAFE_INTEGER): void {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ConfigurationError(`${field} must be an integer between ${min} and ${max}, got ${value}`);
  }
}

function isVideoFormat(value: string): value is VideoFormat {
  return VIDEO_FORMATS.some((format) => format === value);
}

function isPreset(value: string): value is X264Preset {
  return X264_PRESETS.some((preset) => preset === value);
}

function extensionOf(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * Derived width keeps the source aspect ratio and is rounded to an even pixel count
 */
export function deriveWidth(resolution: number, source: VideoDimensions): number {
  return 2 * Math.round((source.width * resolution) / source.height / 2);
}

function defaultMp4CopyPath(outputPath: string): string {
  const parsed = path.parse(outputPath);
  return path.join(parsed.dir, `${parsed.name}-copy.mp4`);
}

/**
 * Build an immutable ClipSettings or throw ConfigurationError naming the violated rule.
 * Probes the input only when the size is derived from `resolution` without cropping.
 */
export async function createClipSettings(
  input: ClipSettingsInput,
  deps: ClipSettingsDeps = {}
): Promise<ClipSettings> {
  requireInteger(input.startMs, "startMs", 0);
  requireInteger(input.endMs, "endMs", 0);
  if (input.startMs >= input.endMs) {
    throw new ConfigurationError(
      `Clip start (${input.startMs}ms) must be before clip end (${input.endMs}ms)`
    );
  }

  const widthSet = input.width !== undefined;
  const heightSet = input.height !== undefined;
  const resolution = input.resolution;

  if (resolution !== undefined && (widthSet || heightSet)) {
    throw new ConfigurationError("Set either resolution or width and height, not both");
  }

  let width: number;
  let height: number;
  let sizing: ClipSizing;

  if (resolution !== undefined) {
    requireInteger(resolution, "resolution", 2);
    sizing = { kind: "resolution", resolution };

    if (input.crop) {
      width = resolution;
      height = resolution;
    } else {
      const probe = deps.probeDimensions ?? ((p: string) => FFmpegService.getDimensions(p));
      const dimensions = await probe(input.inputPath);
      if (!dimensions.success) {
        throw new ConfigurationError(
          `Cannot derive clip size from resolution ${resolution}: ${dimensions.error.message}`,
          { cause: dimensions.error }
        );
      }
      height = resolution;
      width = deriveWidth(resolution, dimensions.data);
      log.debug("DERIVED_SIZE", { source: dimensions.data, width, height });
    }
  } else if (input.width !== undefined && input.height !== undefined) {
    requireInteger(input.width, "width", 1);
    requireInteger(input.height, "height", 1);
    width = input.width;
    height = input.height;
    sizing = { kind: "explicit" };
  } else {
    throw new ConfigurationError("Either resolution or both width and height must be set");
  }

  if (!isVideoFormat(input.outputFormat)) {
    throw new ConfigurationError(`Unsupported output format "${input.outputFormat}"`);
  }
  const extension = extensionOf(input.outputPath);
  if (extension !== input.outputFormat) {
    throw new ConfigurationError(
      `Output path has extension "${extension}" but output format is "${input.outputFormat}"`
    );
  }

  if (input.crop && sizing.kind === "explicit" && width !== height) {
    throw new ConfigurationError(`Crop requires a square size, got ${width}x${height}`);
  }

  const fps = input.fps ?? DEFAULT_FPS;
  requireInteger(fps, "fps", 1, 120);
  const crf = input.crf ?? DEFAULT_CRF;
  requireInteger(crf, "crf", 0, 51);
  const preset = input.preset ?? DEFAULT_PRESET;
  if (!isPreset(preset)) {
    throw new ConfigurationError(`Unknown encoder preset "${preset}"`);
  }

  if (path.resolve(input.clipPath) === path.resolve(input.outputPath)) {
    throw new ConfigurationError("clipPath and outputPath must be different files");
  }

  const mp4Copy = input.mp4Copy ?? false;
  let mp4CopyPath: string | undefined;
  if (mp4Copy) {
    mp4CopyPath = input.mp4CopyPath ?? defaultMp4CopyPath(input.outputPath);
    if (extensionOf(mp4CopyPath) !== "mp4") {
      throw new ConfigurationError(`mp4CopyPath must end in .mp4, got ${mp4CopyPath}`);
    }
    if (path.resolve(mp4CopyPath) === path.resolve(input.outputPath)) {
      throw new ConfigurationError("mp4CopyPath must differ from outputPath");
    }
  }

  const subtitleStyle = createTextStyle(input.subtitleStyle);
  if (subtitleStyle.name === CAPTION_STYLE_NAME) {
    throw new ConfigurationError(`Subtitle style cannot be named "${CAPTION_STYLE_NAME}", the caption uses that name`);
  }
  const captionStyle = defaultCaptionStyle(subtitleStyle, input.captionStyle);

  return Object.freeze({
    inputPath: input.inputPath,
    clipPath: input.clipPath,
    outputPath: input.outputPath,
    outputFormat: input.outputFormat,
    startMs: input.startMs,
    endMs: input.endMs,
    fps,
    width,
    height,
    sizing,
    subtitleStyle,
    captionStyle,
    crop: input.crop ?? false,
    boomerang: input.boomerang ?? false,
    hdGif: input.hdGif ?? false,
    mp4Copy,
    mp4CopyPath,
    crf,
    preset,
  });
}

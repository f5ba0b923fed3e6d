import type { TextStyle } from "./text-style.model";

export const VIDEO_FORMATS = ["gif", "webp", "mp4"] as const;

export type VideoFormat = (typeof VIDEO_FORMATS)[number];

export const X264_PRESETS = [
  "ultrafast",
  "superfast",
  "veryfast",
  "faster",
  "fast",
  "medium",
  "slow",
  "slower",
  "veryslow",
] as const;

export type X264Preset = (typeof X264_PRESETS)[number];

/**
 * How the output frame size was chosen. `resolution` sizing keeps the
 * requested height so the scale stage can be traced back to the request.
 */
export type ClipSizing = { kind: "explicit" } | { kind: "resolution"; resolution: number };

/**
 * Fully validated generation request. Built only through createClipSettings.
 */
export interface ClipSettings {
  readonly inputPath: string;
  /** Intermediate trimmed clip (always MP4) */
  readonly clipPath: string;
  readonly outputPath: string;
  readonly outputFormat: VideoFormat;
  readonly startMs: number;
  readonly endMs: number;
  readonly fps: number;
  readonly width: number;
  readonly height: number;
  readonly sizing: ClipSizing;
  readonly subtitleStyle: TextStyle;
  readonly captionStyle: TextStyle;
  readonly crop: boolean;
  readonly boomerang: boolean;
  readonly hdGif: boolean;
  readonly mp4Copy: boolean;
  /** Companion MP4 location, set whenever mp4Copy is */
  readonly mp4CopyPath?: string;
  readonly crf: number;
  readonly preset: X264Preset;
}

export function clipDurationMs(settings: Pick<ClipSettings, "startMs" | "endMs">): number {
  return settings.endMs - settings.startMs;
}

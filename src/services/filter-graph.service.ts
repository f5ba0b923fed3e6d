/**
 * Filter Graph Service
 * Ordered filter stages for a clip and the one formatter that turns them into
 * an ffmpeg -filter_complex string. All escaping lives here.
 */

import type { ClipSettings } from "../models/clip-settings.model";
import { createSubtitle, type Subtitle } from "../models/subtitle.model";

export type PaletteMode = "full" | "reduced";

export type FilterStage =
  | { kind: "reverse-concat" }
  | { kind: "fps"; fps: number }
  | { kind: "crop" }
  | { kind: "scale"; width: number; height: number }
  | { kind: "pad"; top: number }
  | { kind: "drawtext"; text: string; font: string; fontSize: number; marginBottom: number }
  | { kind: "subtitles"; scriptPath: string; fontsDir?: string }
  | { kind: "palette"; mode: PaletteMode };

export type FilterStageKind = FilterStage["kind"];

export interface FilterGraphOptions {
  /** ASS script to burn in; omitted when there is nothing to render */
  scriptPath?: string;
  /** Rows reserved above the video for a caption */
  captionPadding?: number;
  fontsDir?: string;
}

type StageSettings = Pick<ClipSettings, "boomerang" | "fps" | "crop" | "width" | "height" | "outputFormat" | "hdGif">;

/**
 * Build the stage list. Order: reverse-concat, fps, crop, scale, pad, subtitles, palette.
 */
export function buildFilterStages(settings: StageSettings, options: FilterGraphOptions = {}): FilterStage[] {
  const stages: FilterStage[] = [];

  if (settings.boomerang) {
    stages.push({ kind: "reverse-concat" });
  }

  stages.push({ kind: "fps", fps: settings.fps });

  if (settings.crop) {
    stages.push({ kind: "crop" });
  }

  stages.push({ kind: "scale", width: settings.width, height: settings.height });

  if (options.captionPadding !== undefined && options.captionPadding > 0) {
    stages.push({ kind: "pad", top: options.captionPadding });
  }

  if (options.scriptPath !== undefined) {
    stages.push({ kind: "subtitles", scriptPath: options.scriptPath, fontsDir: options.fontsDir });
  }

  // Palette goes last: it quantizes the final pixels
  if (settings.outputFormat === "gif") {
    stages.push({ kind: "palette", mode: settings.hdGif ? "full" : "reduced" });
  }

  return stages;
}

/**
 * Stages for one sequence segment: geometry plus a plain text overlay
 */
export function buildSegmentStages(
  settings: Pick<ClipSettings, "fps" | "crop" | "width" | "height">,
  overlay: { text: string; font: string; fontSize: number; marginBottom: number }
): FilterStage[] {
  const stages: FilterStage[] = [{ kind: "fps", fps: settings.fps }];
  if (settings.crop) {
    stages.push({ kind: "crop" });
  }
  stages.push({ kind: "scale", width: settings.width, height: settings.height });
  if (overlay.text.trim().length > 0) {
    stages.push({ kind: "drawtext", ...overlay });
  }
  return stages;
}

export function withoutPalette(stages: readonly FilterStage[]): FilterStage[] {
  return stages.filter((stage) => stage.kind !== "palette");
}

// ============================================================================
// Escaping
// ============================================================================

/**
 * First level: a value inside a filter's option list (key=value:key=value)
 */
export function escapeFilterOption(value: string): string {
  return value.replace(/[\\':]/g, (c) => `\\${c}`);
}

/**
 * Second level: a filter's argument string inside the whole graph description
 */
export function escapeFilterGraph(value: string): string {
  return value.replace(/[\\'[\],;]/g, (c) => `\\${c}`);
}

/**
 * Paths use forward slashes, then both escaping levels apply
 */
export function escapeFilterPath(filePath: string): string {
  return escapeFilterGraph(escapeFilterOption(filePath.replace(/\\/g, "/")));
}

const FONT_FILE_PATTERN = /\.(ttf|otf|ttc)$/i;

function formatStage(stage: FilterStage): string {
  switch (stage.kind) {
    case "reverse-concat":
      return "[0]reverse[r];[0][r]concat=n=2:v=1:a=0";
    case "fps":
      return `fps=${stage.fps}`;
    case "crop":
      return "crop='min(iw,ih)':'min(iw,ih)'";
    case "scale":
      return `scale=${stage.width}:${stage.height}:flags=lanczos`;
    case "pad":
      return `pad=iw:(ih+${stage.top}):0:${stage.top}`;
    case "drawtext": {
      const fontOption = FONT_FILE_PATTERN.test(stage.font)
        ? `fontfile=${escapeFilterPath(stage.font)}`
        : `font=${escapeFilterGraph(escapeFilterOption(stage.font))}`;
      const text = escapeFilterGraph(escapeFilterOption(stage.text));
      return (
        `drawtext=${fontOption}:text=${text}:expansion=none:fontsize=${stage.fontSize}` +
        `:fontcolor=white:borderw=2:bordercolor=black` +
        `:x=(w-text_w)/2:y=h-text_h-${stage.marginBottom}`
      );
    }
    case "subtitles": {
      let filter = `subtitles=${escapeFilterPath(stage.scriptPath)}`;
      if (stage.fontsDir !== undefined) {
        filter += `:fontsdir=${escapeFilterPath(stage.fontsDir)}`;
      }
      return filter;
    }
    case "palette":
      return stage.mode === "full"
        ? "split[s0][s1];[s0]palettegen[p];[s1][p]paletteuse"
        : "split[s0][s1];[s0]palettegen=max_colors=32[p];[s1][p]paletteuse=dither=bayer";
  }
}

export function formatFilterGraph(stages: readonly FilterStage[]): string {
  return stages.map(formatStage).join(",");
}

// ============================================================================
// Boomerang timing
// ============================================================================

/**
 * Add a time-reflected copy of every cue for the reversed half of a boomerang clip.
 * A cue at relative (s, e) in a clip of duration D is mirrored to (2D - e, 2D - s).
 * Relative times are clamped to [0, D], so a forward cue never runs into the reversed half.
 * Cues entirely outside the clip are dropped.
 */
export function mirrorCuesForBoomerang(
  subtitles: readonly Subtitle[],
  clipStartMs: number,
  durationMs: number
): Subtitle[] {
  const forward: Subtitle[] = [];
  const mirrored: Subtitle[] = [];
  for (const cue of subtitles) {
    const relStart = Math.min(durationMs, Math.max(0, cue.startMs - clipStartMs));
    const relEnd = Math.min(durationMs, Math.max(0, cue.endMs - clipStartMs));
    if (relEnd <= relStart) continue;

    forward.push(
      cue.endMs - clipStartMs > durationMs
        ? createSubtitle({
            sequenceId: cue.sequenceId,
            startMs: cue.startMs,
            endMs: clipStartMs + durationMs,
            text: cue.text,
            delayMs: cue.delayMs,
          })
        : cue
    );
    mirrored.push(
      createSubtitle({
        sequenceId: cue.sequenceId,
        startMs: clipStartMs + 2 * durationMs - relEnd,
        endMs: clipStartMs + 2 * durationMs - relStart,
        text: cue.text,
        delayMs: cue.delayMs,
      })
    );
  }
  return [...forward, ...mirrored];
}

/**
 * Caption cue spanning the whole output: D, or 2D under boomerang
 */
export function captionCueFor(text: string, clipStartMs: number, durationMs: number, boomerang: boolean): Subtitle {
  return createSubtitle({
    sequenceId: 0,
    startMs: clipStartMs,
    endMs: clipStartMs + (boomerang ? 2 * durationMs : durationMs),
    text,
  });
}

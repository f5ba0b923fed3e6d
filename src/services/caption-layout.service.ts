/**
 * Caption Layout Service
 * Renders a caption onto a solid probe frame and measures how tall it came out
 */

import * as path from "path";
import sharp from "sharp";
import { MissingArtifactError, ProbeError, ToolInvocationError, WorkspaceError } from "../lib/errors";
import { createLogger } from "../lib/logger";
import { err, ok, type Result } from "../lib/result";
import { fileExists, writeWorkFile } from "../lib/temp-dir";
import { createSubtitle } from "../models/subtitle.model";
import { buildAssStyleHeader, buildAssStyleLine, type TextStyle } from "../models/text-style.model";
import { buildDialogueLine, buildScriptInfo } from "./ass-script.service";
import { FFmpegService } from "./ffmpeg.service";

const log = createLogger("CAPTION_LAYOUT");

// Caption stays on screen for the whole probe render
const PROBE_CUE_MS = 5000;

export type CaptionLayoutError = ToolInvocationError | MissingArtifactError | ProbeError | WorkspaceError;

/**
 * Height of the band of rows holding any pixel whose colour differs from pixel (0,0).
 * Alpha is ignored. Returns 0 when every row matches the background.
 */
export function measureTextBlockHeight(
  pixels: Uint8Array,
  width: number,
  height: number,
  channels: number
): number {
  if (width === 0 || height === 0) return 0;

  const bgR = pixels[0];
  const bgG = pixels[1];
  const bgB = pixels[2];
  const rowStride = width * channels;

  let top = -1;
  let bottom = -1;
  for (let y = 0; y < height; y++) {
    const rowStart = y * rowStride;
    for (let x = 0; x < width; x++) {
      const i = rowStart + x * channels;
      if (pixels[i] !== bgR || pixels[i + 1] !== bgG || pixels[i + 2] !== bgB) {
        if (top === -1) top = y;
        bottom = y;
        break;
      }
    }
  }

  return top === -1 ? 0 : bottom - top + 1;
}

export function buildCaptionProbeScript(text: string, style: TextStyle, width: number, height: number): string {
  const cue = createSubtitle({ sequenceId: 0, startMs: 0, endMs: PROBE_CUE_MS, text });
  return [
    buildScriptInfo(width, height),
    "",
    buildAssStyleHeader(),
    buildAssStyleLine(style),
    "",
    "[Events]",
    "Format: Layer, Start, End, Style, Name, MarginL, MarginR, MarginV, Effect, Text",
    buildDialogueLine(cue, 0, style),
    "",
  ].join("\n");
}

/**
 * Vertical padding to reserve above the video so the caption fits:
 * measured text height plus the style's vertical margin on both sides.
 */
export async function measureCaptionPadding(
  text: string,
  style: TextStyle,
  width: number,
  height: number,
  workDir: string
): Promise<Result<number, CaptionLayoutError>> {
  const scriptPath = path.join(workDir, "caption-probe.ass");
  const framePath = path.join(workDir, "caption-probe.png");

  const written = await writeWorkFile(scriptPath, buildCaptionProbeScript(text, style, width, height));
  if (!written.success) {
    return written;
  }

  const render = await FFmpegService.renderProbeFrame(scriptPath, width, height, framePath);
  if (!render.success) {
    return render;
  }
  if (!(await fileExists(framePath))) {
    return err(new MissingArtifactError(framePath, "Caption probe render"));
  }

  let measured: number;
  try {
    const { data, info } = await sharp(framePath).ensureAlpha().raw().toBuffer({ resolveWithObject: true });
    measured = measureTextBlockHeight(data, info.width, info.height, info.channels);
  } catch (error) {
    return err(
      new ProbeError(
        `Could not decode caption probe frame ${framePath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      )
    );
  }

  const padding = measured + 2 * style.marginV;
  log.info("MEASURED", { measured, padding, width, height });
  return ok(padding);
}

/**
 * In-process stand-in for ffmpeg and ffprobe. Writes placeholder outputs,
 * renders caption probe frames with sharp and records every invocation.
 */

import { promises as fs } from "fs";
import sharp from "sharp";
import { config } from "../config/engine-config";
import { ToolInvocationError } from "../lib/errors";
import type { ProcessOutput, RunProcessOptions } from "../lib/process-runner";
import { err, ok, type Result } from "../lib/result";

export interface FakeStream {
  index: number;
  codec_type: string;
  codec_name?: string;
  width?: number;
  height?: number;
  tags?: { language?: string; title?: string };
}

export interface FakeMediaToolsOptions {
  /** Streams reported for a probed file; defaults to one video stream */
  probeStreams?: (filePath: string) => FakeStream[];
  /** `width,height` printed for a dimensions probe */
  dimensions?: string;
  /** Rows of caption pixels drawn into the probe frame */
  captionRows?: number;
  /** SRT written when a subtitle track is extracted */
  subtitleSrt?: string;
  failWhen?: (command: string, args: readonly string[]) => boolean;
  /** Succeed without writing the output file */
  skipOutputWhen?: (args: readonly string[]) => boolean;
}

export interface RecordedCall {
  command: string;
  args: string[];
}

export type RunProcessFn = (
  command: string,
  args: readonly string[],
  options: RunProcessOptions
) => Promise<Result<ProcessOutput, ToolInvocationError>>;

const MAGENTA = { r: 255, g: 0, b: 255 };
const WHITE = { r: 255, g: 255, b: 255 };

function output(stdout: string): Result<ProcessOutput, ToolInvocationError> {
  return ok({ stdout: Buffer.from(stdout), stderr: "", durationMs: 1 });
}

async function writeProbeFrame(target: string, args: readonly string[], rows: number): Promise<void> {
  const source = args.find((arg) => arg.startsWith("color=")) ?? "";
  const size = /size=(\d+)x(\d+)/.exec(source);
  const width = size ? parseInt(size[1], 10) : 64;
  const height = size ? parseInt(size[2], 10) : 64;

  const frame = sharp({ create: { width, height, channels: 3, background: MAGENTA } });
  if (rows === 0) {
    await frame.png().toFile(target);
    return;
  }

  const band = await sharp({ create: { width, height: rows, channels: 3, background: WHITE } }).png().toBuffer();
  await frame.composite([{ input: band, top: 4, left: 0 }]).png().toFile(target);
}

/**
 * ASS script referenced by a subtitles filter, read before the pipeline removes it
 */
async function readSubtitleScript(args: readonly string[]): Promise<string | undefined> {
  const graphIndex = args.findIndex((arg) => arg === "-filter_complex" || arg === "-vf");
  if (graphIndex === -1) return undefined;
  const match = /subtitles=([^,:]+)/.exec(args[graphIndex + 1]);
  if (!match) return undefined;
  return fs.readFile(match[1], "utf-8");
}

export function createFakeMediaTools(options: FakeMediaToolsOptions = {}) {
  const calls: RecordedCall[] = [];
  const scripts: string[] = [];

  const run: RunProcessFn = async (command, args) => {
    const argv = [...args];
    calls.push({ command, args: argv });

    if (options.failWhen?.(command, argv)) {
      return err(
        new ToolInvocationError(`${command} failed with code 1`, {
          command: [command, ...argv].join(" "),
          exitCode: 1,
          stderrTail: "Conversion failed!",
          timedOut: false,
        })
      );
    }

    if (command === config.ffprobePath) {
      const target = argv[argv.length - 1];
      if (argv.includes("-show_streams")) {
        const streams = options.probeStreams?.(target) ?? [
          { index: 0, codec_type: "video", codec_name: "h264", width: 1920, height: 1080 },
        ];
        return output(JSON.stringify({ streams }));
      }
      return output(options.dimensions ?? "1920,1080\n");
    }

    const script = await readSubtitleScript(argv);
    if (script !== undefined) {
      scripts.push(script);
    }

    const target = argv[argv.length - 1];
    if (options.skipOutputWhen?.(argv)) {
      return output("");
    }

    if (argv.includes("lavfi")) {
      await writeProbeFrame(target, argv, options.captionRows ?? 20);
    } else if (target.endsWith(".srt")) {
      await fs.writeFile(target, options.subtitleSrt ?? "", "utf-8");
    } else {
      await fs.writeFile(target, "placeholder media");
    }
    return output("");
  };

  const ffmpegCalls = () => calls.filter((call) => call.command === config.ffmpegPath);

  return { run, calls, scripts, ffmpegCalls };
}

/**
 * Value following `flag` in an argument vector
 */
export function argAfter(args: readonly string[], flag: string): string | undefined {
  const index = args.indexOf(flag);
  return index === -1 ? undefined : args[index + 1];
}

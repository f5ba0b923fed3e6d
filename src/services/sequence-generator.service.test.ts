import { promises as fs } from "fs";
import * as os from "os";
import * as path from "path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { runProcess } from "../lib/process-runner";
import { argAfter, createFakeMediaTools } from "../test-utils/fake-media-tools";
import {
  buildConcatList,
  normalizeSegments,
  planSegments,
  SequenceGeneratorService,
  type SequenceRequest,
  type SequenceSegment,
} from "./sequence-generator.service";

vi.mock("../lib/process-runner", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/process-runner")>();
  return { ...actual, runProcess: vi.fn() };
});

const segments: SequenceSegment[] = [
  { sequenceId: 5, startMs: 1000, endMs: 2000, text: ["one"] },
  { sequenceId: 6, startMs: 2100, endMs: 3000, text: ["two", "lines"] },
  { sequenceId: 7, startMs: 3000, endMs: 4000, text: ["three"], font: "Impact", fontSize: 30 },
];

describe("Sequence generator", () => {
  describe("planSegments", () => {
    test("should extend each segment to the start of the next", () => {
      const plan = planSegments(segments);
      expect(plan.success).toBe(true);
      if (!plan.success) return;
      expect(plan.data.map((s) => s.effectiveEndMs)).toEqual([2100, 3000, 4000]);
    });

    test("should require at least two segments", () => {
      const plan = planSegments(segments.slice(0, 1));
      expect(plan.success).toBe(false);
      if (plan.success) return;
      expect(plan.error.message).toBe("A sequence needs at least 2 segments, got 1");
    });

    test("should reject a gap in sequence ids", () => {
      const plan = planSegments([segments[0], segments[2]]);
      expect(plan.success).toBe(false);
      if (plan.success) return;
      expect(plan.error.code).toBe("SEQUENCE_ERROR");
      expect(plan.error.message).toBe("Selection is not contiguous: sequence id 7 follows 5 at position 1");
    });

    test("should reject a segment that the next one starts before", () => {
      const plan = planSegments([
        { sequenceId: 1, startMs: 5000, endMs: 6000, text: ["a"] },
        { sequenceId: 2, startMs: 4000, endMs: 7000, text: ["b"] },
      ]);
      expect(plan.success).toBe(false);
      if (plan.success) return;
      expect(plan.error.message).toBe("Segment 1 starts at 5000ms but the sequence continues at 4000ms");
    });
  });

  describe("segment helpers", () => {
    test("should split newline separated text", () => {
      const [segment] = normalizeSegments([{ sequenceId: 1, startMs: 0, endMs: 10, text: "a\nb" }]);
      expect(segment.text).toEqual(["a", "b"]);
    });

    test("should quote every path in the concat list", () => {
      expect(buildConcatList(["/tmp/a.mp4", "/tmp/it's.mp4"])).toBe("file '/tmp/a.mp4'\nfile '/tmp/it'\\''s.mp4'\n");
    });
  });

  describe("SequenceGeneratorService.generateSequence", () => {
    let dir: string;
    let request: SequenceRequest;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), "sequence-generator-test-"));
      request = {
        settings: {
          inputPath: path.join(dir, "episode.mkv"),
          clipPath: path.join(dir, "joined.mp4"),
          outputPath: path.join(dir, "out.gif"),
          outputFormat: "gif",
          width: 480,
          height: 270,
        },
        segments,
      };
    });

    afterEach(async () => {
      vi.mocked(runProcess).mockReset();
      await fs.rm(dir, { recursive: true, force: true });
    });

    test("should render each segment, join them and convert the joined clip", async () => {
      const tools = createFakeMediaTools();
      vi.mocked(runProcess).mockImplementation(tools.run);
      const onProgress = vi.fn();

      const result = await SequenceGeneratorService.generateSequence({ ...request, onProgress });

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.durationMs).toBe(3000);
      expect(result.data.outputPath).toBe(path.join(dir, "out.gif"));
      expect(onProgress.mock.calls.map(([percent]) => percent)).toEqual([10, 40, 80, 100]);

      const trims = tools.ffmpegCalls().filter((call) => argAfter(call.args, "-ss") !== undefined);
      expect(trims.map((call) => [argAfter(call.args, "-ss"), argAfter(call.args, "-t")])).toEqual([
        ["1.000", "1.100"],
        ["2.100", "0.900"],
        ["3.000", "1.000"],
      ]);

      const overlays = tools
        .ffmpegCalls()
        .map((call) => argAfter(call.args, "-filter_complex"))
        .filter((graph): graph is string => graph !== undefined && graph.includes("drawtext"));
      expect(overlays).toHaveLength(3);
      expect(overlays[2]).toBe(
        "fps=20,scale=480:270:flags=lanczos,drawtext=font=Impact:text=three:expansion=none:fontsize=30" +
          ":fontcolor=white:borderw=2:bordercolor=black:x=(w-text_w)/2:y=h-text_h-10"
      );

      const concat = tools.ffmpegCalls().find((call) => call.args.includes("concat"));
      expect(concat?.args.slice(2)).toEqual([
        "-f", "concat",
        "-safe", "0",
        "-i", expect.stringMatching(/segments\.txt$/),
        "-c", "copy",
        path.join(dir, "joined.mp4"),
      ]);

      const final = tools.ffmpegCalls()[tools.ffmpegCalls().length - 1];
      expect(argAfter(final.args, "-i")).toBe(path.join(dir, "joined.mp4"));
      expect(argAfter(final.args, "-filter_complex")).toBe(
        "fps=20,scale=480:270:flags=lanczos,split[s0][s1];[s0]palettegen=max_colors=32[p];[s1][p]paletteuse=dither=bayer"
      );
    });

    test("should stop before any ffmpeg call for a non-contiguous selection", async () => {
      const tools = createFakeMediaTools();
      vi.mocked(runProcess).mockImplementation(tools.run);

      const result = await SequenceGeneratorService.generateSequence({
        ...request,
        segments: [segments[0], segments[2]],
      });

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe("SEQUENCE_ERROR");
      expect(tools.calls).toHaveLength(0);
    });

    test("should fail when a segment cannot be rendered", async () => {
      const tools = createFakeMediaTools({
        failWhen: (_, args) => (argAfter(args, "-filter_complex") ?? "").includes("text=two"),
      });
      vi.mocked(runProcess).mockImplementation(tools.run);

      const result = await SequenceGeneratorService.generateSequence(request);

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe("TOOL_INVOCATION_ERROR");
      expect(tools.ffmpegCalls().some((call) => call.args.includes("concat"))).toBe(false);
    });
  });
});

import { afterEach, describe, expect, test, vi } from "vitest";
import { runProcess } from "../lib/process-runner";
import { argAfter, createFakeMediaTools, type FakeStream } from "../test-utils/fake-media-tools";
import type { MediaStream } from "./ffmpeg.service";
import {
  extractSubtitles,
  extractSubtitlesByLanguage,
  isClosedCaptionTitle,
  selectSubtitleTrack,
} from "./subtitle-track.service";

vi.mock("../lib/process-runner", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/process-runner")>();
  return { ...actual, runProcess: vi.fn() };
});

const streams: FakeStream[] = [
  { index: 0, codec_type: "video", codec_name: "h264" },
  { index: 1, codec_type: "audio", codec_name: "aac", tags: { language: "jpn" } },
  { index: 2, codec_type: "audio", codec_name: "aac", tags: { language: "eng" } },
  { index: 3, codec_type: "subtitle", codec_name: "subrip", tags: { language: "eng", title: "English SDH" } },
  { index: 4, codec_type: "subtitle", codec_name: "subrip", tags: { language: "eng", title: "English" } },
  { index: 5, codec_type: "subtitle", codec_name: "ass", tags: { language: "spa" } },
];

const mediaStreams: MediaStream[] = streams;

const SRT = "1\n00:00:01,000 --> 00:00:02,000\nHola\n\n2\n00:00:03,000 --> 00:00:04,000\nAdiós\n";

describe("Subtitle tracks", () => {
  afterEach(() => {
    vi.mocked(runProcess).mockReset();
  });

  describe("isClosedCaptionTitle", () => {
    test("should recognise SDH and CC titles", () => {
      expect(isClosedCaptionTitle("English SDH")).toBe(true);
      expect(isClosedCaptionTitle("English (CC)")).toBe(true);
      expect(isClosedCaptionTitle("Hearing Impaired")).toBe(true);
      expect(isClosedCaptionTitle("English")).toBe(false);
      expect(isClosedCaptionTitle(undefined)).toBe(false);
    });
  });

  describe("selectSubtitleTrack", () => {
    test("should count the track among subtitle streams and skip closed captions", () => {
      const selected = selectSubtitleTrack(mediaStreams, ["fre", "ENG"]);
      expect(selected).toEqual({ success: true, data: { track: 1, language: "ENG", title: "English" } });
    });

    test("should take closed captions when asked to", () => {
      const selected = selectSubtitleTrack(mediaStreams, ["eng"], true);
      expect(selected).toEqual({ success: true, data: { track: 0, language: "eng", title: "English SDH" } });
    });

    test("should pick the later stream for a lower priority language", () => {
      const selected = selectSubtitleTrack(mediaStreams, ["spa", "eng"]);
      expect(selected.success && selected.data.track).toBe(2);
    });

    test("should fail when no language matches", () => {
      const selected = selectSubtitleTrack(mediaStreams, ["ger"]);
      expect(selected.success).toBe(false);
      if (selected.success) return;
      expect(selected.error.message).toBe("No subtitle track found for languages [ger] (closed caption tracks excluded)");
    });
  });

  describe("extractSubtitles", () => {
    test("should map the requested track and parse the result", async () => {
      const tools = createFakeMediaTools({ subtitleSrt: SRT });
      vi.mocked(runProcess).mockImplementation(tools.run);

      const result = await extractSubtitles("/media/show.mkv", 2);

      expect(result.success).toBe(true);
      if (!result.success) return;
      expect(result.data.map((cue) => cue.text)).toEqual([["Hola"], ["Adiós"]]);
      const [call] = tools.ffmpegCalls();
      expect(argAfter(call.args, "-map")).toBe("0:s:2");
      expect(call.args).toContain("-vn");
    });

    test("should fail when ffmpeg wrote no subtitle file", async () => {
      vi.mocked(runProcess).mockImplementation(createFakeMediaTools({ skipOutputWhen: () => true }).run);

      const result = await extractSubtitles("/media/show.mkv");

      expect(result.success).toBe(false);
      if (result.success) return;
      expect(result.error.code).toBe("EXTRACTION_ERROR");
      expect(result.error.message).toBe("Could not extract subtitles from /media/show.mkv at subtitle track 0");
    });
  });

  describe("extractSubtitlesByLanguage", () => {
    test("should probe, select and extract", async () => {
      const tools = createFakeMediaTools({ probeStreams: () => streams, subtitleSrt: SRT });
      vi.mocked(runProcess).mockImplementation(tools.run);

      const result = await extractSubtitlesByLanguage("/media/show.mkv", ["spa"]);

      expect(result.success).toBe(true);
      const [call] = tools.ffmpegCalls();
      expect(argAfter(call.args, "-map")).toBe("0:s:2");
    });

    test("should return the selection error without extracting", async () => {
      const tools = createFakeMediaTools({ probeStreams: () => streams });
      vi.mocked(runProcess).mockImplementation(tools.run);

      const result = await extractSubtitlesByLanguage("/media/show.mkv", ["ger"]);

      expect(result.success).toBe(false);
      expect(tools.ffmpegCalls()).toHaveLength(0);
    });
  });
});

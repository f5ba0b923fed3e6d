import { describe, test, expect, vi } from "vitest";
import { ConfigurationError, ProbeError } from "../lib/errors";
import { err, ok } from "../lib/result";
import { createClipSettings, deriveWidth, type ClipSettingsInput } from "./clip-settings.service";

const base: ClipSettingsInput = {
  inputPath: "/media/episode.mkv",
  clipPath: "/out/clip.mp4",
  outputPath: "/out/clip.gif",
  outputFormat: "gif",
  startMs: 10000,
  endMs: 13000,
  width: 480,
  height: 270,
};

describe("Clip settings", () => {
  describe("deriveWidth", () => {
    test("should keep the aspect ratio and round to an even width", () => {
      expect(deriveWidth(320, { width: 1920, height: 1080 })).toBe(568);
      expect(deriveWidth(480, { width: 1280, height: 720 })).toBe(854);
    });
  });

  describe("createClipSettings", () => {
    test("should apply defaults", async () => {
      const settings = await createClipSettings(base);
      expect(settings.fps).toBe(20);
      expect(settings.crf).toBe(18);
      expect(settings.preset).toBe("fast");
      expect(settings.sizing).toEqual({ kind: "explicit" });
      expect(settings.subtitleStyle.name).toBe("subtitle_style");
      expect(settings.captionStyle.name).toBe("caption_style");
      expect(settings.mp4CopyPath).toBeUndefined();
      expect(Object.isFrozen(settings)).toBe(true);
    });

    test("should derive width from the probed source when only resolution is set", async () => {
      const probeDimensions = vi.fn().mockResolvedValue(ok({ width: 1920, height: 1080 }));
      const settings = await createClipSettings(
        { ...base, width: undefined, height: undefined, resolution: 320 },
        { probeDimensions }
      );

      expect(probeDimensions).toHaveBeenCalledWith("/media/episode.mkv");
      expect(settings.width).toBe(568);
      expect(settings.height).toBe(320);
      expect(settings.sizing).toEqual({ kind: "resolution", resolution: 320 });
    });

    test("should not probe when cropping to a resolution", async () => {
      const probeDimensions = vi.fn();
      const settings = await createClipSettings(
        { ...base, width: undefined, height: undefined, resolution: 300, crop: true },
        { probeDimensions }
      );

      expect(probeDimensions).not.toHaveBeenCalled();
      expect(settings.width).toBe(300);
      expect(settings.height).toBe(300);
    });

    test("should turn a probe failure into a configuration error", async () => {
      const probeDimensions = vi.fn().mockResolvedValue(err(new ProbeError("no video stream")));
      await expect(
        createClipSettings({ ...base, width: undefined, height: undefined, resolution: 320 }, { probeDimensions })
      ).rejects.toThrow("Cannot derive clip size from resolution 320: no video stream");
    });

    test("should reject start at or after end", async () => {
      await expect(createClipSettings({ ...base, startMs: 5000, endMs: 5000 })).rejects.toThrow(
        "Clip start (5000ms) must be before clip end (5000ms)"
      );
    });

    test("should reject resolution together with explicit size", async () => {
      await expect(createClipSettings({ ...base, resolution: 320 })).rejects.toThrow(
        "Set either resolution or width and height, not both"
      );
    });

    test("should reject a missing size", async () => {
      await expect(createClipSettings({ ...base, height: undefined })).rejects.toThrow(
        "Either resolution or both width and height must be set"
      );
    });

    test("should reject an extension that does not match the format", async () => {
      await expect(createClipSettings({ ...base, outputFormat: "mp4" })).rejects.toThrow(
        'Output path has extension "gif" but output format is "mp4"'
      );
    });

    test("should reject crop with a non-square explicit size", async () => {
      await expect(createClipSettings({ ...base, crop: true })).rejects.toThrow(
        "Crop requires a square size, got 480x270"
      );
    });

    test("should reject out of range fps and crf", async () => {
      await expect(createClipSettings({ ...base, fps: 0 })).rejects.toBeInstanceOf(ConfigurationError);
      await expect(createClipSettings({ ...base, crf: 52 })).rejects.toThrow(
        "crf must be an integer between 0 and 51, got 52"
      );
    });

    test("should reject a clip path equal to the output path", async () => {
      await expect(
        createClipSettings({ ...base, outputFormat: "mp4", outputPath: "/out/clip.mp4" })
      ).rejects.toThrow("clipPath and outputPath must be different files");
    });

    test("should default the companion MP4 path next to the output", async () => {
      const settings = await createClipSettings({ ...base, mp4Copy: true });
      expect(settings.mp4CopyPath).toBe("/out/clip-copy.mp4");
    });

    test("should reject a subtitle style named like the caption style", async () => {
      await expect(createClipSettings({ ...base, subtitleStyle: { name: "caption_style" } })).rejects.toThrow(
        'Subtitle style cannot be named "caption_style", the caption uses that name'
      );
    });

    test("should reject a companion path that is not an MP4", async () => {
      await expect(createClipSettings({ ...base, mp4Copy: true, mp4CopyPath: "/out/copy.mov" })).rejects.toThrow(
        "mp4CopyPath must end in .mp4, got /out/copy.mov"
      );
    });
  });
});

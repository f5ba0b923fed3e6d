import { describe, test, expect } from "vitest";
import { ConfigurationError } from "../lib/errors";
import {
  checkContiguity,
  createSubtitle,
  formatAssTimestamp,
  getNeighbours,
  sortSubtitles,
  toRelativeMs,
} from "./subtitle.model";

describe("Subtitle model", () => {
  describe("createSubtitle", () => {
    test("should split string text into lines", () => {
      const cue = createSubtitle({ sequenceId: 1, startMs: 1000, endMs: 2000, text: "first\nsecond" });
      expect(cue.text).toEqual(["first", "second"]);
      expect(cue.delayMs).toBe(0);
    });

    test("should freeze the cue", () => {
      const cue = createSubtitle({ sequenceId: 1, startMs: 0, endMs: 500, text: ["a"] });
      expect(Object.isFrozen(cue)).toBe(true);
      expect(Object.isFrozen(cue.text)).toBe(true);
    });

    test("should reject a cue that does not end after it starts", () => {
      expect(() => createSubtitle({ sequenceId: 2, startMs: 1000, endMs: 1000, text: "x" })).toThrow(
        ConfigurationError
      );
    });

    test("should reject fractional or negative times", () => {
      expect(() => createSubtitle({ sequenceId: 0, startMs: 1.5, endMs: 10, text: "x" })).toThrow(
        "startMs must be a non-negative integer"
      );
      expect(() => createSubtitle({ sequenceId: 0, startMs: 0, endMs: 10, text: "x", delayMs: -1 })).toThrow(
        "delayMs must be a non-negative integer"
      );
    });
  });

  describe("formatAssTimestamp", () => {
    test("should format zero", () => {
      expect(formatAssTimestamp(0)).toBe("0:00:00.00");
    });

    test("should format minutes, seconds and centiseconds", () => {
      expect(formatAssTimestamp(61230)).toBe("0:01:01.23");
    });

    test("should format whole hours", () => {
      expect(formatAssTimestamp(3600000)).toBe("1:00:00.00");
    });

    test("should round half up to the nearest centisecond", () => {
      expect(formatAssTimestamp(5)).toBe("0:00:00.01");
      expect(formatAssTimestamp(4)).toBe("0:00:00.00");
      expect(formatAssTimestamp(1235)).toBe("0:00:01.24");
    });

    test("should clamp negative input to zero", () => {
      expect(formatAssTimestamp(-300)).toBe("0:00:00.00");
    });
  });

  describe("toRelativeMs", () => {
    test("should subtract the origin", () => {
      expect(toRelativeMs(12500, 10000)).toBe(2500);
    });

    test("should clamp times before the origin to zero", () => {
      expect(toRelativeMs(9000, 10000)).toBe(0);
    });
  });

  describe("sortSubtitles", () => {
    test("should order by start and keep input order for equal starts", () => {
      const a = createSubtitle({ sequenceId: 1, startMs: 2000, endMs: 3000, text: "a" });
      const b = createSubtitle({ sequenceId: 2, startMs: 1000, endMs: 1500, text: "b" });
      const c = createSubtitle({ sequenceId: 3, startMs: 2000, endMs: 2500, text: "c" });

      expect(sortSubtitles([a, b, c]).map((s) => s.sequenceId)).toEqual([2, 1, 3]);
    });
  });

  describe("getNeighbours", () => {
    const cues = [0, 1, 2].map((i) =>
      createSubtitle({ sequenceId: i, startMs: i * 1000, endMs: i * 1000 + 500, text: `${i}` })
    );

    test("should have no previous cue at the start", () => {
      const { previous, next } = getNeighbours(cues, 0);
      expect(previous).toBeUndefined();
      expect(next?.sequenceId).toBe(1);
    });

    test("should have no next cue at the end", () => {
      const { previous, next } = getNeighbours(cues, 2);
      expect(previous?.sequenceId).toBe(1);
      expect(next).toBeUndefined();
    });
  });

  describe("checkContiguity", () => {
    test("should accept consecutive sequence ids", () => {
      const result = checkContiguity([{ sequenceId: 3 }, { sequenceId: 4 }, { sequenceId: 5 }]);
      expect(result.success).toBe(true);
    });

    test("should reject a gap and name the position", () => {
      const result = checkContiguity([{ sequenceId: 3 }, { sequenceId: 5 }, { sequenceId: 6 }]);
      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe("SEQUENCE_ERROR");
        expect(result.error.message).toBe("Selection is not contiguous: sequence id 5 follows 3 at position 1");
      }
    });

    test("should accept an empty or single selection", () => {
      expect(checkContiguity([]).success).toBe(true);
      expect(checkContiguity([{ sequenceId: 9 }]).success).toBe(true);
    });
  });
});

import { afterEach, describe, expect, test, vi } from "vitest";
import app from "../app";
import { addClipGenerationJob, getClipJobStatus } from "../jobs/queue";

vi.mock("../jobs/queue", () => ({
  addClipGenerationJob: vi.fn(async () => ({ id: "42" })),
  getClipJobStatus: vi.fn(async () => null),
  getQueueJobCounts: vi.fn(async () => ({ waiting: 0, active: 0, completed: 0, failed: 0, delayed: 0 })),
}));

const clipBody = {
  inputPath: "/media/episode.mkv",
  clipPath: "/out/clip.mp4",
  outputPath: "/out/clip.gif",
  outputFormat: "gif",
  startMs: 1000,
  endMs: 4000,
  width: 480,
  height: 270,
};

const sequenceBody = {
  inputPath: "/media/episode.mkv",
  clipPath: "/out/joined.mp4",
  outputPath: "/out/sequence.webp",
  outputFormat: "webp",
  resolution: 320,
  segments: [
    { sequenceId: 1, startMs: 1000, endMs: 2000, text: "one" },
    { sequenceId: 2, startMs: 2000, endMs: 3000, text: ["two"] },
  ],
};

function post(path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

describe("Clip Generation Controller", () => {
  afterEach(() => {
    vi.clearAllMocks();
  });

  describe("POST /api/clips", () => {
    test("should queue a valid clip request", async () => {
      const res = await post("/api/clips", clipBody);

      expect(res.status).toBe(202);
      expect(await res.json()).toEqual({ jobId: "42", status: "queued" });
      expect(addClipGenerationJob).toHaveBeenCalledWith({
        kind: "clip",
        request: { ...clipBody, subtitles: [] },
      });
    });

    test("should reject a body that is not JSON", async () => {
      const res = await post("/api/clips", "{not json");

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: "Invalid JSON body", code: "VALIDATION_ERROR" });
    });

    test("should name the invalid fields", async () => {
      const res = await post("/api/clips", { ...clipBody, outputFormat: "avi" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: "Invalid body parameters",
        code: "VALIDATION_ERROR",
        details: [{ field: "outputFormat" }],
      });
      expect(addClipGenerationJob).not.toHaveBeenCalled();
    });
  });

  describe("POST /api/clips/sequence", () => {
    test("should queue a contiguous sequence", async () => {
      const res = await post("/api/clips/sequence", sequenceBody);

      expect(res.status).toBe(202);
      expect(addClipGenerationJob).toHaveBeenCalledWith({ kind: "sequence", request: sequenceBody });
    });

    test("should reject a selection with a gap before queueing", async () => {
      const res = await post("/api/clips/sequence", {
        ...sequenceBody,
        segments: [sequenceBody.segments[0], { ...sequenceBody.segments[1], sequenceId: 3 }],
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        error: "Selection is not contiguous: sequence id 3 follows 1 at position 1",
        code: "SEQUENCE_ERROR",
      });
      expect(addClipGenerationJob).not.toHaveBeenCalled();
    });
  });

  describe("GET /api/clips/jobs/:id", () => {
    test("should return 404 for an unknown job", async () => {
      const res = await app.request("/api/clips/jobs/missing");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Job not found" });
    });

    test("should return the job status", async () => {
      vi.mocked(getClipJobStatus).mockResolvedValueOnce({
        id: "42",
        state: "completed",
        progress: 100,
        result: { outputPath: "/out/clip.gif", width: 480, height: 270, durationMs: 3000, fileSize: 1024 },
        attemptsMade: 1,
      });

      const res = await app.request("/api/clips/jobs/42");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ state: "completed", result: { fileSize: 1024 } });
      expect(getClipJobStatus).toHaveBeenCalledWith("42");
    });
  });

  describe("app routing", () => {
    test("should answer unknown paths with JSON", async () => {
      const res = await app.request("/nowhere");

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({ error: "Not found", path: "/nowhere" });
    });

    test("should redirect trailing slashes", async () => {
      const res = await app.request("/health/live/");

      expect(res.status).toBe(301);
      expect(res.headers.get("location")).toBe("http://localhost/health/live");
    });

    test("should report liveness", async () => {
      const res = await app.request("/health/live");

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({ status: "alive" });
    });

    test("should echo a request id", async () => {
      const res = await app.request("/health/live", { headers: { "x-request-id": "req-test-1" } });
      expect(res.headers.get("x-request-id")).toBe("req-test-1");
    });
  });
});

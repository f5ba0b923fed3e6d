/**
 * Clip Generation Worker
 * Processes clip and sequence generation jobs from the BullMQ queue
 */

import { UnrecoverableError, type Job } from "bullmq";
import { promises as fs } from "fs";
import { isClipEngineError, ToolInvocationError, type ClipEngineError } from "../lib/errors";
import { runWithLogContext, workerLogger } from "../lib/logger";
import { createSubtitle } from "../models/subtitle.model";
import type { ClipRequest, SequenceRequestBody } from "../schemas/validation.schemas";
import { ClipGeneratorService, type GeneratedClip, type ProgressListener } from "../services/clip-generator.service";
import { createClipSettings } from "../services/clip-settings.service";
import { normalizeSegments, SequenceGeneratorService } from "../services/sequence-generator.service";
import type { Result } from "../lib/result";
import { createWorker, QUEUE_NAMES, type ClipGenerationJobData, type ClipJobResult } from "./queue";

export type ClipJobHandle = Pick<Job<ClipGenerationJobData, ClipJobResult>, "id" | "data" | "updateProgress">;

async function runClipRequest(
  request: ClipRequest,
  onProgress: ProgressListener
): Promise<Result<GeneratedClip, ClipEngineError>> {
  const settings = await createClipSettings(request);
  const subtitles = request.subtitles.map((cue, index) =>
    createSubtitle({
      sequenceId: cue.sequenceId ?? index,
      startMs: cue.startMs,
      endMs: cue.endMs,
      text: cue.text,
      delayMs: cue.delayMs,
    })
  );

  return ClipGeneratorService.generateClip({ settings, subtitles, caption: request.caption, onProgress });
}

async function runSequenceRequest(
  request: SequenceRequestBody,
  onProgress: ProgressListener
): Promise<Result<GeneratedClip, ClipEngineError>> {
  return SequenceGeneratorService.generateSequence({
    settings: request,
    segments: normalizeSegments(request.segments),
    caption: request.caption,
    onProgress,
  });
}

/**
 * Timed-out invocations may succeed on another attempt; every other failure is final
 */
export function toJobError(error: ClipEngineError): Error {
  if (error instanceof ToolInvocationError && error.timedOut) {
    return new Error(`${error.code}: ${error.message}`);
  }
  return new UnrecoverableError(`${error.code}: ${error.message}`);
}

/**
 * Process a clip generation job
 */
export async function processClipGenerationJob(job: ClipJobHandle): Promise<ClipJobResult> {
  return runWithLogContext({ jobId: job.id }, async () => {
    const { data } = job;
    const jobStartTime = Date.now();
    workerLogger.info("PROCESSING", { kind: data.kind, outputPath: data.request.outputPath });

    const onProgress: ProgressListener = (percent) => job.updateProgress(percent);

    let result: Result<GeneratedClip, ClipEngineError>;
    try {
      result = await workerLogger.timedAsync(
        "ENGINE_RUN",
        () =>
          data.kind === "clip"
            ? runClipRequest(data.request, onProgress)
            : runSequenceRequest(data.request, onProgress),
        { kind: data.kind }
      );
    } catch (error) {
      // ConfigurationError surfaces here as a throw; it can never succeed on retry
      if (isClipEngineError(error)) {
        throw toJobError(error);
      }
      throw error;
    }

    if (!result.success) {
      throw toJobError(result.error);
    }

    const clip = result.data;
    const { size } = await fs.stat(clip.outputPath);

    workerLogger.info("COMPLETED", {
      outputPath: clip.outputPath,
      fileSize: size,
      totalMs: Date.now() - jobStartTime,
    });

    return {
      outputPath: clip.outputPath,
      mp4CopyPath: clip.mp4CopyPath,
      width: clip.width,
      height: clip.height,
      durationMs: clip.durationMs,
      fileSize: size,
    };
  });
}

export function startClipWorker(concurrency?: number) {
  workerLogger.info("STARTING_CLIP_WORKER", { concurrency });
  return createWorker<ClipGenerationJobData, ClipJobResult>(
    QUEUE_NAMES.CLIP_GENERATION,
    processClipGenerationJob,
    concurrency
  );
}

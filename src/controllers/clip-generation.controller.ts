/**
 * Clip Generation Controller
 * Validates clip and sequence requests and hands them to the worker queue
 */

import type { Context } from "hono";
import { addClipGenerationJob, getClipJobStatus } from "../jobs/queue";
import { apiLogger } from "../lib/logger";
import { validateBody, validateParams } from "../middleware/validation.middleware";
import { clipRequestSchema, idParamSchema, sequenceRequestSchema } from "../schemas/validation.schemas";
import { normalizeSegments, planSegments } from "../services/sequence-generator.service";

export class ClipGenerationController {
  private static logRequest(c: Context, operation: string, details?: Record<string, unknown>) {
    apiLogger.info(`[CLIP GENERATION CONTROLLER] ${operation}`, {
      method: c.req.method,
      path: c.req.path,
      ...details,
    });
  }

  /**
   * POST /api/clips
   * Queue a single clip
   */
  static async generateClip(c: Context) {
    const validation = await validateBody(c, clipRequestSchema);
    if (!validation.success) {
      return c.json(validation.error, 400);
    }

    const request = validation.data;
    ClipGenerationController.logRequest(c, "GENERATE_CLIP", {
      inputPath: request.inputPath,
      outputFormat: request.outputFormat,
      cues: request.subtitles.length,
    });

    const job = await addClipGenerationJob({ kind: "clip", request });
    return c.json({ jobId: job.id, status: "queued" }, 202);
  }

  /**
   * POST /api/clips/sequence
   * Queue a sequence of contiguous subtitle-bounded segments
   */
  static async generateSequence(c: Context) {
    const validation = await validateBody(c, sequenceRequestSchema);
    if (!validation.success) {
      return c.json(validation.error, 400);
    }

    const request = validation.data;
    const plan = planSegments(normalizeSegments(request.segments));
    if (!plan.success) {
      return c.json({ error: plan.error.message, code: plan.error.code }, 400);
    }

    ClipGenerationController.logRequest(c, "GENERATE_SEQUENCE", {
      inputPath: request.inputPath,
      segments: request.segments.length,
    });

    const job = await addClipGenerationJob({ kind: "sequence", request });
    return c.json({ jobId: job.id, status: "queued" }, 202);
  }

  /**
   * GET /api/clips/jobs/:id
   */
  static async getJobStatus(c: Context) {
    const validation = validateParams(c, idParamSchema);
    if (!validation.success) {
      return c.json(validation.error, 400);
    }

    const status = await getClipJobStatus(validation.data.id);
    if (!status) {
      return c.json({ error: "Job not found" }, 404);
    }

    return c.json(status);
  }
}

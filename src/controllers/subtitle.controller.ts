import type { Context } from "hono";
import { httpStatusFor } from "../lib/errors";
import { apiLogger } from "../lib/logger";
import { validateBody } from "../middleware/validation.middleware";
import { subtitleExtractSchema } from "../schemas/validation.schemas";
import { extractSubtitles, extractSubtitlesByLanguage } from "../services/subtitle-track.service";
import { formatSRT } from "../utils/subtitle-converter";

export class SubtitleController {
  /**
   * Extract a subtitle track from a local video, by track number or by language priority
   * POST /api/subtitles/extract
   */
  static async extract(c: Context) {
    const validation = await validateBody(c, subtitleExtractSchema);
    if (!validation.success) {
      return c.json(validation.error, 400);
    }

    const { inputPath, track, languages, includeCc, format } = validation.data;
    apiLogger.info("[SUBTITLE CONTROLLER] EXTRACT", { inputPath, track, languages, includeCc });

    const result = languages
      ? await extractSubtitlesByLanguage(inputPath, languages, includeCc)
      : await extractSubtitles(inputPath, track ?? 0);

    if (!result.success) {
      return c.json({ error: result.error.message, code: result.error.code }, httpStatusFor(result.error));
    }

    if (format === "srt") {
      c.header("Content-Type", "application/x-subrip; charset=utf-8");
      return c.body(formatSRT(result.data));
    }

    return c.json({ count: result.data.length, subtitles: result.data });
  }
}

/**
 * Zod Validation Schemas
 *
 * Request bodies and params for the clip and subtitle endpoints.
 * The same shapes are stored as BullMQ job data.
 */

import { z } from "zod";
import { VIDEO_FORMATS, X264_PRESETS } from "../models/clip-settings.model";
import { TEXT_ALIGNMENTS } from "../models/text-style.model";

// ============================================================================
// Common Schemas
// ============================================================================

export const idParamSchema = z.object({
  id: z.string().min(1, "ID is required"),
});

const millis = z.number().int("Must be whole milliseconds").nonnegative();

const colorSchema = z
  .string()
  .regex(/^(#?[0-9a-fA-F]{6}|&H[0-9a-fA-F]{6}([0-9a-fA-F]{2})?&?)$/, "Colour must be #RRGGBB or &HAABBGGRR");

const cueTextSchema = z.union([z.string(), z.array(z.string()).min(1)]);

export const textStyleSchema = z.object({
  name: z.string().min(1).max(64).regex(/^[^,\r\n]+$/, "Style name cannot contain commas").optional(),
  font: z.string().min(1).optional(),
  fontSize: z.number().positive().max(500).optional(),
  color: colorSchema.optional(),
  outlineColor: colorSchema.optional(),
  outlineWidth: z.number().nonnegative().max(50).optional(),
  bold: z.boolean().optional(),
  italic: z.boolean().optional(),
  shadow: z.boolean().optional(),
  alignment: z.enum(TEXT_ALIGNMENTS).optional(),
  marginL: z.number().int().nonnegative().optional(),
  marginR: z.number().int().nonnegative().optional(),
  marginV: z.number().int().nonnegative().optional(),
});

export const subtitleCueSchema = z
  .object({
    sequenceId: z.number().int().nonnegative().optional(),
    startMs: millis,
    endMs: millis,
    text: cueTextSchema,
    delayMs: millis.optional(),
  })
  .refine((cue) => cue.endMs > cue.startMs, {
    message: "Cue must end after it starts",
    path: ["endMs"],
  });

// ============================================================================
// Clip Schemas
// ============================================================================

const clipOutputSchema = z.object({
  inputPath: z.string().min(1, "inputPath is required"),
  clipPath: z.string().min(1, "clipPath is required"),
  outputPath: z.string().min(1, "outputPath is required"),
  outputFormat: z.enum(VIDEO_FORMATS),
  fps: z.number().int().min(1).max(120).optional(),
  width: z.number().int().positive().optional(),
  height: z.number().int().positive().optional(),
  resolution: z.number().int().min(2).optional(),
  crop: z.boolean().optional(),
  boomerang: z.boolean().optional(),
  hdGif: z.boolean().optional(),
  mp4Copy: z.boolean().optional(),
  mp4CopyPath: z.string().min(1).optional(),
  crf: z.number().int().min(0).max(51).optional(),
  preset: z.enum(X264_PRESETS).optional(),
  subtitleStyle: textStyleSchema.optional(),
  captionStyle: textStyleSchema.optional(),
  caption: z.string().max(500).optional(),
});

type SizingFields = { width?: number; height?: number; resolution?: number };

function checkSizing(data: SizingFields, ctx: z.RefinementCtx): void {
  const explicit = data.width !== undefined || data.height !== undefined;
  if (data.resolution !== undefined && explicit) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Set either resolution or width and height, not both",
      path: ["resolution"],
    });
  } else if (data.resolution === undefined && (data.width === undefined || data.height === undefined)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: "Either resolution or both width and height must be set",
      path: ["resolution"],
    });
  }
}

export const clipRequestSchema = clipOutputSchema
  .extend({
    startMs: millis,
    endMs: millis,
    subtitles: z.array(subtitleCueSchema).max(5000).default([]),
  })
  .superRefine((data, ctx) => {
    if (data.startMs >= data.endMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "startMs must be before endMs",
        path: ["endMs"],
      });
    }
    checkSizing(data, ctx);
  });

export const sequenceSegmentSchema = z.object({
  sequenceId: z.number().int().nonnegative(),
  startMs: millis,
  endMs: millis,
  text: cueTextSchema,
  font: z.string().min(1).optional(),
  fontSize: z.number().int().positive().max(500).optional(),
});

export const sequenceRequestSchema = clipOutputSchema
  .extend({
    segments: z.array(sequenceSegmentSchema).min(2, "A sequence needs at least 2 segments").max(200),
  })
  .superRefine(checkSizing);

// ============================================================================
// Subtitle Schemas
// ============================================================================

export const subtitleExtractSchema = z
  .object({
    inputPath: z.string().min(1, "inputPath is required"),
    track: z.number().int().nonnegative().optional(),
    languages: z
      .array(z.string().regex(/^[a-zA-Z]{2,3}$/, "Languages must be ISO 639 codes"))
      .min(1)
      .optional(),
    includeCc: z.boolean().default(false),
    format: z.enum(["json", "srt"]).default("json"),
  })
  .refine((data) => !(data.track !== undefined && data.languages !== undefined), {
    message: "Use either track or languages, not both",
    path: ["languages"],
  });

// ============================================================================
// Type Exports
// ============================================================================

export type ClipRequest = z.infer<typeof clipRequestSchema>;
export type SequenceRequestBody = z.infer<typeof sequenceRequestSchema>;
export type SequenceSegmentBody = z.infer<typeof sequenceSegmentSchema>;
export type SubtitleExtractRequest = z.infer<typeof subtitleExtractSchema>;
export type TextStyleBody = z.infer<typeof textStyleSchema>;

/**
 * Zod Validation Helpers
 *
 * Inline request validation for controller methods. Every failure is
 * reported in the same shape so clients can handle them uniformly.
 */

import type { Context } from "hono";
import { z } from "zod";

export type ValidationTarget = "body" | "param";

/**
 * Standardized validation error response
 */
export interface ValidationErrorResponse {
  error: string;
  code: "VALIDATION_ERROR";
  details: Array<{
    field: string;
    message: string;
    code: string;
  }>;
}

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: ValidationErrorResponse };

/**
 * Format Zod errors into a consistent response format
 */
export function formatZodError(error: z.ZodError, target: ValidationTarget): ValidationErrorResponse {
  const details = error.issues.map((issue) => ({
    field: issue.path.join(".") || target,
    message: issue.message,
    code: issue.code,
  }));

  return {
    error: `Invalid ${target} parameters`,
    code: "VALIDATION_ERROR",
    details,
  };
}

/**
 * @example
 * const result = await validateBody(c, clipRequestSchema);
 * if (!result.success) {
 *   return c.json(result.error, 400);
 * }
 * const data = result.data;
 */
export async function validateBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<ValidationResult<z.infer<T>>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    return {
      success: false,
      error: {
        error: "Invalid JSON body",
        code: "VALIDATION_ERROR",
        details: [{ field: "body", message: "Request body must be valid JSON", code: "invalid_json" }],
      },
    };
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    return { success: false, error: formatZodError(result.error, "body") };
  }

  return { success: true, data: result.data };
}

export function validateParams<T extends z.ZodTypeAny>(c: Context, schema: T): ValidationResult<z.infer<T>> {
  const result = schema.safeParse(c.req.param());

  if (!result.success) {
    return { success: false, error: formatZodError(result.error, "param") };
  }

  return { success: true, data: result.data };
}

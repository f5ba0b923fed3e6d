/**
 * Clip engine error taxonomy
 *
 * ConfigurationError is thrown at construction time. Every other error travels
 * inside a Result and reaches the caller unchanged.
 */

export type ClipEngineErrorCode =
  | "CONFIGURATION_ERROR"
  | "PROBE_ERROR"
  | "EXTRACTION_ERROR"
  | "TOOL_INVOCATION_ERROR"
  | "MISSING_ARTIFACT_ERROR"
  | "SEQUENCE_ERROR"
  | "WORKSPACE_ERROR";

export abstract class ClipEngineError extends Error {
  abstract readonly code: ClipEngineErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid clip settings, subtitle cue or environment configuration
 */
export class ConfigurationError extends ClipEngineError {
  readonly code = "CONFIGURATION_ERROR";
}

/**
 * Media metadata query (dimensions, stream list, probe frame) failed
 */
export class ProbeError extends ClipEngineError {
  readonly code = "PROBE_ERROR";
}

/**
 * No matching subtitle track, or extraction produced no file
 */
export class ExtractionError extends ClipEngineError {
  readonly code = "EXTRACTION_ERROR";
}

export interface ToolInvocationDetails {
  command: string;
  exitCode: number | null;
  stderrTail: string;
  timedOut: boolean;
}

/**
 * External process failed to spawn, exited non-zero, or timed out.
 * `command` is the full command line, ready to paste into a shell.
 */
export class ToolInvocationError extends ClipEngineError {
  readonly code = "TOOL_INVOCATION_ERROR";
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderrTail: string;
  readonly timedOut: boolean;

  constructor(reason: string, details: ToolInvocationDetails, options?: { cause?: unknown }) {
    super(`${reason}. Command = ${details.command}`, options);
    this.command = details.command;
    this.exitCode = details.exitCode;
    this.stderrTail = details.stderrTail;
    this.timedOut = details.timedOut;
  }
}

/**
 * A file the previous step should have produced does not exist
 */
export class MissingArtifactError extends ClipEngineError {
  readonly code = "MISSING_ARTIFACT_ERROR";
  readonly path: string;

  constructor(path: string, step: string) {
    super(`${step} reported success but produced no file at ${path}`);
    this.path = path;
  }
}

/**
 * Multi-segment selection is not a contiguous run of cues
 */
export class SequenceError extends ClipEngineError {
  readonly code = "SEQUENCE_ERROR";
}

/**
 * A working file (markup script, concat list) could not be written
 */
export class WorkspaceError extends ClipEngineError {
  readonly code = "WORKSPACE_ERROR";
  readonly path: string;

  constructor(path: string, reason: string, options?: { cause?: unknown }) {
    super(`Could not write ${path}: ${reason}`, options);
    this.path = path;
  }
}

export function isClipEngineError(error: unknown): error is ClipEngineError {
  return error instanceof ClipEngineError;
}

export type ErrorHttpStatus = 400 | 422 | 500;

/**
 * Status code for an engine error returned over HTTP
 */
export function httpStatusFor(error: ClipEngineError): ErrorHttpStatus {
  switch (error.code) {
    case "CONFIGURATION_ERROR":
    case "SEQUENCE_ERROR":
      return 400;
    case "EXTRACTION_ERROR":
      return 422;
    default:
      return 500;
  }
}

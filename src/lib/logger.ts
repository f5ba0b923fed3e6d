import { AsyncLocalStorage } from "async_hooks";
import type { Context, Next } from "hono";

// Log levels in order of severity
export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// Request or job context stored in AsyncLocalStorage
export interface LogContext {
  requestId?: string;
  jobId?: string;
  path?: string;
  method?: string;
}

// Structured log entry format
interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  requestId?: string;
  jobId?: string;
  service: string;
  path?: string;
  method?: string;
  error?: {
    name: string;
    message: string;
    stack?: string;
  };
  metadata?: Record<string, unknown>;
}

const logContext = new AsyncLocalStorage<LogContext>();

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LOG_LEVELS;
}

// Read straight from the environment: the logger must work before config validation runs
const isProduction = process.env.NODE_ENV === "production";
const envLevel = process.env.LOG_LEVEL;
const minLogLevel: LogLevel = isLogLevel(envLevel) ? envLevel : isProduction ? "info" : "debug";
const serviceName = process.env.SERVICE_NAME || "subclip-engine";

/**
 * Generate a unique request ID
 */
export function generateRequestId(): string {
  return `req_${Date.now().toString(36)}_${Math.random().toString(36).substring(2, 9)}`;
}

export function getLogContext(): LogContext | undefined {
  return logContext.getStore();
}

/**
 * Run a function with request or job context attached to every log line it emits
 */
export function runWithLogContext<T>(context: LogContext, fn: () => T): T {
  return logContext.run(context, fn);
}

function formatLogEntry(entry: LogEntry): string {
  if (isProduction) {
    return JSON.stringify(entry);
  }

  const timestamp = new Date(entry.timestamp).toLocaleTimeString();
  const level = entry.level.toUpperCase().padEnd(5);
  const ctxId = entry.jobId ? `[job:${entry.jobId}]` : entry.requestId ? `[${entry.requestId}]` : "";
  const service = `[${entry.service}]`;

  let output = `${timestamp} ${level} ${service}${ctxId} ${entry.message}`;

  if (entry.metadata && Object.keys(entry.metadata).length > 0) {
    output += `\n  ${JSON.stringify(entry.metadata)}`;
  }

  if (entry.error) {
    output += `\n  Error: ${entry.error.name}: ${entry.error.message}`;
    if (entry.error.stack) {
      output += `\n  ${entry.error.stack}`;
    }
  }

  return output;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLogLevel];
}

function log(
  level: LogLevel,
  service: string,
  message: string,
  metadata?: Record<string, unknown>,
  error?: Error
): void {
  if (!shouldLog(level)) return;

  const ctx = getLogContext();

  const entry: LogEntry = {
    timestamp: new Date().toISOString(),
    level,
    message,
    service,
    requestId: ctx?.requestId,
    jobId: ctx?.jobId,
    path: ctx?.path,
    method: ctx?.method,
  };

  if (metadata) {
    entry.metadata = metadata;
  }

  if (error) {
    entry.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }

  const formatted = formatLogEntry(entry);

  switch (level) {
    case "debug":
      console.debug(formatted);
      break;
    case "info":
      console.log(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    case "error":
      console.error(formatted);
      break;
  }
}

/**
 * Service-scoped logger
 */
export class Logger {
  private service: string;
  private defaultMetadata: Record<string, unknown>;

  constructor(service: string, defaultMetadata: Record<string, unknown> = {}) {
    this.service = service;
    this.defaultMetadata = defaultMetadata;
  }

  /**
   * Create a child logger with additional context
   */
  child(metadata: Record<string, unknown>): Logger {
    return new Logger(this.service, { ...this.defaultMetadata, ...metadata });
  }

  debug(message: string, metadata?: Record<string, unknown>): void {
    log("debug", this.service, message, { ...this.defaultMetadata, ...metadata });
  }

  info(message: string, metadata?: Record<string, unknown>): void {
    log("info", this.service, message, { ...this.defaultMetadata, ...metadata });
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    log("warn", this.service, message, { ...this.defaultMetadata, ...metadata });
  }

  error(message: string, error?: unknown, metadata?: Record<string, unknown>): void {
    const err = error instanceof Error ? error : error ? new Error(String(error)) : undefined;
    log("error", this.service, message, { ...this.defaultMetadata, ...metadata }, err);
  }

  /**
   * Log with timing information (async version)
   */
  async timedAsync<T>(message: string, fn: () => Promise<T>, metadata?: Record<string, unknown>): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      const duration = performance.now() - start;
      this.info(message, { ...metadata, durationMs: Math.round(duration) });
      return result;
    } catch (error) {
      const duration = performance.now() - start;
      this.error(message, error, { ...metadata, durationMs: Math.round(duration) });
      throw error;
    }
  }
}

export const logger = new Logger(serviceName);
export const apiLogger = new Logger("API");
export const workerLogger = new Logger("WORKER");

export function createLogger(service: string, defaultMetadata?: Record<string, unknown>): Logger {
  return new Logger(service, defaultMetadata);
}

/**
 * Hono middleware for request logging and context tracking
 */
export function loggerMiddleware() {
  return async (c: Context, next: Next) => {
    const requestId = c.req.header("x-request-id") || generateRequestId();
    const start = performance.now();

    c.header("x-request-id", requestId);

    const context: LogContext = {
      requestId,
      path: c.req.path,
      method: c.req.method,
    };

    await runWithLogContext(context, async () => {
      apiLogger.debug(`--> ${c.req.method} ${c.req.path}`);

      try {
        await next();

        const durationMs = Math.round(performance.now() - start);
        const status = c.res.status;

        if (status >= 500) {
          apiLogger.error(`<-- ${c.req.method} ${c.req.path} ${status}`, undefined, { durationMs, status });
        } else if (status >= 400) {
          apiLogger.warn(`<-- ${c.req.method} ${c.req.path} ${status}`, { durationMs, status });
        } else {
          apiLogger.info(`<-- ${c.req.method} ${c.req.path} ${status}`, { durationMs, status });
        }
      } catch (error) {
        const durationMs = Math.round(performance.now() - start);
        apiLogger.error(`<-- ${c.req.method} ${c.req.path} ERROR`, error, { durationMs });
        throw error;
      }
    });
  };
}

export default logger;

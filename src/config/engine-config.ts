import "dotenv/config";
import * as os from "os";
import { z } from "zod";
import { ConfigurationError } from "../lib/errors";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .optional()
  .transform((value) => value === "true" || value === "1");

const envSchema = z.object({
  NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
  PORT: z.coerce.number().int().positive().default(3001),

  // External media tool
  FFMPEG_PATH: z.string().min(1).default("ffmpeg"),
  FFPROBE_PATH: z.string().min(1).default("ffprobe"),
  FFMPEG_TIMEOUT_MS: z.coerce.number().int().positive().default(20 * 60 * 1000),
  FFPROBE_TIMEOUT_MS: z.coerce.number().int().positive().default(60 * 1000),
  FONTS_DIR: z.string().min(1).optional(),
  TMP_DIR: z.string().min(1).default(os.tmpdir()),

  // Redis / BullMQ
  REDIS_URL: z.string().url().optional(),
  REDIS_HOST: z.string().min(1).default("localhost"),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  REDIS_PASSWORD: z.string().optional(),
  REDIS_TLS: booleanFlag,
  CLIP_WORKER_CONCURRENCY: z.coerce.number().int().positive().default(1),
  CLIP_JOB_ATTEMPTS: z.coerce.number().int().positive().default(1),
});

export interface EngineConfig {
  nodeEnv: "development" | "production" | "test";
  port: number;
  ffmpegPath: string;
  ffprobePath: string;
  ffmpegTimeoutMs: number;
  ffprobeTimeoutMs: number;
  fontsDir?: string;
  tmpDir: string;
  redis: {
    url?: string;
    host: string;
    port: number;
    password?: string;
    tls: boolean;
  };
  clipWorkerConcurrency: number;
  clipJobAttempts: number;
}

/**
 * Validate an environment and map it onto the engine configuration
 */
export function loadConfig(env: NodeJS.ProcessEnv): EngineConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid environment configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    nodeEnv: e.NODE_ENV,
    port: e.PORT,
    ffmpegPath: e.FFMPEG_PATH,
    ffprobePath: e.FFPROBE_PATH,
    ffmpegTimeoutMs: e.FFMPEG_TIMEOUT_MS,
    ffprobeTimeoutMs: e.FFPROBE_TIMEOUT_MS,
    fontsDir: e.FONTS_DIR,
    tmpDir: e.TMP_DIR,
    redis: {
      url: e.REDIS_URL,
      host: e.REDIS_HOST,
      port: e.REDIS_PORT,
      password: e.REDIS_PASSWORD || undefined,
      // Upstash and similar hosted Redis require TLS
      tls: e.REDIS_TLS || e.REDIS_HOST.includes("upstash.io"),
    },
    clipWorkerConcurrency: e.CLIP_WORKER_CONCURRENCY,
    clipJobAttempts: e.CLIP_JOB_ATTEMPTS,
  };
}

export const config: EngineConfig = loadConfig(process.env);

import { Queue, Worker, type Job } from "bullmq";
import IORedis, { type RedisOptions } from "ioredis";
import { config } from "../config/engine-config";
import { createLogger } from "../lib/logger";
import type { ClipRequest, SequenceRequestBody } from "../schemas/validation.schemas";

const log = createLogger("QUEUE");

// BullMQ workers block on Redis, so requests must never time out
const redisConfig: RedisOptions = {
  maxRetriesPerRequest: null,
  ...(config.redis.url
    ? {}
    : { host: config.redis.host, port: config.redis.port, password: config.redis.password }),
  ...(config.redis.tls ? { tls: {} } : {}),
};

/**
 * BullMQ needs its own connections (not shared), so each queue and worker gets a new one
 */
export function createRedisConnection(): IORedis {
  const connection = config.redis.url ? new IORedis(config.redis.url, redisConfig) : new IORedis(redisConfig);

  connection.on("error", (error) => {
    log.error("REDIS_CONNECTION_ERROR", error);
  });

  return connection;
}

export const QUEUE_NAMES = {
  CLIP_GENERATION: "clip-generation",
} as const;

export type ClipGenerationJobData =
  | { kind: "clip"; request: ClipRequest }
  | { kind: "sequence"; request: SequenceRequestBody };

export interface ClipJobResult {
  outputPath: string;
  mp4CopyPath?: string;
  width: number;
  height: number;
  durationMs: number;
  fileSize: number;
}

let clipGenerationQueue: Queue<ClipGenerationJobData, ClipJobResult> | null = null;
let cleanupTimer: NodeJS.Timeout | null = null;

async function cleanStaleJobs(queue: Queue<ClipGenerationJobData, ClipJobResult>): Promise<void> {
  try {
    // Completed jobs older than 24 hours
    await queue.clean(24 * 60 * 60 * 1000, 100, "completed");
    // Failed jobs older than 7 days
    await queue.clean(7 * 24 * 60 * 60 * 1000, 50, "failed");
    // Waiting jobs older than 1 hour are stuck
    await queue.clean(60 * 60 * 1000, 10, "wait");
    log.debug("CLEANED_STALE_JOBS");
  } catch (error) {
    log.error("CLEANUP_FAILED", error);
  }
}

/**
 * Clip generation queue, created on first use
 */
export function getClipGenerationQueue(): Queue<ClipGenerationJobData, ClipJobResult> {
  if (clipGenerationQueue) {
    return clipGenerationQueue;
  }

  const queue = new Queue<ClipGenerationJobData, ClipJobResult>(QUEUE_NAMES.CLIP_GENERATION, {
    connection: createRedisConnection(),
    defaultJobOptions: {
      attempts: config.clipJobAttempts,
      backoff: {
        type: "exponential",
        delay: 5000,
      },
      removeOnComplete: {
        count: 100,
        age: 24 * 60 * 60,
      },
      removeOnFail: {
        count: 50,
        age: 7 * 24 * 60 * 60,
      },
    },
  });

  cleanupTimer = setInterval(() => {
    void cleanStaleJobs(queue);
  }, 60 * 60 * 1000);
  cleanupTimer.unref();

  clipGenerationQueue = queue;
  return queue;
}

/**
 * Add a clip generation job to the queue
 */
export async function addClipGenerationJob(data: ClipGenerationJobData): Promise<Job<ClipGenerationJobData, ClipJobResult>> {
  const job = await getClipGenerationQueue().add(data.kind === "clip" ? "generate-clip" : "generate-sequence", data);

  log.info("JOB_ADDED", { jobId: job.id, kind: data.kind, outputPath: data.request.outputPath });
  return job;
}

export interface ClipJobStatus {
  id: string | undefined;
  state: string;
  progress: unknown;
  result?: ClipJobResult;
  failedReason?: string;
  attemptsMade: number;
  processedOn?: number;
  finishedOn?: number;
}

/**
 * Get clip generation job status
 */
export async function getClipJobStatus(jobId: string): Promise<ClipJobStatus | null> {
  const job = await getClipGenerationQueue().getJob(jobId);
  if (!job) {
    return null;
  }

  const state = await job.getState();

  return {
    id: job.id,
    state,
    progress: job.progress,
    result: job.returnvalue ?? undefined,
    failedReason: job.failedReason || undefined,
    attemptsMade: job.attemptsMade,
    processedOn: job.processedOn,
    finishedOn: job.finishedOn,
  };
}

export async function getQueueJobCounts(): Promise<Record<string, number>> {
  return getClipGenerationQueue().getJobCounts("waiting", "active", "completed", "failed", "delayed");
}

export async function closeClipGenerationQueue(): Promise<void> {
  if (cleanupTimer) {
    clearInterval(cleanupTimer);
    cleanupTimer = null;
  }
  if (clipGenerationQueue) {
    await clipGenerationQueue.close();
    clipGenerationQueue = null;
  }
}

export function createWorker<T, R>(
  queueName: string,
  processor: (job: Job<T, R>) => Promise<R>,
  concurrency: number = config.clipWorkerConcurrency
): Worker<T, R> {
  const worker = new Worker<T, R>(queueName, processor, {
    connection: createRedisConnection(),
    concurrency,
  });

  worker.on("completed", (job) => {
    log.info("JOB_COMPLETED", { jobId: job.id });
  });

  worker.on("failed", (job, error) => {
    log.error("JOB_FAILED", error, { jobId: job?.id, attemptsMade: job?.attemptsMade });
  });

  worker.on("error", (error) => {
    log.error("WORKER_ERROR", error);
  });

  return worker;
}

import { Hono } from "hono";
import { config } from "../config/engine-config";
import { getQueueJobCounts } from "../jobs/queue";
import { runProcess } from "../lib/process-runner";

const healthRouter = new Hono();

interface HealthCheckResult {
  status: "healthy" | "unhealthy" | "degraded";
  timestamp: string;
  version: string;
  uptime: number;
  checks: {
    ffmpeg: ComponentHealth;
    queue: QueueHealth;
  };
}

interface ComponentHealth {
  status: "healthy" | "unhealthy";
  latency?: number;
  error?: string;
}

interface QueueHealth extends ComponentHealth {
  counts?: Record<string, number>;
}

const startTime = Date.now();

// ioredis retries forever under BullMQ settings, so queue checks need their own deadline
const QUEUE_CHECK_TIMEOUT_MS = 2000;

/**
 * Check that the ffmpeg binary can be invoked
 */
async function checkFfmpeg(): Promise<ComponentHealth> {
  const start = Date.now();
  const result = await runProcess(config.ffmpegPath, ["-hide_banner", "-version"], { timeoutMs: 5000 });
  if (result.success) {
    return { status: "healthy", latency: Date.now() - start };
  }
  return {
    status: "unhealthy",
    latency: Date.now() - start,
    error: result.error.message,
  };
}

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

/**
 * Check Redis through the clip queue's job counts
 */
async function checkQueue(): Promise<QueueHealth> {
  const start = Date.now();
  try {
    const counts = await withTimeout(getQueueJobCounts(), QUEUE_CHECK_TIMEOUT_MS, "Queue check");
    return { status: "healthy", latency: Date.now() - start, counts };
  } catch (error) {
    return {
      status: "unhealthy",
      latency: Date.now() - start,
      error: error instanceof Error ? error.message : "Unknown Redis error",
    };
  }
}

/**
 * GET /health
 * Unhealthy without ffmpeg; degraded when only the queue is down, since subtitle extraction still works
 */
healthRouter.get("/", async (c) => {
  const [ffmpegHealth, queueHealth] = await Promise.all([checkFfmpeg(), checkQueue()]);

  let overallStatus: HealthCheckResult["status"] = "healthy";
  if (ffmpegHealth.status === "unhealthy") {
    overallStatus = "unhealthy";
  } else if (queueHealth.status === "unhealthy") {
    overallStatus = "degraded";
  }

  const result: HealthCheckResult = {
    status: overallStatus,
    timestamp: new Date().toISOString(),
    version: process.env.npm_package_version || "1.0.0",
    uptime: Math.floor((Date.now() - startTime) / 1000),
    checks: {
      ffmpeg: ffmpegHealth,
      queue: queueHealth,
    },
  };

  return c.json(result, overallStatus === "unhealthy" ? 503 : 200);
});

/**
 * Liveness probe - just checks if the server is running
 * GET /health/live
 */
healthRouter.get("/live", (c) => {
  return c.json({
    status: "alive",
    timestamp: new Date().toISOString(),
  });
});

export default healthRouter;

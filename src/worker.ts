import { config } from "./config/engine-config";
import { startClipWorker } from "./jobs/clip.worker";
import { closeClipGenerationQueue } from "./jobs/queue";
import { workerLogger } from "./lib/logger";

const clipWorker = startClipWorker(config.clipWorkerConcurrency);

workerLogger.info("[WORKER] Clip worker started", {
  concurrency: config.clipWorkerConcurrency,
  ffmpeg: config.ffmpegPath,
  tmpDir: config.tmpDir,
});

async function shutdown(signal: string): Promise<void> {
  workerLogger.info(`[WORKER] Received ${signal}, shutting down gracefully...`);
  try {
    // Waits for active jobs to finish
    await clipWorker.close();
    await closeClipGenerationQueue();
  } catch (error) {
    workerLogger.error("[WORKER] Shutdown failed", error);
    process.exit(1);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

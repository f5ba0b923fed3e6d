import { serve } from "@hono/node-server";
import { config } from "./config/engine-config";
import { closeClipGenerationQueue } from "./jobs/queue";
import { logger } from "./lib/logger";
import app from "./app";

const server = serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info(`Server running on http://localhost:${info.port}`, { environment: config.nodeEnv });
});

async function shutdown(signal: string): Promise<void> {
  logger.info(`${signal} received, shutting down gracefully...`);
  server.close();
  try {
    await closeClipGenerationQueue();
  } catch (error) {
    logger.error("SHUTDOWN_FAILED", error);
    process.exit(1);
  }
  process.exit(0);
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));

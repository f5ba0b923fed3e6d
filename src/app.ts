import { Hono } from "hono";
import { cors } from "hono/cors";
import { httpStatusFor, isClipEngineError } from "./lib/errors";
import { apiLogger, loggerMiddleware } from "./lib/logger";
import clipRouter from "./routes/clip.routes";
import healthRouter from "./routes/health.routes";
import subtitleRouter from "./routes/subtitle.routes";

const app = new Hono();

app.use(loggerMiddleware());

// Normalize trailing slashes - redirect /path/ to /path
app.use(async (c, next) => {
  const url = new URL(c.req.url);
  if (url.pathname !== "/" && url.pathname.endsWith("/")) {
    url.pathname = url.pathname.slice(0, -1);
    return c.redirect(url.toString(), 301);
  }
  return next();
});

app.use(
  "/api/*",
  cors({
    origin: "*",
    allowMethods: ["GET", "POST", "OPTIONS"],
    allowHeaders: ["Content-Type"],
  })
);

// Mount routes
app.route("/api/clips", clipRouter);
app.route("/api/subtitles", subtitleRouter);
app.route("/health", healthRouter);

// Root route
app.get("/", (c) => {
  return c.json({
    message: "Subtitle clip engine",
    endpoints: {
      clips: "/api/clips",
      sequences: "/api/clips/sequence",
      jobs: "/api/clips/jobs/:id",
      subtitles: "/api/subtitles/extract",
      health: "/health",
    },
  });
});

app.notFound((c) => {
  return c.json({ error: "Not found", path: c.req.path }, 404);
});

app.onError((error, c) => {
  if (isClipEngineError(error)) {
    apiLogger.warn("REQUEST_FAILED", { code: error.code, message: error.message });
    return c.json({ error: error.message, code: error.code }, httpStatusFor(error));
  }
  apiLogger.error("UNHANDLED_ERROR", error);
  return c.json({ error: "Internal server error" }, 500);
});

export { app };
export default app;

import { Hono } from "hono";
import { SubtitleController } from "../controllers/subtitle.controller";

const subtitleRouter = new Hono();

// Synchronous: extraction only reads the container, no encoding
subtitleRouter.post("/extract", SubtitleController.extract);

export default subtitleRouter;

import { Hono } from "hono";
import { ClipGenerationController } from "../controllers/clip-generation.controller";

const clipRouter = new Hono();

// Clip generation endpoints
clipRouter.post("/", ClipGenerationController.generateClip);
clipRouter.post("/sequence", ClipGenerationController.generateSequence);
clipRouter.get("/jobs/:id", ClipGenerationController.getJobStatus);

export default clipRouter;

/**
 * Detect Routes
 * POST /detect takes the body as raw text so that malformed JSON reaches
 * the detector and is answered like any other invalid request.
 */

import express, { Router } from "express";
import { createDetectController } from "../controllers/detectController.js";
import { apiLimiter } from "../middlewares/rateLimiting.js";
import type { NoiseDetector } from "../services/business/noiseDetectionService.js";

export function createDetectRouter(detector: NoiseDetector): Router {
  const detectRouter = Router();

  detectRouter.post(
    "/detect",
    apiLimiter,
    express.text({ type: "*/*", limit: "64kb" }),
    createDetectController(detector)
  );

  return detectRouter;
}

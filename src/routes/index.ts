/**
 * Route Aggregator
 * Combines all routers into a single exported router.
 */

import { Router } from "express";
import { createHealthRouter } from "./health.js";
import { createDetectRouter } from "./detect.js";
import type { NoiseDetector } from "../services/business/noiseDetectionService.js";

export interface RouterDependencies {
  detector: NoiseDetector;
  isReady: () => boolean;
}

export function createRouter({ detector, isReady }: RouterDependencies): Router {
  const router = Router();

  router.use(createHealthRouter(isReady));
  router.use(createDetectRouter(detector));

  return router;
}

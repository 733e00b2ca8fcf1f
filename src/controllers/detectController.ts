/**
 * Detect Controller
 * Thin controller exposing the noise detector over HTTP.
 */

import { Request, Response, NextFunction } from "express";
import type { NoiseDetector } from "../services/business/noiseDetectionService.js";

/**
 * Runs detection on the raw request body. Always answers 200 with the same
 * envelope the Lambda handler returns.
 */
export function createDetectController(detector: NoiseDetector) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const body: unknown = typeof req.body === "string" ? req.body : undefined;
      const data = await detector.detect(body === "" ? undefined : body);
      res.status(200).json({ statusCode: 200, data });
    } catch (error) {
      next(error);
    }
  };
}

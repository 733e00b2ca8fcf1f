/**
 * Lambda Entry Point
 * The request arrives in `event.body`, as an object on direct invocation
 * or as a JSON string behind API Gateway. The transport status is always
 * 200; failures are reported in `data.success`.
 */

import { buildNoiseDetector } from "./config/init.js";
import type {
  DetectionResponse,
  NoiseDetector,
} from "./services/business/noiseDetectionService.js";

export interface DetectionEvent {
  body?: unknown;
}

export interface DetectionEnvelope {
  statusCode: 200;
  data: DetectionResponse;
}

export function createHandler(detector: NoiseDetector) {
  return async (event: DetectionEvent | null | undefined): Promise<DetectionEnvelope> => {
    const data = await detector.detect(event?.body);
    return { statusCode: 200, data };
  };
}

export const handler = createHandler(buildNoiseDetector());

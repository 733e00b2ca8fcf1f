import express from "express";
import helmet from "helmet";
import cors from "cors";
import { createRouter, type RouterDependencies } from "./routes/index.js";
import { errorHandler } from "./middlewares/errorHandler.js";

/**
 * Builds the Express application around a noise detector.
 * Configures global middleware and routes.
 */
export function createApp(dependencies: RouterDependencies): express.Express {
  const app = express();

  /** Disable the X-Powered-By header to reduce fingerprinting. */
  app.disable("x-powered-by");

  /** Adds standard security headers. */
  app.use(helmet());
  /** Enables CORS for cross-origin requests. */
  app.use(cors());

  /** Application routes. */
  app.use(createRouter(dependencies));

  /** Global error handler - MUST be last. */
  app.use(errorHandler);

  return app;
}

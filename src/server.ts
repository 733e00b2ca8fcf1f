/**
 * HTTP Server Entry Point
 * Serves the noise detector for container deployments and local runs.
 * Handles graceful shutdown on SIGTERM signal.
 */
import "dotenv/config";
import { createServer } from "http";
import { createApp } from "./app.js";
import { buildNoiseDetector, initializeApp } from "./config/init.js";
import { PORT } from "./config/env.js";

/** Tracks whether application initialization is complete. */
let isReady = false;

const app = createApp({
  detector: buildNoiseDetector(),
  isReady: () => isReady,
});

/** HTTP server instance wrapping the Express application. */
const server = createServer(app);

/**
 * Starts the HTTP server immediately.
 * Initialization runs after listen without blocking server startup.
 */
server.listen(PORT, "0.0.0.0", () => {
  console.log(`Server running on 0.0.0.0:${PORT}`);

  initializeApp()
    .then(() => {
      isReady = true;
      console.log("✓ Server ready to accept requests\n");
    })
    .catch((error: unknown) => {
      console.error("✗ Initialization failed:", error);
      process.exit(1);
    });
});

/**
 * Handles graceful shutdown on SIGTERM signal.
 * Closes the server and exits the process cleanly.
 */
process.on("SIGTERM", () => {
  server.close(() => process.exit(0));
});

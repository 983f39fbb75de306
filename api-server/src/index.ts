import "./register-path-aliases";
import { createApp } from "./app";
import { createProductionServices } from "./container";
import { config } from "./lib/config";
import { closeAllDbs } from "./lib/db/index";
import { logger } from "./lib/logger";
import redisClient from "./lib/redisClient";

const app = createApp(createProductionServices(), {
  requireConfirmedUser: config.authn.requireConfirmedUser,
  requireHttps: config.nodeEnv === "production",
});
const port: number = config.port;

// Handle uncaught exceptions
process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception:", error);
});

// Graceful shutdown
async function gracefulShutdown() {
  logger.info("[AppShutdown] Starting graceful shutdown...");

  await new Promise<void>((resolve) => server.close(() => resolve()));
  logger.info("[AppShutdown] HTTP server closed.");

  // Close database connections
  await closeAllDbs();
  logger.info("[AppShutdown] Database connections closed.");

  // Close Redis connection
  await redisClient.quit();
  logger.info("[AppShutdown] Redis connection closed.");

  process.exit(0);
}

function onShutdownSignal() {
  gracefulShutdown().catch((err: unknown) => {
    logger.error("[AppShutdown] Graceful shutdown failed", { error: err });
    process.exit(1);
  });
}

// Handle shutdown signals
process.on("SIGTERM", onShutdownSignal);
process.on("SIGINT", onShutdownSignal);

// Start server
const server = app.listen(port, () => {
  logger.info(`Server is listening to http://localhost:${port}`);
});

import "dotenv/config";
import { createApp } from "./app";
import { InMemoryTaskRepository } from "./repositories/task.repository";
import { getEnv, getSchedulerDefaults } from "./utils/env";
import { logger } from "./utils/logger";
import { metrics } from "./utils/metrics";

const env = getEnv();
logger.setLevel(env.LOG_LEVEL);

logger.info("Initializing scheduling service", {
  nodeVersion: process.version,
  environment: env.NODE_ENV,
  port: env.PORT,
});

const app = createApp({
  repository: new InMemoryTaskRepository(),
  schedulerDefaults: getSchedulerDefaults(env),
  corsOrigin: env.CORS_ORIGIN,
});

if (env.NODE_ENV === "production") {
  metrics.start();
}

const server = app.listen(env.PORT, () => {
  logger.info("Server listening", { port: env.PORT });
});

function gracefulShutdown(signal: string) {
  logger.info("Shutdown signal received", { signal });

  const shutdownTimeout = setTimeout(() => {
    logger.error("Graceful shutdown timeout (10s), forcing exit");
    process.exit(1);
  }, 10000);

  server.close((error) => {
    clearTimeout(shutdownTimeout);
    metrics.shutdown();

    if (error) {
      logger.error("Error during graceful shutdown", {}, error);
      process.exit(1);
    }

    logger.info("Graceful shutdown complete");
    process.exit(0);
  });
}

process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: String(reason) });
});

process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", {}, error);
  process.exit(1);
});

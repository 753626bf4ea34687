import express, { Express } from "express";
import cors from "cors";
import helmet from "helmet";
import { correlationIdMiddleware } from "./middleware/correlation-id.middleware";
import { errorHandler, notFoundHandler } from "./middleware/error-handler";
import { createSchedulingRouter } from "./api/scheduling";
import type { TaskRepository } from "./repositories/task.repository";
import type { SchedulerDefaults } from "./utils/env";

export interface AppOptions {
  repository: TaskRepository;
  schedulerDefaults: SchedulerDefaults;
  corsOrigin?: string;
}

export function createApp({ repository, schedulerDefaults, corsOrigin }: AppOptions): Express {
  const app = express();

  app.use(helmet());
  app.use(cors({ origin: corsOrigin || "http://localhost:3000" }));

  // Correlation ID middleware - must be early to capture all requests
  app.use(correlationIdMiddleware);

  app.use(express.json({ limit: "1mb" }));

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", timestamp: new Date().toISOString() });
  });

  app.use("/api", createSchedulingRouter(repository, schedulerDefaults));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

import express, { type Request, type Response } from "express";
import cors from "cors";
import type { Analyzer, LoggerPort } from "@wlr/core";
import { createLogRouter } from "./routes/logs.js";
import { errorHandler } from "./middleware/errors.js";

export interface AppDeps {
  analyzer: Analyzer;
  logger: LoggerPort;
  maxUploadBytes: number;
  exposeErrors: boolean; // include error messages in 500 bodies (development)
}

export function createApp(deps: AppDeps): express.Express {
  const app = express();

  // Middleware
  app.use(cors());

  // =============================================================================
  // Health Endpoints
  // =============================================================================

  app.get("/", (_req: Request, res: Response) => {
    res.json({ message: "API is online" });
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  // =============================================================================
  // API Routes
  // =============================================================================

  app.use("/log", createLogRouter({ analyzer: deps.analyzer, maxUploadBytes: deps.maxUploadBytes }));

  // =============================================================================
  // Error Handler
  // =============================================================================

  app.use(errorHandler(deps.logger, deps.exposeErrors));

  return app;
}

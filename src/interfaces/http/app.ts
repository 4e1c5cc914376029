/**
 * Express application factory. Kept apart from src/server.ts so tests can mount
 * the full middleware stack on an ephemeral port.
 */
import cors from "cors";
import express from "express";
import type { Express } from "express";

import { NotFoundError, errorHandler } from "@middleware/errorHandler";
import { registerRoutes } from "@routes/index";

export function createApp(): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  registerRoutes(app);

  app.use((req, _res, next) => {
    next(new NotFoundError(`Route ${req.method} ${req.path} not found`));
  });

  app.use(errorHandler);

  return app;
}

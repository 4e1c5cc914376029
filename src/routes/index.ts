/**
 * Express route registration.
 *
 * Everything except the API banner lives under /api/v1:
 * - /query: LLM-backed plugin-chain recommendations
 * - /chains: chain CRUD and direct similarity search
 * - /knowledge: audio-engineering knowledge base
 * - /health, /initialize: database status and schema setup
 */
import { rootController } from "@interfaces/http/HealthController";
import chainsRouter from "@routes/v1/chains";
import knowledgeRouter from "@routes/v1/knowledge";
import queryRouter from "@routes/v1/query";
import systemRouter from "@routes/v1/system";
import type { Express } from "express";

export const API_PREFIX = "/api/v1";

export function registerRoutes(app: Express): void {
  app.get("/", rootController);
  app.use(`${API_PREFIX}/query`, queryRouter);
  app.use(`${API_PREFIX}/chains`, chainsRouter);
  app.use(`${API_PREFIX}/knowledge`, knowledgeRouter);
  app.use(API_PREFIX, systemRouter);
}

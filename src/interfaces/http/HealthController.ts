import { checkHealth, initializeDatabase } from "@app/health/HealthUseCase";
import type { Request, Response } from "express";

export const API_INFO = {
  message: "Audio Plugin RAG API",
  version: "1.0.0",
} as const;

export function rootController(_req: Request, res: Response): void {
  res.json(API_INFO);
}

export async function healthController(
  _req: Request,
  res: Response
): Promise<void> {
  const report = await checkHealth();
  res.status(report.status === "healthy" ? 200 : 503).json(report);
}

export async function initializeController(
  _req: Request,
  res: Response
): Promise<void> {
  res.json(await initializeDatabase());
}

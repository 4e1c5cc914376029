import { initializeTables } from "@infrastructure/database/schema";
import { pingDatabase } from "@infrastructure/database/db";
import { logger } from "@infrastructure/logging/Logger";
import { messageOf } from "@typesLocal/StatusCodeError";

export type HealthReport =
  | { status: "healthy"; timestamp: number; database: "connected" }
  | {
      status: "unhealthy";
      timestamp: number;
      database: "disconnected";
      detail: string;
    };

function nowSeconds(): number {
  return Date.now() / 1000;
}

export async function checkHealth(): Promise<HealthReport> {
  try {
    await pingDatabase();
    return { status: "healthy", timestamp: nowSeconds(), database: "connected" };
  } catch (error: unknown) {
    const detail = messageOf(error);
    logger.log("warn", "HEALTH_DB_UNREACHABLE", { detail });
    return {
      status: "unhealthy",
      timestamp: nowSeconds(),
      database: "disconnected",
      detail,
    };
  }
}

export async function initializeDatabase(): Promise<{ message: string }> {
  await initializeTables();
  return { message: "Database initialized successfully" };
}

/**
 * Application entry point.
 *
 * Creates the schema if needed, checks OpenAI connectivity, starts the HTTP
 * server and closes the pg pool on SIGINT/SIGTERM.
 */
import { createApp } from "@interfaces/http/app";
import { config } from "@config/index";
import { closePool } from "@infrastructure/database/db";
import { initializeTables } from "@infrastructure/database/schema";
import { logger } from "@infrastructure/logging/Logger";
import { messageOf } from "@typesLocal/StatusCodeError";
import { validateOpenAIKey } from "@utils/validateOpenAI";

async function bootstrap(): Promise<void> {
  try {
    await initializeTables();
  } catch (error: unknown) {
    logger.log("error", "DB_SCHEMA_INIT_FAILED", {
      message: messageOf(error),
    });
  }

  void validateOpenAIKey();

  const app = createApp();

  const server = app.listen(config.port, () => {
    logger.log("info", "SERVER_STARTED", {
      url: `http://localhost:${config.port}`,
      model: config.openai.model,
      embeddingModel: config.openai.embeddingModel,
    });
  });

  let shuttingDown = false;

  const shutdown = (signal: string): void => {
    if (shuttingDown) return;
    shuttingDown = true;

    logger.log("info", "SERVER_SHUTDOWN", { signal });

    server.close(() => {
      closePool()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.log("error", "DB_POOL_CLOSE_FAILED", {
            message: messageOf(error),
          });
          process.exit(1);
        });
    });
  };

  process.on("SIGINT", () => shutdown("SIGINT"));
  process.on("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error: unknown) => {
  logger.log("error", "SERVER_START_FAILED", { message: messageOf(error) });
  process.exit(1);
});

import { config } from "@config/index";
import { embedText } from "@infrastructure/llm/EmbeddingProvider";
import { logger } from "@infrastructure/logging/Logger";
import { messageOf } from "@typesLocal/StatusCodeError";

/**
 * Startup diagnostic for the OpenAI configuration: a key format check and
 * one embedding round trip. Never throws; the API should still come up and
 * report failures per request.
 */
export async function validateOpenAIKey(): Promise<boolean> {
  const key = config.openai.key;

  if (!/^sk-[A-Za-z0-9_-]{20,}$/.test(key) && !config.openai.baseUrl) {
    logger.log("warn", "OPENAI_KEY_FORMAT_UNEXPECTED", {
      hint: "OpenAI keys normally start with 'sk-'",
    });
  }

  const startedAt = Date.now();

  try {
    const vector = await embedText("connectivity-check");

    logger.log("info", "OPENAI_CONNECTIVITY_OK", {
      model: config.openai.embeddingModel,
      dimensions: vector.length,
      durationMs: Date.now() - startedAt,
    });
    return true;
  } catch (error: unknown) {
    logger.log("error", "OPENAI_CONNECTIVITY_FAILED", {
      model: config.openai.embeddingModel,
      message: messageOf(error),
    });
    return false;
  }
}

import { logger } from "@infrastructure/logging/Logger";
import { messageOf, statusCodeOf } from "@typesLocal/StatusCodeError";

const BACKOFF_DELAYS_MS: readonly number[] = [0, 200, 500];
const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT"]);
const RETRYABLE_STATUSES = new Set([429, 500, 502, 503]);

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorCodeOf(error: unknown): string | undefined {
  if (!error || typeof error !== "object") {
    return undefined;
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  if ("cause" in error) {
    return errorCodeOf(error.cause);
  }
  return undefined;
}

export function isRetryableError(error: unknown): boolean {
  const code = errorCodeOf(error);
  if (code && RETRYABLE_CODES.has(code)) {
    return true;
  }

  const status = statusCodeOf(error);
  return typeof status === "number" && RETRYABLE_STATUSES.has(status);
}

/**
 * Runs an upstream model call with up to three attempts. Only transient
 * network failures and 429/5xx responses are retried.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  operation: string
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 1; attempt <= BACKOFF_DELAYS_MS.length; attempt += 1) {
    if (attempt > 1) {
      await delay(BACKOFF_DELAYS_MS[attempt - 1] ?? 0);
    }

    try {
      return await fn();
    } catch (e: unknown) {
      lastError = e;

      if (!isRetryableError(e) || attempt === BACKOFF_DELAYS_MS.length) {
        throw e;
      }

      logger.log("warn", "LLM_RETRY", {
        attempt,
        error: messageOf(e),
        operation,
      });
    }
  }

  throw lastError instanceof Error
    ? lastError
    : new Error("LLM operation failed after retries.");
}

/**
 * Error carrying the HTTP status it should surface with.
 *
 * Use-cases and adapters throw these; the global error handler reads
 * `statusCode` when building the response.
 */
export interface StatusCodeErrorInterface extends Error {
  statusCode?: number;
}

export class StatusCodeError extends Error implements StatusCodeErrorInterface {
  statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "StatusCodeError";
    if (statusCode !== undefined) {
      this.statusCode = statusCode;
    }
  }
}

/**
 * Reads an HTTP status from an unknown thrown value. Our own errors carry
 * `statusCode`, as does the AI SDK's APICallError; the OpenAI SDK's APIError
 * carries `status`. Retry and wrapper errors are unwrapped through
 * `lastError` and `cause`.
 */
export function statusCodeOf(error: unknown, depth = 0): number | undefined {
  if (!error || typeof error !== "object" || depth > 5) {
    return undefined;
  }

  if ("statusCode" in error && typeof error.statusCode === "number") {
    return error.statusCode;
  }
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  if ("lastError" in error) {
    const status = statusCodeOf(error.lastError, depth + 1);
    if (status !== undefined) return status;
  }
  if ("cause" in error) {
    return statusCodeOf(error.cause, depth + 1);
  }
  return undefined;
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Wraps a failed model-provider call. The provider's HTTP status is kept
 * when there is one; anything else surfaces as 502.
 */
export function toUpstreamError(
  error: unknown,
  fallbackMessage: string
): StatusCodeError {
  const message =
    error instanceof Error && error.message ? error.message : fallbackMessage;
  const wrapped = new StatusCodeError(message, statusCodeOf(error) ?? 502);
  wrapped.cause = error;
  return wrapped;
}

import { ValidationError } from "@middleware/errorHandler";
import type { z } from "zod";

export function parseRequest<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown
): z.output<T> {
  const parsed = schema.safeParse(input);

  if (!parsed.success) {
    throw new ValidationError("Invalid request", {
      issues: parsed.error.issues,
    });
  }

  return parsed.data;
}

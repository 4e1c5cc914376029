import { config } from "@config/index";
import { z } from "zod";

/**
 * Request DTO for POST /api/v1/query. Blank genre/instrument filters are
 * treated as absent.
 */
export const OptionalFilterSchema = z
  .string()
  .trim()
  .nullish()
  .transform((value) => (value ? value : null));

export const QueryRequestSchema = z.object({
  text: z.string().trim().min(1, "Query text cannot be empty"),
  genre: OptionalFilterSchema,
  instrument: OptionalFilterSchema,
  owned_plugins: z.array(z.string().trim().min(1)).default([]),
  max_results: z
    .number()
    .int()
    .min(1)
    .max(config.rag.maxResultsLimit)
    .default(5),
});

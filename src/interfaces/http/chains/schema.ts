import { config } from "@config/index";
import { z } from "zod";

import { OptionalFilterSchema } from "@interfaces/http/query/schema";

// Upper bound of the Postgres `integer` id column.
const PG_INT_MAX = 2147483647;

/**
 * Path and query-string DTOs for the /api/v1/chains routes. Query-string
 * values arrive as strings and are coerced.
 */
export const ChainIdParamsSchema = z.object({
  id: z.coerce.number().int().positive().max(PG_INT_MAX),
});

export const ChainListQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  offset: z.coerce.number().int().min(0).default(0),
});

export const ChainSearchQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  genre: OptionalFilterSchema,
  instrument: OptionalFilterSchema,
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(config.rag.maxResultsLimit)
    .default(5),
});

import { config } from "@config/index";
import { z } from "zod";

export const KnowledgeIngestRequestSchema = z.object({
  filepath: z.string().min(1),
  source: z.string().trim().min(1).optional(),
});

export const KnowledgeSearchQuerySchema = z.object({
  q: z.string().trim().min(1, "q is required"),
  limit: z.coerce
    .number()
    .int()
    .min(1)
    .max(config.rag.maxResultsLimit)
    .default(5),
});

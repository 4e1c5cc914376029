/**
 * Direct similarity search over plugin chains, without the LLM step.
 * Backs GET /api/v1/chains/search.
 */
import type { ScoredPluginChain } from "@domain/plugins/models";
import type { ChainSearchFilters } from "@domain/plugins/ports";
import { pluginChainRepository } from "@infrastructure/database/PgVectorPluginChainRepository";
import { embedText } from "@infrastructure/llm/EmbeddingProvider";
import { logEvent } from "@infrastructure/logging/Logger";
import { StatusCodeError } from "@typesLocal/StatusCodeError";

export interface ChainSearchRequest extends ChainSearchFilters {
  query: string;
  limit: number;
}

export interface ChainSearchResponse {
  results: ScoredPluginChain[];
  total: number;
}

export async function searchChainsByText(
  input: ChainSearchRequest
): Promise<ChainSearchResponse> {
  const normalized = input.query.trim();

  if (!normalized) {
    throw new StatusCodeError("query is required", 400);
  }

  const embedding = await embedText(normalized);
  const results = await pluginChainRepository.searchByEmbedding(
    embedding,
    input.limit,
    { genre: input.genre, instrument: input.instrument }
  );

  logEvent("CHAIN_SEARCH", {
    limit: input.limit,
    genre: input.genre ?? null,
    instrument: input.instrument ?? null,
    returned: results.length,
  });

  return { results, total: results.length };
}

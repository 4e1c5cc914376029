/**
 * Retrieval half of the recommendation pipeline.
 *
 * Nearest-neighbour ordering comes from pgvector; this module only applies
 * the configured similarity floor and pulls supporting knowledge chunks.
 */
import { config } from "@config/index";
import type {
  ScoredDocumentChunk,
  ScoredPluginChain,
} from "@domain/plugins/models";
import type { ChainSearchFilters } from "@domain/plugins/ports";
import { knowledgeRepository } from "@infrastructure/database/PgVectorKnowledgeRepository";
import { pluginChainRepository } from "@infrastructure/database/PgVectorPluginChainRepository";
import { logEvent } from "@infrastructure/logging/Logger";

export interface ChainRetrievalOptions {
  limit: number;
  filters?: ChainSearchFilters;
  minSimilarity?: number;
}

export interface ChainRetrievalResult {
  rawChains: ScoredPluginChain[];
  finalChains: ScoredPluginChain[];
  meta: {
    limit: number;
    minSimilarity: number;
    chainsReturned: number;
  };
}

/**
 * Drops rows under the floor. When the floor would remove every row the raw
 * rows are kept, so a strict threshold never empties a non-empty result.
 */
export function applySimilarityFloor<T extends { similarity_score: number }>(
  rows: T[],
  minSimilarity: number
): { filtered: T[]; final: T[] } {
  const filtered = rows.filter((row) => row.similarity_score >= minSimilarity);
  return { filtered, final: filtered.length > 0 ? filtered : rows };
}

export async function retrieveCandidateChains(
  queryEmbedding: number[],
  options: ChainRetrievalOptions
): Promise<ChainRetrievalResult> {
  const minSimilarity = options.minSimilarity ?? config.rag.minSimilarity;
  const filters = options.filters ?? {};

  const rawChains = await pluginChainRepository.searchByEmbedding(
    queryEmbedding,
    options.limit,
    filters
  );

  const { filtered, final } = applySimilarityFloor(rawChains, minSimilarity);

  logEvent("RAG_RETRIEVE", {
    limit: options.limit,
    minSimilarity,
    genre: filters.genre ?? null,
    instrument: filters.instrument ?? null,
    rawCount: rawChains.length,
    filteredCount: filtered.length,
    finalCount: final.length,
  });

  return {
    rawChains,
    finalChains: final,
    meta: {
      limit: options.limit,
      minSimilarity,
      chainsReturned: final.length,
    },
  };
}

export async function retrieveKnowledge(
  queryEmbedding: number[],
  topK: number = config.rag.knowledgeTopK
): Promise<ScoredDocumentChunk[]> {
  if (topK <= 0) {
    return [];
  }

  const chunks = await knowledgeRepository.searchByEmbedding(
    queryEmbedding,
    topK
  );

  logEvent("RAG_KNOWLEDGE", {
    topK,
    returned: chunks.length,
  });

  return chunks;
}

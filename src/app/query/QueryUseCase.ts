/**
 * Plugin-chain recommendation use-case.
 *
 * Orchestrates the full RAG pipeline for one query:
 * - Embeds the query text
 * - Retrieves candidate chains (with genre/instrument filters) and
 *   knowledge-base snippets from pgvector
 * - Asks the agent to pick and explain chains among the candidates
 * - Validates the agent's JSON against the candidate set
 */
import type { PluginQuery, RAGResponse } from "@domain/plugins/models";
import {
  buildQueryContext,
  buildRecommendationContext,
  buildRecommendationPrompt,
} from "@domain/plugins/prompt";
import { parseRecommendations } from "@domain/plugins/recommendationParser";
import { retrieveCandidateChains, retrieveKnowledge } from "@domain/rag/ragEngine";
import { embedText } from "@infrastructure/llm/EmbeddingProvider";
import { llmPort } from "@infrastructure/llm/OpenAIAdapter";
import { logEvent } from "@infrastructure/logging/Logger";
import { StatusCodeError } from "@typesLocal/StatusCodeError";

export async function recommendChains(query: PluginQuery): Promise<RAGResponse> {
  const startedAt = Date.now();
  const text = query.text.trim();

  if (!text) {
    throw new StatusCodeError("Query text cannot be empty", 400);
  }

  const queryContext = buildQueryContext(query);

  logEvent("QUERY_REQUEST", {
    queryLength: text.length,
    genre: query.genre ?? null,
    instrument: query.instrument ?? null,
    ownedPlugins: query.owned_plugins.length,
    maxResults: query.max_results,
  });

  const embedding = await embedText(text);

  const [retrieval, knowledge] = await Promise.all([
    retrieveCandidateChains(embedding, {
      limit: query.max_results,
      filters: { genre: query.genre, instrument: query.instrument },
    }),
    retrieveKnowledge(embedding),
  ]);

  const candidates = retrieval.finalChains;

  if (candidates.length === 0) {
    const searchTimeMs = Date.now() - startedAt;

    logEvent("QUERY_RESPONSE", {
      candidates: 0,
      recommendations: 0,
      searchTimeMs,
    });

    return {
      recommendations: [],
      query_context: queryContext,
      total_results: 0,
      search_time_ms: searchTimeMs,
      additional_tips: null,
    };
  }

  const answer = await llmPort.callLLM(
    buildRecommendationPrompt(query),
    buildRecommendationContext(candidates, knowledge)
  );

  const parsed = parseRecommendations(answer, candidates, query.max_results);
  const searchTimeMs = Date.now() - startedAt;

  logEvent("QUERY_RESPONSE", {
    candidates: candidates.length,
    knowledgeChunks: knowledge.length,
    recommendations: parsed.recommendations.length,
    dropped: parsed.dropped,
    searchTimeMs,
  });

  return {
    recommendations: parsed.recommendations,
    query_context: queryContext,
    total_results: parsed.recommendations.length,
    search_time_ms: searchTimeMs,
    additional_tips: parsed.additional_tips,
  };
}

import { beforeEach, describe, expect, it, vi } from "vitest";

import { recommendChains } from "@app/query/QueryUseCase";
import type { PluginQuery } from "@domain/plugins/models";
import {
  buildRecommendationContext,
  buildRecommendationPrompt,
} from "@domain/plugins/prompt";

import { makeScored } from "./helpers/fixtures";

const { embedText, retrieveCandidateChains, retrieveKnowledge, callLLM } =
  vi.hoisted(() => ({
    embedText: vi.fn(),
    retrieveCandidateChains: vi.fn(),
    retrieveKnowledge: vi.fn(),
    callLLM: vi.fn(),
  }));

vi.mock("@infrastructure/llm/EmbeddingProvider", () => ({ embedText }));

vi.mock("@domain/rag/ragEngine", () => ({
  retrieveCandidateChains,
  retrieveKnowledge,
}));

vi.mock("@infrastructure/llm/OpenAIAdapter", () => ({
  llmPort: { callLLM },
}));

const vector = [0.4, 0.5];

function query(overrides: Partial<PluginQuery> = {}): PluginQuery {
  return {
    text: "dark techno bass",
    genre: "techno",
    instrument: null,
    owned_plugins: [],
    max_results: 5,
    ...overrides,
  };
}

beforeEach(() => {
  vi.resetAllMocks();
  embedText.mockResolvedValue(vector);
  retrieveKnowledge.mockResolvedValue([]);
});

describe("recommendChains", () => {
  it("rejects empty query text before embedding", async () => {
    await expect(recommendChains(query({ text: "   " }))).rejects.toMatchObject(
      { statusCode: 400, message: "Query text cannot be empty" }
    );
    expect(embedText).not.toHaveBeenCalled();
  });

  it("returns an empty result without calling the LLM when nothing matches", async () => {
    retrieveCandidateChains.mockResolvedValue({ finalChains: [] });

    const result = await recommendChains(query());

    expect(embedText).toHaveBeenCalledWith("dark techno bass");
    expect(retrieveCandidateChains).toHaveBeenCalledWith(vector, {
      limit: 5,
      filters: { genre: "techno", instrument: null },
    });
    expect(callLLM).not.toHaveBeenCalled();
    expect(result).toMatchObject({
      recommendations: [],
      query_context: "Query: dark techno bass | Genre: techno",
      total_results: 0,
      additional_tips: null,
    });
    expect(result.search_time_ms).toBeGreaterThanOrEqual(0);
  });

  it("builds recommendations from the LLM's picks", async () => {
    const candidates = [makeScored(4, 0.8)];
    retrieveCandidateChains.mockResolvedValue({ finalChains: candidates });
    callLLM.mockResolvedValue(
      '{"recommendations":[{"chain_id":4,"explanation":"Good fit","confidence":0.9}],"additional_tips":"Watch the low end"}'
    );

    const q = query({ owned_plugins: ["Saturn 2"] });
    const result = await recommendChains(q);

    expect(callLLM).toHaveBeenCalledWith(
      buildRecommendationPrompt(q),
      buildRecommendationContext(candidates, [])
    );
    expect(result.recommendations).toEqual([
      {
        chain: candidates[0]?.chain,
        similarity_score: 0.8,
        confidence: 0.9,
        explanation: "Good fit",
      },
    ]);
    expect(result.total_results).toBe(1);
    expect(result.additional_tips).toBe("Watch the low end");
    expect(result.query_context).toBe(
      "Query: dark techno bass | Genre: techno | Owned plugins: Saturn 2"
    );
  });

  it("surfaces unparseable LLM output as a 502", async () => {
    retrieveCandidateChains.mockResolvedValue({
      finalChains: [makeScored(1, 0.6)],
    });
    callLLM.mockResolvedValue("Try the first chain.");

    await expect(recommendChains(query())).rejects.toMatchObject({
      statusCode: 502,
    });
  });
});

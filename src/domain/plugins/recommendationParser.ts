import { z } from "zod";

import { StatusCodeError } from "@typesLocal/StatusCodeError";

import type { PluginRecommendation, ScoredPluginChain } from "./models";

const ChainIdSchema = z.union([
  z.number().int(),
  z
    .string()
    .trim()
    .regex(/^\d+$/)
    .transform((value) => Number(value)),
]);

const LlmRecommendationSchema = z.object({
  chain_id: ChainIdSchema,
  explanation: z.string().default(""),
  confidence: z.number().finite().optional(),
});

const LlmOutputSchema = z.object({
  recommendations: z.array(z.unknown()),
  additional_tips: z.string().nullish(),
});

export interface ParsedRecommendations {
  recommendations: PluginRecommendation[];
  additional_tips: string | null;
  dropped: number;
}

export function clampConfidence(value: number): number {
  return Math.min(1, Math.max(0, value));
}

/**
 * Models sometimes wrap the object in prose or a code fence; take the span
 * from the first "{" to the last "}".
 */
export function extractJsonObject(text: string): unknown {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");

  if (start === -1 || end <= start) {
    throw new StatusCodeError("LLM response did not contain a JSON object", 502);
  }

  try {
    return JSON.parse(text.slice(start, end + 1));
  } catch {
    throw new StatusCodeError("LLM response was not valid JSON", 502);
  }
}

/**
 * Turns raw model output into recommendations over the retrieved candidates.
 *
 * Entries that reference a chain outside `candidates`, repeat an earlier
 * chain, or fail validation are dropped. A missing confidence falls back to
 * the chain's similarity score.
 */
export function parseRecommendations(
  text: string,
  candidates: ScoredPluginChain[],
  maxResults: number
): ParsedRecommendations {
  const parsed = LlmOutputSchema.safeParse(extractJsonObject(text));

  if (!parsed.success) {
    throw new StatusCodeError(
      "LLM response did not match the recommendation format",
      502
    );
  }

  const byId = new Map(candidates.map((c) => [c.chain.id, c]));
  const seen = new Set<number>();
  const recommendations: PluginRecommendation[] = [];
  let dropped = 0;

  for (const raw of parsed.data.recommendations) {
    const item = LlmRecommendationSchema.safeParse(raw);
    const candidate = item.success ? byId.get(item.data.chain_id) : undefined;

    if (!item.success || !candidate || seen.has(candidate.chain.id)) {
      dropped++;
      continue;
    }

    if (recommendations.length >= maxResults) {
      dropped++;
      continue;
    }

    seen.add(candidate.chain.id);
    recommendations.push({
      chain: candidate.chain,
      similarity_score: candidate.similarity_score,
      confidence: clampConfidence(
        item.data.confidence ?? candidate.similarity_score
      ),
      explanation: item.data.explanation.trim(),
    });
  }

  const tips = parsed.data.additional_tips?.trim();

  return {
    recommendations,
    additional_tips: tips ? tips : null,
    dropped,
  };
}

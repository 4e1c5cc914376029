/**
 * Core records of the plugin recommendation domain.
 *
 * The zod schemas double as the runtime contract for request bodies and for
 * JSONB values read back from Postgres; the exported types are inferred from
 * them so both stay in step.
 */
import { z } from "zod";

export const PluginSchema = z.object({
  name: z.string().trim().min(1),
  manufacturer: z.string().trim().min(1),
  category: z.string().trim().min(1),
  order: z.number().int().positive(),
  settings: z.string().nullish(),
  parameters: z.record(z.unknown()).nullish(),
});

export type Plugin = z.infer<typeof PluginSchema>;

export const PluginChainInputSchema = z.object({
  name: z.string().trim().min(1),
  description: z.string(),
  plugins: z.array(PluginSchema).min(1),
  genre: z.string().trim().min(1).nullish(),
  instrument: z.string().trim().min(1).nullish(),
  tags: z.array(z.string()).default([]),
  rating: z.number().min(0).max(5).nullish(),
  created_by: z.string().nullish(),
});

export type PluginChainInput = z.infer<typeof PluginChainInputSchema>;

export interface PluginChain {
  id: number;
  name: string;
  description: string;
  plugins: Plugin[];
  genre: string | null;
  instrument: string | null;
  tags: string[];
  rating: number | null;
  created_by: string | null;
  created_at: string | null;
}

export interface ScoredPluginChain {
  chain: PluginChain;
  similarity_score: number;
}

export interface PluginQuery {
  text: string;
  genre?: string | null;
  instrument?: string | null;
  owned_plugins: string[];
  max_results: number;
}

export interface PluginRecommendation {
  chain: PluginChain;
  similarity_score: number;
  confidence: number;
  explanation: string;
}

export interface RAGResponse {
  recommendations: PluginRecommendation[];
  query_context: string;
  total_results: number;
  search_time_ms: number;
  additional_tips: string | null;
}

export const DocumentChunkInputSchema = z.object({
  content: z.string().trim().min(1),
  source: z.string().trim().min(1),
  chunk_index: z.number().int().nonnegative().default(0),
  metadata: z.record(z.unknown()).default({}),
});

export type DocumentChunkInput = z.infer<typeof DocumentChunkInputSchema>;

export interface DocumentChunk {
  id: number;
  content: string;
  source: string;
  chunk_index: number;
  metadata: Record<string, unknown>;
  created_at: string | null;
}

export interface ScoredDocumentChunk {
  chunk: DocumentChunk;
  similarity_score: number;
}

export function sortPlugins(plugins: Plugin[]): Plugin[] {
  return [...plugins].sort((a, b) => a.order - b.order);
}

/**
 * Audio-engineering knowledge base: single-chunk inserts, Markdown file
 * ingestion and raw similarity search. Chunks stored here are pulled into
 * the recommendation prompt by the query pipeline.
 */
import fs from "fs";
import path from "path";

import type {
  DocumentChunkInput,
  ScoredDocumentChunk,
} from "@domain/plugins/models";
import { knowledgeRepository } from "@infrastructure/database/PgVectorKnowledgeRepository";
import { embedBatch, embedText } from "@infrastructure/llm/EmbeddingProvider";
import { logEvent } from "@infrastructure/logging/Logger";
import { StatusCodeError, messageOf } from "@typesLocal/StatusCodeError";
import MarkdownIt from "markdown-it";

const md = new MarkdownIt();

export const MAX_INGEST_BYTES = 5 * 1024 * 1024;
export const CHUNK_MAX_CHARS = 800;

export interface IngestRequest {
  filepath: string;
  source?: string | undefined;
}

export interface IngestResult {
  source: string;
  totalChunks: number;
  inserted: number;
  skipped: boolean;
}

export interface KnowledgeSearchResponse {
  results: ScoredDocumentChunk[];
  total: number;
}

/**
 * Splits on blank lines; paragraphs longer than `maxLen` code points are cut
 * into fixed-size pieces.
 */
export function chunkText(text: string, maxLen = CHUNK_MAX_CHARS): string[] {
  const paragraphs = text
    .split(/\n{2,}/)
    .map((p) => p.trim())
    .filter(Boolean);

  const chunks: string[] = [];

  for (const p of paragraphs) {
    const chars = Array.from(p);
    if (chars.length <= maxLen) {
      chunks.push(p);
      continue;
    }

    for (let start = 0; start < chars.length; start += maxLen) {
      chunks.push(chars.slice(start, start + maxLen).join("").trim());
    }
  }

  return chunks.filter(Boolean);
}

/**
 * Reduces Markdown to plain text, one paragraph per block. Code blocks and
 * images are dropped; link and emphasis markup keep only their text.
 */
export function normalizeMarkdown(raw: string): string {
  const blocks: string[] = [];

  for (const token of md.parse(raw, {})) {
    if (token.type !== "inline") continue;

    const text = (token.children ?? [])
      .map((child) => {
        if (child.type === "text" || child.type === "code_inline") {
          return child.content;
        }
        if (child.type === "softbreak" || child.type === "hardbreak") {
          return " ";
        }
        return "";
      })
      .join("")
      .trim();

    if (text) blocks.push(text);
  }

  return blocks.join("\n\n");
}

export async function addKnowledgeChunk(
  chunk: DocumentChunkInput
): Promise<{ id: number; message: string }> {
  const embedding = await embedText(chunk.content);
  const id = await knowledgeRepository.insert(chunk, embedding);

  logEvent("KNOWLEDGE_ADDED", {
    id,
    source: chunk.source,
    chunkIndex: chunk.chunk_index,
  });

  return { id, message: "Knowledge chunk added successfully" };
}

export async function ingestMarkdownFile(
  input: IngestRequest
): Promise<IngestResult> {
  const { filepath } = input;

  if (!filepath) {
    throw new StatusCodeError("filepath required", 400);
  }

  const fileStats = fs.statSync(filepath, { throwIfNoEntry: false });
  if (!fileStats) {
    throw new StatusCodeError("file not found", 404);
  }
  if (!fileStats.isFile()) {
    throw new StatusCodeError("filepath is not a file", 400);
  }
  if (fileStats.size > MAX_INGEST_BYTES) {
    throw new StatusCodeError("File too large (max 5MB)", 400);
  }

  const source = input.source?.trim() || path.basename(filepath);

  const skip = (existingChunks: number | null): IngestResult => {
    logEvent("KNOWLEDGE_INGEST_SKIPPED", { source, existingChunks });
    return { source, totalChunks: 0, inserted: 0, skipped: true };
  };

  try {
    const existing = await knowledgeRepository.countBySource(source);
    if (existing > 0) {
      return skip(existing);
    }

    const raw = fs.readFileSync(filepath, "utf-8");
    const chunks = chunkText(normalizeMarkdown(raw));

    const embeddings = await embedBatch(chunks);
    const inputs: DocumentChunkInput[] = chunks.map((content, index) => ({
      content,
      source,
      chunk_index: index,
      metadata: { filepath },
    }));
    // A concurrent ingest of the same source may have committed meanwhile.
    const inserted = await knowledgeRepository.insertSourceChunks(
      source,
      inputs,
      embeddings
    );
    if (inserted === null) {
      return skip(null);
    }

    logEvent("KNOWLEDGE_INGEST_SUCCESS", {
      source,
      totalChunks: chunks.length,
      inserted,
    });

    return { source, totalChunks: chunks.length, inserted, skipped: false };
  } catch (error: unknown) {
    logEvent("KNOWLEDGE_INGEST_FAILURE", {
      source,
      message: messageOf(error),
    });
    throw error;
  }
}

export async function searchKnowledge(
  query: string,
  limit: number
): Promise<KnowledgeSearchResponse> {
  const normalized = query.trim();

  if (!normalized) {
    throw new StatusCodeError("query is required", 400);
  }

  const embedding = await embedText(normalized);
  const results = await knowledgeRepository.searchByEmbedding(embedding, limit);

  return { results, total: results.length };
}

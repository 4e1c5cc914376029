/**
 * Knowledge-base controllers: single chunk inserts, Markdown ingestion from
 * the server's disk, and raw similarity search.
 */
import path from "path";

import {
  addKnowledgeChunk,
  ingestMarkdownFile,
  searchKnowledge,
} from "@app/knowledge/KnowledgeUseCase";
import { DocumentChunkInputSchema } from "@domain/plugins/models";
import {
  KnowledgeIngestRequestSchema,
  KnowledgeSearchQuerySchema,
} from "@interfaces/http/knowledge/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export async function addKnowledgeController(
  req: Request,
  res: Response
): Promise<void> {
  const chunk = parseRequest(DocumentChunkInputSchema, req.body);
  res.status(201).json(await addKnowledgeChunk(chunk));
}

export async function ingestKnowledgeController(
  req: Request,
  res: Response
): Promise<void> {
  const parsed = parseRequest(KnowledgeIngestRequestSchema, req.body);

  const result = await ingestMarkdownFile({
    filepath: path.resolve(parsed.filepath),
    source: parsed.source,
  });

  res.json(result);
}

export async function searchKnowledgeController(
  req: Request,
  res: Response
): Promise<void> {
  const { q, limit } = parseRequest(KnowledgeSearchQuerySchema, req.query);
  res.json(await searchKnowledge(q, limit));
}

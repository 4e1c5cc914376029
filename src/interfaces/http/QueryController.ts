/**
 * HTTP boundary for plugin-chain recommendations (POST /api/v1/query).
 */
import { recommendChains } from "@app/query/QueryUseCase";
import { QueryRequestSchema } from "@interfaces/http/query/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export async function queryController(
  req: Request,
  res: Response
): Promise<void> {
  const query = parseRequest(QueryRequestSchema, req.body);
  const result = await recommendChains(query);
  res.json(result);
}

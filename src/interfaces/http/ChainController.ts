/**
 * Plugin-chain CRUD and direct search controllers.
 *
 * Bodies are validated against the domain's PluginChainInputSchema; ids and
 * query-string parameters against the DTOs in ./chains/schema.
 */
import {
  addChain,
  deleteChain,
  getChain,
  listChains,
  updateChain,
} from "@app/chains/ChainUseCase";
import { searchChainsByText } from "@app/search/SearchUseCase";
import { PluginChainInputSchema } from "@domain/plugins/models";
import {
  ChainIdParamsSchema,
  ChainListQuerySchema,
  ChainSearchQuerySchema,
} from "@interfaces/http/chains/schema";
import { parseRequest } from "@interfaces/http/validation";
import type { Request, Response } from "express";

export async function createChainController(
  req: Request,
  res: Response
): Promise<void> {
  const chain = parseRequest(PluginChainInputSchema, req.body);
  const result = await addChain(chain);
  res.status(201).json(result);
}

export async function listChainsController(
  req: Request,
  res: Response
): Promise<void> {
  const { limit, offset } = parseRequest(ChainListQuerySchema, req.query);
  res.json(await listChains(limit, offset));
}

export async function getChainController(
  req: Request,
  res: Response
): Promise<void> {
  const { id } = parseRequest(ChainIdParamsSchema, req.params);
  res.json(await getChain(id));
}

export async function updateChainController(
  req: Request,
  res: Response
): Promise<void> {
  const { id } = parseRequest(ChainIdParamsSchema, req.params);
  const chain = parseRequest(PluginChainInputSchema, req.body);
  res.json(await updateChain(id, chain));
}

export async function deleteChainController(
  req: Request,
  res: Response
): Promise<void> {
  const { id } = parseRequest(ChainIdParamsSchema, req.params);
  res.json(await deleteChain(id));
}

export async function searchChainsController(
  req: Request,
  res: Response
): Promise<void> {
  const { q, genre, instrument, limit } = parseRequest(
    ChainSearchQuerySchema,
    req.query
  );

  res.json(await searchChainsByText({ query: q, genre, instrument, limit }));
}

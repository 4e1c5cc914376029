import type {
  PluginChain,
  PluginChainInput,
} from "@domain/plugins/models";
import { buildChainEmbeddingText } from "@domain/plugins/prompt";
import type { ChainPage } from "@domain/plugins/ports";
import { pluginChainRepository } from "@infrastructure/database/PgVectorPluginChainRepository";
import { embedText } from "@infrastructure/llm/EmbeddingProvider";
import { logEvent } from "@infrastructure/logging/Logger";
import { StatusCodeError } from "@typesLocal/StatusCodeError";

export interface ChainMutationResult {
  id: number;
  message: string;
}

function chainNotFound(id: number): StatusCodeError {
  return new StatusCodeError(`Plugin chain ${id} not found`, 404);
}

export async function addChain(
  chain: PluginChainInput
): Promise<ChainMutationResult> {
  const embedding = await embedText(buildChainEmbeddingText(chain));
  const id = await pluginChainRepository.insert(chain, embedding);

  logEvent("CHAIN_ADDED", {
    id,
    plugins: chain.plugins.length,
    genre: chain.genre ?? null,
    instrument: chain.instrument ?? null,
  });

  return { id, message: "Plugin chain added successfully" };
}

export async function updateChain(
  id: number,
  chain: PluginChainInput
): Promise<ChainMutationResult> {
  // Look up first so a missing id is a 404 without spending an embedding call.
  const existing = await pluginChainRepository.findById(id);
  if (!existing) {
    throw chainNotFound(id);
  }

  const embedding = await embedText(buildChainEmbeddingText(chain));
  const updated = await pluginChainRepository.update(id, chain, embedding);
  if (!updated) {
    throw chainNotFound(id);
  }

  logEvent("CHAIN_UPDATED", { id, plugins: chain.plugins.length });

  return { id, message: "Plugin chain updated successfully" };
}

export async function deleteChain(id: number): Promise<ChainMutationResult> {
  const removed = await pluginChainRepository.remove(id);
  if (!removed) {
    throw chainNotFound(id);
  }

  logEvent("CHAIN_DELETED", { id });

  return { id, message: "Plugin chain deleted successfully" };
}

export async function getChain(id: number): Promise<PluginChain> {
  const chain = await pluginChainRepository.findById(id);
  if (!chain) {
    throw chainNotFound(id);
  }
  return chain;
}

export async function listChains(
  limit: number,
  offset: number
): Promise<ChainPage> {
  return pluginChainRepository.list(limit, offset);
}

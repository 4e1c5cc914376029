/**
 * Text assembly for the recommendation pipeline: the query summary echoed to
 * clients, the text a chain is embedded from, and the LLM prompt/context.
 */
import type {
  PluginChain,
  PluginChainInput,
  PluginQuery,
  ScoredDocumentChunk,
  ScoredPluginChain,
} from "./models";
import { sortPlugins } from "./models";

export function buildQueryContext(query: PluginQuery): string {
  let context = `Query: ${query.text.trim()}`;

  if (query.genre) {
    context += ` | Genre: ${query.genre}`;
  }
  if (query.instrument) {
    context += ` | Instrument: ${query.instrument}`;
  }
  if (query.owned_plugins.length > 0) {
    context += ` | Owned plugins: ${query.owned_plugins.join(", ")}`;
  }

  return context;
}

/**
 * The text a chain is embedded from. Stored vectors and query vectors must be
 * produced from the same recipe, so inserts and updates both go through here.
 */
export function buildChainEmbeddingText(
  chain: Pick<
    PluginChainInput,
    "name" | "description" | "tags" | "genre" | "instrument"
  >
): string {
  let text = `${chain.name} ${chain.description} ${chain.tags.join(" ")}`;

  if (chain.genre) {
    text += ` ${chain.genre}`;
  }
  if (chain.instrument) {
    text += ` ${chain.instrument}`;
  }

  return text;
}

function formatChain(chain: PluginChain): string {
  const header = [
    chain.genre ? `Genre: ${chain.genre}` : null,
    chain.instrument ? `Instrument: ${chain.instrument}` : null,
    chain.tags.length > 0 ? `Tags: ${chain.tags.join(", ")}` : null,
  ].filter((part): part is string => part !== null);

  const plugins = sortPlugins(chain.plugins).map((plugin) => {
    const settings = plugin.settings ? `: ${plugin.settings}` : "";
    return `  ${plugin.order}. ${plugin.name} by ${plugin.manufacturer} (${plugin.category})${settings}`;
  });

  return [
    chain.name,
    ...(header.length > 0 ? [header.join(" | ")] : []),
    `Description: ${chain.description}`,
    "Plugins:",
    ...plugins,
  ].join("\n");
}

export function buildCandidateSection(candidates: ScoredPluginChain[]): string {
  return candidates
    .map(
      ({ chain, similarity_score }) =>
        `[chain_id: ${chain.id}] (similarity ${similarity_score.toFixed(3)})\n${formatChain(chain)}`
    )
    .join("\n\n");
}

export function buildKnowledgeSection(chunks: ScoredDocumentChunk[]): string {
  return chunks.map(({ chunk }) => chunk.content).join("\n---\n");
}

/**
 * Context block handed to the agent next to the prompt.
 */
export function buildRecommendationContext(
  candidates: ScoredPluginChain[],
  knowledge: ScoredDocumentChunk[]
): string {
  const sections = [`CANDIDATE CHAINS:\n${buildCandidateSection(candidates)}`];

  if (knowledge.length > 0) {
    sections.push(`KNOWLEDGE:\n${buildKnowledgeSection(knowledge)}`);
  }

  return sections.join("\n\n");
}

export function buildRecommendationPrompt(query: PluginQuery): string {
  const owned =
    query.owned_plugins.length > 0
      ? query.owned_plugins.join(", ")
      : "none listed";

  return `
USER REQUEST: ${query.text.trim()}
GENRE: ${query.genre ?? "any"}
INSTRUMENT: ${query.instrument ?? "any"}
OWNED PLUGINS: ${owned}

Pick at most ${query.max_results} chains from CANDIDATE CHAINS that best fit the request, best first.
Respond with JSON only, in exactly this shape:
{"recommendations":[{"chain_id":<id from CANDIDATE CHAINS>,"explanation":"<why this chain fits>","confidence":<number between 0 and 1>}],"additional_tips":"<short mixing advice or null>"}
`.trim();
}

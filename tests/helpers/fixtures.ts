import type {
  PluginChain,
  PluginChainInput,
  ScoredPluginChain,
} from "@domain/plugins/models";

export function makeChain(overrides: Partial<PluginChain> = {}): PluginChain {
  return {
    id: 1,
    name: "Vocal Chain",
    description: "Warm vocal processing",
    plugins: [
      { name: "Pro-Q 3", manufacturer: "FabFilter", category: "EQ", order: 1 },
    ],
    genre: "pop",
    instrument: "vocals",
    tags: ["vocal"],
    rating: null,
    created_by: null,
    created_at: null,
    ...overrides,
  };
}

export function makeScored(
  id: number,
  similarity: number,
  overrides: Partial<PluginChain> = {}
): ScoredPluginChain {
  return {
    chain: makeChain({ id, name: `Chain ${id}`, ...overrides }),
    similarity_score: similarity,
  };
}

export function makeChainInput(
  overrides: Partial<PluginChainInput> = {}
): PluginChainInput {
  return {
    name: "Vocal Chain",
    description: "Warm vocal processing",
    plugins: [
      { name: "CLA-76", manufacturer: "Waves", category: "compressor", order: 2 },
      { name: "Pro-Q 3", manufacturer: "FabFilter", category: "EQ", order: 1 },
    ],
    genre: "pop",
    instrument: "vocals",
    tags: ["vocal"],
    ...overrides,
  };
}

export function thrownBy(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error: unknown) {
    return error;
  }
  throw new Error("expected function to throw");
}

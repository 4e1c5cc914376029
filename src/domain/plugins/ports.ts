import type {
  DocumentChunkInput,
  PluginChain,
  PluginChainInput,
  ScoredDocumentChunk,
  ScoredPluginChain,
} from "./models";

export interface ChainSearchFilters {
  genre?: string | null;
  instrument?: string | null;
}

export interface ChainPage {
  results: PluginChain[];
  total: number;
}

/**
 * Storage contract for plugin chains. Similarity ordering is delegated to
 * the store; callers only pass the query embedding.
 */
export interface PluginChainRepository {
  insert(chain: PluginChainInput, embedding: number[]): Promise<number>;

  update(
    id: number,
    chain: PluginChainInput,
    embedding: number[]
  ): Promise<boolean>;

  remove(id: number): Promise<boolean>;

  findById(id: number): Promise<PluginChain | null>;

  list(limit: number, offset: number): Promise<ChainPage>;

  searchByEmbedding(
    queryEmbedding: number[],
    limit: number,
    filters?: ChainSearchFilters
  ): Promise<ScoredPluginChain[]>;
}

/**
 * Storage contract for the audio-engineering knowledge base.
 */
export interface KnowledgeRepository {
  insert(chunk: DocumentChunkInput, embedding: number[]): Promise<number>;

  /** Null when the source already has chunks. */
  insertSourceChunks(
    source: string,
    chunks: DocumentChunkInput[],
    embeddings: number[][]
  ): Promise<number | null>;

  countBySource(source: string): Promise<number>;

  searchByEmbedding(
    queryEmbedding: number[],
    limit: number
  ): Promise<ScoredDocumentChunk[]>;
}

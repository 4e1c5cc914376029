import type {
  DocumentChunk,
  DocumentChunkInput,
  ScoredDocumentChunk,
} from "@domain/plugins/models";
import type { KnowledgeRepository } from "@domain/plugins/ports";
import { pool } from "@infrastructure/database/db";
import { toPgVectorLiteral, toSimilarity } from "@utils/vector";

type DocumentChunkRow = {
  id: number;
  content: string;
  source: string | null;
  chunk_index: number | null;
  metadata: unknown;
  created_at: Date | null;
};

type ScoredDocumentChunkRow = DocumentChunkRow & {
  similarity: number | string | null;
};

const CHUNK_COLUMNS = "id, content, source, chunk_index, metadata, created_at";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function mapChunkRow(row: DocumentChunkRow): DocumentChunk {
  return {
    id: row.id,
    content: row.content,
    source: row.source ?? "",
    chunk_index: row.chunk_index ?? 0,
    metadata: isRecord(row.metadata) ? row.metadata : {},
    created_at: row.created_at ? row.created_at.toISOString() : null,
  };
}

const INSERT_CHUNK_SQL = `
  INSERT INTO document_chunks (content, source, chunk_index, metadata, embedding)
  VALUES ($1, $2, $3, $4::jsonb, $5::vector)
  RETURNING id;
`;

const COUNT_BY_SOURCE_SQL =
  "SELECT COUNT(*)::int AS total FROM document_chunks WHERE source = $1;";

function chunkValues(chunk: DocumentChunkInput, embedding: number[]): unknown[] {
  return [
    chunk.content,
    chunk.source,
    chunk.chunk_index,
    JSON.stringify(chunk.metadata),
    toPgVectorLiteral(embedding),
  ];
}

/**
 * Knowledge base chunks stored next to the plugin chains. Retrieval uses the
 * same cosine similarity as chain search.
 */
export class PgVectorKnowledgeRepository implements KnowledgeRepository {
  async insert(chunk: DocumentChunkInput, embedding: number[]): Promise<number> {
    const result = await pool.query<{ id: number }>(
      INSERT_CHUNK_SQL,
      chunkValues(chunk, embedding)
    );

    const inserted = result.rows[0];
    if (!inserted) {
      throw new Error("Document chunk insert returned no id");
    }
    return inserted.id;
  }

  /**
   * Inserts every chunk of a new source in a single transaction; a failure on
   * any chunk leaves the table untouched. The source is locked for the
   * transaction, and nothing is written when it already has chunks (the
   * result is then null).
   */
  async insertSourceChunks(
    source: string,
    chunks: DocumentChunkInput[],
    embeddings: number[][]
  ): Promise<number | null> {
    if (chunks.length !== embeddings.length) {
      throw new Error(
        `Chunk/embedding count mismatch: ${chunks.length} vs ${embeddings.length}`
      );
    }
    if (chunks.length === 0) return 0;

    const client = await pool.connect();
    let inserted = 0;

    try {
      await client.query("BEGIN");
      await client.query("SELECT pg_advisory_xact_lock(hashtext($1));", [
        source,
      ]);

      const existing = await client.query<{ total: number }>(
        COUNT_BY_SOURCE_SQL,
        [source]
      );
      if ((existing.rows[0]?.total ?? 0) > 0) {
        await client.query("ROLLBACK");
        return null;
      }

      for (let i = 0; i < chunks.length; i++) {
        const chunk = chunks[i];
        const embedding = embeddings[i];
        if (!chunk || !embedding) continue;

        await client.query(INSERT_CHUNK_SQL, chunkValues(chunk, embedding));
        inserted++;
      }

      await client.query("COMMIT");
    } catch (error: unknown) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }

    return inserted;
  }

  async countBySource(source: string): Promise<number> {
    const result = await pool.query<{ total: number }>(COUNT_BY_SOURCE_SQL, [
      source,
    ]);
    return result.rows[0]?.total ?? 0;
  }

  async searchByEmbedding(
    queryEmbedding: number[],
    limit: number
  ): Promise<ScoredDocumentChunk[]> {
    const result = await pool.query<ScoredDocumentChunkRow>(
      `
      SELECT
        ${CHUNK_COLUMNS},
        1 - (embedding <=> $1::vector) AS similarity
      FROM document_chunks
      WHERE embedding IS NOT NULL
      ORDER BY embedding <=> $1::vector
      LIMIT $2;
      `,
      [toPgVectorLiteral(queryEmbedding), limit]
    );

    return result.rows.map((row) => ({
      chunk: mapChunkRow(row),
      similarity_score: toSimilarity(row.similarity),
    }));
  }
}

export const knowledgeRepository: KnowledgeRepository =
  new PgVectorKnowledgeRepository();

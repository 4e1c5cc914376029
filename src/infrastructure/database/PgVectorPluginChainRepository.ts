import { z } from "zod";

import { PluginSchema, sortPlugins } from "@domain/plugins/models";
import type {
  Plugin,
  PluginChain,
  PluginChainInput,
  ScoredPluginChain,
} from "@domain/plugins/models";
import type {
  ChainPage,
  ChainSearchFilters,
  PluginChainRepository,
} from "@domain/plugins/ports";
import { pool } from "@infrastructure/database/db";
import { logger } from "@infrastructure/logging/Logger";
import { toPgVectorLiteral, toSimilarity } from "@utils/vector";

type PluginChainRow = {
  id: number;
  name: string;
  description: string | null;
  plugins: unknown;
  genre: string | null;
  instrument: string | null;
  tags: string[] | null;
  rating: number | null;
  created_by: string | null;
  created_at: Date | null;
};

type ScoredPluginChainRow = PluginChainRow & {
  similarity: number | string | null;
};

const CHAIN_COLUMNS = `
  id,
  name,
  description,
  plugins,
  genre,
  instrument,
  tags,
  rating,
  created_by,
  created_at
`;

const PluginListSchema = z.array(PluginSchema);

function toPlugins(chainId: number, raw: unknown): Plugin[] {
  const parsed = PluginListSchema.safeParse(raw);

  if (!parsed.success) {
    logger.log("warn", "CHAIN_PLUGINS_INVALID", {
      chainId,
      issues: parsed.error.issues.length,
    });
    return [];
  }

  return sortPlugins(parsed.data);
}

export function mapChainRow(row: PluginChainRow): PluginChain {
  return {
    id: row.id,
    name: row.name,
    description: row.description ?? "",
    plugins: toPlugins(row.id, row.plugins),
    genre: row.genre,
    instrument: row.instrument,
    tags: row.tags ?? [],
    rating: row.rating,
    created_by: row.created_by,
    created_at: row.created_at ? row.created_at.toISOString() : null,
  };
}

export function escapeLikePattern(value: string): string {
  return value.replace(/[\\%_]/g, "\\$&");
}

/**
 * Builds the WHERE clause for filtered similarity search. Parameters $1 and
 * $2 are reserved for the query vector and the limit.
 */
export function buildChainFilterClause(filters: ChainSearchFilters = {}): {
  clause: string;
  params: string[];
} {
  const conditions = ["embedding IS NOT NULL"];
  const params: string[] = [];

  const genre = filters.genre?.trim();
  if (genre) {
    params.push(`%${escapeLikePattern(genre)}%`);
    conditions.push(`genre ILIKE $${params.length + 2}`);
  }

  const instrument = filters.instrument?.trim();
  if (instrument) {
    params.push(`%${escapeLikePattern(instrument)}%`);
    conditions.push(`instrument ILIKE $${params.length + 2}`);
  }

  return { clause: `WHERE ${conditions.join(" AND ")}`, params };
}

function chainValues(chain: PluginChainInput, embedding: number[]): unknown[] {
  return [
    chain.name,
    chain.description,
    JSON.stringify(sortPlugins(chain.plugins)),
    chain.genre ?? null,
    chain.instrument ?? null,
    chain.tags,
    chain.rating ?? null,
    chain.created_by ?? null,
    toPgVectorLiteral(embedding),
  ];
}

/**
 * Postgres + pgvector implementation of the PluginChainRepository port.
 * Similarity is cosine: `1 - (embedding <=> query)`, ordered by the
 * operator so the HNSW index can serve the scan.
 */
export class PgVectorPluginChainRepository implements PluginChainRepository {
  async insert(chain: PluginChainInput, embedding: number[]): Promise<number> {
    const result = await pool.query<{ id: number }>(
      `
      INSERT INTO plugin_chains
        (name, description, plugins, genre, instrument, tags, rating, created_by, embedding)
      VALUES ($1, $2, $3::jsonb, $4, $5, $6, $7, $8, $9::vector)
      RETURNING id;
      `,
      chainValues(chain, embedding)
    );

    const inserted = result.rows[0];
    if (!inserted) {
      throw new Error("Plugin chain insert returned no id");
    }
    return inserted.id;
  }

  async update(
    id: number,
    chain: PluginChainInput,
    embedding: number[]
  ): Promise<boolean> {
    const result = await pool.query(
      `
      UPDATE plugin_chains
      SET
        name = $1,
        description = $2,
        plugins = $3::jsonb,
        genre = $4,
        instrument = $5,
        tags = $6,
        rating = $7,
        created_by = $8,
        embedding = $9::vector
      WHERE id = $10;
      `,
      [...chainValues(chain, embedding), id]
    );

    return (result.rowCount ?? 0) > 0;
  }

  async remove(id: number): Promise<boolean> {
    const result = await pool.query("DELETE FROM plugin_chains WHERE id = $1;", [
      id,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  async findById(id: number): Promise<PluginChain | null> {
    const result = await pool.query<PluginChainRow>(
      `SELECT ${CHAIN_COLUMNS} FROM plugin_chains WHERE id = $1;`,
      [id]
    );

    const row = result.rows[0];
    return row ? mapChainRow(row) : null;
  }

  async list(limit: number, offset: number): Promise<ChainPage> {
    const [rows, count] = await Promise.all([
      pool.query<PluginChainRow>(
        `
        SELECT ${CHAIN_COLUMNS}
        FROM plugin_chains
        ORDER BY created_at DESC, id DESC
        LIMIT $1 OFFSET $2;
        `,
        [limit, offset]
      ),
      pool.query<{ total: number }>(
        "SELECT COUNT(*)::int AS total FROM plugin_chains;"
      ),
    ]);

    return {
      results: rows.rows.map(mapChainRow),
      total: count.rows[0]?.total ?? 0,
    };
  }

  async searchByEmbedding(
    queryEmbedding: number[],
    limit: number,
    filters: ChainSearchFilters = {}
  ): Promise<ScoredPluginChain[]> {
    const { clause, params } = buildChainFilterClause(filters);

    const result = await pool.query<ScoredPluginChainRow>(
      `
      SELECT
        ${CHAIN_COLUMNS},
        1 - (embedding <=> $1::vector) AS similarity
      FROM plugin_chains
      ${clause}
      ORDER BY embedding <=> $1::vector
      LIMIT $2;
      `,
      [toPgVectorLiteral(queryEmbedding), limit, ...params]
    );

    return result.rows.map((row) => ({
      chain: mapChainRow(row),
      similarity_score: toSimilarity(row.similarity),
    }));
  }
}

export const pluginChainRepository: PluginChainRepository =
  new PgVectorPluginChainRepository();

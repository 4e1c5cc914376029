import { config } from "@config/index";
import { pool } from "@infrastructure/database/db";
import { logEvent } from "@infrastructure/logging/Logger";

/**
 * Idempotent DDL for the two vector tables. The embedding width is baked into
 * the column type, so it must match EMBEDDING_DIMENSIONS.
 */
export function buildSchemaStatements(dimensions: number): string[] {
  if (!Number.isInteger(dimensions) || dimensions <= 0) {
    throw new Error(`Invalid embedding dimensions: ${dimensions}`);
  }

  return [
    "CREATE EXTENSION IF NOT EXISTS vector;",
    `
    CREATE TABLE IF NOT EXISTS plugin_chains (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) NOT NULL,
      description TEXT,
      plugins JSONB NOT NULL DEFAULT '[]'::jsonb,
      genre VARCHAR(100),
      instrument VARCHAR(100),
      tags TEXT[] NOT NULL DEFAULT '{}',
      rating FLOAT,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      created_by VARCHAR(100),
      embedding vector(${dimensions})
    );
    `,
    `
    CREATE TABLE IF NOT EXISTS document_chunks (
      id SERIAL PRIMARY KEY,
      content TEXT NOT NULL,
      embedding vector(${dimensions}),
      metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
      source VARCHAR(500),
      chunk_index INTEGER NOT NULL DEFAULT 0,
      created_at TIMESTAMPTZ DEFAULT NOW()
    );
    `,
    `
    CREATE INDEX IF NOT EXISTS plugin_chains_embedding_idx
    ON plugin_chains USING hnsw (embedding vector_cosine_ops);
    `,
    `
    CREATE INDEX IF NOT EXISTS document_chunks_embedding_idx
    ON document_chunks USING hnsw (embedding vector_cosine_ops);
    `,
  ];
}

export async function initializeTables(): Promise<void> {
  const statements = buildSchemaStatements(config.openai.embeddingDimensions);
  const client = await pool.connect();

  try {
    await client.query("BEGIN");
    for (const statement of statements) {
      await client.query(statement);
    }
    await client.query("COMMIT");
  } catch (error: unknown) {
    await client.query("ROLLBACK");
    throw error;
  } finally {
    client.release();
  }

  logEvent("DB_SCHEMA_READY", {
    dimensions: config.openai.embeddingDimensions,
    statements: statements.length,
  });
}

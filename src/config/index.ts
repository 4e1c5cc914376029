/**
 * Centralized configuration for the plugin chain RAG service.
 *
 * Values come from the environment (optionally a local .env file) and are
 * resolved once at startup:
 * - OpenAI-compatible API settings (completion model, embedding model, timeouts)
 * - PostgreSQL connection, either a DATABASE_URL or discrete DB_* parts
 * - Retrieval tuning (similarity floor, knowledge-base depth)
 * - HTTP port and logging
 */
import dotenv from "dotenv";

dotenv.config();

const openaiKey = process.env.OPENAI_API_KEY;

if (!openaiKey) {
  throw new Error(
    "OPENAI_API_KEY is missing. Please set it in your .env file."
  );
}

export const config = {
  openai: {
    key: openaiKey,
    model: process.env.OPENAI_MODEL || "gpt-4o-mini",
    embeddingModel:
      process.env.OPENAI_EMBEDDING_MODEL || "text-embedding-3-small",
    embeddingDimensions: Number(process.env.EMBEDDING_DIMENSIONS || 1536),
    baseUrl: process.env.OPENAI_BASE_URL || undefined,
    timeoutMs: Number(process.env.OPENAI_TIMEOUT_MS || 30000),
  },

  db: {
    connectionString: process.env.DATABASE_URL || undefined,
    host: process.env.DB_HOST || "localhost",
    port: Number(process.env.DB_PORT || 5432),
    user: process.env.DB_USER,
    password: process.env.DB_PASSWORD,
    database: process.env.DB_NAME,
    max: Number(process.env.DB_POOL_MAX || 10),
    idleTimeoutMs: Number(process.env.DB_IDLE_TIMEOUT_MS || 30000),
    connectionTimeoutMs: Number(process.env.DB_CONN_TIMEOUT_MS || 10000),
  },

  port: Number(process.env.PORT || 8000),

  rag: {
    minSimilarity: Number(process.env.RAG_MIN_SIMILARITY || 0),
    knowledgeTopK: Number(process.env.RAG_KNOWLEDGE_TOP_K || 3),
    maxResultsLimit: 20,
  },

  observability: {
    logLevel: process.env.LOG_LEVEL || "info",
    logFile: process.env.LOG_FILE ?? "logs/app.log",
  },
} as const;

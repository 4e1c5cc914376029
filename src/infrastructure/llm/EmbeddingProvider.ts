/**
 * Text-to-vector conversion for chain and knowledge search.
 *
 * Every vector is checked against EMBEDDING_DIMENSIONS before it leaves this
 * module; a mismatch would otherwise only surface as a pgvector error at
 * insert time.
 */
import { config } from "@config/index";
import { client } from "@infrastructure/llm/OpenAIAdapter";
import { withRetry } from "@infrastructure/llm/retry";
import { logEvent } from "@infrastructure/logging/Logger";
import {
  StatusCodeError,
  messageOf,
  toUpstreamError,
} from "@typesLocal/StatusCodeError";
import { assertDimensions } from "@utils/vector";

// Only the text-embedding-3 family accepts a requested output width.
export function supportsDimensionsParam(model: string): boolean {
  return model.startsWith("text-embedding-3");
}

function embeddingRequest(input: string | string[]) {
  const { embeddingModel, embeddingDimensions } = config.openai;
  return {
    model: embeddingModel,
    input,
    ...(supportsDimensionsParam(embeddingModel)
      ? { dimensions: embeddingDimensions }
      : {}),
  };
}

function checkVector(vector: number[] | undefined): number[] {
  if (!vector || vector.length === 0) {
    throw new StatusCodeError("Embedding API returned invalid data", 502);
  }
  try {
    assertDimensions(vector, config.openai.embeddingDimensions);
  } catch (error: unknown) {
    throw new StatusCodeError(messageOf(error), 502);
  }
  return vector;
}

export async function embedText(text: string): Promise<number[]> {
  const normalized = text.trim();

  if (!normalized) {
    throw new StatusCodeError("Cannot embed empty text", 400);
  }

  const startedAt = Date.now();

  try {
    const response = await withRetry(
      () => client.embeddings.create(embeddingRequest(normalized)),
      "embeddings.create.single"
    );

    const vector = checkVector(response.data[0]?.embedding);

    logEvent("EMBEDDING_SUCCESS", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      inputLength: normalized.length,
      vectorLength: vector.length,
    });

    return vector;
  } catch (error: unknown) {
    logEvent("EMBEDDING_FAILURE", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      message: messageOf(error),
    });

    throw toUpstreamError(error, "Embedding request failed");
  }
}

/**
 * Embeds several texts in one request. The result is index-aligned with the
 * input, so blank entries are rejected rather than skipped.
 */
export async function embedBatch(texts: string[]): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }

  const normalized = texts.map((t) => t.trim());
  if (normalized.some((t) => t.length === 0)) {
    throw new StatusCodeError("Cannot embed empty text", 400);
  }

  const startedAt = Date.now();

  try {
    const response = await withRetry(
      () => client.embeddings.create(embeddingRequest(normalized)),
      "embeddings.create.batch"
    );

    if (response.data.length !== normalized.length) {
      throw new StatusCodeError(
        `Embedding API returned ${response.data.length} vectors for ${normalized.length} inputs`,
        502
      );
    }

    const vectors = [...response.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => checkVector(item.embedding));

    logEvent("EMBEDDING_BATCH_SUCCESS", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      batchSize: normalized.length,
      vectorLength: vectors[0]?.length ?? 0,
    });

    return vectors;
  } catch (error: unknown) {
    logEvent("EMBEDDING_BATCH_FAILURE", {
      model: config.openai.embeddingModel,
      durationMs: Date.now() - startedAt,
      batchSize: normalized.length,
      message: messageOf(error),
    });

    throw toUpstreamError(error, "Batch embedding request failed");
  }
}

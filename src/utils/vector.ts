/**
 * pgvector helpers.
 *
 * Embeddings travel to Postgres as the textual vector literal `[v1,v2,...]`
 * and are cast with `::vector` inside the SQL.
 */
export function toPgVectorLiteral(vector: number[]): string {
  if (!Array.isArray(vector)) {
    throw new TypeError("toPgVectorLiteral expected an array");
  }

  if (vector.length === 0) {
    throw new Error("toPgVectorLiteral received an empty vector");
  }

  if (!vector.every((v) => Number.isFinite(v))) {
    throw new Error("toPgVectorLiteral received a non-finite value");
  }

  return `[${vector.join(",")}]`;
}

export function assertDimensions(vector: number[], expected: number): void {
  if (vector.length !== expected) {
    throw new Error(
      `Embedding has ${vector.length} dimensions, expected ${expected}`
    );
  }
}

/**
 * Similarity columns computed as `1 - (embedding <=> $1::vector)` come back
 * as float8 numbers, but NUMERIC casts arrive as strings. Both are accepted.
 */
export function toSimilarity(value: unknown): number {
  const numeric = typeof value === "string" ? Number(value) : value;
  return typeof numeric === "number" && Number.isFinite(numeric) ? numeric : 0;
}

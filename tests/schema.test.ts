import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  buildSchemaStatements,
  initializeTables,
} from "@infrastructure/database/schema";

const { connect } = vi.hoisted(() => ({ connect: vi.fn() }));

vi.mock("@infrastructure/database/db", () => ({
  pool: { connect },
}));

function fakeClient(failOn?: string) {
  const client = {
    query: vi.fn((sql: string) =>
      failOn && sql.includes(failOn)
        ? Promise.reject(new Error("permission denied"))
        : Promise.resolve({ rows: [] })
    ),
    release: vi.fn(),
  };
  connect.mockResolvedValue(client);
  return client;
}

beforeEach(() => {
  vi.resetAllMocks();
});

describe("buildSchemaStatements", () => {
  it("sizes both vector columns to the embedding width", () => {
    const statements = buildSchemaStatements(768);

    expect(statements).toHaveLength(5);
    expect(statements[0]).toBe("CREATE EXTENSION IF NOT EXISTS vector;");
    expect(statements[1]).toContain("embedding vector(768)");
    expect(statements[2]).toContain("embedding vector(768)");
    expect(statements[3]).toContain(
      "ON plugin_chains USING hnsw (embedding vector_cosine_ops)"
    );
  });

  it("rejects a non-positive width", () => {
    expect(() => buildSchemaStatements(0)).toThrow(
      "Invalid embedding dimensions: 0"
    );
  });
});

describe("initializeTables", () => {
  it("runs the DDL in one transaction", async () => {
    const client = fakeClient();

    await initializeTables();

    const calls = client.query.mock.calls.map(([sql]) => sql);
    expect(calls[0]).toBe("BEGIN");
    expect(calls[calls.length - 1]).toBe("COMMIT");
    expect(calls).toHaveLength(7);
    expect(client.release).toHaveBeenCalledTimes(1);
  });

  it("rolls back and rethrows on failure", async () => {
    const client = fakeClient("CREATE EXTENSION");

    await expect(initializeTables()).rejects.toThrow("permission denied");

    const calls = client.query.mock.calls.map(([sql]) => sql);
    expect(calls).toEqual([
      "BEGIN",
      "CREATE EXTENSION IF NOT EXISTS vector;",
      "ROLLBACK",
    ]);
    expect(client.release).toHaveBeenCalledTimes(1);
  });
});

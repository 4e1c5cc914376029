import { once } from "events";
import type { Server } from "http";

import {
  afterAll,
  beforeAll,
  beforeEach,
  describe,
  expect,
  it,
  vi,
} from "vitest";

import { z } from "zod";

import { createApp } from "@interfaces/http/app";

import { makeChainInput } from "./helpers/fixtures";

const { query, pingDatabase, embedText, callLLM } = vi.hoisted(() => ({
  query: vi.fn(),
  pingDatabase: vi.fn(),
  embedText: vi.fn(),
  callLLM: vi.fn(),
}));

vi.mock("@infrastructure/database/db", () => ({
  pool: { query, connect: vi.fn() },
  pingDatabase,
  closePool: vi.fn(),
}));

vi.mock("@infrastructure/llm/EmbeddingProvider", () => ({
  embedText,
  embedBatch: vi.fn(),
}));

vi.mock("@infrastructure/llm/OpenAIAdapter", () => ({
  llmPort: { callLLM },
}));

let server: Server;
let baseUrl = "";

beforeAll(async () => {
  server = createApp().listen(0);
  await once(server, "listening");

  const address = server.address();
  if (!address || typeof address === "string") {
    throw new Error("server did not bind to a TCP port");
  }
  baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
    })
);

beforeEach(() => {
  vi.resetAllMocks();
  embedText.mockResolvedValue([0.1, 0.2]);
});

const ErrorEnvelopeSchema = z.object({
  error: z.object({
    message: z.string(),
    code: z.string(),
    details: z.unknown(),
  }),
});

async function errorOf(res: Response) {
  return ErrorEnvelopeSchema.parse(await res.json()).error;
}

function postJson(pathname: string, body: unknown): Promise<Response> {
  return fetch(`${baseUrl}${pathname}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("GET /", () => {
  it("describes the API", async () => {
    const res = await fetch(`${baseUrl}/`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      message: "Audio Plugin RAG API",
      version: "1.0.0",
    });
  });
});

describe("GET /api/v1/health", () => {
  it("reports a reachable database", async () => {
    pingDatabase.mockResolvedValue(undefined);

    const res = await fetch(`${baseUrl}/api/v1/health`);

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      status: "healthy",
      database: "connected",
      timestamp: expect.any(Number),
    });
  });

  it("answers 503 when the database is down", async () => {
    pingDatabase.mockRejectedValue(new Error("connection refused"));

    const res = await fetch(`${baseUrl}/api/v1/health`);

    expect(res.status).toBe(503);
    expect(await res.json()).toMatchObject({
      status: "unhealthy",
      database: "disconnected",
      detail: "connection refused",
    });
  });
});

describe("POST /api/v1/chains", () => {
  it("stores a valid chain", async () => {
    query.mockResolvedValue({ rows: [{ id: 42 }] });

    const res = await postJson("/api/v1/chains", makeChainInput());

    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({
      id: 42,
      message: "Plugin chain added successfully",
    });
    expect(embedText).toHaveBeenCalledWith(
      "Vocal Chain Warm vocal processing vocal pop vocals"
    );
  });

  it("rejects a chain without plugins", async () => {
    const res = await postJson(
      "/api/v1/chains",
      makeChainInput({ plugins: [] })
    );

    expect(res.status).toBe(400);
    expect(await errorOf(res)).toMatchObject({
      code: "ValidationError",
      message: "Invalid request",
    });
    expect(query).not.toHaveBeenCalled();
  });
});

describe("/api/v1/chains/:id", () => {
  it("rejects non-numeric ids", async () => {
    const res = await fetch(`${baseUrl}/api/v1/chains/abc`);

    expect(res.status).toBe(400);
  });

  it("rejects ids beyond the integer column range", async () => {
    const res = await fetch(`${baseUrl}/api/v1/chains/3000000000`);

    expect(res.status).toBe(400);
    expect(query).not.toHaveBeenCalled();
  });

  it("answers 404 for an unknown chain", async () => {
    query.mockResolvedValue({ rows: [] });

    const res = await fetch(`${baseUrl}/api/v1/chains/5`);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: {
        message: "Plugin chain 5 not found",
        code: "NotFoundError",
        details: {},
      },
    });
  });
});

describe("GET /api/v1/chains/search", () => {
  it("requires q", async () => {
    const res = await fetch(`${baseUrl}/api/v1/chains/search`);

    expect(res.status).toBe(400);
    expect(embedText).not.toHaveBeenCalled();
  });

  it("passes filters to the similarity query", async () => {
    query.mockResolvedValue({ rows: [] });

    const res = await fetch(
      `${baseUrl}/api/v1/chains/search?q=big%20drums&genre=rock&limit=3`
    );

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ results: [], total: 0 });
    expect(embedText).toHaveBeenCalledWith("big drums");
    expect(query.mock.calls[0]?.[1]).toEqual(["[0.1,0.2]", 3, "%rock%"]);
  });

  it("rejects a limit above the configured maximum", async () => {
    const res = await fetch(`${baseUrl}/api/v1/chains/search?q=drums&limit=21`);

    expect(res.status).toBe(400);
    expect(embedText).not.toHaveBeenCalled();
  });
});

describe("POST /api/v1/query", () => {
  it("rejects empty query text without embedding", async () => {
    const res = await postJson("/api/v1/query", { text: "   " });

    expect(res.status).toBe(400);
    expect((await errorOf(res)).code).toBe("ValidationError");
    expect(embedText).not.toHaveBeenCalled();
  });

  it("rejects malformed JSON", async () => {
    const res = await fetch(`${baseUrl}/api/v1/query`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{bad",
    });

    expect(res.status).toBe(400);
  });

  it("returns an empty recommendation list when no chain matches", async () => {
    query.mockResolvedValue({ rows: [] });

    const res = await postJson("/api/v1/query", {
      text: "glassy synth pads",
      genre: "ambient",
    });
    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      recommendations: [],
      query_context: "Query: glassy synth pads | Genre: ambient",
      total_results: 0,
      additional_tips: null,
    });
    expect(callLLM).not.toHaveBeenCalled();
  });
});

describe("unknown routes", () => {
  it("answer 404 in the error envelope", async () => {
    const res = await fetch(`${baseUrl}/api/v1/nope`);

    expect(res.status).toBe(404);
    expect((await errorOf(res)).code).toBe("NotFoundError");
  });
});

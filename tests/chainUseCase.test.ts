import { beforeEach, describe, expect, it, vi } from "vitest";

import {
  addChain,
  deleteChain,
  getChain,
  listChains,
  updateChain,
} from "@app/chains/ChainUseCase";

import { makeChain, makeChainInput } from "./helpers/fixtures";

const { embedText, repository } = vi.hoisted(() => ({
  embedText: vi.fn(),
  repository: {
    insert: vi.fn(),
    update: vi.fn(),
    remove: vi.fn(),
    findById: vi.fn(),
    list: vi.fn(),
  },
}));

vi.mock("@infrastructure/llm/EmbeddingProvider", () => ({ embedText }));

vi.mock("@infrastructure/database/PgVectorPluginChainRepository", () => ({
  pluginChainRepository: repository,
}));

const vector = [0.3, 0.1];

beforeEach(() => {
  vi.resetAllMocks();
  embedText.mockResolvedValue(vector);
});

describe("addChain", () => {
  it("embeds the chain text and returns the new id", async () => {
    repository.insert.mockResolvedValue(12);
    const input = makeChainInput();

    const result = await addChain(input);

    expect(embedText).toHaveBeenCalledWith(
      "Vocal Chain Warm vocal processing vocal pop vocals"
    );
    expect(repository.insert).toHaveBeenCalledWith(input, vector);
    expect(result).toEqual({
      id: 12,
      message: "Plugin chain added successfully",
    });
  });
});

describe("updateChain", () => {
  it("returns 404 for a missing chain without embedding", async () => {
    repository.findById.mockResolvedValue(null);

    await expect(updateChain(5, makeChainInput())).rejects.toMatchObject({
      statusCode: 404,
      message: "Plugin chain 5 not found",
    });
    expect(embedText).not.toHaveBeenCalled();
  });

  it("re-embeds and replaces an existing chain", async () => {
    repository.findById.mockResolvedValue(makeChain({ id: 5 }));
    repository.update.mockResolvedValue(true);
    const input = makeChainInput({ name: "Brighter Vocal", tags: [] });

    const result = await updateChain(5, input);

    expect(embedText).toHaveBeenCalledWith(
      "Brighter Vocal Warm vocal processing  pop vocals"
    );
    expect(repository.update).toHaveBeenCalledWith(5, input, vector);
    expect(result).toEqual({
      id: 5,
      message: "Plugin chain updated successfully",
    });
  });
});

describe("deleteChain", () => {
  it("returns 404 when nothing was removed", async () => {
    repository.remove.mockResolvedValue(false);

    await expect(deleteChain(8)).rejects.toMatchObject({ statusCode: 404 });
  });

  it("confirms the deletion", async () => {
    repository.remove.mockResolvedValue(true);

    expect(await deleteChain(8)).toEqual({
      id: 8,
      message: "Plugin chain deleted successfully",
    });
  });
});

describe("getChain and listChains", () => {
  it("returns a stored chain", async () => {
    const chain = makeChain({ id: 3 });
    repository.findById.mockResolvedValue(chain);

    expect(await getChain(3)).toBe(chain);
  });

  it("passes paging through", async () => {
    repository.list.mockResolvedValue({ results: [], total: 0 });

    expect(await listChains(20, 40)).toEqual({ results: [], total: 0 });
    expect(repository.list).toHaveBeenCalledWith(20, 40);
  });
});

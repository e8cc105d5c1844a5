import { describe, expect, it } from "vitest";
import { loadConfig } from "../src/config/env.js";
import { ProviderError } from "../src/domain/errors.js";
import {
  DefaultEmbeddingProvider,
  createEmbeddingProvider,
} from "../src/infra/ai/defaultEmbeddingProvider.js";
import type { EmbeddingClient } from "../src/infra/ai/types.js";
import { jsonResponse, stubFetch } from "./support/stubs.js";

describe("createEmbeddingProvider", () => {
  it("sends OpenAI batches with the configured dimension and restores input order", async () => {
    const { fetchImpl, requests } = stubFetch({
      "https://api.openai.com/v1/embeddings": () =>
        jsonResponse({
          data: [
            { index: 1, embedding: [0, 1] },
            { index: 0, embedding: [1, 0] },
          ],
        }),
    });
    const provider = createEmbeddingProvider(
      loadConfig({ OPENAI_API_KEY: "test-secret", VECTOR_DIMENSION: "2" }),
      fetchImpl,
    );

    expect(await provider.embedMany(["first", "second"])).toEqual([
      [1, 0],
      [0, 1],
    ]);
    expect(requests[0].headers.authorization).toBe("Bearer test-secret");
    expect(requests[0].body).toEqual({
      model: "text-embedding-3-small",
      input: ["first", "second"],
      dimensions: 2,
    });
  });

  it("embeds one prompt per Ollama request", async () => {
    const { fetchImpl, requests } = stubFetch({
      "http://ollama.test/api/embeddings": (request) => {
        const prompt =
          typeof request.body === "object" && request.body !== null && "prompt" in request.body
            ? String(request.body.prompt)
            : "";
        return jsonResponse({ embedding: [prompt.length, 1] });
      },
    });
    const provider = createEmbeddingProvider(
      loadConfig({ OLLAMA_BASE_URL: "http://ollama.test", VECTOR_DIMENSION: "2" }),
      fetchImpl,
    );

    expect(await provider.embedMany(["a", "abc"])).toEqual([
      [1, 1],
      [3, 1],
    ]);
    expect(await provider.embed("ab")).toEqual([2, 1]);
    expect(requests).toHaveLength(3);
  });

  it("wraps HTTP failures in ProviderError", async () => {
    const { fetchImpl } = stubFetch({
      "http://ollama.test/": () => new Response("model not found", { status: 404 }),
    });
    const provider = createEmbeddingProvider(
      loadConfig({ OLLAMA_BASE_URL: "http://ollama.test", VECTOR_DIMENSION: "2" }),
      fetchImpl,
    );

    const failure = provider.embed("hello");
    await expect(failure).rejects.toBeInstanceOf(ProviderError);
    await expect(failure).rejects.toThrow(
      "Ollama embedding failed: Ollama embeddings failed (404): model not found",
    );
  });
});

describe("DefaultEmbeddingProvider", () => {
  const fixedClient = (vectors: number[][]): EmbeddingClient => ({
    embedTexts: async () => vectors,
    embedQuery: async () => vectors[0] ?? [],
  });

  it("rejects vectors of the wrong width", async () => {
    const provider = new DefaultEmbeddingProvider(fixedClient([[1, 2, 3]]), 2, "Test");

    await expect(provider.embed("x")).rejects.toThrow(
      "Test returned a 3-dimensional embedding; expected 2.",
    );
  });

  it("rejects a batch with a missing vector", async () => {
    const provider = new DefaultEmbeddingProvider(fixedClient([[1, 2]]), 2, "Test");

    await expect(provider.embedMany(["x", "y"])).rejects.toThrow(
      "Test returned 1 embeddings for 2 inputs.",
    );
    expect(await provider.embedMany([])).toEqual([]);
  });
});

import type { AppConfig } from "../../config/env.js";
import { ProviderError, describeError } from "../../domain/errors.js";
import { OllamaClient } from "./ollamaClient.js";
import { OpenAiClient } from "./openAiClient.js";
import type { EmbeddingClient, EmbeddingProvider, FetchLike } from "./types.js";

/**
 * Embedding provider backed by one remote client. Every failure and every
 * vector whose length differs from the configured dimension is reported as a
 * ProviderError.
 */
export class DefaultEmbeddingProvider implements EmbeddingProvider {
  constructor(
    private readonly client: EmbeddingClient,
    readonly dimension: number,
    private readonly label: string,
  ) {}

  async embed(text: string): Promise<number[]> {
    const vector = await this.call(() => this.client.embedQuery(text));
    this.assertDimension(vector);
    return vector;
  }

  async embedMany(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const vectors = await this.call(() => this.client.embedTexts(texts));
    if (vectors.length !== texts.length) {
      throw new ProviderError(
        `${this.label} returned ${vectors.length} embeddings for ${texts.length} inputs.`,
      );
    }
    for (const vector of vectors) {
      this.assertDimension(vector);
    }
    return vectors;
  }

  private async call<T>(task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      throw new ProviderError(`${this.label} embedding failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  private assertDimension(vector: number[]): void {
    if (vector.length !== this.dimension) {
      throw new ProviderError(
        `${this.label} returned a ${vector.length}-dimensional embedding; expected ${this.dimension}.`,
      );
    }
  }
}

export function createEmbeddingProvider(
  config: AppConfig,
  fetchImpl?: FetchLike,
): EmbeddingProvider {
  if (config.embeddingProvider === "openai") {
    return new DefaultEmbeddingProvider(
      new OpenAiClient({
        apiKey: config.openaiApiKey,
        embeddingModel: config.embeddingModel,
        dimensions: config.vectorDimension,
        fetchImpl,
      }),
      config.vectorDimension,
      "OpenAI",
    );
  }

  return new DefaultEmbeddingProvider(
    new OllamaClient({
      baseUrl: config.ollamaBaseUrl,
      embeddingModel: config.ollamaEmbeddingModel,
      fetchImpl,
    }),
    config.vectorDimension,
    "Ollama",
  );
}

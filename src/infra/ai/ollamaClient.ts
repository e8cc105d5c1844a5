import type { EmbeddingClient, FetchLike } from "./types.js";

interface OllamaClientOptions {
  baseUrl: string;
  embeddingModel: string;
  fetchImpl?: FetchLike;
}

interface OllamaEmbeddingsResponse {
  embedding?: number[];
}

const EMBEDDING_CONCURRENCY = 4;

export class OllamaClient implements EmbeddingClient {
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: OllamaClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const workers = Math.min(EMBEDDING_CONCURRENCY, texts.length);
    const embeddings: number[][] = new Array(texts.length);
    let cursor = 0;

    const runWorker = async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= texts.length) {
          return;
        }
        embeddings[index] = await this.embedQuery(texts[index]);
      }
    };

    await Promise.all(Array.from({ length: workers }, () => runWorker()));
    return embeddings;
  }

  async embedQuery(query: string): Promise<number[]> {
    const response = await this.fetchImpl(`${this.options.baseUrl}/api/embeddings`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify({
        model: this.options.embeddingModel,
        prompt: query,
      }),
    });

    if (!response.ok) {
      throw new Error(
        `Ollama embeddings failed (${response.status}): ${await response.text()}`,
      );
    }

    const data = (await response.json()) as OllamaEmbeddingsResponse;
    if (!data.embedding || data.embedding.length === 0) {
      throw new Error("Ollama embeddings returned empty vector.");
    }
    return data.embedding;
  }
}

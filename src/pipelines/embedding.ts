import type { CreateDocumentInput } from "../domain/contentStore.js";
import { ProviderError, ValidationError } from "../domain/errors.js";
import type { EmbeddingProvider } from "../infra/ai/types.js";
import { truncate } from "../utils/text.js";

export const MAX_TITLE_CHARS = 200;

export interface EmbeddedChunk {
  index: number;
  content: string;
  embedding: number[];
}

export interface EmbeddedDocument {
  input: CreateDocumentInput;
  embedding: number[];
  chunks: EmbeddedChunk[];
}

export interface EmbedDocumentOptions {
  dimension: number;
  documentEmbeddingMaxChars: number;
}

/**
 * Validates a document write and computes every embedding it needs. Runs
 * before a store touches any row, so a failure here leaves nothing behind.
 */
export async function embedDocument(
  provider: EmbeddingProvider,
  input: CreateDocumentInput,
  options: EmbedDocumentOptions,
): Promise<EmbeddedDocument> {
  const title = truncate(input.title.trim(), MAX_TITLE_CHARS);
  if (!title) {
    throw new ValidationError("Document title must not be empty.");
  }
  if (!input.content.trim()) {
    throw new ValidationError(`Document "${title}" has empty content.`);
  }

  const chunkTexts = input.chunkTexts
    .map((text) => text.trim())
    .filter((text) => text.length > 0);
  const representative = truncate(
    `${title}\n\n${input.content.trim()}`,
    options.documentEmbeddingMaxChars,
  );

  const vectors = await provider.embedMany([representative, ...chunkTexts]);
  if (vectors.length !== chunkTexts.length + 1) {
    throw new ProviderError(
      `Expected ${chunkTexts.length + 1} embeddings, received ${vectors.length}.`,
    );
  }
  for (const vector of vectors) {
    assertDimension(vector, options.dimension);
  }

  const [documentEmbedding, ...chunkEmbeddings] = vectors;
  return {
    input: { ...input, title, chunkTexts },
    embedding: documentEmbedding,
    chunks: chunkTexts.map((content, index) => ({
      index,
      content,
      embedding: chunkEmbeddings[index],
    })),
  };
}

export function assertDimension(vector: number[], dimension: number): void {
  if (vector.length !== dimension) {
    throw new ProviderError(
      `Embedding has ${vector.length} dimensions; the store is configured for ${dimension}.`,
    );
  }
}

import type { SearchScope, SearchTier } from "../domain/contentStore.js";
import { ValidationError } from "../domain/errors.js";
import type { FusedEntity } from "../domain/types.js";
import type { EmbeddingProvider } from "../infra/ai/types.js";
import { DEFAULT_RRF_RANK_CONSTANT, fuseByReciprocalRank } from "../pipelines/rankFusion.js";

export interface HybridRetrieverOptions {
  rankConstant?: number;
  oversampleFactor?: number;
}

export const DEFAULT_OVERSAMPLE_FACTOR = 3;

/**
 * Ranks one tier (documents or chunks) by fusing its vector ranking with its
 * lexical ranking. The caller decides which search spaces are visible.
 */
export class HybridRetriever<T extends { id: number }> {
  private readonly rankConstant: number;

  private readonly oversampleFactor: number;

  constructor(
    private readonly tier: SearchTier<T>,
    private readonly embeddingProvider: EmbeddingProvider,
    options: HybridRetrieverOptions = {},
  ) {
    this.rankConstant = options.rankConstant ?? DEFAULT_RRF_RANK_CONSTANT;
    this.oversampleFactor = options.oversampleFactor ?? DEFAULT_OVERSAMPLE_FACTOR;
  }

  async search(query: unknown, topK: number, scope: SearchScope = {}): Promise<FusedEntity<T>[]> {
    if (typeof query !== "string") {
      throw new ValidationError("Search query must be a string.");
    }
    if (!Number.isFinite(topK) || !Number.isInteger(topK)) {
      throw new ValidationError(`topK must be an integer, received ${topK}.`);
    }
    if (topK <= 0) {
      return [];
    }

    const queryEmbedding = await this.embeddingProvider.embed(query);
    const candidates = topK * this.oversampleFactor;

    const [vectorHits, lexicalHits] = await Promise.all([
      this.tier.vectorSearch(scope, queryEmbedding, candidates),
      query.trim() ? this.tier.lexicalSearch(scope, query, candidates) : Promise.resolve([]),
    ]);

    return fuseByReciprocalRank(vectorHits, lexicalHits, topK, this.rankConstant);
  }
}

import type { FusedEntity, RankedEntity } from "../domain/types.js";

export const DEFAULT_RRF_RANK_CONSTANT = 60;

interface FusionAccumulator<T> {
  entity: T;
  score: number;
  vectorRank: number | null;
  lexicalRank: number | null;
}

/**
 * Reciprocal Rank Fusion of a vector ranking and a lexical ranking. An
 * entity scores `1 / (rankConstant + rank)` for every list it appears in,
 * with 1-based ranks. Equal scores are ordered by id ascending.
 */
export function fuseByReciprocalRank<T extends { id: number }>(
  vectorHits: RankedEntity<T>[],
  lexicalHits: RankedEntity<T>[],
  topK: number,
  rankConstant: number = DEFAULT_RRF_RANK_CONSTANT,
): FusedEntity<T>[] {
  if (topK <= 0) {
    return [];
  }

  const fused = new Map<number, FusionAccumulator<T>>();
  const accumulate = (hits: RankedEntity<T>[], list: "vectorRank" | "lexicalRank") => {
    hits.forEach((hit, position) => {
      const id = hit.entity.id;
      const current = fused.get(id) ?? {
        entity: hit.entity,
        score: 0,
        vectorRank: null,
        lexicalRank: null,
      };
      // A list may repeat an id; only its best rank counts.
      if (current[list] !== null) {
        return;
      }
      const rank = position + 1;
      current[list] = rank;
      current.score += 1 / (rankConstant + rank);
      fused.set(id, current);
    });
  };

  accumulate(vectorHits, "vectorRank");
  accumulate(lexicalHits, "lexicalRank");

  return [...fused.values()]
    .sort((a, b) => b.score - a.score || a.entity.id - b.entity.id)
    .slice(0, topK)
    .map((item) => ({
      entity: item.entity,
      score: item.score,
      vectorRank: item.vectorRank,
      lexicalRank: item.lexicalRank,
    }));
}

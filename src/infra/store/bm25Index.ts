import { tokenize, tokenizeForBm25 } from "../../utils/text.js";

interface Bm25Entry {
  tf: Map<string, number>;
  length: number;
}

export interface Bm25Hit {
  id: number;
  score: number;
}

const K1 = 1.2;
const B = 0.75;

/**
 * Incremental BM25 inverted index keyed by numeric row id. Adding an id that
 * is already present replaces its entry; removing one drops every posting.
 */
export class Bm25Index {
  private readonly entries = new Map<number, Bm25Entry>();

  private readonly postings = new Map<string, Set<number>>();

  private totalLength = 0;

  get size(): number {
    return this.entries.size;
  }

  has(id: number): boolean {
    return this.entries.has(id);
  }

  add(id: number, text: string): void {
    this.remove(id);

    const tokens = tokenizeForBm25(text);
    if (tokens.length === 0) {
      return;
    }

    const tf = new Map<string, number>();
    for (const token of tokens) {
      tf.set(token, (tf.get(token) ?? 0) + 1);
    }

    for (const term of tf.keys()) {
      let ids = this.postings.get(term);
      if (!ids) {
        ids = new Set<number>();
        this.postings.set(term, ids);
      }
      ids.add(id);
    }

    this.entries.set(id, { tf, length: tokens.length });
    this.totalLength += tokens.length;
  }

  remove(id: number): void {
    const entry = this.entries.get(id);
    if (!entry) {
      return;
    }

    for (const term of entry.tf.keys()) {
      const ids = this.postings.get(term);
      if (!ids) {
        continue;
      }
      ids.delete(id);
      if (ids.size === 0) {
        this.postings.delete(term);
      }
    }

    this.entries.delete(id);
    this.totalLength -= entry.length;
  }

  search(query: string, k: number, accept: (id: number) => boolean): Bm25Hit[] {
    const queryTerms = tokenize(query);
    if (queryTerms.length === 0 || k <= 0 || this.entries.size === 0) {
      return [];
    }

    const documentCount = this.entries.size;
    const avgLength = this.totalLength / documentCount;
    const scores = new Map<number, number>();

    for (const term of queryTerms) {
      const ids = this.postings.get(term);
      if (!ids) {
        continue;
      }

      const df = ids.size;
      const idf = Math.log(1 + (documentCount - df + 0.5) / (df + 0.5));
      for (const id of ids) {
        if (!accept(id)) {
          continue;
        }
        const entry = this.entries.get(id);
        if (!entry) {
          continue;
        }
        const tf = entry.tf.get(term) ?? 0;
        const denominator = tf + K1 * (1 - B + B * (entry.length / Math.max(avgLength, 1e-9)));
        scores.set(id, (scores.get(id) ?? 0) + idf * ((tf * (K1 + 1)) / denominator));
      }
    }

    return [...scores.entries()]
      .map(([id, score]) => ({ id, score }))
      .sort((a, b) => b.score - a.score || a.id - b.id)
      .slice(0, k);
  }
}

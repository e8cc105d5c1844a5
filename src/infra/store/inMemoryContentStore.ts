import type {
  ContentStore,
  ContentStoreOptions,
  CreateDocumentInput,
  CreateSearchSpaceInput,
  ListDocumentsInput,
  ReplaceDocumentInput,
  SearchScope,
  SearchTier,
  UpdateSearchSpaceInput,
} from "../../domain/contentStore.js";
import { isScopeEmpty } from "../../domain/contentStore.js";
import { NotFoundError, ValidationError } from "../../domain/errors.js";
import type {
  ChunkRecord,
  ChunkSearchRecord,
  DocumentRecord,
  DocumentRef,
  RankedEntity,
  SearchSpaceRecord,
} from "../../domain/types.js";
import type { EmbeddedChunk } from "../../pipelines/embedding.js";
import { assertDimension, embedDocument } from "../../pipelines/embedding.js";
import { cosineDistance } from "../../utils/vector.js";
import type { EmbeddingProvider } from "../ai/types.js";
import { Bm25Index } from "./bm25Index.js";

interface StoredDocument {
  record: DocumentRecord;
  embedding: number[];
}

interface StoredChunk {
  record: ChunkRecord;
  embedding: number[];
}

interface VectorCandidate<T> {
  entity: T;
  id: number;
  searchSpaceId: number;
  embedding: number[];
}

/**
 * Content store held in process memory: exact cosine scan for vector search
 * and an incremental BM25 index for lexical search, kept for both documents
 * and chunks. Writes apply synchronously after all embeddings are computed,
 * so each document write is all-or-nothing.
 */
export class InMemoryContentStore implements ContentStore {
  readonly documents: SearchTier<DocumentRecord>;

  readonly chunks: SearchTier<ChunkSearchRecord>;

  private readonly spaces = new Map<number, SearchSpaceRecord>();

  private readonly documentRows = new Map<number, StoredDocument>();

  private readonly chunkRows = new Map<number, StoredChunk>();

  private readonly chunkIdsByDocument = new Map<number, number[]>();

  private readonly documentLexicalIndex = new Bm25Index();

  private readonly chunkLexicalIndex = new Bm25Index();

  private nextSpaceId = 1;

  private nextDocumentId = 1;

  private nextChunkId = 1;

  constructor(
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly options: ContentStoreOptions,
  ) {
    this.documents = {
      vectorSearch: async (scope, queryEmbedding, k) =>
        this.rankByVector(this.documentCandidates(), scope, queryEmbedding, k),
      lexicalSearch: async (scope, queryText, k) =>
        this.rankByLexical(
          this.documentLexicalIndex,
          (id) => this.documentRows.get(id)?.record,
          (record) => record.searchSpaceId,
          scope,
          queryText,
          k,
        ),
    };

    this.chunks = {
      vectorSearch: async (scope, queryEmbedding, k) =>
        this.rankByVector(this.chunkCandidates(), scope, queryEmbedding, k),
      lexicalSearch: async (scope, queryText, k) =>
        this.rankByLexical(
          this.chunkLexicalIndex,
          (id) => this.toChunkSearchRecord(id),
          (record) => record.document.searchSpaceId,
          scope,
          queryText,
          k,
        ),
    };
  }

  async createSearchSpace(
    ownerId: string,
    input: CreateSearchSpaceInput,
  ): Promise<SearchSpaceRecord> {
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError("Search space name must not be empty.");
    }

    const space: SearchSpaceRecord = {
      id: this.nextSpaceId,
      ownerId,
      name,
      description: input.description ?? null,
      createdAt: new Date().toISOString(),
    };
    this.nextSpaceId += 1;
    this.spaces.set(space.id, space);
    return { ...space };
  }

  async getSearchSpace(id: number): Promise<SearchSpaceRecord | null> {
    const space = this.spaces.get(id);
    return space ? { ...space } : null;
  }

  async listSearchSpaces(ownerId: string): Promise<SearchSpaceRecord[]> {
    return [...this.spaces.values()]
      .filter((space) => space.ownerId === ownerId)
      .sort((a, b) => a.id - b.id)
      .map((space) => ({ ...space }));
  }

  async updateSearchSpace(
    id: number,
    input: UpdateSearchSpaceInput,
  ): Promise<SearchSpaceRecord | null> {
    const space = this.spaces.get(id);
    if (!space) {
      return null;
    }
    if (input.name !== undefined) {
      const name = input.name.trim();
      if (!name) {
        throw new ValidationError("Search space name must not be empty.");
      }
      space.name = name;
    }
    if (input.description !== undefined) {
      space.description = input.description;
    }
    return { ...space };
  }

  async deleteSearchSpace(id: number): Promise<boolean> {
    if (!this.spaces.has(id)) {
      return false;
    }

    for (const stored of [...this.documentRows.values()]) {
      if (stored.record.searchSpaceId === id) {
        this.removeDocumentRows(stored.record.id);
      }
    }
    this.spaces.delete(id);
    return true;
  }

  async createDocumentWithChunks(input: CreateDocumentInput): Promise<number> {
    if (!this.spaces.has(input.searchSpaceId)) {
      throw new NotFoundError(`Search space ${input.searchSpaceId} not found.`);
    }

    const embedded = await embedDocument(this.embeddingProvider, input, this.options);

    // The space may have been deleted while embeddings were computed.
    if (!this.spaces.has(input.searchSpaceId)) {
      throw new NotFoundError(`Search space ${input.searchSpaceId} not found.`);
    }

    const createdAt = new Date().toISOString();
    const documentId = this.nextDocumentId;
    this.nextDocumentId += 1;

    const record: DocumentRecord = {
      id: documentId,
      searchSpaceId: embedded.input.searchSpaceId,
      title: embedded.input.title,
      documentType: embedded.input.documentType,
      metadata: { ...embedded.input.metadata },
      content: embedded.input.content,
      createdAt,
    };
    this.documentRows.set(documentId, { record, embedding: embedded.embedding });
    this.documentLexicalIndex.add(documentId, record.content);
    this.insertChunks(documentId, embedded.chunks, createdAt);

    return documentId;
  }

  async replaceDocument(id: number, input: ReplaceDocumentInput): Promise<boolean> {
    const current = this.documentRows.get(id);
    if (!current) {
      return false;
    }

    const embedded = await embedDocument(
      this.embeddingProvider,
      {
        ...input,
        searchSpaceId: current.record.searchSpaceId,
        documentType: current.record.documentType,
      },
      this.options,
    );

    const stored = this.documentRows.get(id);
    if (!stored) {
      return false;
    }

    this.removeChunkRows(id);
    stored.record = {
      ...stored.record,
      title: embedded.input.title,
      metadata: { ...embedded.input.metadata },
      content: embedded.input.content,
    };
    stored.embedding = embedded.embedding;
    this.documentLexicalIndex.add(id, stored.record.content);
    this.insertChunks(id, embedded.chunks, new Date().toISOString());
    return true;
  }

  async getDocument(id: number): Promise<DocumentRecord | null> {
    const stored = this.documentRows.get(id);
    return stored ? cloneDocument(stored.record) : null;
  }

  async listDocuments(input?: ListDocumentsInput): Promise<DocumentRecord[]> {
    const scope: SearchScope = { searchSpaceIds: input?.searchSpaceIds };
    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : undefined;

    const rows = [...this.documentRows.values()]
      .map((stored) => stored.record)
      .filter((record) => inScope(scope, record.searchSpaceId))
      .sort((a, b) => a.id - b.id)
      .map(cloneDocument);

    return limit ? rows.slice(0, limit) : rows;
  }

  async listChunks(documentId: number): Promise<ChunkRecord[]> {
    const ids = this.chunkIdsByDocument.get(documentId) ?? [];
    const rows: ChunkRecord[] = [];
    for (const id of ids) {
      const stored = this.chunkRows.get(id);
      if (stored) {
        rows.push({ ...stored.record });
      }
    }
    return rows.sort((a, b) => a.index - b.index);
  }

  async deleteDocument(id: number): Promise<boolean> {
    if (!this.documentRows.has(id)) {
      return false;
    }
    this.removeDocumentRows(id);
    return true;
  }

  async close(): Promise<void> {}

  private insertChunks(documentId: number, chunks: EmbeddedChunk[], createdAt: string): void {
    const chunkIds: number[] = [];
    for (const chunk of chunks) {
      const chunkId = this.nextChunkId;
      this.nextChunkId += 1;
      this.chunkRows.set(chunkId, {
        record: {
          id: chunkId,
          documentId,
          index: chunk.index,
          content: chunk.content,
          createdAt,
        },
        embedding: chunk.embedding,
      });
      this.chunkLexicalIndex.add(chunkId, chunk.content);
      chunkIds.push(chunkId);
    }
    this.chunkIdsByDocument.set(documentId, chunkIds);
  }

  private removeChunkRows(documentId: number): void {
    for (const chunkId of this.chunkIdsByDocument.get(documentId) ?? []) {
      this.chunkRows.delete(chunkId);
      this.chunkLexicalIndex.remove(chunkId);
    }
    this.chunkIdsByDocument.delete(documentId);
  }

  private removeDocumentRows(documentId: number): void {
    this.removeChunkRows(documentId);
    this.documentRows.delete(documentId);
    this.documentLexicalIndex.remove(documentId);
  }

  private *documentCandidates(): Iterable<VectorCandidate<DocumentRecord>> {
    for (const stored of this.documentRows.values()) {
      yield {
        entity: stored.record,
        id: stored.record.id,
        searchSpaceId: stored.record.searchSpaceId,
        embedding: stored.embedding,
      };
    }
  }

  private *chunkCandidates(): Iterable<VectorCandidate<ChunkSearchRecord>> {
    for (const stored of this.chunkRows.values()) {
      const entity = this.toChunkSearchRecord(stored.record.id);
      if (!entity) {
        continue;
      }
      yield {
        entity,
        id: stored.record.id,
        searchSpaceId: entity.document.searchSpaceId,
        embedding: stored.embedding,
      };
    }
  }

  private rankByVector<T>(
    candidates: Iterable<VectorCandidate<T>>,
    scope: SearchScope,
    queryEmbedding: number[],
    k: number,
  ): RankedEntity<T>[] {
    if (k <= 0 || isScopeEmpty(scope)) {
      return [];
    }
    assertDimension(queryEmbedding, this.options.dimension);

    const ranked: Array<{ id: number; distance: number; entity: T }> = [];
    for (const candidate of candidates) {
      if (!inScope(scope, candidate.searchSpaceId)) {
        continue;
      }
      ranked.push({
        id: candidate.id,
        distance: cosineDistance(queryEmbedding, candidate.embedding),
        entity: candidate.entity,
      });
    }

    return ranked
      .sort((a, b) => a.distance - b.distance || a.id - b.id)
      .slice(0, Math.floor(k))
      .map((item) => ({ entity: cloneEntity(item.entity), score: 1 - item.distance }));
  }

  private rankByLexical<T>(
    index: Bm25Index,
    resolve: (id: number) => T | undefined,
    searchSpaceOf: (entity: T) => number,
    scope: SearchScope,
    queryText: string,
    k: number,
  ): RankedEntity<T>[] {
    if (k <= 0 || isScopeEmpty(scope) || !queryText.trim()) {
      return [];
    }

    const accept = (id: number) => {
      const entity = resolve(id);
      return entity !== undefined && inScope(scope, searchSpaceOf(entity));
    };

    const ranked: RankedEntity<T>[] = [];
    for (const hit of index.search(queryText, Math.floor(k), accept)) {
      const entity = resolve(hit.id);
      if (entity !== undefined) {
        ranked.push({ entity: cloneEntity(entity), score: hit.score });
      }
    }
    return ranked;
  }

  private toChunkSearchRecord(chunkId: number): ChunkSearchRecord | undefined {
    const chunk = this.chunkRows.get(chunkId);
    if (!chunk) {
      return undefined;
    }
    const document = this.documentRows.get(chunk.record.documentId);
    if (!document) {
      return undefined;
    }
    return { ...chunk.record, document: toDocumentRef(document.record) };
  }
}

function inScope(scope: SearchScope, searchSpaceId: number): boolean {
  return !scope.searchSpaceIds || scope.searchSpaceIds.includes(searchSpaceId);
}

function toDocumentRef(record: DocumentRecord): DocumentRef {
  return {
    id: record.id,
    searchSpaceId: record.searchSpaceId,
    title: record.title,
    documentType: record.documentType,
  };
}

function cloneDocument(record: DocumentRecord): DocumentRecord {
  return { ...record, metadata: { ...record.metadata } };
}

function cloneEntity<T>(entity: T): T {
  return structuredClone(entity);
}

import type {
  ChunkRecord,
  ChunkSearchRecord,
  DocumentMetadata,
  DocumentRecord,
  DocumentType,
  RankedEntity,
  SearchSpaceRecord,
} from "./types.js";

export interface ContentStoreOptions {
  /** Width of every stored embedding. */
  dimension: number;
  /** Cap on the title-plus-content text embedded for a document. */
  documentEmbeddingMaxChars: number;
}

export interface CreateSearchSpaceInput {
  name: string;
  description?: string | null;
}

export interface UpdateSearchSpaceInput {
  name?: string;
  description?: string | null;
}

export interface CreateDocumentInput {
  searchSpaceId: number;
  documentType: DocumentType;
  title: string;
  content: string;
  metadata: DocumentMetadata;
  chunkTexts: string[];
}

/** New text for an existing document; its space and type stay as they are. */
export type ReplaceDocumentInput = Pick<
  CreateDocumentInput,
  "title" | "content" | "metadata" | "chunkTexts"
>;

export interface ListDocumentsInput {
  searchSpaceIds?: number[];
  limit?: number;
}

/**
 * Visibility filter for a search. `searchSpaceIds` undefined means every
 * search space; an empty array means none.
 */
export interface SearchScope {
  searchSpaceIds?: number[];
}

export interface SearchTier<T extends { id: number }> {
  vectorSearch(
    scope: SearchScope,
    queryEmbedding: number[],
    k: number,
  ): Promise<RankedEntity<T>[]>;
  lexicalSearch(
    scope: SearchScope,
    queryText: string,
    k: number,
  ): Promise<RankedEntity<T>[]>;
}

export interface ContentStore {
  readonly documents: SearchTier<DocumentRecord>;
  readonly chunks: SearchTier<ChunkSearchRecord>;

  createSearchSpace(
    ownerId: string,
    input: CreateSearchSpaceInput,
  ): Promise<SearchSpaceRecord>;
  getSearchSpace(id: number): Promise<SearchSpaceRecord | null>;
  listSearchSpaces(ownerId: string): Promise<SearchSpaceRecord[]>;
  updateSearchSpace(id: number, input: UpdateSearchSpaceInput): Promise<SearchSpaceRecord | null>;
  /** Removes the space with all of its documents and chunks. */
  deleteSearchSpace(id: number): Promise<boolean>;

  /**
   * Embeds the document and its chunks, then persists them as one unit.
   * Nothing is written when embedding fails.
   */
  createDocumentWithChunks(input: CreateDocumentInput): Promise<number>;
  /**
   * Re-embeds the document and swaps its content and chunks in one unit.
   * Resolves false when the document does not exist.
   */
  replaceDocument(id: number, input: ReplaceDocumentInput): Promise<boolean>;
  getDocument(id: number): Promise<DocumentRecord | null>;
  listDocuments(input?: ListDocumentsInput): Promise<DocumentRecord[]>;
  listChunks(documentId: number): Promise<ChunkRecord[]>;
  deleteDocument(id: number): Promise<boolean>;

  close(): Promise<void>;
}

export function isScopeEmpty(scope: SearchScope): boolean {
  return Array.isArray(scope.searchSpaceIds) && scope.searchSpaceIds.length === 0;
}

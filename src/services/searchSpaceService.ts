import type { ContentStore, SearchScope } from "../domain/contentStore.js";
import { NotFoundError, ValidationError } from "../domain/errors.js";
import type {
  ChunkRecord,
  ChunkSearchRecord,
  DocumentMetadata,
  DocumentRecord,
  DocumentType,
  FusedEntity,
  SearchSpaceRecord,
} from "../domain/types.js";
import { logger } from "../lib/logger.js";
import type { ChunkingOptions } from "../pipelines/chunking.js";
import { DEFAULT_CHUNKING, splitIntoChunks } from "../pipelines/chunking.js";
import type { HybridRetriever } from "./hybridRetriever.js";

const log = logger.child({ module: "search-space-service" });

const MAX_SPACE_NAME_CHARS = 100;
const MAX_DESCRIPTION_CHARS = 500;

export interface AddTextDocumentInput {
  title: string;
  content: string;
  documentType?: DocumentType;
  metadata?: DocumentMetadata;
}

export interface UpdateTextDocumentInput {
  title?: string;
  content?: string;
  metadata?: DocumentMetadata;
}

export interface DocumentWithChunks {
  document: DocumentRecord;
  chunks: ChunkRecord[];
}

export interface SearchSpaceServiceDeps {
  contentStore: ContentStore;
  chunkRetriever: HybridRetriever<ChunkSearchRecord>;
  documentRetriever: HybridRetriever<DocumentRecord>;
  chunking?: ChunkingOptions;
}

/** Owner-scoped access to search spaces, their documents and retrieval. */
export class SearchSpaceService {
  private readonly contentStore: ContentStore;

  private readonly chunkRetriever: HybridRetriever<ChunkSearchRecord>;

  private readonly documentRetriever: HybridRetriever<DocumentRecord>;

  private readonly chunking: ChunkingOptions;

  constructor(deps: SearchSpaceServiceDeps) {
    this.contentStore = deps.contentStore;
    this.chunkRetriever = deps.chunkRetriever;
    this.documentRetriever = deps.documentRetriever;
    this.chunking = deps.chunking ?? DEFAULT_CHUNKING;
  }

  async createSearchSpace(
    ownerId: string,
    input: { name: string; description?: string | null },
  ): Promise<SearchSpaceRecord> {
    const name = validateSpaceName(input.name);
    validateDescription(input.description);

    const space = await this.contentStore.createSearchSpace(ownerId, {
      name,
      description: input.description ?? null,
    });
    log.info("Search space created", { searchSpaceId: space.id });
    return space;
  }

  async listSearchSpaces(ownerId: string): Promise<SearchSpaceRecord[]> {
    return this.contentStore.listSearchSpaces(ownerId);
  }

  /** Changes only the fields given; `description: null` clears it. */
  async updateSearchSpace(
    ownerId: string,
    id: number,
    input: { name?: string; description?: string | null },
  ): Promise<SearchSpaceRecord> {
    const name = input.name === undefined ? undefined : validateSpaceName(input.name);
    validateDescription(input.description);
    await this.requireOwnedSpace(ownerId, id);

    const space = await this.contentStore.updateSearchSpace(id, {
      name,
      description: input.description,
    });
    if (!space) {
      throw new NotFoundError(`Search space ${id} not found.`);
    }
    log.info("Search space updated", { searchSpaceId: id });
    return space;
  }

  async deleteSearchSpace(ownerId: string, id: number): Promise<{ deleted: true; id: number }> {
    await this.requireOwnedSpace(ownerId, id);
    await this.contentStore.deleteSearchSpace(id);
    log.info("Search space deleted", { searchSpaceId: id });
    return { deleted: true, id };
  }

  async addTextDocument(
    ownerId: string,
    searchSpaceId: number,
    input: AddTextDocumentInput,
  ): Promise<DocumentRecord> {
    await this.requireOwnedSpace(ownerId, searchSpaceId);

    const documentId = await this.contentStore.createDocumentWithChunks({
      searchSpaceId,
      documentType: input.documentType ?? "FILE",
      title: input.title,
      content: input.content,
      metadata: input.metadata ?? {},
      chunkTexts: splitIntoChunks(input.content, this.chunking),
    });

    const document = await this.contentStore.getDocument(documentId);
    if (!document) {
      throw new NotFoundError(`Document ${documentId} not found.`);
    }
    log.info("Document added", { documentId, searchSpaceId });
    return document;
  }

  async getDocument(ownerId: string, id: number): Promise<DocumentWithChunks> {
    const document = await this.requireOwnedDocument(ownerId, id);
    return { document, chunks: await this.contentStore.listChunks(id) };
  }

  /** Re-chunks and re-embeds the document; omitted fields keep their values. */
  async updateTextDocument(
    ownerId: string,
    id: number,
    input: UpdateTextDocumentInput,
  ): Promise<DocumentRecord> {
    const current = await this.requireOwnedDocument(ownerId, id);
    const content = input.content ?? current.content;

    const replaced = await this.contentStore.replaceDocument(id, {
      title: input.title ?? current.title,
      content,
      metadata: input.metadata ?? current.metadata,
      chunkTexts: splitIntoChunks(content, this.chunking),
    });
    const document = replaced ? await this.contentStore.getDocument(id) : null;
    if (!document) {
      throw new NotFoundError(`Document ${id} not found.`);
    }
    log.info("Document updated", { documentId: id });
    return document;
  }

  async listDocuments(
    ownerId: string,
    searchSpaceIds?: number[],
    limit?: number,
  ): Promise<DocumentRecord[]> {
    const scope = await this.resolveScope(ownerId, searchSpaceIds);
    return this.contentStore.listDocuments({ searchSpaceIds: scope.searchSpaceIds, limit });
  }

  async deleteDocument(ownerId: string, id: number): Promise<{ deleted: true; id: number }> {
    await this.requireOwnedDocument(ownerId, id);
    await this.contentStore.deleteDocument(id);
    log.info("Document deleted", { documentId: id });
    return { deleted: true, id };
  }

  async searchChunks(
    ownerId: string,
    query: string,
    topK: number,
    searchSpaceIds?: number[],
  ): Promise<FusedEntity<ChunkSearchRecord>[]> {
    if (Number.isInteger(topK) && topK <= 0) {
      return [];
    }
    const scope = await this.resolveScope(ownerId, searchSpaceIds);
    return this.chunkRetriever.search(query, topK, scope);
  }

  async searchDocuments(
    ownerId: string,
    query: string,
    topK: number,
    searchSpaceIds?: number[],
  ): Promise<FusedEntity<DocumentRecord>[]> {
    if (Number.isInteger(topK) && topK <= 0) {
      return [];
    }
    const scope = await this.resolveScope(ownerId, searchSpaceIds);
    return this.documentRetriever.search(query, topK, scope);
  }

  /** The owner's spaces, narrowed to `requested` when given. */
  private async resolveScope(ownerId: string, requested?: number[]): Promise<SearchScope> {
    const owned = (await this.contentStore.listSearchSpaces(ownerId)).map((space) => space.id);
    if (!requested) {
      return { searchSpaceIds: owned };
    }
    const wanted = new Set(requested);
    return { searchSpaceIds: owned.filter((id) => wanted.has(id)) };
  }

  private async requireOwnedDocument(ownerId: string, id: number): Promise<DocumentRecord> {
    const document = await this.contentStore.getDocument(id);
    const space = document ? await this.contentStore.getSearchSpace(document.searchSpaceId) : null;
    if (!document || !space || space.ownerId !== ownerId) {
      throw new NotFoundError(`Document ${id} not found.`);
    }
    return document;
  }

  private async requireOwnedSpace(ownerId: string, id: number): Promise<SearchSpaceRecord> {
    const space = await this.contentStore.getSearchSpace(id);
    if (!space || space.ownerId !== ownerId) {
      throw new NotFoundError(`Search space ${id} not found.`);
    }
    return space;
  }
}

function validateSpaceName(raw: string): string {
  const name = raw.trim();
  if (!name || name.length > MAX_SPACE_NAME_CHARS) {
    throw new ValidationError(
      `Search space name must be between 1 and ${MAX_SPACE_NAME_CHARS} characters.`,
    );
  }
  return name;
}

function validateDescription(description: string | null | undefined): void {
  if (description && description.length > MAX_DESCRIPTION_CHARS) {
    throw new ValidationError(
      `Search space description must be at most ${MAX_DESCRIPTION_CHARS} characters.`,
    );
  }
}

import type pg from "pg";
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
  DocumentMetadata,
  DocumentRecord,
  DocumentType,
  RankedEntity,
  SearchSpaceRecord,
} from "../../domain/types.js";
import { isDocumentType } from "../../domain/types.js";
import type { EmbeddedChunk } from "../../pipelines/embedding.js";
import { assertDimension, embedDocument } from "../../pipelines/embedding.js";
import { toVectorLiteral } from "../../utils/vector.js";
import type { EmbeddingProvider } from "../ai/types.js";
import { withTransaction } from "../db/postgres.js";
import { ensureSchema } from "../db/schema.js";

interface PgSearchSpaceRow {
  id: number;
  owner_id: string;
  name: string;
  description: string | null;
  created_at: Date;
}

interface PgDocumentRow {
  id: number;
  search_space_id: number;
  title: string;
  document_type: string;
  document_metadata: DocumentMetadata | null;
  content: string;
  created_at: Date;
}

interface PgChunkRow {
  id: number;
  document_id: number;
  chunk_index: number;
  content: string;
  created_at: Date;
}

interface PgChunkSearchRow extends PgChunkRow {
  search_space_id: number;
  title: string;
  document_type: string;
  score: number | string;
}

interface PgDocumentSearchRow extends PgDocumentRow {
  score: number | string;
}

const DOCUMENT_COLUMNS = `
  d.id, d.search_space_id, d.title, d.document_type, d.document_metadata,
  d.content, d.created_at
`;

const CHUNK_COLUMNS = `
  c.id, c.document_id, c.chunk_index, c.content, c.created_at,
  d.search_space_id, d.title, d.document_type
`;

const SCOPE_FILTER = `($2::int[] IS NULL OR d.search_space_id = ANY($2::int[]))`;

/**
 * Content store on PostgreSQL with pgvector. Vector ranking uses the cosine
 * distance operator over HNSW indexes; lexical ranking uses `ts_rank_cd` over
 * English tsvectors backed by GIN indexes.
 */
export class PgContentStore implements ContentStore {
  readonly documents: SearchTier<DocumentRecord>;

  readonly chunks: SearchTier<ChunkSearchRecord>;

  private initialized = false;

  constructor(
    private readonly pool: pg.Pool,
    private readonly embeddingProvider: EmbeddingProvider,
    private readonly options: ContentStoreOptions,
  ) {
    this.documents = {
      vectorSearch: (scope, queryEmbedding, k) =>
        this.searchDocumentsByVector(scope, queryEmbedding, k),
      lexicalSearch: (scope, queryText, k) =>
        this.searchDocumentsByText(scope, queryText, k),
    };
    this.chunks = {
      vectorSearch: (scope, queryEmbedding, k) =>
        this.searchChunksByVector(scope, queryEmbedding, k),
      lexicalSearch: (scope, queryText, k) => this.searchChunksByText(scope, queryText, k),
    };
  }

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }
    await ensureSchema(this.pool, this.options.dimension);
    this.initialized = true;
  }

  async createSearchSpace(
    ownerId: string,
    input: CreateSearchSpaceInput,
  ): Promise<SearchSpaceRecord> {
    await this.initialize();
    const name = input.name.trim();
    if (!name) {
      throw new ValidationError("Search space name must not be empty.");
    }

    const result = await this.pool.query<PgSearchSpaceRow>(
      `
        INSERT INTO search_spaces (owner_id, name, description)
        VALUES ($1, $2, $3)
        RETURNING id, owner_id, name, description, created_at
      `,
      [ownerId, name, input.description ?? null],
    );
    return toSearchSpace(result.rows[0]);
  }

  async getSearchSpace(id: number): Promise<SearchSpaceRecord | null> {
    await this.initialize();
    const result = await this.pool.query<PgSearchSpaceRow>(
      `SELECT id, owner_id, name, description, created_at FROM search_spaces WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? toSearchSpace(row) : null;
  }

  async listSearchSpaces(ownerId: string): Promise<SearchSpaceRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgSearchSpaceRow>(
      `
        SELECT id, owner_id, name, description, created_at
        FROM search_spaces
        WHERE owner_id = $1
        ORDER BY id ASC
      `,
      [ownerId],
    );
    return result.rows.map(toSearchSpace);
  }

  async updateSearchSpace(
    id: number,
    input: UpdateSearchSpaceInput,
  ): Promise<SearchSpaceRecord | null> {
    await this.initialize();
    const name = input.name?.trim();
    if (name === "") {
      throw new ValidationError("Search space name must not be empty.");
    }

    const result = await this.pool.query<PgSearchSpaceRow>(
      `
        UPDATE search_spaces
        SET name = COALESCE($2, name),
            description = CASE WHEN $3::boolean THEN $4 ELSE description END
        WHERE id = $1
        RETURNING id, owner_id, name, description, created_at
      `,
      [id, name ?? null, input.description !== undefined, input.description ?? null],
    );
    const row = result.rows[0];
    return row ? toSearchSpace(row) : null;
  }

  async deleteSearchSpace(id: number): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM search_spaces WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async createDocumentWithChunks(input: CreateDocumentInput): Promise<number> {
    await this.initialize();
    if (!(await this.getSearchSpace(input.searchSpaceId))) {
      throw new NotFoundError(`Search space ${input.searchSpaceId} not found.`);
    }

    const embedded = await embedDocument(this.embeddingProvider, input, this.options);

    return withTransaction(this.pool, async (client) => {
      const space = await client.query(
        `SELECT id FROM search_spaces WHERE id = $1 FOR SHARE`,
        [input.searchSpaceId],
      );
      if (space.rowCount === 0) {
        throw new NotFoundError(`Search space ${input.searchSpaceId} not found.`);
      }

      const document = await client.query<{ id: number }>(
        `
          INSERT INTO documents
            (search_space_id, title, document_type, document_metadata, content, embedding)
          VALUES ($1, $2, $3, $4::jsonb, $5, $6::vector)
          RETURNING id
        `,
        [
          embedded.input.searchSpaceId,
          embedded.input.title,
          embedded.input.documentType,
          JSON.stringify(embedded.input.metadata),
          embedded.input.content,
          toVectorLiteral(embedded.embedding),
        ],
      );
      const documentId = document.rows[0].id;
      await insertChunks(client, documentId, embedded.chunks);
      return documentId;
    });
  }

  async replaceDocument(id: number, input: ReplaceDocumentInput): Promise<boolean> {
    const current = await this.getDocument(id);
    if (!current) {
      return false;
    }

    const embedded = await embedDocument(
      this.embeddingProvider,
      { ...input, searchSpaceId: current.searchSpaceId, documentType: current.documentType },
      this.options,
    );

    return withTransaction(this.pool, async (client) => {
      const updated = await client.query(
        `
          UPDATE documents
          SET title = $2, document_metadata = $3::jsonb, content = $4, embedding = $5::vector
          WHERE id = $1
        `,
        [
          id,
          embedded.input.title,
          JSON.stringify(embedded.input.metadata),
          embedded.input.content,
          toVectorLiteral(embedded.embedding),
        ],
      );
      if (updated.rowCount === 0) {
        return false;
      }
      await client.query(`DELETE FROM chunks WHERE document_id = $1`, [id]);
      await insertChunks(client, id, embedded.chunks);
      return true;
    });
  }

  async getDocument(id: number): Promise<DocumentRecord | null> {
    await this.initialize();
    const result = await this.pool.query<PgDocumentRow>(
      `SELECT ${DOCUMENT_COLUMNS} FROM documents d WHERE d.id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? toDocument(row) : null;
  }

  async listDocuments(input?: ListDocumentsInput): Promise<DocumentRecord[]> {
    await this.initialize();
    if (isScopeEmpty({ searchSpaceIds: input?.searchSpaceIds })) {
      return [];
    }

    const limit = input?.limit && input.limit > 0 ? Math.floor(input.limit) : null;
    const result = await this.pool.query<PgDocumentRow>(
      `
        SELECT ${DOCUMENT_COLUMNS}
        FROM documents d
        WHERE ($1::int[] IS NULL OR d.search_space_id = ANY($1::int[]))
        ORDER BY d.id ASC
        LIMIT $2
      `,
      [input?.searchSpaceIds ?? null, limit],
    );
    return result.rows.map(toDocument);
  }

  async listChunks(documentId: number): Promise<ChunkRecord[]> {
    await this.initialize();
    const result = await this.pool.query<PgChunkRow>(
      `
        SELECT id, document_id, chunk_index, content, created_at
        FROM chunks
        WHERE document_id = $1
        ORDER BY chunk_index ASC, id ASC
      `,
      [documentId],
    );
    return result.rows.map(toChunk);
  }

  async deleteDocument(id: number): Promise<boolean> {
    await this.initialize();
    const result = await this.pool.query(`DELETE FROM documents WHERE id = $1`, [id]);
    return (result.rowCount ?? 0) > 0;
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  private async searchDocumentsByVector(
    scope: SearchScope,
    queryEmbedding: number[],
    k: number,
  ): Promise<RankedEntity<DocumentRecord>[]> {
    if (k <= 0 || isScopeEmpty(scope)) {
      return [];
    }
    assertDimension(queryEmbedding, this.options.dimension);
    await this.initialize();

    const result = await this.pool.query<PgDocumentSearchRow>(
      `
        SELECT ${DOCUMENT_COLUMNS}, (1 - (d.embedding <=> $1::vector)) AS score
        FROM documents d
        WHERE ${SCOPE_FILTER}
        ORDER BY d.embedding <=> $1::vector ASC, d.id ASC
        LIMIT $3
      `,
      [toVectorLiteral(queryEmbedding), scope.searchSpaceIds ?? null, Math.floor(k)],
    );
    return result.rows.map((row) => ({ entity: toDocument(row), score: Number(row.score) }));
  }

  private async searchDocumentsByText(
    scope: SearchScope,
    queryText: string,
    k: number,
  ): Promise<RankedEntity<DocumentRecord>[]> {
    if (k <= 0 || isScopeEmpty(scope) || !queryText.trim()) {
      return [];
    }
    await this.initialize();

    const result = await this.pool.query<PgDocumentSearchRow>(
      `
        SELECT ${DOCUMENT_COLUMNS},
          ts_rank_cd(to_tsvector('english', d.content), plainto_tsquery('english', $1)) AS score
        FROM documents d
        WHERE ${SCOPE_FILTER}
          AND to_tsvector('english', d.content) @@ plainto_tsquery('english', $1)
        ORDER BY score DESC, d.id ASC
        LIMIT $3
      `,
      [queryText, scope.searchSpaceIds ?? null, Math.floor(k)],
    );
    return result.rows.map((row) => ({ entity: toDocument(row), score: Number(row.score) }));
  }

  private async searchChunksByVector(
    scope: SearchScope,
    queryEmbedding: number[],
    k: number,
  ): Promise<RankedEntity<ChunkSearchRecord>[]> {
    if (k <= 0 || isScopeEmpty(scope)) {
      return [];
    }
    assertDimension(queryEmbedding, this.options.dimension);
    await this.initialize();

    const result = await this.pool.query<PgChunkSearchRow>(
      `
        SELECT ${CHUNK_COLUMNS}, (1 - (c.embedding <=> $1::vector)) AS score
        FROM chunks c
        JOIN documents d ON d.id = c.document_id
        WHERE ${SCOPE_FILTER}
        ORDER BY c.embedding <=> $1::vector ASC, c.id ASC
        LIMIT $3
      `,
      [toVectorLiteral(queryEmbedding), scope.searchSpaceIds ?? null, Math.floor(k)],
    );
    return result.rows.map(toRankedChunk);
  }

  private async searchChunksByText(
    scope: SearchScope,
    queryText: string,
    k: number,
  ): Promise<RankedEntity<ChunkSearchRecord>[]> {
    if (k <= 0 || isScopeEmpty(scope) || !queryText.trim()) {
      return [];
    }
    await this.initialize();

    const result = await this.pool.query<PgChunkSearchRow>(
      `
        SELECT ${CHUNK_COLUMNS},
          ts_rank_cd(to_tsvector('english', c.content), plainto_tsquery('english', $1)) AS score
        FROM chunks c
        JOIN documents d ON d.id = c.document_id
        WHERE ${SCOPE_FILTER}
          AND to_tsvector('english', c.content) @@ plainto_tsquery('english', $1)
        ORDER BY score DESC, c.id ASC
        LIMIT $3
      `,
      [queryText, scope.searchSpaceIds ?? null, Math.floor(k)],
    );
    return result.rows.map(toRankedChunk);
  }
}

async function insertChunks(
  client: pg.PoolClient,
  documentId: number,
  chunks: EmbeddedChunk[],
): Promise<void> {
  for (const chunk of chunks) {
    await client.query(
      `
        INSERT INTO chunks (document_id, chunk_index, content, embedding)
        VALUES ($1, $2, $3, $4::vector)
      `,
      [documentId, chunk.index, chunk.content, toVectorLiteral(chunk.embedding)],
    );
  }
}

function toSearchSpace(row: PgSearchSpaceRow): SearchSpaceRecord {
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    description: row.description,
    createdAt: row.created_at.toISOString(),
  };
}

function toDocumentType(value: string): DocumentType {
  if (!isDocumentType(value)) {
    throw new ValidationError(`Unknown document type in store: ${value}`);
  }
  return value;
}

function toDocument(row: PgDocumentRow): DocumentRecord {
  return {
    id: row.id,
    searchSpaceId: row.search_space_id,
    title: row.title,
    documentType: toDocumentType(row.document_type),
    metadata: row.document_metadata ?? {},
    content: row.content,
    createdAt: row.created_at.toISOString(),
  };
}

function toChunk(row: PgChunkRow): ChunkRecord {
  return {
    id: row.id,
    documentId: row.document_id,
    index: row.chunk_index,
    content: row.content,
    createdAt: row.created_at.toISOString(),
  };
}

function toRankedChunk(row: PgChunkSearchRow): RankedEntity<ChunkSearchRecord> {
  return {
    entity: {
      ...toChunk(row),
      document: {
        id: row.document_id,
        searchSpaceId: row.search_space_id,
        title: row.title,
        documentType: toDocumentType(row.document_type),
      },
    },
    score: Number(row.score),
  };
}

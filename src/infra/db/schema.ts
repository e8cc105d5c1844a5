import type pg from "pg";

/**
 * Creates the tables and indexes if they are missing. Safe to run on every
 * start; the vector columns take their width from the configured dimension.
 */
export async function ensureSchema(pool: pg.Pool, vectorDimension: number): Promise<void> {
  await pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS search_spaces (
      id SERIAL PRIMARY KEY,
      owner_id TEXT NOT NULL,
      name VARCHAR(100) NOT NULL,
      description VARCHAR(500),
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS documents (
      id SERIAL PRIMARY KEY,
      search_space_id INTEGER NOT NULL REFERENCES search_spaces(id) ON DELETE CASCADE,
      title VARCHAR(200) NOT NULL,
      document_type TEXT NOT NULL,
      document_metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
      content TEXT NOT NULL,
      embedding VECTOR(${vectorDimension}) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS chunks (
      id SERIAL PRIMARY KEY,
      document_id INTEGER NOT NULL REFERENCES documents(id) ON DELETE CASCADE,
      chunk_index INTEGER NOT NULL,
      content TEXT NOT NULL,
      embedding VECTOR(${vectorDimension}) NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    )
  `);
  await pool.query(`
    CREATE TABLE IF NOT EXISTS search_source_connectors (
      id SERIAL PRIMARY KEY,
      owner_id TEXT NOT NULL,
      name VARCHAR(100) NOT NULL,
      connector_type TEXT NOT NULL,
      is_indexable BOOLEAN NOT NULL DEFAULT FALSE,
      last_indexed_at TIMESTAMPTZ,
      config JSONB NOT NULL,
      created_at TIMESTAMPTZ NOT NULL DEFAULT NOW(),
      CONSTRAINT uq_owner_connector_type UNIQUE (owner_id, connector_type)
    )
  `);

  await pool.query(
    `CREATE INDEX IF NOT EXISTS idx_search_spaces_owner ON search_spaces(owner_id)`,
  );
  await pool.query(
    `CREATE INDEX IF NOT EXISTS idx_documents_search_space ON documents(search_space_id)`,
  );
  await pool.query(`CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(document_id)`);
  await pool.query(`
    CREATE INDEX IF NOT EXISTS document_vector_index
    ON documents USING hnsw (embedding vector_cosine_ops)
  `);
  await pool.query(`
    CREATE INDEX IF NOT EXISTS document_search_index
    ON documents USING gin (to_tsvector('english', content))
  `);
  await pool.query(`
    CREATE INDEX IF NOT EXISTS chunks_vector_index
    ON chunks USING hnsw (embedding vector_cosine_ops)
  `);
  await pool.query(`
    CREATE INDEX IF NOT EXISTS chunks_search_index
    ON chunks USING gin (to_tsvector('english', content))
  `);
}

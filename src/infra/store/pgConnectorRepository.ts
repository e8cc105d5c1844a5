import type pg from "pg";
import { parseConnectorSettings } from "../../domain/connectorConfig.js";
import type {
  ConnectorChanges,
  ConnectorRepository,
  NewConnector,
  SearchSourceConnector,
} from "../../domain/connectorRepository.js";
import { ConflictError, NotFoundError } from "../../domain/errors.js";
import type { ConnectorType } from "../../domain/types.js";

interface PgConnectorRow {
  id: number;
  owner_id: string;
  name: string;
  connector_type: string;
  is_indexable: boolean;
  last_indexed_at: Date | null;
  config: unknown;
  created_at: Date;
}

const CONNECTOR_COLUMNS = `
  id, owner_id, name, connector_type, is_indexable, last_indexed_at, config, created_at
`;

const UNIQUE_VIOLATION = "23505";

/** Connector rows in `search_source_connectors`; the schema comes from `ensureSchema`. */
export class PgConnectorRepository implements ConnectorRepository {
  constructor(private readonly pool: pg.Pool) {}

  async create(input: NewConnector): Promise<SearchSourceConnector> {
    const result = await this.guardUnique(input.connectorType, () =>
      this.pool.query<PgConnectorRow>(
        `
          INSERT INTO search_source_connectors
            (owner_id, name, connector_type, is_indexable, config)
          VALUES ($1, $2, $3, $4, $5::jsonb)
          RETURNING ${CONNECTOR_COLUMNS}
        `,
        [
          input.ownerId,
          input.name,
          input.connectorType,
          input.isIndexable,
          JSON.stringify(input.config),
        ],
      ),
    );
    return toConnector(result.rows[0]);
  }

  async get(id: number): Promise<SearchSourceConnector | null> {
    const result = await this.pool.query<PgConnectorRow>(
      `SELECT ${CONNECTOR_COLUMNS} FROM search_source_connectors WHERE id = $1`,
      [id],
    );
    const row = result.rows[0];
    return row ? toConnector(row) : null;
  }

  async findByOwnerAndType(
    ownerId: string,
    connectorType: ConnectorType,
  ): Promise<SearchSourceConnector | null> {
    const result = await this.pool.query<PgConnectorRow>(
      `
        SELECT ${CONNECTOR_COLUMNS}
        FROM search_source_connectors
        WHERE owner_id = $1 AND connector_type = $2
      `,
      [ownerId, connectorType],
    );
    const row = result.rows[0];
    return row ? toConnector(row) : null;
  }

  async listByOwner(ownerId: string): Promise<SearchSourceConnector[]> {
    const result = await this.pool.query<PgConnectorRow>(
      `
        SELECT ${CONNECTOR_COLUMNS}
        FROM search_source_connectors
        WHERE owner_id = $1
        ORDER BY id ASC
      `,
      [ownerId],
    );
    return result.rows.map(toConnector);
  }

  async update(id: number, changes: ConnectorChanges): Promise<SearchSourceConnector> {
    const result = await this.guardUnique(changes.connectorType, () =>
      this.pool.query<PgConnectorRow>(
        `
          UPDATE search_source_connectors
          SET name = $2, connector_type = $3, is_indexable = $4, config = $5::jsonb
          WHERE id = $1
          RETURNING ${CONNECTOR_COLUMNS}
        `,
        [
          id,
          changes.name,
          changes.connectorType,
          changes.isIndexable,
          JSON.stringify(changes.config),
        ],
      ),
    );
    const row = result.rows[0];
    if (!row) {
      throw new NotFoundError(`Connector ${id} not found.`);
    }
    return toConnector(row);
  }

  async updateLastIndexedAt(id: number, at: Date): Promise<void> {
    const result = await this.pool.query(
      `UPDATE search_source_connectors SET last_indexed_at = $2 WHERE id = $1`,
      [id, at],
    );
    if (result.rowCount === 0) {
      throw new NotFoundError(`Connector ${id} not found.`);
    }
  }

  async delete(id: number): Promise<boolean> {
    const result = await this.pool.query(`DELETE FROM search_source_connectors WHERE id = $1`, [
      id,
    ]);
    return (result.rowCount ?? 0) > 0;
  }

  private async guardUnique<T>(connectorType: ConnectorType, task: () => Promise<T>): Promise<T> {
    try {
      return await task();
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(
          `A connector with type ${connectorType} already exists for this owner.`,
        );
      }
      throw error;
    }
  }
}

function isUniqueViolation(error: unknown): boolean {
  return (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    error.code === UNIQUE_VIOLATION
  );
}

function toConnector(row: PgConnectorRow): SearchSourceConnector {
  return {
    ...parseConnectorSettings(row.connector_type, row.config),
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    isIndexable: row.is_indexable,
    lastIndexedAt: row.last_indexed_at,
    createdAt: row.created_at.toISOString(),
  };
}

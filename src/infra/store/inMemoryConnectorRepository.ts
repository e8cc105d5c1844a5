import type {
  ConnectorChanges,
  ConnectorRepository,
  NewConnector,
  SearchSourceConnector,
} from "../../domain/connectorRepository.js";
import { ConflictError, NotFoundError } from "../../domain/errors.js";
import type { ConnectorType } from "../../domain/types.js";

export class InMemoryConnectorRepository implements ConnectorRepository {
  private readonly rows = new Map<number, SearchSourceConnector>();

  private nextId = 1;

  async create(input: NewConnector): Promise<SearchSourceConnector> {
    this.assertTypeFree(input.ownerId, input.connectorType, null);

    const connector: SearchSourceConnector = {
      ...structuredClone(input),
      id: this.nextId,
      lastIndexedAt: null,
      createdAt: new Date().toISOString(),
    };
    this.nextId += 1;
    this.rows.set(connector.id, connector);
    return structuredClone(connector);
  }

  async get(id: number): Promise<SearchSourceConnector | null> {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : null;
  }

  async findByOwnerAndType(
    ownerId: string,
    connectorType: ConnectorType,
  ): Promise<SearchSourceConnector | null> {
    for (const row of this.rows.values()) {
      if (row.ownerId === ownerId && row.connectorType === connectorType) {
        return structuredClone(row);
      }
    }
    return null;
  }

  async listByOwner(ownerId: string): Promise<SearchSourceConnector[]> {
    return [...this.rows.values()]
      .filter((row) => row.ownerId === ownerId)
      .sort((a, b) => a.id - b.id)
      .map((row) => structuredClone(row));
  }

  async update(id: number, changes: ConnectorChanges): Promise<SearchSourceConnector> {
    const existing = this.rows.get(id);
    if (!existing) {
      throw new NotFoundError(`Connector ${id} not found.`);
    }
    this.assertTypeFree(existing.ownerId, changes.connectorType, id);

    const updated: SearchSourceConnector = {
      ...structuredClone(changes),
      id: existing.id,
      ownerId: existing.ownerId,
      lastIndexedAt: existing.lastIndexedAt,
      createdAt: existing.createdAt,
    };
    this.rows.set(id, updated);
    return structuredClone(updated);
  }

  async updateLastIndexedAt(id: number, at: Date): Promise<void> {
    const existing = this.rows.get(id);
    if (!existing) {
      throw new NotFoundError(`Connector ${id} not found.`);
    }
    this.rows.set(id, { ...existing, lastIndexedAt: new Date(at.getTime()) });
  }

  async delete(id: number): Promise<boolean> {
    return this.rows.delete(id);
  }

  // Mirrors the UNIQUE (owner_id, connector_type) constraint of the SQL schema.
  private assertTypeFree(
    ownerId: string,
    connectorType: ConnectorType,
    exceptId: number | null,
  ): void {
    for (const row of this.rows.values()) {
      if (row.id !== exceptId && row.ownerId === ownerId && row.connectorType === connectorType) {
        throw new ConflictError(
          `A connector with type ${connectorType} already exists for this owner.`,
        );
      }
    }
  }
}

import type { ConnectorSettings } from "./connectorConfig.js";
import type { ConnectorType } from "./types.js";

interface ConnectorBase {
  id: number;
  ownerId: string;
  name: string;
  isIndexable: boolean;
  /** End of the last successfully indexed window; null until the first one. */
  lastIndexedAt: Date | null;
  createdAt: string;
}

export type SearchSourceConnector = ConnectorBase & ConnectorSettings;

export type NewConnector = {
  ownerId: string;
  name: string;
  isIndexable: boolean;
} & ConnectorSettings;

export type ConnectorChanges = {
  name: string;
  isIndexable: boolean;
} & ConnectorSettings;

export interface ConnectorRepository {
  create(input: NewConnector): Promise<SearchSourceConnector>;
  get(id: number): Promise<SearchSourceConnector | null>;
  findByOwnerAndType(
    ownerId: string,
    connectorType: ConnectorType,
  ): Promise<SearchSourceConnector | null>;
  listByOwner(ownerId: string): Promise<SearchSourceConnector[]>;
  update(id: number, changes: ConnectorChanges): Promise<SearchSourceConnector>;
  updateLastIndexedAt(id: number, at: Date): Promise<void>;
  delete(id: number): Promise<boolean>;
}

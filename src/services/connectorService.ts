import {
  isIndexableConnectorType,
  parseConnectorSettings,
  redactConfig,
} from "../domain/connectorConfig.js";
import type {
  ConnectorRepository,
  SearchSourceConnector,
} from "../domain/connectorRepository.js";
import type { ContentStore } from "../domain/contentStore.js";
import { ConflictError, NotFoundError, ValidationError } from "../domain/errors.js";
import type { ConnectorType, SearchSpaceRecord } from "../domain/types.js";
import { logger } from "../lib/logger.js";
import {
  DEFAULT_LOOKBACK_DAYS,
  computeIndexingWindow,
  formatDay,
} from "../pipelines/indexingWindow.js";
import type { IndexingJob, IndexingQueue } from "./indexingQueue.js";

const log = logger.child({ module: "connector-service" });

const MAX_NAME_CHARS = 100;

export interface CreateConnectorInput {
  name: string;
  connectorType: unknown;
  config: unknown;
}

export interface UpdateConnectorInput {
  name?: string;
  connectorType?: unknown;
  config?: Record<string, unknown>;
}

/** A connector as returned to callers: secrets masked, checkpoint as ISO text. */
export interface ConnectorView {
  id: number;
  name: string;
  connectorType: ConnectorType;
  config: Record<string, unknown>;
  isIndexable: boolean;
  lastIndexedAt: string | null;
  createdAt: string;
}

export interface TriggerIndexingResult {
  job: IndexingJob;
  connectorType: ConnectorType;
  searchSpace: string;
  indexingFrom: string;
  indexingTo: string;
}

export interface ConnectorServiceOptions {
  lookbackDays?: number;
  clock?: () => Date;
}

export class ConnectorService {
  private readonly lookbackDays: number;

  private readonly clock: () => Date;

  constructor(
    private readonly connectors: ConnectorRepository,
    private readonly contentStore: ContentStore,
    private readonly queue: IndexingQueue,
    options: ConnectorServiceOptions = {},
  ) {
    this.lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    this.clock = options.clock ?? (() => new Date());
  }

  async createConnector(ownerId: string, input: CreateConnectorInput): Promise<ConnectorView> {
    const name = validateName(input.name);
    const settings = parseConnectorSettings(input.connectorType, input.config);

    const existing = await this.connectors.findByOwnerAndType(ownerId, settings.connectorType);
    if (existing) {
      throw new ConflictError(
        `A connector with type ${settings.connectorType} already exists for this owner.`,
      );
    }

    const connector = await this.connectors.create({
      ...settings,
      ownerId,
      name,
      isIndexable: isIndexableConnectorType(settings.connectorType),
    });
    log.info("Connector created", { connectorId: connector.id, type: connector.connectorType });
    return toView(connector);
  }

  async listConnectors(ownerId: string): Promise<ConnectorView[]> {
    const connectors = await this.connectors.listByOwner(ownerId);
    return connectors.map(toView);
  }

  async getConnector(ownerId: string, id: number): Promise<ConnectorView> {
    return toView(await this.requireOwned(ownerId, id));
  }

  async updateConnector(
    ownerId: string,
    id: number,
    input: UpdateConnectorInput,
  ): Promise<ConnectorView> {
    const existing = await this.requireOwned(ownerId, id);
    const name = input.name === undefined ? existing.name : validateName(input.name);
    const connectorType = input.connectorType ?? existing.connectorType;

    // A new type starts from an empty config; the same type merges into the stored one.
    const baseConfig: Record<string, unknown> =
      connectorType === existing.connectorType ? { ...existing.config } : {};
    const settings = parseConnectorSettings(connectorType, { ...baseConfig, ...input.config });

    if (settings.connectorType !== existing.connectorType) {
      const clash = await this.connectors.findByOwnerAndType(ownerId, settings.connectorType);
      if (clash && clash.id !== id) {
        throw new ConflictError(
          `A connector with type ${settings.connectorType} already exists for this owner.`,
        );
      }
    }

    const updated = await this.connectors.update(id, {
      ...settings,
      name,
      isIndexable: isIndexableConnectorType(settings.connectorType),
    });
    log.info("Connector updated", { connectorId: id, type: updated.connectorType });
    return toView(updated);
  }

  async deleteConnector(ownerId: string, id: number): Promise<{ deleted: true; id: number }> {
    await this.requireOwned(ownerId, id);
    await this.connectors.delete(id);
    log.info("Connector deleted", { connectorId: id });
    return { deleted: true, id };
  }

  /**
   * Queues an indexing run and returns the window it will cover. The preview
   * uses the checkpoint as read now; the run reads it again when it starts.
   */
  async triggerIndexing(
    ownerId: string,
    connectorId: number,
    searchSpaceId: number,
  ): Promise<TriggerIndexingResult> {
    const connector = await this.requireOwned(ownerId, connectorId);
    if (!connector.isIndexable) {
      throw new ValidationError(
        `Connector ${connectorId} (${connector.connectorType}) is not indexable.`,
      );
    }
    const space = await this.requireOwnedSpace(ownerId, searchSpaceId);

    const window = computeIndexingWindow(connector.lastIndexedAt, this.clock(), this.lookbackDays);
    const job = this.queue.submit({ connectorId, searchSpaceId });

    return {
      job,
      connectorType: connector.connectorType,
      searchSpace: space.name,
      indexingFrom: formatDay(window.since),
      indexingTo: formatDay(window.until),
    };
  }

  private async requireOwned(ownerId: string, id: number): Promise<SearchSourceConnector> {
    const connector = await this.connectors.get(id);
    if (!connector || connector.ownerId !== ownerId) {
      throw new NotFoundError(`Connector ${id} not found.`);
    }
    return connector;
  }

  private async requireOwnedSpace(ownerId: string, id: number): Promise<SearchSpaceRecord> {
    const space = await this.contentStore.getSearchSpace(id);
    if (!space || space.ownerId !== ownerId) {
      throw new NotFoundError(`Search space ${id} not found.`);
    }
    return space;
  }
}

function validateName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new ValidationError("Connector name must not be empty.");
  }
  if (trimmed.length > MAX_NAME_CHARS) {
    throw new ValidationError(`Connector name must be at most ${MAX_NAME_CHARS} characters.`);
  }
  return trimmed;
}

function toView(connector: SearchSourceConnector): ConnectorView {
  return {
    id: connector.id,
    name: connector.name,
    connectorType: connector.connectorType,
    config: redactConfig(connector.config),
    isIndexable: connector.isIndexable,
    lastIndexedAt: connector.lastIndexedAt ? connector.lastIndexedAt.toISOString() : null,
    createdAt: connector.createdAt,
  };
}

import type { ConnectorRepository } from "../domain/connectorRepository.js";
import type { ContentStore } from "../domain/contentStore.js";
import { NotFoundError, ValidationError, describeError } from "../domain/errors.js";
import { createConnectorSource } from "../infra/connectors/createConnectorSource.js";
import type { ConnectorSourceFactory } from "../infra/connectors/createConnectorSource.js";
import type { PendingItem } from "../infra/connectors/types.js";
import { logger } from "../lib/logger.js";
import {
  DEFAULT_LOOKBACK_DAYS,
  computeIndexingWindow,
  describeWindow,
} from "../pipelines/indexingWindow.js";
import type { IndexingWindow } from "../pipelines/indexingWindow.js";

const log = logger.child({ module: "connector-indexer" });

export type IndexingOutcome =
  | { status: "success" }
  | { status: "warning"; message: string }
  | { status: "failure"; message: string };

export interface FailedItem {
  itemId: string;
  reason: string;
}

export interface IndexingRunResult {
  connectorId: number;
  searchSpaceId: number;
  window: IndexingWindow;
  documentsIndexed: number;
  outcome: IndexingOutcome;
  failedItems: FailedItem[];
  checkpointAdvanced: boolean;
  startedAt: Date;
}

export interface ConnectorIndexerOptions {
  lookbackDays?: number;
  clock?: () => Date;
  sourceFactory?: ConnectorSourceFactory;
}

/**
 * A run with at least one written document moves the checkpoint, unless the
 * run is an outright failure or a warning that reports nothing indexed.
 */
export function shouldAdvanceCheckpoint(
  documentsIndexed: number,
  outcome: IndexingOutcome,
): boolean {
  if (documentsIndexed <= 0) {
    return false;
  }
  return (
    outcome.status === "success" ||
    (outcome.status === "warning" && outcome.message.includes("Indexed"))
  );
}

export class ConnectorIndexer {
  private readonly lookbackDays: number;

  private readonly clock: () => Date;

  private readonly sourceFactory: ConnectorSourceFactory;

  constructor(
    private readonly contentStore: ContentStore,
    private readonly connectors: ConnectorRepository,
    options: ConnectorIndexerOptions = {},
  ) {
    this.lookbackDays = options.lookbackDays ?? DEFAULT_LOOKBACK_DAYS;
    this.clock = options.clock ?? (() => new Date());
    this.sourceFactory = options.sourceFactory ?? ((settings) => createConnectorSource(settings));
  }

  async runIndexing(connectorId: number, searchSpaceId: number): Promise<IndexingRunResult> {
    const startedAt = this.clock();

    const connector = await this.connectors.get(connectorId);
    if (!connector) {
      throw new NotFoundError(`Connector ${connectorId} not found.`);
    }
    if (!connector.isIndexable) {
      throw new ValidationError(
        `Connector ${connectorId} (${connector.connectorType}) is not indexable.`,
      );
    }
    const space = await this.contentStore.getSearchSpace(searchSpaceId);
    if (!space || space.ownerId !== connector.ownerId) {
      throw new NotFoundError(`Search space ${searchSpaceId} not found.`);
    }

    const window = computeIndexingWindow(connector.lastIndexedAt, startedAt, this.lookbackDays);
    const source = this.sourceFactory(connector);
    const context = `[connector ${connectorId}, window ${window.since.toISOString()} to ${window.until.toISOString()}]`;
    log.info("Indexing run started", {
      connectorId,
      searchSpaceId,
      connectorType: connector.connectorType,
      since: window.since.toISOString(),
      until: window.until.toISOString(),
    });

    const finish = async (
      documentsIndexed: number,
      outcome: IndexingOutcome,
      failedItems: FailedItem[],
    ): Promise<IndexingRunResult> => {
      const checkpointAdvanced = shouldAdvanceCheckpoint(documentsIndexed, outcome);
      if (checkpointAdvanced) {
        await this.connectors.updateLastIndexedAt(connectorId, startedAt);
      }
      log.info("Indexing run finished", {
        connectorId,
        searchSpaceId,
        documentsIndexed,
        status: outcome.status,
        failedItems: failedItems.length,
        checkpointAdvanced,
      });
      return {
        connectorId,
        searchSpaceId,
        window,
        documentsIndexed,
        outcome,
        failedItems,
        checkpointAdvanced,
        startedAt,
      };
    };

    let items: PendingItem[];
    try {
      items = await source.fetchItems(window);
    } catch (error) {
      log.error("Connector fetch failed", { connectorId, error: describeError(error) });
      return finish(
        0,
        {
          status: "failure",
          message: `Failed to fetch ${source.label} items: ${describeError(error)} ${context}`,
        },
        [],
      );
    }

    if (items.length === 0) {
      return finish(
        0,
        {
          status: "warning",
          message: `No new ${source.label} items found between ${describeWindow(window)} [connector ${connectorId}]`,
        },
        [],
      );
    }

    let documentsIndexed = 0;
    const failedItems: FailedItem[] = [];
    for (const item of items) {
      try {
        const document = await item.build();
        await this.contentStore.createDocumentWithChunks({ ...document, searchSpaceId });
        documentsIndexed += 1;
      } catch (error) {
        const reason = describeError(error);
        log.warn("Connector item failed", { connectorId, itemId: item.itemId, reason });
        failedItems.push({ itemId: item.itemId, reason });
      }
    }

    const failures = failedItems.map((failed) => `${failed.itemId} (${failed.reason})`).join(", ");
    if (documentsIndexed === 0) {
      return finish(
        0,
        {
          status: "failure",
          message: `Failed to index all ${items.length} ${source.label} items: ${failures} ${context}`,
        },
        failedItems,
      );
    }
    if (failedItems.length > 0) {
      return finish(
        documentsIndexed,
        {
          status: "warning",
          message: `Indexed ${documentsIndexed} of ${items.length} ${source.label} items; ${failedItems.length} failed: ${failures} ${context}`,
        },
        failedItems,
      );
    }
    return finish(documentsIndexed, { status: "success" }, failedItems);
  }
}

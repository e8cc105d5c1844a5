import type { DocumentMetadata, DocumentType } from "../../domain/types.js";
import type { IndexingWindow } from "../../pipelines/indexingWindow.js";

/** Everything the content store needs to write one connector item. */
export interface ConnectorDocument {
  documentType: DocumentType;
  title: string;
  content: string;
  metadata: DocumentMetadata;
  chunkTexts: string[];
}

/**
 * An item listed by a source but not yet converted. `build` may do the item's
 * own API reads; a rejection fails only this item.
 */
export interface PendingItem {
  itemId: string;
  build(): Promise<ConnectorDocument>;
}

/** Stands in for an item whose reads already failed during listing. */
export function failedItem(itemId: string, error: unknown): PendingItem {
  return {
    itemId,
    build: async () => {
      throw error;
    },
  };
}

export interface ConnectorSource {
  /** Plural label used in run messages, e.g. "Slack". */
  readonly label: string;
  fetchItems(window: IndexingWindow): Promise<PendingItem[]>;
}

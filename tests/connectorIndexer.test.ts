import { beforeEach, describe, expect, it } from "vitest";
import type { ConnectorSettings } from "../src/domain/connectorConfig.js";
import { NotFoundError, ValidationError } from "../src/domain/errors.js";
import { NotionSource } from "../src/infra/connectors/notionSource.js";
import type {
  ConnectorDocument,
  ConnectorSource,
  PendingItem,
} from "../src/infra/connectors/types.js";
import { InMemoryConnectorRepository } from "../src/infra/store/inMemoryConnectorRepository.js";
import { InMemoryContentStore } from "../src/infra/store/inMemoryContentStore.js";
import type { IndexingWindow } from "../src/pipelines/indexingWindow.js";
import { ConnectorIndexer, shouldAdvanceCheckpoint } from "../src/services/connectorIndexer.js";
import { StubEmbeddingProvider, jsonResponse, stubFetch } from "./support/stubs.js";

const NOW = new Date("2026-03-15T10:30:00.000Z");
const YEAR_AGO = "2025-03-15T10:30:00.000Z";
const CONTEXT = `[connector 1, window ${YEAR_AGO} to ${NOW.toISOString()}]`;

class FakeSource implements ConnectorSource {
  readonly label = "Slack";

  readonly windows: IndexingWindow[] = [];

  items: PendingItem[] = [];

  fetchError: Error | null = null;

  async fetchItems(window: IndexingWindow): Promise<PendingItem[]> {
    this.windows.push(window);
    if (this.fetchError) {
      throw this.fetchError;
    }
    return this.items;
  }
}

function document(title: string, content: string): ConnectorDocument {
  return {
    documentType: "SLACK_CONNECTOR",
    title,
    content,
    metadata: { channel_name: title },
    chunkTexts: [content],
  };
}

function goodItem(itemId: string, content = `message in ${itemId}`): PendingItem {
  return { itemId, build: async () => document(itemId, content) };
}

function badItem(itemId: string, reason: string): PendingItem {
  return {
    itemId,
    build: async () => {
      throw new Error(reason);
    },
  };
}

describe("ConnectorIndexer", () => {
  let provider: StubEmbeddingProvider;
  let store: InMemoryContentStore;
  let connectors: InMemoryConnectorRepository;
  let source: FakeSource;
  let indexer: ConnectorIndexer;
  let spaceId: number;
  let connectorId: number;
  let builtFor: ConnectorSettings[];

  beforeEach(async () => {
    provider = new StubEmbeddingProvider();
    store = new InMemoryContentStore(provider, { dimension: 3, documentEmbeddingMaxChars: 500 });
    connectors = new InMemoryConnectorRepository();
    source = new FakeSource();
    builtFor = [];
    indexer = new ConnectorIndexer(store, connectors, {
      clock: () => NOW,
      sourceFactory: (settings) => {
        builtFor.push(settings);
        return source;
      },
    });

    spaceId = (await store.createSearchSpace("owner-1", { name: "Team" })).id;
    connectorId = (
      await connectors.create({
        ownerId: "owner-1",
        name: "Team Slack",
        isIndexable: true,
        connectorType: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret" },
      })
    ).id;
  });

  it("indexes every item and advances the checkpoint to the run start", async () => {
    source.items = [goodItem("C1"), goodItem("C2"), goodItem("C3")];

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.documentsIndexed).toBe(3);
    expect(result.outcome).toEqual({ status: "success" });
    expect(result.checkpointAdvanced).toBe(true);
    expect(result.window.since.toISOString()).toBe(YEAR_AGO);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toEqual(NOW);
    expect((await store.listDocuments()).map((doc) => doc.title)).toEqual(["C1", "C2", "C3"]);
    expect(builtFor[0]).toMatchObject({ connectorType: "SLACK_CONNECTOR" });
  });

  it("warns and keeps the checkpoint when nothing is new", async () => {
    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.documentsIndexed).toBe(0);
    expect(result.outcome).toEqual({
      status: "warning",
      message: `No new Slack items found between ${YEAR_AGO} and ${NOW.toISOString()} [connector 1]`,
    });
    expect(result.checkpointAdvanced).toBe(false);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toBeNull();
  });

  it("fails without touching the checkpoint when the fetch fails", async () => {
    source.fetchError = new Error("Slack API error: invalid_auth");

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.outcome).toEqual({
      status: "failure",
      message: `Failed to fetch Slack items: Slack API error: invalid_auth ${CONTEXT}`,
    });
    expect(result.documentsIndexed).toBe(0);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toBeNull();
  });

  it("keeps going past failed items and advances on partial success", async () => {
    source.items = [goodItem("C1"), badItem("C2", "bad payload"), goodItem("C3")];

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.documentsIndexed).toBe(2);
    expect(result.failedItems).toEqual([{ itemId: "C2", reason: "bad payload" }]);
    expect(result.outcome).toEqual({
      status: "warning",
      message: `Indexed 2 of 3 Slack items; 1 failed: C2 (bad payload) ${CONTEXT}`,
    });
    expect(result.checkpointAdvanced).toBe(true);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toEqual(NOW);
  });

  it("counts a failed store write as a failed item", async () => {
    provider.failWhen = (texts) => texts.some((text) => text.includes("poison"));
    source.items = [goodItem("C1", "poison pill"), goodItem("C2")];

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.documentsIndexed).toBe(1);
    expect(result.failedItems).toEqual([{ itemId: "C1", reason: "stub embedding failed" }]);
    expect((await store.listDocuments()).map((doc) => doc.title)).toEqual(["C2"]);
  });

  it("fails and keeps the checkpoint when every item fails", async () => {
    source.items = [badItem("C1", "no text"), badItem("C2", "bad ts")];

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(result.outcome).toEqual({
      status: "failure",
      message: `Failed to index all 2 Slack items: C1 (no text), C2 (bad ts) ${CONTEXT}`,
    });
    expect(result.checkpointAdvanced).toBe(false);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toBeNull();
  });

  it("starts from yesterday when the checkpoint is from today", async () => {
    await connectors.updateLastIndexedAt(connectorId, new Date("2026-03-15T01:00:00.000Z"));
    source.items = [goodItem("C1")];

    const result = await indexer.runIndexing(connectorId, spaceId);

    expect(source.windows[0].since.toISOString()).toBe("2026-03-14T00:00:00.000Z");
    expect(result.window.until).toEqual(NOW);
  });

  it("starts from an older checkpoint", async () => {
    const checkpoint = new Date("2026-03-10T12:00:00.000Z");
    await connectors.updateLastIndexedAt(connectorId, checkpoint);

    await indexer.runIndexing(connectorId, spaceId);

    expect(source.windows[0].since).toEqual(checkpoint);
    expect((await connectors.get(connectorId))?.lastIndexedAt).toEqual(checkpoint);
  });

  it("rejects connectors that cannot be indexed", async () => {
    const search = await connectors.create({
      ownerId: "owner-1",
      name: "Web search",
      isIndexable: false,
      connectorType: "TAVILY_API",
      config: { TAVILY_API_KEY: "test-secret" },
    });

    await expect(indexer.runIndexing(search.id, spaceId)).rejects.toBeInstanceOf(ValidationError);
    expect(source.windows).toEqual([]);
  });

  it("rejects unknown connectors and foreign search spaces", async () => {
    const foreign = await store.createSearchSpace("owner-2", { name: "Other" });

    await expect(indexer.runIndexing(99, spaceId)).rejects.toBeInstanceOf(NotFoundError);
    await expect(indexer.runIndexing(connectorId, foreign.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    await expect(indexer.runIndexing(connectorId, 404)).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe("ConnectorIndexer with a Notion source", () => {
  const page = (id: string, title: string) => ({
    id,
    url: `https://notion.example/${id}`,
    last_edited_time: "2026-03-15T09:00:00.000Z",
    properties: { Name: { type: "title", title: [{ plain_text: title }] } },
  });

  it("indexes the readable page when another page's blocks fail", async () => {
    const { fetchImpl } = stubFetch({
      "https://api.notion.com/v1/search": () =>
        jsonResponse({ results: [page("p1", "Roadmap"), page("p2", "Specs")] }),
      "https://api.notion.com/v1/blocks/p1/children": () =>
        jsonResponse({
          results: [
            {
              id: "b1",
              type: "paragraph",
              paragraph: { rich_text: [{ plain_text: "apple notes" }] },
            },
          ],
        }),
      "https://api.notion.com/v1/blocks/p2/children": () => new Response("boom", { status: 500 }),
    });
    const store = new InMemoryContentStore(new StubEmbeddingProvider(), {
      dimension: 3,
      documentEmbeddingMaxChars: 500,
    });
    const connectors = new InMemoryConnectorRepository();
    const config = { NOTION_INTEGRATION_TOKEN: "test-secret" };
    const indexer = new ConnectorIndexer(store, connectors, {
      clock: () => NOW,
      sourceFactory: () => new NotionSource(config, { fetchImpl }),
    });
    const space = await store.createSearchSpace("owner-1", { name: "Docs" });
    const connector = await connectors.create({
      ownerId: "owner-1",
      name: "Notion",
      isIndexable: true,
      connectorType: "NOTION_CONNECTOR",
      config,
    });

    const result = await indexer.runIndexing(connector.id, space.id);

    expect(result.documentsIndexed).toBe(1);
    expect(result.outcome).toEqual({
      status: "warning",
      message: `Indexed 1 of 2 Notion items; 1 failed: p2 (Notion API request failed (500): boom) ${CONTEXT}`,
    });
    expect(result.checkpointAdvanced).toBe(true);
    expect((await connectors.get(connector.id))?.lastIndexedAt).toEqual(NOW);
    expect((await store.listDocuments()).map((doc) => doc.title)).toEqual(["Notion - Roadmap"]);
  });
});

describe("shouldAdvanceCheckpoint", () => {
  it("requires documents and a success or partial-success outcome", () => {
    expect(shouldAdvanceCheckpoint(3, { status: "success" })).toBe(true);
    expect(shouldAdvanceCheckpoint(0, { status: "success" })).toBe(false);
    expect(shouldAdvanceCheckpoint(2, { status: "warning", message: "Indexed 2 of 3 items" })).toBe(
      true,
    );
    expect(shouldAdvanceCheckpoint(2, { status: "warning", message: "No new items found" })).toBe(
      false,
    );
    expect(shouldAdvanceCheckpoint(1, { status: "failure", message: "Indexed nothing" })).toBe(
      false,
    );
  });
});

import { beforeEach, describe, expect, it } from "vitest";
import { ConflictError, NotFoundError, ValidationError } from "../src/domain/errors.js";
import { InMemoryConnectorRepository } from "../src/infra/store/inMemoryConnectorRepository.js";
import { InMemoryContentStore } from "../src/infra/store/inMemoryContentStore.js";
import type { IndexingRunResult } from "../src/services/connectorIndexer.js";
import { ConnectorService } from "../src/services/connectorService.js";
import { IndexingQueue } from "../src/services/indexingQueue.js";
import type { IndexingRequest } from "../src/services/indexingQueue.js";
import { StubEmbeddingProvider } from "./support/stubs.js";

const NOW = new Date("2026-03-15T10:30:00.000Z");

describe("ConnectorService", () => {
  let store: InMemoryContentStore;
  let connectors: InMemoryConnectorRepository;
  let queue: IndexingQueue;
  let service: ConnectorService;
  let runs: IndexingRequest[];

  beforeEach(() => {
    store = new InMemoryContentStore(new StubEmbeddingProvider(), {
      dimension: 3,
      documentEmbeddingMaxChars: 500,
    });
    connectors = new InMemoryConnectorRepository();
    runs = [];
    queue = new IndexingQueue(async (request): Promise<IndexingRunResult> => {
      runs.push(request);
      return {
        ...request,
        window: { since: NOW, until: NOW },
        documentsIndexed: 0,
        outcome: { status: "warning", message: "No new items" },
        failedItems: [],
        checkpointAdvanced: false,
        startedAt: NOW,
      };
    });
    service = new ConnectorService(connectors, store, queue, { clock: () => NOW });
  });

  it("creates a connector with a redacted view", async () => {
    const view = await service.createConnector("owner-1", {
      name: "  Engineering GitHub ",
      connectorType: "GITHUB_CONNECTOR",
      config: { GITHUB_PAT: "test-secret", repo_full_names: ["acme/widgets"] },
    });

    expect(view).toMatchObject({
      id: 1,
      name: "Engineering GitHub",
      connectorType: "GITHUB_CONNECTOR",
      config: { GITHUB_PAT: "***", repo_full_names: ["acme/widgets"] },
      isIndexable: true,
      lastIndexedAt: null,
    });
    const stored = await connectors.get(1);
    expect(stored?.config).toEqual({
      GITHUB_PAT: "test-secret",
      repo_full_names: ["acme/widgets"],
    });
  });

  it("marks live search connectors as not indexable", async () => {
    const view = await service.createConnector("owner-1", {
      name: "Search",
      connectorType: "SERPER_API",
      config: { SERPER_API_KEY: "test-secret" },
    });

    expect(view.isIndexable).toBe(false);
    expect(view.config).toEqual({ SERPER_API_KEY: "***" });
  });

  it("rejects invalid names and configs", async () => {
    await expect(
      service.createConnector("owner-1", {
        name: "   ",
        connectorType: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret" },
      }),
    ).rejects.toThrow("Connector name must not be empty.");
    await expect(
      service.createConnector("owner-1", {
        name: "Slack",
        connectorType: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret", extra: true },
      }),
    ).rejects.toBeInstanceOf(ValidationError);
    await expect(
      service.createConnector("owner-1", {
        name: "x".repeat(101),
        connectorType: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret" },
      }),
    ).rejects.toThrow("Connector name must be at most 100 characters.");
  });

  it("allows one connector per type for each owner", async () => {
    const input = {
      name: "Slack",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    };
    await service.createConnector("owner-1", input);

    await expect(service.createConnector("owner-1", input)).rejects.toBeInstanceOf(ConflictError);
    await expect(service.createConnector("owner-2", input)).resolves.toMatchObject({ id: 2 });
  });

  it("merges config updates for the same type", async () => {
    await service.createConnector("owner-1", {
      name: "GitHub",
      connectorType: "GITHUB_CONNECTOR",
      config: { GITHUB_PAT: "test-secret", repo_full_names: ["acme/widgets"] },
    });

    const view = await service.updateConnector("owner-1", 1, {
      config: { repo_full_names: ["acme/gadgets"] },
    });

    expect(view.name).toBe("GitHub");
    expect((await connectors.get(1))?.config).toEqual({
      GITHUB_PAT: "test-secret",
      repo_full_names: ["acme/gadgets"],
    });
  });

  it("requires a full config when the type changes", async () => {
    await service.createConnector("owner-1", {
      name: "Source",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    });

    await expect(
      service.updateConnector("owner-1", 1, { connectorType: "NOTION_CONNECTOR" }),
    ).rejects.toBeInstanceOf(ValidationError);

    const view = await service.updateConnector("owner-1", 1, {
      connectorType: "NOTION_CONNECTOR",
      config: { NOTION_INTEGRATION_TOKEN: "test-secret" },
    });
    expect(view).toMatchObject({
      connectorType: "NOTION_CONNECTOR",
      config: { NOTION_INTEGRATION_TOKEN: "***" },
    });
  });

  it("rejects a type change onto a type the owner already has", async () => {
    await service.createConnector("owner-1", {
      name: "Slack",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    });
    await service.createConnector("owner-1", {
      name: "Notion",
      connectorType: "NOTION_CONNECTOR",
      config: { NOTION_INTEGRATION_TOKEN: "test-secret" },
    });

    await expect(
      service.updateConnector("owner-1", 2, {
        connectorType: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret" },
      }),
    ).rejects.toBeInstanceOf(ConflictError);
  });

  it("hides other owners' connectors", async () => {
    await service.createConnector("owner-1", {
      name: "Slack",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    });

    await expect(service.getConnector("owner-2", 1)).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.deleteConnector("owner-2", 1)).rejects.toBeInstanceOf(NotFoundError);
    expect(await service.listConnectors("owner-2")).toEqual([]);
    expect(await service.deleteConnector("owner-1", 1)).toEqual({ deleted: true, id: 1 });
    expect(await service.listConnectors("owner-1")).toEqual([]);
  });

  it("queues an indexing run and previews its window", async () => {
    const space = await store.createSearchSpace("owner-1", { name: "Team" });
    await service.createConnector("owner-1", {
      name: "Slack",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    });
    await connectors.updateLastIndexedAt(1, new Date("2026-03-15T02:00:00.000Z"));

    const triggered = await service.triggerIndexing("owner-1", 1, space.id);
    await queue.onIdle();

    expect(triggered).toMatchObject({
      connectorType: "SLACK_CONNECTOR",
      searchSpace: "Team",
      indexingFrom: "2026-03-14",
      indexingTo: "2026-03-15",
    });
    expect(triggered.job.status).toBe("queued");
    expect(runs).toEqual([{ connectorId: 1, searchSpaceId: space.id }]);
    expect(queue.getJob(triggered.job.id)?.status).toBe("completed");
  });

  it("refuses to index live search connectors or foreign spaces", async () => {
    const foreign = await store.createSearchSpace("owner-2", { name: "Theirs" });
    const own = await store.createSearchSpace("owner-1", { name: "Mine" });
    await service.createConnector("owner-1", {
      name: "Search",
      connectorType: "TAVILY_API",
      config: { TAVILY_API_KEY: "test-secret" },
    });
    await service.createConnector("owner-1", {
      name: "Slack",
      connectorType: "SLACK_CONNECTOR",
      config: { SLACK_BOT_TOKEN: "test-secret" },
    });

    await expect(service.triggerIndexing("owner-1", 1, own.id)).rejects.toBeInstanceOf(
      ValidationError,
    );
    await expect(service.triggerIndexing("owner-1", 2, foreign.id)).rejects.toBeInstanceOf(
      NotFoundError,
    );
    expect(queue.listJobs()).toEqual([]);
  });
});

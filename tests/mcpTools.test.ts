import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createAppServer, createToolContext } from "../src/app.js";
import { loadConfig } from "../src/config/env.js";
import type { ConnectorSource } from "../src/infra/connectors/types.js";
import { InMemoryConnectorRepository } from "../src/infra/store/inMemoryConnectorRepository.js";
import { InMemoryContentStore } from "../src/infra/store/inMemoryContentStore.js";
import type { ToolContext } from "../src/tools/toolResult.js";
import { StubEmbeddingProvider } from "./support/stubs.js";

const NOW = new Date("2026-03-15T10:30:00.000Z");

const slackSource: ConnectorSource = {
  label: "Slack",
  fetchItems: async () => [
    {
      itemId: "C1",
      build: async () => ({
        documentType: "SLACK_CONNECTOR",
        title: "Slack - general",
        content: "[2026-03-15 09:00:00] <U1>: cherry picking done",
        metadata: { channel_id: "C1" },
        chunkTexts: ["[2026-03-15 09:00:00] <U1>: cherry picking done"],
      }),
    },
  ],
};

describe("MCP tools", () => {
  let context: ToolContext;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    const provider = new StubEmbeddingProvider();
    const store = new InMemoryContentStore(provider, {
      dimension: 3,
      documentEmbeddingMaxChars: 500,
    });
    context = createToolContext(
      loadConfig({ OWNER_ID: "owner-1" }),
      provider,
      store,
      new InMemoryConnectorRepository(),
      { clock: () => NOW, sourceFactory: () => slackSource },
    );
    server = createAppServer(context);

    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connect(serverTransport);
    client = new Client({ name: "tools-test", version: "0.0.0" });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await server.close();
    await context.queue.close();
  });

  async function call(name: string, args: Record<string, unknown> = {}) {
    const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
    const first = result.content[0];
    if (!first || first.type !== "text") {
      throw new Error(`Tool ${name} returned no text content.`);
    }
    return { isError: result.isError ?? false, text: first.text };
  }

  async function callJson(name: string, args: Record<string, unknown> = {}): Promise<unknown> {
    const { text } = await call(name, args);
    return JSON.parse(text);
  }

  it("answers the health check", async () => {
    expect(await call("health_check", { name: "tester" })).toEqual({
      isError: false,
      text: "search-space-mcp is running. hello tester",
    });
  });

  it("adds a document and finds its chunk through both rankings", async () => {
    expect(await callJson("create_search_space", { name: "Team" })).toMatchObject({
      id: 1,
      name: "Team",
      ownerId: "owner-1",
    });
    expect(
      await callJson("add_document", { search_space_id: 1, title: "Pie", content: "apple pie" }),
    ).toMatchObject({ id: 1, search_space_id: 1, document_type: "FILE" });
    expect(await callJson("get_document", { document_id: 1 })).toMatchObject({
      title: "Pie",
      content: "apple pie",
      chunks: [{ id: 1, index: 0, content: "apple pie" }],
    });

    expect(await callJson("search_chunks", { query: "apple" })).toEqual({
      query: "apple",
      hits: [
        {
          score: 0.032787,
          vector_rank: 1,
          lexical_rank: 1,
          chunk_id: 1,
          chunk_index: 0,
          document_id: 1,
          document_title: "Pie",
          search_space_id: 1,
          snippet: "apple pie",
        },
      ],
    });
  });

  it("reports domain errors as tool errors", async () => {
    const result = await call("delete_search_space", { search_space_id: 99 });

    expect(result.isError).toBe(true);
    expect(JSON.parse(result.text)).toEqual({
      error: { code: "NOT_FOUND", message: "Search space 99 not found." },
    });
  });

  it("indexes a connector in the background", async () => {
    await callJson("create_search_space", { name: "Team" });
    expect(
      await callJson("create_connector", {
        name: "Slack",
        connector_type: "SLACK_CONNECTOR",
        config: { SLACK_BOT_TOKEN: "test-secret" },
      }),
    ).toMatchObject({ id: 1, config: { SLACK_BOT_TOKEN: "***" }, isIndexable: true });

    expect(
      await callJson("index_connector", { connector_id: 1, search_space_id: 1 }),
    ).toMatchObject({
      status: "queued",
      connector_type: "SLACK_CONNECTOR",
      search_space: "Team",
      indexing_from: "2025-03-15",
      indexing_to: "2026-03-15",
    });
    await context.queue.onIdle();

    expect(await callJson("list_indexing_jobs")).toMatchObject({
      jobs: [
        {
          status: "completed",
          documents_indexed: 1,
          outcome: { status: "success" },
          checkpoint_advanced: true,
        },
      ],
    });
    expect(await callJson("get_connector", { connector_id: 1 })).toMatchObject({
      lastIndexedAt: NOW.toISOString(),
    });
    expect(await callJson("list_documents")).toMatchObject({
      documents: [{ title: "Slack - general", document_type: "SLACK_CONNECTOR" }],
    });
  });
});

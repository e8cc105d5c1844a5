import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { AppConfig } from "./config/env.js";
import type { ConnectorRepository } from "./domain/connectorRepository.js";
import type { ContentStore } from "./domain/contentStore.js";
import type { EmbeddingProvider } from "./infra/ai/types.js";
import type { ConnectorSourceFactory } from "./infra/connectors/createConnectorSource.js";
import { ConnectorIndexer } from "./services/connectorIndexer.js";
import { ConnectorService } from "./services/connectorService.js";
import { HybridRetriever } from "./services/hybridRetriever.js";
import { IndexingQueue } from "./services/indexingQueue.js";
import { SearchSpaceService } from "./services/searchSpaceService.js";
import { registerConnectorTools } from "./tools/connectors.js";
import { registerDocumentTools } from "./tools/documents.js";
import { registerIndexConnectorTools } from "./tools/indexConnector.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";
import { registerSearchDocumentsTool } from "./tools/searchDocuments.js";
import { registerSearchSpaceTools } from "./tools/searchSpaces.js";
import type { ToolContext } from "./tools/toolResult.js";

export const SERVER_NAME = "search-space-mcp";
export const SERVER_VERSION = "0.1.0";

export type ServiceConfig = Pick<
  AppConfig,
  | "ownerId"
  | "rrfRankConstant"
  | "searchOversampleFactor"
  | "indexingConcurrency"
  | "indexingLookbackDays"
>;

export interface ServiceOverrides {
  sourceFactory?: ConnectorSourceFactory;
  clock?: () => Date;
}

/** Wires stores, retrievers, the indexer and its queue into one tool context. */
export function createToolContext(
  config: ServiceConfig,
  embeddingProvider: EmbeddingProvider,
  contentStore: ContentStore,
  connectors: ConnectorRepository,
  overrides: ServiceOverrides = {},
): ToolContext {
  const retrieverOptions = {
    rankConstant: config.rrfRankConstant,
    oversampleFactor: config.searchOversampleFactor,
  };
  const indexer = new ConnectorIndexer(contentStore, connectors, {
    lookbackDays: config.indexingLookbackDays,
    clock: overrides.clock,
    sourceFactory: overrides.sourceFactory,
  });
  const queue = new IndexingQueue(
    (request) => indexer.runIndexing(request.connectorId, request.searchSpaceId),
    config.indexingConcurrency,
  );

  return {
    ownerId: config.ownerId,
    queue,
    searchSpaces: new SearchSpaceService({
      contentStore,
      chunkRetriever: new HybridRetriever(contentStore.chunks, embeddingProvider, retrieverOptions),
      documentRetriever: new HybridRetriever(
        contentStore.documents,
        embeddingProvider,
        retrieverOptions,
      ),
    }),
    connectors: new ConnectorService(connectors, contentStore, queue, {
      lookbackDays: config.indexingLookbackDays,
      clock: overrides.clock,
    }),
  };
}

export function createAppServer(context: ToolContext): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerSearchSpaceTools(server, context);
  registerDocumentTools(server, context);
  registerSearchChunksTool(server, context);
  registerSearchDocumentsTool(server, context);
  registerConnectorTools(server, context);
  registerIndexConnectorTools(server, context);

  return server;
}

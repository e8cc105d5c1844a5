#!/usr/bin/env node
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { createAppServer, createToolContext } from "./app.js";
import { loadConfig } from "./config/env.js";
import { McpHttpServer } from "./httpServer.js";
import { createEmbeddingProvider } from "./infra/ai/defaultEmbeddingProvider.js";
import { createContentStore } from "./infra/store/createContentStore.js";
import { logger } from "./lib/logger.js";

const log = logger.child({ module: "server" });

async function main() {
  const config = loadConfig();
  const embeddingProvider = createEmbeddingProvider(config);
  const { contentStore, connectors, close } = await createContentStore(
    config,
    embeddingProvider,
  );

  const context = createToolContext(config, embeddingProvider, contentStore, connectors);

  // Drain running indexing jobs before the store closes under them.
  const shutdownTasks: Array<() => Promise<void>> = [
    () => context.queue.close(),
    close,
  ];

  if (config.transport === "http") {
    const httpServer = new McpHttpServer({ host: config.host, port: config.port, context });
    await httpServer.listen();
    shutdownTasks.unshift(() => httpServer.close());
  } else {
    await runStdioServer(createAppServer(context));
    log.info("MCP stdio server ready");
  }

  const shutdown = async () => {
    log.info("Shutting down");
    try {
      for (const task of shutdownTasks) {
        await task();
      }
      process.exit(0);
    } catch (error) {
      log.error("Shutdown failed", { error });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

async function runStdioServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error) => {
  log.error("Failed to start MCP server", { error });
  process.exit(1);
});

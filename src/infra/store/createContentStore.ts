import type { AppConfig } from "../../config/env.js";
import type { ConnectorRepository } from "../../domain/connectorRepository.js";
import type { ContentStore } from "../../domain/contentStore.js";
import { logger } from "../../lib/logger.js";
import type { EmbeddingProvider } from "../ai/types.js";
import { createPostgresPool } from "../db/postgres.js";
import { InMemoryConnectorRepository } from "./inMemoryConnectorRepository.js";
import { InMemoryContentStore } from "./inMemoryContentStore.js";
import { PgConnectorRepository } from "./pgConnectorRepository.js";
import { PgContentStore } from "./pgContentStore.js";

const log = logger.child({ module: "store" });

export interface StoreBootstrapResult {
  contentStore: ContentStore;
  connectors: ConnectorRepository;
  close: () => Promise<void>;
}

export async function createContentStore(
  config: AppConfig,
  embeddingProvider: EmbeddingProvider,
): Promise<StoreBootstrapResult> {
  const options = {
    dimension: config.vectorDimension,
    documentEmbeddingMaxChars: config.documentEmbeddingMaxChars,
  };

  if (!config.enablePgvector) {
    log.info("Using in-memory content store", { dimension: options.dimension });
    const contentStore = new InMemoryContentStore(embeddingProvider, options);
    return {
      contentStore,
      connectors: new InMemoryConnectorRepository(),
      close: async () => {
        await contentStore.close();
      },
    };
  }

  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is required when pgvector is enabled.");
  }

  const pool = createPostgresPool(config.databaseUrl);
  const contentStore = new PgContentStore(pool, embeddingProvider, options);
  await contentStore.initialize();
  log.info("Using pgvector content store", { dimension: options.dimension });

  return {
    contentStore,
    connectors: new PgConnectorRepository(pool),
    close: async () => {
      await contentStore.close();
    },
  };
}

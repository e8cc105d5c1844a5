import { z } from "zod";

const envSchema = z.object({
  DATABASE_URL: z.string().optional(),
  ENABLE_PGVECTOR: z.enum(["true", "false"]).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  EMBEDDING_PROVIDER: z.enum(["openai", "ollama"]).optional(),
  OLLAMA_BASE_URL: z.string().default("http://127.0.0.1:11434"),
  OLLAMA_EMBEDDING_MODEL: z.string().default("nomic-embed-text"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  DOCUMENT_EMBEDDING_MAX_CHARS: z.coerce.number().int().positive().default(8000),
  RRF_RANK_CONSTANT: z.coerce.number().int().positive().default(60),
  SEARCH_OVERSAMPLE_FACTOR: z.coerce.number().int().min(1).max(10).default(3),
  INDEXING_CONCURRENCY: z.coerce.number().int().positive().default(2),
  INDEXING_LOOKBACK_DAYS: z.coerce.number().int().positive().default(365),
  OWNER_ID: z.string().min(1).default("local-user"),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("stdio"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(3000),
});

export type EmbeddingProviderName = "openai" | "ollama";

export interface AppConfig {
  enablePgvector: boolean;
  databaseUrl: string | null;
  openaiApiKey: string | null;
  embeddingModel: string;
  embeddingProvider: EmbeddingProviderName;
  ollamaBaseUrl: string;
  ollamaEmbeddingModel: string;
  vectorDimension: number;
  documentEmbeddingMaxChars: number;
  rrfRankConstant: number;
  searchOversampleFactor: number;
  indexingConcurrency: number;
  indexingLookbackDays: number;
  ownerId: string;
  transport: "stdio" | "http";
  host: string;
  port: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  const enablePgvector = parsed.ENABLE_PGVECTOR === "true";

  if (enablePgvector && !parsed.DATABASE_URL) {
    throw new Error("ENABLE_PGVECTOR=true requires DATABASE_URL.");
  }

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ?? (parsed.OPENAI_API_KEY ? "openai" : "ollama");

  if (embeddingProvider === "openai" && !parsed.OPENAI_API_KEY) {
    throw new Error("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  return {
    enablePgvector,
    databaseUrl: parsed.DATABASE_URL ?? null,
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    embeddingModel: parsed.OPENAI_EMBEDDING_MODEL,
    embeddingProvider,
    ollamaBaseUrl: parsed.OLLAMA_BASE_URL,
    ollamaEmbeddingModel: parsed.OLLAMA_EMBEDDING_MODEL,
    vectorDimension: parsed.VECTOR_DIMENSION,
    documentEmbeddingMaxChars: parsed.DOCUMENT_EMBEDDING_MAX_CHARS,
    rrfRankConstant: parsed.RRF_RANK_CONSTANT,
    searchOversampleFactor: parsed.SEARCH_OVERSAMPLE_FACTOR,
    indexingConcurrency: parsed.INDEXING_CONCURRENCY,
    indexingLookbackDays: parsed.INDEXING_LOOKBACK_DAYS,
    ownerId: parsed.OWNER_ID,
    transport: parsed.MCP_TRANSPORT,
    host: parsed.MCP_HOST,
    port: parsed.MCP_PORT,
  };
}

import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

export function registerSearchDocumentsTool(server: McpServer, context: ToolContext) {
  server.registerTool(
    "search_documents",
    {
      title: "Search Documents",
      description: "Hybrid search over whole documents, fused by reciprocal rank.",
      inputSchema: {
        query: z.string().describe("Search query"),
        top_k: z.number().int().min(1).max(100).optional().describe("Max hits"),
        search_space_ids: z
          .array(z.number().int().positive())
          .optional()
          .describe("Limit the search to these search spaces"),
      },
    },
    async ({ query, top_k, search_space_ids }) =>
      runTool(async () => {
        const hits = await context.searchSpaces.searchDocuments(
          context.ownerId,
          query,
          top_k ?? 5,
          search_space_ids,
        );
        return {
          query,
          hits: hits.map((hit) => ({
            score: Number(hit.score.toFixed(6)),
            vector_rank: hit.vectorRank,
            lexical_rank: hit.lexicalRank,
            document_id: hit.entity.id,
            title: hit.entity.title,
            document_type: hit.entity.documentType,
            search_space_id: hit.entity.searchSpaceId,
            metadata: hit.entity.metadata,
            snippet: hit.entity.content.slice(0, 240),
          })),
        };
      }),
  );
}

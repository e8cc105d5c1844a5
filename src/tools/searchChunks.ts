import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

export function registerSearchChunksTool(server: McpServer, context: ToolContext) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description:
        "Hybrid (vector + full-text) search over document chunks, fused by reciprocal rank.",
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
        const hits = await context.searchSpaces.searchChunks(
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
            chunk_id: hit.entity.id,
            chunk_index: hit.entity.index,
            document_id: hit.entity.document.id,
            document_title: hit.entity.document.title,
            search_space_id: hit.entity.document.searchSpaceId,
            snippet: hit.entity.content.slice(0, 240),
          })),
        };
      }),
  );
}

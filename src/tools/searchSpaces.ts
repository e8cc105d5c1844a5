import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

export function registerSearchSpaceTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "create_search_space",
    {
      title: "Create Search Space",
      description: "Creates a search space that groups documents for retrieval.",
      inputSchema: {
        name: z.string().min(1).max(100).describe("Search space name"),
        description: z.string().max(500).optional().describe("Optional description"),
      },
    },
    async ({ name, description }) =>
      runTool(() => context.searchSpaces.createSearchSpace(context.ownerId, { name, description })),
  );

  server.registerTool(
    "list_search_spaces",
    {
      title: "List Search Spaces",
      description: "Lists the search spaces owned by the current user.",
      inputSchema: {},
    },
    async () =>
      runTool(async () => ({
        search_spaces: await context.searchSpaces.listSearchSpaces(context.ownerId),
      })),
  );

  server.registerTool(
    "update_search_space",
    {
      title: "Update Search Space",
      description: "Renames a search space or changes its description.",
      inputSchema: {
        search_space_id: z.number().int().positive().describe("Search space id"),
        name: z.string().min(1).max(100).optional().describe("New name"),
        description: z
          .string()
          .max(500)
          .nullable()
          .optional()
          .describe("New description; null clears it"),
      },
    },
    async ({ search_space_id, name, description }) =>
      runTool(() =>
        context.searchSpaces.updateSearchSpace(context.ownerId, search_space_id, {
          name,
          description,
        }),
      ),
  );

  server.registerTool(
    "delete_search_space",
    {
      title: "Delete Search Space",
      description: "Deletes a search space together with its documents and chunks.",
      inputSchema: {
        search_space_id: z.number().int().positive().describe("Search space id"),
      },
    },
    async ({ search_space_id }) =>
      runTool(() => context.searchSpaces.deleteSearchSpace(context.ownerId, search_space_id)),
  );
}

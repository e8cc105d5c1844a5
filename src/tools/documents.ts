import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { DOCUMENT_TYPES } from "../domain/types.js";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

export function registerDocumentTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "add_document",
    {
      title: "Add Document",
      description: "Chunks, embeds and stores a raw-text document in a search space.",
      inputSchema: {
        search_space_id: z.number().int().positive().describe("Target search space id"),
        title: z.string().min(1).max(200).describe("Document title"),
        content: z.string().min(1).describe("Document text"),
        document_type: z.enum(DOCUMENT_TYPES).optional().describe("Defaults to FILE"),
        metadata: z.record(z.unknown()).optional().describe("Free-form metadata"),
      },
    },
    async ({ search_space_id, title, content, document_type, metadata }) =>
      runTool(async () => {
        const document = await context.searchSpaces.addTextDocument(
          context.ownerId,
          search_space_id,
          { title, content, documentType: document_type, metadata },
        );
        return {
          id: document.id,
          search_space_id: document.searchSpaceId,
          title: document.title,
          document_type: document.documentType,
          created_at: document.createdAt,
        };
      }),
  );

  server.registerTool(
    "list_documents",
    {
      title: "List Documents",
      description: "Lists documents in the caller's search spaces.",
      inputSchema: {
        search_space_ids: z
          .array(z.number().int().positive())
          .optional()
          .describe("Limit the listing to these search spaces"),
        limit: z.number().int().positive().optional().describe("Max documents returned"),
      },
    },
    async ({ search_space_ids, limit }) =>
      runTool(async () => {
        const documents = await context.searchSpaces.listDocuments(
          context.ownerId,
          search_space_ids,
          limit,
        );
        return {
          documents: documents.map((document) => ({
            id: document.id,
            search_space_id: document.searchSpaceId,
            title: document.title,
            document_type: document.documentType,
            metadata: document.metadata,
            created_at: document.createdAt,
          })),
        };
      }),
  );

  server.registerTool(
    "get_document",
    {
      title: "Get Document",
      description: "Returns a document's full content and its chunks.",
      inputSchema: {
        document_id: z.number().int().positive().describe("Document id"),
      },
    },
    async ({ document_id }) =>
      runTool(async () => {
        const { document, chunks } = await context.searchSpaces.getDocument(
          context.ownerId,
          document_id,
        );
        return {
          id: document.id,
          search_space_id: document.searchSpaceId,
          title: document.title,
          document_type: document.documentType,
          metadata: document.metadata,
          content: document.content,
          created_at: document.createdAt,
          chunks: chunks.map((chunk) => ({
            id: chunk.id,
            index: chunk.index,
            content: chunk.content,
          })),
        };
      }),
  );

  server.registerTool(
    "update_document",
    {
      title: "Update Document",
      description: "Replaces a document's title, content or metadata and re-indexes it.",
      inputSchema: {
        document_id: z.number().int().positive().describe("Document id"),
        title: z.string().min(1).max(200).optional().describe("New title"),
        content: z.string().min(1).optional().describe("New text"),
        metadata: z.record(z.unknown()).optional().describe("Replacement metadata"),
      },
    },
    async ({ document_id, title, content, metadata }) =>
      runTool(async () => {
        const document = await context.searchSpaces.updateTextDocument(
          context.ownerId,
          document_id,
          { title, content, metadata },
        );
        return {
          id: document.id,
          search_space_id: document.searchSpaceId,
          title: document.title,
          document_type: document.documentType,
          created_at: document.createdAt,
        };
      }),
  );

  server.registerTool(
    "delete_document",
    {
      title: "Delete Document",
      description: "Deletes a document and its chunks.",
      inputSchema: {
        document_id: z.number().int().positive().describe("Document id"),
      },
    },
    async ({ document_id }) =>
      runTool(() => context.searchSpaces.deleteDocument(context.ownerId, document_id)),
  );
}

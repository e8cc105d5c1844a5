import type { CallToolResult } from "@modelcontextprotocol/sdk/types.js";
import { AppError } from "../domain/errors.js";
import type { ConnectorService } from "../services/connectorService.js";
import type { IndexingQueue } from "../services/indexingQueue.js";
import type { SearchSpaceService } from "../services/searchSpaceService.js";

export interface ToolContext {
  ownerId: string;
  searchSpaces: SearchSpaceService;
  connectors: ConnectorService;
  queue: IndexingQueue;
}

export function jsonResult(payload: unknown): CallToolResult {
  return {
    content: [
      {
        type: "text",
        text: JSON.stringify(payload, null, 2),
      },
    ],
  };
}

/**
 * Runs a tool body and renders its value as JSON text. Domain errors become
 * an `isError` result carrying the serialized error; anything else propagates
 * to the MCP server.
 */
export async function runTool(task: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    return jsonResult(await task());
  } catch (error) {
    if (error instanceof AppError) {
      return { ...jsonResult({ error: error.serialize() }), isError: true };
    }
    throw error;
  }
}

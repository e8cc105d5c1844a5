import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { CONNECTOR_TYPES } from "../domain/types.js";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

const connectorId = z.number().int().positive().describe("Connector id");

export function registerConnectorTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "create_connector",
    {
      title: "Create Connector",
      description:
        "Adds a search source connector. One connector per type; config fields depend on the type.",
      inputSchema: {
        name: z.string().min(1).max(100).describe("Connector name"),
        connector_type: z.enum(CONNECTOR_TYPES).describe("Connector type"),
        config: z.record(z.unknown()).describe("Credentials and options for the type"),
      },
    },
    async ({ name, connector_type, config }) =>
      runTool(() =>
        context.connectors.createConnector(context.ownerId, {
          name,
          connectorType: connector_type,
          config,
        }),
      ),
  );

  server.registerTool(
    "list_connectors",
    {
      title: "List Connectors",
      description: "Lists configured connectors with secrets masked.",
      inputSchema: {},
    },
    async () =>
      runTool(async () => ({
        connectors: await context.connectors.listConnectors(context.ownerId),
      })),
  );

  server.registerTool(
    "get_connector",
    {
      title: "Get Connector",
      description: "Returns one connector with secrets masked.",
      inputSchema: { connector_id: connectorId },
    },
    async ({ connector_id }) =>
      runTool(() => context.connectors.getConnector(context.ownerId, connector_id)),
  );

  server.registerTool(
    "update_connector",
    {
      title: "Update Connector",
      description:
        "Renames a connector or changes its type or config. Config keys merge into the stored config when the type is unchanged.",
      inputSchema: {
        connector_id: connectorId,
        name: z.string().min(1).max(100).optional().describe("New name"),
        connector_type: z.enum(CONNECTOR_TYPES).optional().describe("New type"),
        config: z.record(z.unknown()).optional().describe("Config keys to set"),
      },
    },
    async ({ connector_id, name, connector_type, config }) =>
      runTool(() =>
        context.connectors.updateConnector(context.ownerId, connector_id, {
          name,
          connectorType: connector_type,
          config,
        }),
      ),
  );

  server.registerTool(
    "delete_connector",
    {
      title: "Delete Connector",
      description: "Deletes a connector. Documents it already indexed stay in place.",
      inputSchema: { connector_id: connectorId },
    },
    async ({ connector_id }) =>
      runTool(() => context.connectors.deleteConnector(context.ownerId, connector_id)),
  );
}

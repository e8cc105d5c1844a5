import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { IndexingJob } from "../services/indexingQueue.js";
import type { ToolContext } from "./toolResult.js";
import { runTool } from "./toolResult.js";

export function registerIndexConnectorTools(server: McpServer, context: ToolContext) {
  server.registerTool(
    "index_connector",
    {
      title: "Index Connector",
      description:
        "Queues an incremental indexing run of a Slack, Notion or GitHub connector into a search space and returns at once.",
      inputSchema: {
        connector_id: z.number().int().positive().describe("Connector id"),
        search_space_id: z.number().int().positive().describe("Target search space id"),
      },
    },
    async ({ connector_id, search_space_id }) =>
      runTool(async () => {
        const triggered = await context.connectors.triggerIndexing(
          context.ownerId,
          connector_id,
          search_space_id,
        );
        return {
          message: "Indexing started in the background",
          job_id: triggered.job.id,
          status: triggered.job.status,
          connector_type: triggered.connectorType,
          search_space: triggered.searchSpace,
          indexing_from: triggered.indexingFrom,
          indexing_to: triggered.indexingTo,
        };
      }),
  );

  server.registerTool(
    "get_indexing_job",
    {
      title: "Get Indexing Job",
      description: "Returns the status and, once finished, the outcome of an indexing job.",
      inputSchema: {
        job_id: z.string().min(1).describe("Job id returned by index_connector"),
      },
    },
    async ({ job_id }) =>
      runTool(async () => {
        const job = context.queue.getJob(job_id);
        return job ? toJobView(job) : { job_id, status: "unknown" };
      }),
  );

  server.registerTool(
    "list_indexing_jobs",
    {
      title: "List Indexing Jobs",
      description: "Lists recent indexing jobs of this process.",
      inputSchema: {},
    },
    async () => runTool(async () => ({ jobs: context.queue.listJobs().map(toJobView) })),
  );
}

function toJobView(job: IndexingJob) {
  return {
    job_id: job.id,
    status: job.status,
    connector_id: job.connectorId,
    search_space_id: job.searchSpaceId,
    submitted_at: job.submittedAt,
    started_at: job.startedAt,
    finished_at: job.finishedAt,
    error: job.error,
    documents_indexed: job.result?.documentsIndexed ?? null,
    outcome: job.result?.outcome ?? null,
    failed_items: job.result?.failedItems ?? [],
    checkpoint_advanced: job.result?.checkpointAdvanced ?? null,
  };
}

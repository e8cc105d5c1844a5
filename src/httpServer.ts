import { randomUUID } from "node:crypto";
import { createServer } from "node:http";
import type { IncomingMessage, Server, ServerResponse } from "node:http";
import type { AddressInfo } from "node:net";
import type { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { createAppServer } from "./app.js";
import { describeError } from "./domain/errors.js";
import { logger } from "./lib/logger.js";
import type { ToolContext } from "./tools/toolResult.js";

export const MCP_PATH = "/mcp";
export const HEALTH_PATH = "/healthz";

const PARSE_ERROR = -32700;
const SESSION_REQUIRED = -32000;
const SESSION_NOT_FOUND = -32001;

const log = logger.child({ module: "http" });

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

export interface HttpServerOptions {
  host: string;
  port: number;
  context: ToolContext;
}

type JsonBody = { ok: true; value: unknown } | { ok: false; reason: string };

/**
 * Streamable HTTP front for the tool server. Every MCP session gets its own
 * `McpServer` over the shared tool context; `/healthz` reports sessions and
 * the indexing backlog.
 */
export class McpHttpServer {
  private readonly sessions = new Map<string, Session>();

  private readonly httpServer: Server;

  private stopping = false;

  constructor(private readonly options: HttpServerOptions) {
    this.httpServer = createServer((req, res) => {
      this.route(req, res).catch((error: unknown) => {
        log.error("HTTP request failed", { error: describeError(error) });
        if (!res.headersSent) {
          writeJson(res, 500, { error: describeError(error) });
        }
      });
    });
  }

  /** Resolves with the bound port once the server accepts connections. */
  async listen(): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.httpServer.once("error", reject);
      this.httpServer.listen(this.options.port, this.options.host, () => {
        this.httpServer.off("error", reject);
        resolve();
      });
    });
    const address = this.httpServer.address();
    const port = isAddressInfo(address) ? address.port : this.options.port;
    log.info("MCP HTTP server listening", {
      url: `http://${this.options.host}:${port}${MCP_PATH}`,
    });
    return port;
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  /** Refuses new sessions, closes the open ones, then the listener. */
  async close(): Promise<void> {
    this.stopping = true;
    const open = [...this.sessions.values()];
    this.sessions.clear();
    for (const session of open) {
      await session.transport.close();
      await session.server.close();
    }

    await new Promise<void>((resolve, reject) => {
      this.httpServer.close((error) => (error ? reject(error) : resolve()));
      this.httpServer.closeAllConnections();
    });
  }

  private async route(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const { pathname } = new URL(req.url ?? "/", "http://localhost");

    if (pathname === HEALTH_PATH && req.method === "GET") {
      writeJson(res, 200, this.health());
      return;
    }
    if (pathname !== MCP_PATH) {
      writeJson(res, 404, { error: `No route for ${pathname}` });
      return;
    }

    switch (req.method) {
      case "POST":
        await this.handlePost(req, res);
        return;
      case "GET":
      case "DELETE":
        await this.forwardToSession(req, res);
        return;
      default:
        writeJson(res, 405, { error: `Method ${req.method ?? "unknown"} not allowed` });
    }
  }

  private health() {
    const jobs = this.options.context.queue.listJobs();
    return {
      status: this.stopping ? "stopping" : "ok",
      sessions: this.sessions.size,
      indexing: {
        queued: jobs.filter((job) => job.status === "queued").length,
        running: jobs.filter((job) => job.status === "running").length,
      },
    };
  }

  private async handlePost(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readJsonBody(req);
    if (!body.ok) {
      writeRpcError(res, 400, PARSE_ERROR, `Parse error: ${body.reason}`);
      return;
    }

    const sessionId = sessionIdOf(req);
    if (sessionId) {
      const session = this.sessions.get(sessionId);
      if (!session) {
        writeRpcError(res, 404, SESSION_NOT_FOUND, `Session ${sessionId} not found`);
        return;
      }
      await session.transport.handleRequest(req, res, body.value);
      return;
    }

    if (!isInitializeRequest(body.value)) {
      writeRpcError(res, 400, SESSION_REQUIRED, "Send an initialize request to open a session");
      return;
    }
    if (this.stopping) {
      writeJson(res, 503, { error: "Server is shutting down" });
      return;
    }

    await this.openSession(req, res, body.value);
  }

  private async openSession(
    req: IncomingMessage,
    res: ServerResponse,
    initialize: unknown,
  ): Promise<void> {
    const server = createAppServer(this.options.context);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        log.info("MCP session opened", { sessionId });
      },
    });

    transport.onclose = () => {
      const sessionId = transport.sessionId;
      if (!sessionId || !this.sessions.delete(sessionId)) {
        return;
      }
      log.info("MCP session closed", { sessionId });
      server.close().catch((error: unknown) => {
        log.warn("Failed to close MCP session", { sessionId, error: describeError(error) });
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, initialize);
  }

  private async forwardToSession(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const sessionId = sessionIdOf(req);
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) {
      writeRpcError(res, 400, SESSION_REQUIRED, "Missing or unknown mcp-session-id header");
      return;
    }
    await session.transport.handleRequest(req, res);
  }
}

async function readJsonBody(req: IncomingMessage): Promise<JsonBody> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return { ok: false, reason: "empty body" };
  }
  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (error) {
    return { ok: false, reason: describeError(error) };
  }
}

function sessionIdOf(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value || null;
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === "object" && address !== null;
}

function writeJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function writeRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

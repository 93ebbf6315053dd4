import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { SERVER_NAME, SERVER_VERSION, createAppServer } from "./appServer.js";
import { ValidationError, describeError } from "./domain/errors.js";
import { QueryAgent } from "./services/queryAgent.js";
import { Logger } from "./utils/logger.js";

export const MCP_PATH = "/mcp";

export interface HttpServerOptions {
  host: string;
  /** 0 picks a free port; read the bound one from the result. */
  port: number;
  agent: QueryAgent;
  logger: Logger;
}

export interface RunningHttpServer {
  port: number;
  close(): Promise<void>;
}

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

/**
 * Streamable HTTP front end. Every MCP session gets its own McpServer, all of
 * them backed by the one shared agent and its index.
 */
export async function startHttpServer(options: HttpServerOptions): Promise<RunningHttpServer> {
  const { agent, logger } = options;
  const sessions = new Map<string, Session>();

  const httpServer = createServer((req, res) => {
    handleRequest(req, res).catch((error: unknown) => {
      logger.error("HTTP request failed", {
        method: req.method,
        url: req.url,
        error: describeError(error),
      });
      if (!res.headersSent) {
        writeJson(res, 500, { error: describeError(error) });
      }
    });
  });

  async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    if (url.pathname === "/healthz") {
      writeJson(res, 200, {
        server: SERVER_NAME,
        version: SERVER_VERSION,
        sessions: sessions.size,
        index: agent.getStatus(),
      });
      return;
    }
    if (url.pathname !== MCP_PATH) {
      writeJson(res, 404, { error: `No route for ${url.pathname}` });
      return;
    }

    switch (req.method) {
      case "POST":
        await handlePost(req, res);
        return;
      case "GET":
      case "DELETE": {
        const session = findSession(req);
        if (!session) {
          writeJson(res, 400, { error: "Missing or unknown mcp-session-id header." });
          return;
        }
        await session.transport.handleRequest(req, res);
        return;
      }
      default:
        writeJson(res, 405, {
          error: `Method ${req.method ?? "(none)"} is not allowed on ${MCP_PATH}.`,
        });
    }
  }

  async function handlePost(req: IncomingMessage, res: ServerResponse): Promise<void> {
    let body: unknown;
    try {
      body = await readJsonBody(req);
    } catch (error) {
      if (error instanceof ValidationError) {
        writeJsonRpcError(res, 400, -32700, error.message);
        return;
      }
      throw error;
    }

    const sessionId = readSessionId(req);
    if (sessionId) {
      const session = sessions.get(sessionId);
      if (!session) {
        writeJsonRpcError(res, 404, -32001, `Session ${sessionId} not found.`);
        return;
      }
      await session.transport.handleRequest(req, res, body);
      return;
    }

    if (!isInitializeRequest(body)) {
      writeJsonRpcError(res, 400, -32000, "Send an initialize request to open a session first.");
      return;
    }

    const server = createAppServer(agent);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (newSessionId) => {
        sessions.set(newSessionId, { server, transport });
        logger.debug("MCP session opened", { sessionId: newSessionId });
      },
    });

    transport.onclose = () => {
      const closedId = transport.sessionId;
      if (!closedId || !sessions.delete(closedId)) {
        return;
      }
      logger.debug("MCP session closed", { sessionId: closedId });
      server.close().catch((error: unknown) => {
        logger.warn("Failed to close MCP session", {
          sessionId: closedId,
          error: describeError(error),
        });
      });
    };

    await server.connect(transport);
    await transport.handleRequest(req, res, body);
  }

  function findSession(req: IncomingMessage): Session | undefined {
    const sessionId = readSessionId(req);
    return sessionId ? sessions.get(sessionId) : undefined;
  }

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(options.port, options.host, () => {
      httpServer.off("error", reject);
      resolve();
    });
  });

  const address = httpServer.address();
  const port = typeof address === "object" && address !== null ? address.port : options.port;

  return {
    port,
    close: async () => {
      const open = [...sessions.values()];
      sessions.clear();
      await Promise.all(
        open.map(async ({ server, transport }) => {
          await transport.close();
          await server.close();
        }),
      );

      httpServer.closeAllConnections();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    },
  };
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  for await (const chunk of req) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk));
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ValidationError("Request body is not valid JSON.");
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  if (!header) {
    return null;
  }
  return Array.isArray(header) ? header[0] : header;
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

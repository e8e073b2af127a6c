import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../domain/errors.js";
import type { Logger } from "../utils/logger.js";

export const DEFAULT_MCP_PATH = "/mcp";
export const HEALTH_PATH = "/healthz";

const JSON_RPC_PARSE_ERROR = -32700;
const JSON_RPC_NO_SESSION = -32000;
const JSON_RPC_UNKNOWN_SESSION = -32001;

export interface HttpTransportOptions {
  host: string;
  /** 0 picks a free port; read the bound one from the result. */
  port: number;
  mcpPath?: string;
  createMcpServer: () => McpServer;
  logger: Logger;
}

export interface RunningHttpTransport {
  port: number;
  close: () => Promise<void>;
}

interface Session {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

class InvalidJsonBodyError extends Error {
  constructor() {
    super("Invalid JSON body");
    this.name = "InvalidJsonBodyError";
  }
}

/** One MCP server per streamable-HTTP session, keyed by `mcp-session-id`. */
class SessionRegistry {
  private readonly sessions = new Map<string, Session>();

  constructor(private readonly logger: Logger) {}

  get size(): number {
    return this.sessions.size;
  }

  find(sessionId: string | null): Session | null {
    return sessionId ? (this.sessions.get(sessionId) ?? null) : null;
  }

  async open(createMcpServer: () => McpServer): Promise<Session> {
    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: () => randomUUID(),
      onsessioninitialized: (sessionId) => {
        this.sessions.set(sessionId, { server, transport });
        this.logger.debug({ sessionId }, "MCP session opened");
      },
    });
    transport.onclose = () => this.forget(transport.sessionId);

    await server.connect(transport);
    return { server, transport };
  }

  async closeAll(): Promise<void> {
    const open = [...this.sessions.values()];
    this.sessions.clear();
    await Promise.all(
      open.map(async ({ server, transport }) => {
        await transport.close();
        await server.close();
      }),
    );
  }

  private forget(sessionId: string | undefined): void {
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!sessionId || !session) {
      return;
    }

    this.sessions.delete(sessionId);
    this.logger.debug({ sessionId }, "MCP session closed");
    session.server.close().catch((error: unknown) => {
      this.logger.warn({ sessionId, err: errorMessage(error) }, "failed to close MCP session server");
    });
  }
}

export async function startHttpTransport(
  options: HttpTransportOptions,
): Promise<RunningHttpTransport> {
  const mcpPath = options.mcpPath ?? DEFAULT_MCP_PATH;
  const { logger } = options;
  const sessions = new SessionRegistry(logger);

  const routeMcp = async (req: IncomingMessage, res: ServerResponse) => {
    const sessionId = readSessionId(req);
    const session = sessions.find(sessionId);

    if (req.method === "GET" || req.method === "DELETE") {
      if (!session) {
        writeText(res, 400, "Missing or invalid mcp-session-id");
        return;
      }
      await session.transport.handleRequest(req, res);
      return;
    }

    if (req.method !== "POST") {
      writeJson(res, 405, { error: "Method not allowed" });
      return;
    }

    const body = await readJsonBody(req);
    if (session) {
      await session.transport.handleRequest(req, res, body);
      return;
    }
    if (sessionId) {
      writeJsonRpcError(res, 404, JSON_RPC_UNKNOWN_SESSION, "Session not found");
      return;
    }
    if (!isInitializeRequest(body)) {
      writeJsonRpcError(
        res,
        400,
        JSON_RPC_NO_SESSION,
        "Initialize request is required when session is not established",
      );
      return;
    }

    const opened = await sessions.open(options.createMcpServer);
    await opened.transport.handleRequest(req, res, body);
  };

  const httpServer = createServer((req, res) => {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

    const handled =
      url.pathname === HEALTH_PATH
        ? Promise.resolve(writeJson(res, 200, { ok: true, sessions: sessions.size }))
        : url.pathname === mcpPath
          ? routeMcp(req, res)
          : Promise.resolve(writeText(res, 404, "Not found"));

    handled.catch((error: unknown) => {
      if (error instanceof InvalidJsonBodyError) {
        writeJsonRpcError(res, 400, JSON_RPC_PARSE_ERROR, error.message);
        return;
      }
      logger.error({ err: errorMessage(error), path: url.pathname }, "MCP HTTP request failed");
      if (!res.headersSent) {
        writeJson(res, 500, { error: errorMessage(error) });
      }
    });
  });

  const port = await listen(httpServer, options.port, options.host);

  return {
    port,
    close: async () => {
      await sessions.closeAll();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
        httpServer.closeAllConnections();
      });
    },
  };
}

function listen(server: Server, port: number, host: string): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(port, host, () => {
      const address = server.address();
      resolve(typeof address === "object" && address !== null ? address.port : port);
    });
  });
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
    throw new InvalidJsonBodyError();
  }
}

function readSessionId(req: IncomingMessage): string | null {
  const header = req.headers["mcp-session-id"];
  const value = Array.isArray(header) ? header[0] : header;
  return value || null;
}

function writeText(res: ServerResponse, status: number, text: string): void {
  res.writeHead(status, { "Content-Type": "text/plain" });
  res.end(text);
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  writeJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * HTTP transport
 *
 * Serves MCP over Streamable HTTP (`POST /mcp`, stateless, one server per
 * request) and over the older SSE transport (`GET /sse` plus
 * `POST /messages?sessionId=`), next to a `/health` probe.
 */

import {
  createServer as createHttpServer,
  type IncomingMessage,
  type Server as HttpServer,
  type ServerResponse,
} from "http";
import type { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { SSEServerTransport } from "@modelcontextprotocol/sdk/server/sse.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { parseConfigParam } from "./config.js";
import type { CredentialStore } from "./credentials.js";
import type { Logger } from "./logger.js";
import { SERVER_NAME, SERVER_VERSION } from "./server.js";

export interface HttpTransportDeps {
  createMcpServer: () => Server;
  credentials: CredentialStore;
  logger: Logger;
}

function sendJson(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function jsonRpcError(res: ServerResponse, status: number, code: number, message: string): void {
  sendJson(res, status, { jsonrpc: "2.0", error: { code, message }, id: null });
}

/**
 * Build the HTTP server without binding it to a port.
 */
export function createHttpTransport(deps: HttpTransportDeps): HttpServer {
  const { createMcpServer, credentials, logger } = deps;
  const sseSessions = new Map<string, SSEServerTransport>();

  // Apply the token carried by a connection's `config` query parameter.
  function applyConnectionConfig(url: URL): void {
    const encoded = url.searchParams.get("config");
    if (encoded === null) {
      return;
    }
    const config = parseConfigParam(encoded);
    if (!config) {
      logger.warn("Ignoring undecodable config query parameter");
      return;
    }
    if (config.apiToken) {
      credentials.set(config.apiToken, "connection-config");
    }
  }

  async function handleStreamable(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const server = createMcpServer();
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
    });
    res.on("close", () => {
      Promise.all([transport.close(), server.close()]).catch((error: unknown) => {
        logger.warn({ err: error }, "Failed to close MCP request transport");
      });
    });
    await server.connect(transport);
    await transport.handleRequest(req, res);
  }

  async function handleSse(res: ServerResponse): Promise<void> {
    const server = createMcpServer();
    const transport = new SSEServerTransport("/messages", res);
    sseSessions.set(transport.sessionId, transport);
    logger.info({ sessionId: transport.sessionId }, "SSE connection opened");

    res.on("close", () => {
      sseSessions.delete(transport.sessionId);
      logger.info({ sessionId: transport.sessionId }, "SSE connection closed");
      server.close().catch((error: unknown) => {
        logger.warn({ err: error }, "Failed to close SSE session server");
      });
    });

    await server.connect(transport);
  }

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type, Authorization, Mcp-Session-Id");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && (url.pathname === "/health" || url.pathname === "/")) {
      sendJson(res, 200, {
        status: "ok",
        server: SERVER_NAME,
        version: SERVER_VERSION,
        transport: "http",
      });
      return;
    }

    if (url.pathname === "/mcp") {
      if (method !== "POST") {
        jsonRpcError(res, 405, -32000, "Method not allowed.");
        return;
      }
      applyConnectionConfig(url);
      await handleStreamable(req, res);
      return;
    }

    if (url.pathname === "/sse" && method === "GET") {
      applyConnectionConfig(url);
      await handleSse(res);
      return;
    }

    if (url.pathname === "/messages" && method === "POST") {
      const sessionId = url.searchParams.get("sessionId") ?? "";
      const transport = sseSessions.get(sessionId);
      if (!transport) {
        sendJson(res, 404, { error: `Unknown session: ${sessionId}` });
        return;
      }
      await transport.handlePostMessage(req, res);
      return;
    }

    sendJson(res, 404, {
      error: "Not found",
      endpoints: ["/health", "/mcp", "/sse", "/messages"],
    });
  }

  return createHttpServer((req, res) => {
    handle(req, res).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ url: req.url }, `Error handling HTTP request: ${message}`);
      if (!res.headersSent) {
        jsonRpcError(res, 500, -32603, "Internal server error");
      } else {
        res.end();
      }
    });
  });
}

/**
 * Bind the HTTP transport and resolve once it is listening.
 */
export function startHttpTransport(
  deps: HttpTransportDeps,
  host: string,
  port: number
): Promise<HttpServer> {
  const httpServer = createHttpTransport(deps);
  return new Promise((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => {
      httpServer.off("error", reject);
      deps.logger.info(`Marketing Miner MCP server running on http://${host}:${port}`);
      deps.logger.info(`  MCP endpoint: http://${host}:${port}/mcp`);
      deps.logger.info(`  SSE endpoint: http://${host}:${port}/sse`);
      deps.logger.info(`  Health check: http://${host}:${port}/health`);
      resolve(httpServer);
    });
  });
}

#!/usr/bin/env node

/**
 * MCP Server for Marketing Miner keyword research
 *
 * Exposes keyword suggestions and search volume lookups as tools, over
 * stdio (default) or HTTP (`MCP_TRANSPORT=http`).
 */

import "dotenv/config";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { MarketingMinerClient } from "./client.js";
import { loadConfig } from "./config.js";
import { CredentialStore } from "./credentials.js";
import { startHttpTransport } from "./http.js";
import { createLogger, maskToken } from "./logger.js";
import { createServer } from "./server.js";

// Start server
async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);

  if (config.apiToken) {
    logger.info({ token: maskToken(config.apiToken) }, "Using MM_API_TOKEN from environment");
  } else {
    logger.warn("MM_API_TOKEN is not set; tool calls will fail until a token is supplied");
  }

  const credentials = new CredentialStore(config.apiToken, logger);
  const api = new MarketingMinerClient({
    baseUrl: config.apiBase,
    credentials,
    logger,
  });
  const createMcpServer = () => createServer({ api, logger });

  if (config.transport === "http") {
    await startHttpTransport(
      { createMcpServer, credentials, logger },
      config.host,
      config.port
    );
    return;
  }

  const transport = new StdioServerTransport();
  await createMcpServer().connect(transport);
  logger.info("Marketing Miner MCP server running on stdio");
}

main().catch((error: unknown) => {
  console.error("Failed to start Marketing Miner MCP server:", error);
  process.exit(1);
});

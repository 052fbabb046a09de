/**
 * MCP server for Marketing Miner keyword research
 *
 * One server instance serves one transport connection; the HTTP transport
 * builds a fresh one per connection.
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type CallToolResult,
} from "@modelcontextprotocol/sdk/types.js";
import type { ZodError } from "zod";
import type { KeywordApi } from "./client.js";
import type { Logger } from "./logger.js";
import {
  getKeywordSuggestions,
  getSearchVolumeData,
  KEYWORD_SUGGESTIONS_TOOL,
  keywordSuggestionsArgsSchema,
  SEARCH_VOLUME_TOOL,
  searchVolumeArgsSchema,
  TOOL_DEFINITIONS,
} from "./tools.js";

export const SERVER_NAME = "marketing-miner";
export const SERVER_VERSION = "1.0.0";

export interface ServerDeps {
  api: KeywordApi;
  logger: Logger;
}

function textResult(text: string, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text }],
    ...(isError ? { isError: true } : {}),
  };
}

function invalidArguments(tool: string, error: ZodError): CallToolResult {
  const details = error.issues
    .map((issue) => `${issue.path.join(".") || "arguments"}: ${issue.message}`)
    .join("; ");
  return textResult(`Invalid arguments for ${tool}: ${details}`, true);
}

export function createServer({ api, logger }: ServerDeps): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: TOOL_DEFINITIONS };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    logger.debug({ tool: name }, "Tool called");

    try {
      switch (name) {
        case KEYWORD_SUGGESTIONS_TOOL: {
          const parsed = keywordSuggestionsArgsSchema.safeParse(args ?? {});
          if (!parsed.success) {
            return invalidArguments(name, parsed.error);
          }
          return textResult(await getKeywordSuggestions(api, parsed.data));
        }
        case SEARCH_VOLUME_TOOL: {
          const parsed = searchVolumeArgsSchema.safeParse(args ?? {});
          if (!parsed.success) {
            return invalidArguments(name, parsed.error);
          }
          return textResult(await getSearchVolumeData(api, parsed.data));
        }
        default:
          throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
      }
    } catch (error) {
      if (error instanceof McpError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ tool: name }, `Tool execution failed: ${message}`);
      return textResult(message, true);
    }
  });

  return server;
}

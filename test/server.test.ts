import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from "vitest";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import type { ApiResult, KeywordApi } from "../src/client.js";
import { createLogger } from "../src/logger.js";
import { createServer } from "../src/server.js";

let client: Client;
let dispatch: Mock<KeywordApi["dispatch"]>;
let nextResult: ApiResult;

async function callText(
  name: string,
  args: Record<string, unknown>
): Promise<{ text: string; isError: boolean }> {
  const result = CallToolResultSchema.parse(await client.callTool({ name, arguments: args }));
  const first = result.content[0];
  if (!first || first.type !== "text") {
    throw new Error("expected a text result");
  }
  return { text: first.text, isError: result.isError === true };
}

beforeEach(async () => {
  nextResult = { ok: true, payload: { status: "success", data: { keywords: [] } } };
  dispatch = vi.fn<KeywordApi["dispatch"]>(async () => nextResult);

  const server = createServer({ api: { dispatch }, logger: createLogger("silent") });
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  client = new Client({ name: "test-client", version: "1.0.0" });
  await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
});

afterEach(async () => {
  await client.close();
});

describe("MCP server", () => {
  it("lists both tools with their required arguments", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "get_keyword_suggestions",
      "get_search_volume_data",
    ]);
    expect(tools[0].inputSchema.required).toEqual(["language_code", "keyword"]);
    expect(tools[1].inputSchema.required).toEqual(["language_code", "keyword"]);
  });

  it("returns rendered suggestions as text", async () => {
    nextResult = {
      ok: true,
      payload: {
        status: "success",
        data: {
          keywords: [
            {
              keyword: "seo",
              search_volume: 1000,
              cpc: { value: 2.5, currency_code: "USD" },
              difficulty: 45,
              serp_features: ["featured_snippet", "paa"],
            },
          ],
        },
      },
    };

    const result = await callText("get_keyword_suggestions", {
      language_code: "cs",
      keyword: "seo",
      include_extended: true,
    });

    expect(result).toEqual({
      text: "Klíčové slovo: seo | Hledanost: 1000 | CPC: 2.5 USD | Obtížnost: 45 | SERP features: featured_snippet, paa",
      isError: false,
    });
  });

  it("returns enum guidance as a normal result", async () => {
    const result = await callText("get_search_volume_data", {
      language_code: "xx",
      keyword: "seo",
    });

    expect(result).toEqual({
      text: "Nepodporovaný jazyk: xx. Podporované jazyky jsou: cs, sk, pl, hu, ro, gb, us",
      isError: false,
    });
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("returns upstream failures as a normal result", async () => {
    nextResult = { ok: false, message: "HTTP chyba: 503 - maintenance" };

    const result = await callText("get_search_volume_data", {
      language_code: "cs",
      keyword: "seo",
    });

    expect(result).toEqual({ text: "HTTP chyba: 503 - maintenance", isError: false });
  });

  it("flags arguments of the wrong shape as an error result", async () => {
    const result = await callText("get_keyword_suggestions", { language_code: "cs" });

    expect(result.isError).toBe(true);
    expect(result.text.startsWith("Invalid arguments for get_keyword_suggestions: keyword:")).toBe(
      true
    );
    expect(dispatch).not.toHaveBeenCalled();
  });

  it("rejects an unknown tool", async () => {
    await expect(client.callTool({ name: "delete_everything", arguments: {} })).rejects.toThrow(
      "Unknown tool: delete_everything"
    );
  });
});

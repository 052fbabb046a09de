/**
 * Keyword research tools
 *
 * Argument validation, query building and dispatch for the two tools. Enum
 * violations come back as guidance text, not as errors, and never reach
 * the API.
 */

import type { Tool } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import type { KeywordApi, QueryParams } from "./client.js";
import { formatKeywordSuggestions, formatSearchVolume } from "./format.js";
import { unsupportedLanguage, unsupportedSuggestionsType } from "./messages.js";

export const LANGUAGES = ["cs", "sk", "pl", "hu", "ro", "gb", "us"] as const;
export const SUGGESTIONS_TYPES = ["questions", "new", "trending"] as const;

export const SUGGESTIONS_ENDPOINT = "/keywords/suggestions";
export const SEARCH_VOLUME_ENDPOINT = "/keywords/search-volume-data";

export const KEYWORD_SUGGESTIONS_TOOL = "get_keyword_suggestions";
export const SEARCH_VOLUME_TOOL = "get_search_volume_data";

export const keywordSuggestionsArgsSchema = z.object({
  language_code: z.string(),
  keyword: z.string(),
  suggestions_type: z.string().optional(),
  include_extended: z.boolean().optional(),
});

export const searchVolumeArgsSchema = z.object({
  language_code: z.string(),
  keyword: z.string(),
});

export type KeywordSuggestionsArgs = z.infer<typeof keywordSuggestionsArgsSchema>;
export type SearchVolumeArgs = z.infer<typeof searchVolumeArgsSchema>;

export const TOOL_DEFINITIONS: Tool[] = [
  {
    name: KEYWORD_SUGGESTIONS_TOOL,
    description:
      "Get keyword suggestions for a seed keyword from Marketing Miner. Optionally restrict to questions, new or trending suggestions, and include difficulty and SERP features.",
    inputSchema: {
      type: "object",
      properties: {
        language_code: {
          type: "string",
          enum: [...LANGUAGES],
          description: "Market language code",
        },
        keyword: {
          type: "string",
          description: "Seed keyword to get suggestions for",
        },
        suggestions_type: {
          type: "string",
          enum: [...SUGGESTIONS_TYPES],
          description: "Kind of suggestions to return",
        },
        include_extended: {
          type: "boolean",
          description: "Include difficulty and SERP features for each keyword",
          default: false,
        },
      },
      required: ["language_code", "keyword"],
    },
  },
  {
    name: SEARCH_VOLUME_TOOL,
    description:
      "Get search volume data for an exact keyword from Marketing Miner: volume, CPC, year-over-year change, peak month and monthly volumes.",
    inputSchema: {
      type: "object",
      properties: {
        language_code: {
          type: "string",
          enum: [...LANGUAGES],
          description: "Market language code",
        },
        keyword: {
          type: "string",
          description: "Keyword to look up",
        },
      },
      required: ["language_code", "keyword"],
    },
  },
];

function isLanguage(value: string): boolean {
  return LANGUAGES.some((code) => code === value);
}

function isSuggestionsType(value: string): boolean {
  return SUGGESTIONS_TYPES.some((type) => type === value);
}

/**
 * Fetch keyword suggestions and render them one keyword per line.
 */
export async function getKeywordSuggestions(
  api: KeywordApi,
  args: KeywordSuggestionsArgs
): Promise<string> {
  const { language_code, keyword, suggestions_type } = args;
  const includeExtended = args.include_extended ?? false;

  if (!isLanguage(language_code)) {
    return unsupportedLanguage(language_code, LANGUAGES);
  }
  if (suggestions_type && !isSuggestionsType(suggestions_type)) {
    return unsupportedSuggestionsType(suggestions_type, SUGGESTIONS_TYPES);
  }

  const params: QueryParams = { lang: language_code, keyword };
  if (suggestions_type) {
    params.suggestions_type = suggestions_type;
  }
  params.with_keyword_data = String(includeExtended);

  const result = await api.dispatch(SUGGESTIONS_ENDPOINT, params);
  if (!result.ok) {
    return result.message;
  }

  return formatKeywordSuggestions(result.payload, includeExtended);
}

/**
 * Fetch search volume statistics for one keyword.
 */
export async function getSearchVolumeData(
  api: KeywordApi,
  args: SearchVolumeArgs
): Promise<string> {
  const { language_code, keyword } = args;

  if (!isLanguage(language_code)) {
    return unsupportedLanguage(language_code, LANGUAGES);
  }

  const result = await api.dispatch(SEARCH_VOLUME_ENDPOINT, {
    lang: language_code,
    keyword,
  });
  if (!result.ok) {
    return result.message;
  }

  return formatSearchVolume(result.payload);
}

/**
 * Marketing Miner API client
 *
 * Issues one GET per call against the profilers API and folds every kind of
 * failure (missing token, HTTP status, transport, error body) into an
 * `ApiResult`. Nothing here throws and nothing is retried.
 */

import axios, { type AxiosInstance } from "axios";
import type { CredentialStore } from "./credentials.js";
import { maskToken, type Logger } from "./logger.js";
import { httpError, MESSAGES, requestError } from "./messages.js";

export const DEFAULT_API_BASE = "https://profilers-api.marketingminer.com";
export const TOKEN_PARAM = "api_token";
export const REQUEST_TIMEOUT_MS = 30_000;

export type QueryParams = Record<string, string>;

export type ApiResult =
  | { ok: true; payload: unknown }
  | { ok: false; message: string };

/**
 * The part of the client the tools depend on.
 */
export interface KeywordApi {
  dispatch(endpoint: string, params: QueryParams): Promise<ApiResult>;
}

export interface ClientOptions {
  baseUrl: string;
  credentials: CredentialStore;
  logger: Logger;
  timeoutMs?: number;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function failure(message: string): ApiResult {
  return { ok: false, message };
}

/**
 * Describe a rejected axios call the way the tools report it.
 */
export function describeRequestError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    const body: unknown = error.response.data;
    const text = typeof body === "string" ? body : JSON.stringify(body) ?? "";
    return httpError(error.response.status, text);
  }
  const cause = error instanceof Error ? error.message : String(error);
  return requestError(cause);
}

export class MarketingMinerClient implements KeywordApi {
  private readonly http: AxiosInstance;
  private readonly credentials: CredentialStore;
  private readonly logger: Logger;

  constructor(options: ClientOptions) {
    this.credentials = options.credentials;
    this.logger = options.logger;
    this.http = axios.create({
      baseURL: options.baseUrl,
      timeout: options.timeoutMs ?? REQUEST_TIMEOUT_MS,
      // Raw text: error bodies are reported verbatim, success bodies are decoded below.
      responseType: "text",
      headers: { Accept: "application/json" },
    });
  }

  async dispatch(endpoint: string, params: QueryParams): Promise<ApiResult> {
    const token = this.credentials.get();
    if (!token) {
      this.logger.error("MM_API_TOKEN is not set");
      return failure(MESSAGES.missingToken);
    }

    this.logger.debug(
      { endpoint, params, token: maskToken(token) },
      "Calling Marketing Miner API"
    );

    let body: string;
    try {
      const response = await this.http.get<string>(endpoint, {
        params: { ...params, [TOKEN_PARAM]: token },
      });
      this.logger.debug(
        { endpoint, status: response.status },
        "Marketing Miner API responded"
      );
      body = response.data;
    } catch (error) {
      const message = describeRequestError(error);
      this.logger.error({ endpoint }, message);
      return failure(message);
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(body);
    } catch (error) {
      const message = requestError(
        error instanceof Error ? error.message : String(error)
      );
      this.logger.error({ endpoint }, message);
      return failure(message);
    }

    if (isRecord(decoded) && decoded.status === "error") {
      const message =
        typeof decoded.message === "string"
          ? decoded.message
          : MESSAGES.unknownError;
      this.logger.warn({ endpoint }, `API reported an error: ${message}`);
      return failure(message);
    }

    return { ok: true, payload: decoded };
  }
}

/**
 * Configuration
 *
 * Process settings come from the environment (a `.env` file is loaded by
 * the entry point). The HTTP transport also accepts a per-connection
 * `config` query parameter: base64-encoded JSON that may carry an API token.
 */

import { z } from "zod";
import { DEFAULT_API_BASE } from "./client.js";
import { LOG_LEVELS, type LogLevel } from "./logger.js";

export const TRANSPORTS = ["stdio", "http"] as const;
export type TransportMode = (typeof TRANSPORTS)[number];

export const DEFAULT_PORT = 8081;
export const DEFAULT_HOST = "0.0.0.0";

export interface AppConfig {
  apiToken: string | undefined;
  apiBase: string;
  transport: TransportMode;
  host: string;
  port: number;
  logLevel: LogLevel;
}

const envSchema = z.object({
  MM_API_TOKEN: z.string().optional(),
  MM_API_BASE: z.string().url().default(DEFAULT_API_BASE),
  MCP_TRANSPORT: z.enum(TRANSPORTS).default("stdio"),
  SMITHERY_PORT: z.string().optional(),
  PORT: z.string().optional(),
  HOST: z.string().min(1).default(DEFAULT_HOST),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

/**
 * Pick the listening port: SMITHERY_PORT, then PORT, then 8081.
 * Empty values are skipped; a value that is not a port number falls back to 8081.
 */
export function resolvePort(
  smitheryPort: string | undefined,
  port: string | undefined
): number {
  const raw = (smitheryPort || port || "").trim();
  if (!/^\d+$/.test(raw)) {
    return DEFAULT_PORT;
  }
  const value = parseInt(raw, 10);
  return value > 0 && value <= 65535 ? value : DEFAULT_PORT;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  // Unset and empty mean the same thing for every variable.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const vars = parsed.data;
  return {
    apiToken: vars.MM_API_TOKEN,
    apiBase: vars.MM_API_BASE,
    transport: vars.MCP_TRANSPORT,
    host: vars.HOST,
    port: resolvePort(vars.SMITHERY_PORT, vars.PORT),
    logLevel: vars.LOG_LEVEL,
  };
}

export interface ConnectionConfig {
  apiToken?: string;
}

const connectionConfigSchema = z
  .object({
    mmApiToken: z.string().optional(),
    MM_API_TOKEN: z.string().optional(),
    apiToken: z.string().optional(),
  })
  .passthrough();

/**
 * Decode the base64 JSON `config` query parameter of a connection.
 * Returns undefined when the value does not decode to a JSON object.
 */
export function parseConfigParam(encoded: string): ConnectionConfig | undefined {
  let decoded: unknown;
  try {
    decoded = JSON.parse(Buffer.from(encoded, "base64").toString("utf-8"));
  } catch {
    return undefined;
  }

  const parsed = connectionConfigSchema.safeParse(decoded);
  if (!parsed.success) {
    return undefined;
  }

  const { mmApiToken, MM_API_TOKEN, apiToken } = parsed.data;
  const token = mmApiToken || MM_API_TOKEN || apiToken;
  return token ? { apiToken: token } : {};
}

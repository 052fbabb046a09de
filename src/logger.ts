/**
 * Logging
 *
 * pino writing to stderr. stdout belongs to the stdio transport, so nothing
 * else may print there.
 */

import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const satisfies readonly LogLevel[];

export function createLogger(level: LogLevel = "info"): Logger {
  return pino(
    { level, base: { service: "marketing-miner-mcp" } },
    pino.destination({ dest: 2 }) // 2 = stderr
  );
}

/**
 * Show only the tail of a token in logs.
 */
export function maskToken(token: string): string {
  return `...${token.slice(-4)}`;
}

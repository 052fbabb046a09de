import { maskToken, type Logger } from "./logger.js";

export type CredentialSource = "environment" | "connection-config";

/**
 * Holds the Marketing Miner API token shared by every tool call.
 *
 * The token is read on each dispatch, so a replacement applied through
 * `set` is seen by every request that starts after it. Replacement is a
 * single assignment on the event loop; concurrent connections that each
 * carry a token leave the last one in place.
 */
export class CredentialStore {
  private token: string | undefined;

  constructor(
    initial: string | undefined,
    private readonly logger: Logger
  ) {
    this.token = initial ? initial : undefined;
  }

  get(): string | undefined {
    return this.token;
  }

  set(token: string, source: CredentialSource): void {
    if (!token) {
      this.logger.warn({ source }, "Ignoring empty API token");
      return;
    }
    this.token = token;
    this.logger.info({ source, token: maskToken(token) }, "API token replaced");
  }
}

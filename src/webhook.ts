/**
 * Webhook Receiver - framework-agnostic entry point for pushed updates
 *
 * Plug receive() into any HTTP server: pass the request body (parsed JSON
 * or the raw string) and the request headers, then answer with the returned
 * status. No server is started here.
 */

import { timingSafeEqual } from "crypto";
import { ConfigurationError, describeError } from "./errors.js";
import { ConsoleLogger, scopedLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { UpdateSink } from "./polling.js";
import { parseUpdate } from "./updates/parse.js";
import type { Update } from "./updates/types.js";
import { PoolClosedError } from "./worker-pool.js";

export const SECRET_TOKEN_HEADER = "X-Telegram-Bot-Api-Secret-Token";

const SECRET_TOKEN_PATTERN = /^[A-Za-z0-9_-]{1,256}$/;

/** Header map as Node's IncomingHttpHeaders or a plain object gives it */
export type WebhookHeaders = Record<string, string | string[] | undefined>;

export interface WebhookResponse {
  status: 200 | 401 | 503;
  description?: string;
}

export interface WebhookOptions {
  /** Expected value of the secret token header; unset accepts any request */
  secretToken?: string;
  logger?: Logger;
}

export function isValidSecretToken(token: string): boolean {
  return SECRET_TOKEN_PATTERN.test(token);
}

/**
 * Case-insensitive header lookup; the first value wins for repeated headers
 */
export function headerValue(headers: WebhookHeaders, name: string): string | undefined {
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() !== wanted) continue;
    return Array.isArray(value) ? value[0] : value;
  }
  return undefined;
}

function sameToken(expected: string, given: string | undefined): boolean {
  if (given === undefined) return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(given);
  return a.length === b.length && timingSafeEqual(a, b);
}

export class WebhookReceiver {
  private logger: Logger;
  private secretToken: string | undefined;

  constructor(
    private readonly sink: UpdateSink,
    options: WebhookOptions = {}
  ) {
    if (options.secretToken !== undefined && !isValidSecretToken(options.secretToken)) {
      throw new ConfigurationError(
        "Webhook secret token must be 1-256 characters of A-Z, a-z, 0-9, _ and -"
      );
    }
    this.secretToken = options.secretToken;
    this.logger = scopedLogger(options.logger ?? new ConsoleLogger(), "Webhook");
  }

  async receive(body: unknown, headers: WebhookHeaders = {}): Promise<WebhookResponse> {
    if (this.secretToken !== undefined) {
      if (!sameToken(this.secretToken, headerValue(headers, SECRET_TOKEN_HEADER))) {
        this.logger.warn("Rejected request with a missing or wrong secret token");
        return { status: 401, description: "Unauthorized" };
      }
    }

    let update: Update;
    try {
      update = parseUpdate(typeof body === "string" ? JSON.parse(body) : body);
    } catch (err) {
      // Acknowledge anyway; redelivery would fail the same way
      this.logger.warn(`Dropped ${describeError(err)}`);
      return { status: 200 };
    }

    try {
      await this.sink.submit(update);
    } catch (err) {
      if (err instanceof PoolClosedError) {
        return { status: 503, description: "Bot is stopping" };
      }
      this.logger.error(`Dispatch of ${update.kind} #${update.updateId} failed: ${describeError(err)}`);
    }
    return { status: 200 };
  }
}

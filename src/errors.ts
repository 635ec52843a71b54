/**
 * Error taxonomy for wirebot
 *
 * - TransportError: the request never produced a platform response (network, abort)
 * - RemoteError: the platform answered with ok=false (carries code + description)
 * - MalformedUpdateError: a raw update record could not be bound to an Update
 * - HandlerError: user code threw while handling an update
 * - ConfigurationError: invalid handler/filter/config setup, raised at registration
 * - StateNotFoundError: conversation data written for a (chat, user) with no state
 */

import type { Update } from "./updates/types.js";

export class BotError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class TransportError extends BotError {
  constructor(
    readonly method: string,
    cause: unknown
  ) {
    super(`Request '${method}' failed: ${describeError(cause)}`, { cause });
  }
}

export class RemoteError extends BotError {
  constructor(
    readonly method: string,
    readonly code: number,
    readonly description: string,
    /** Seconds to wait before retrying, set on 429 responses */
    readonly retryAfter?: number
  ) {
    super(`Request '${method}' rejected (${code}): ${description}`);
  }

  get isRateLimit(): boolean {
    return this.code === 429;
  }
}

export class MalformedUpdateError extends BotError {
  constructor(
    reason: string,
    readonly updateId: number | null = null
  ) {
    super(
      updateId === null
        ? `Malformed update: ${reason}`
        : `Malformed update #${updateId}: ${reason}`
    );
  }
}

export class HandlerError extends BotError {
  constructor(
    readonly update: Update,
    readonly handlerName: string,
    cause: unknown
  ) {
    super(
      `Handler ${handlerName} failed on ${update.kind} #${update.updateId}: ${describeError(cause)}`,
      { cause }
    );
  }
}

export class ConfigurationError extends BotError {}

export class StateNotFoundError extends BotError {
  constructor(
    readonly chatId: number,
    readonly userId: number
  ) {
    super(`No state set for user ${userId} in chat ${chatId}`);
  }
}

/**
 * Format an unknown thrown value for a log line
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

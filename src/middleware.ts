/**
 * Middleware - hooks around handler dispatch
 *
 * Pre-process hooks run in registration order before handler matching;
 * post-process hooks run in reverse order afterwards, with the handler error
 * (or null). Both see the same per-update data map as the handler.
 *
 * @example
 * bot.use({
 *   updateKinds: ["message"],
 *   preProcess: (update, data) => {
 *     data.set("startedAt", Date.now());
 *   },
 *   postProcess: (update, data, error) => {
 *     logger.log(`${update.kind} took ${Date.now() - Number(data.get("startedAt"))}ms`);
 *   },
 * });
 */

import type { HandlerError } from "./errors.js";
import type { DispatchContext, Update, UpdateKind } from "./updates/types.js";

/** Returned from preProcess: skip handler matching, still run post-process */
export const SKIP_HANDLER: unique symbol = Symbol("wirebot.skipHandler");

/** Returned from preProcess: drop the update, no handlers and no post-process */
export const CANCEL_UPDATE: unique symbol = Symbol("wirebot.cancelUpdate");

export type MiddlewareAction = typeof SKIP_HANDLER | typeof CANCEL_UPDATE | void;

export interface Middleware {
  /** Name used in logs and errors */
  readonly name?: string;
  /** Kinds this middleware sees; all kinds when omitted */
  readonly updateKinds?: readonly UpdateKind[];
  preProcess?(update: Update, data: DispatchContext): MiddlewareAction | Promise<MiddlewareAction>;
  postProcess?(update: Update, data: DispatchContext, error: HandlerError | null): void | Promise<void>;
}

export function acceptsKind(middleware: Middleware, kind: UpdateKind): boolean {
  return middleware.updateKinds === undefined || middleware.updateKinds.includes(kind);
}

export function middlewareName(middleware: Middleware, index: number): string {
  return middleware.name ?? `middleware#${index + 1}`;
}

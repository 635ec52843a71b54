/**
 * Handler registrations
 *
 * A registration pairs one update kind with an ordered list of filter
 * predicates and a handler. It is created once and never mutated.
 */

import type { FilterPredicate } from "../filters/types.js";
import { isKind } from "../updates/accessors.js";
import type { DispatchContext, PayloadOf, Update, UpdateKind, UpdateOf } from "../updates/types.js";

/**
 * Returned from a handler to keep scanning later registrations
 */
export const CONTINUE_HANDLING: unique symbol = Symbol("wirebot.continueHandling");

export interface HandlerContext<K extends UpdateKind> {
  update: UpdateOf<K>;
  /** Per-update values shared with middleware */
  data: DispatchContext;
}

export type Handler<K extends UpdateKind, C = HandlerContext<K>> = (
  payload: PayloadOf<K>,
  context: C
) => unknown;

/** Any function, compared by identity in unregister() */
export type Callback = (...args: never[]) => unknown;

export interface RegistrationOptions {
  /** Keep scanning after this handler runs */
  passToNext?: boolean;
  /** Name used in logs and errors; defaults to the function name */
  name?: string;
}

export interface HandlerRegistration {
  readonly id: number;
  readonly kind: UpdateKind;
  readonly name: string;
  readonly predicates: readonly FilterPredicate[];
  readonly passToNext: boolean;
  /** The function the caller registered */
  readonly callback: Callback;
  invoke(update: Update, data: DispatchContext): unknown;
}

/**
 * Returned by registration calls
 */
export interface RegistrationHandle {
  readonly id: number;
  readonly kind: UpdateKind;
  /** Remove this registration; false when it was already gone */
  remove(): boolean;
}

let nextRegistrationId = 1;

/**
 * Create a registration
 *
 * @param callback - identity used by unregister(); defaults to the handler
 */
export function createRegistration<K extends UpdateKind>(
  kind: K,
  predicates: readonly FilterPredicate[],
  handler: Handler<K>,
  options: RegistrationOptions = {},
  callback: Callback = handler
): HandlerRegistration {
  const id = nextRegistrationId++;
  return Object.freeze({
    id,
    kind,
    name: options.name ?? (callback.name || `handler#${id}`),
    predicates: Object.freeze([...predicates]),
    passToNext: options.passToNext ?? false,
    callback,
    invoke: (update: Update, data: DispatchContext): unknown =>
      isKind(update, kind) ? handler(update.payload, { update, data }) : undefined,
  });
}

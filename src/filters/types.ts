/**
 * Filter types
 *
 * A registration carries an ordered list of predicates built from its filter
 * spec. All predicates must pass (AND, first failure stops evaluation).
 */

import type { ContentType } from "../updates/content-type.js";
import type { ChatType, PayloadOf, Update, UpdateKind, UpdateOf } from "../updates/types.js";

export interface FilterPredicate {
  /** Filter key the predicate was built from, used in log lines */
  readonly name: string;
  evaluate(update: Update): boolean | Promise<boolean>;
}

/**
 * Live facts about the bot that filters read at evaluation time
 */
export interface FilterContext {
  botUsername?: string;
}

/**
 * Builds a predicate from a spec value. Throws ConfigurationError when the
 * value is mistyped or the filter does not apply to the kind.
 */
export type FilterFactory = (
  value: unknown,
  kind: UpdateKind,
  context: FilterContext
) => FilterPredicate;

export type FilterFunction<K extends UpdateKind> = (
  payload: PayloadOf<K>,
  update: UpdateOf<K>
) => boolean | Promise<boolean>;

/**
 * Filter spec passed when registering a handler. Keys beyond the built-ins
 * name custom filters added through addCustomFilter.
 */
export interface FilterSpec<K extends UpdateKind = UpdateKind> {
  content_types?: readonly ContentType[];
  commands?: readonly string[];
  regexp?: string | RegExp;
  chat_types?: readonly ChatType[];
  func?: FilterFunction<K>;
  [key: string]: unknown;
}

/**
 * User-defined filter keyed by a spec key
 *
 * @example
 * bot.addCustomFilter({
 *   key: "is_admin",
 *   check: (update, value) => (senderOf(update)?.id === ADMIN_ID) === value,
 * });
 * bot.onMessage({ is_admin: true }, handler);
 */
export interface CustomFilter {
  readonly key: string;
  check(update: Update, value: unknown): boolean | Promise<boolean>;
  /** Called at registration; throw ConfigurationError to reject the value */
  validate?(value: unknown, kind: UpdateKind): void;
}

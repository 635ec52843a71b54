/**
 * Filter Registry - maps spec keys to predicate factories
 */

import { ConfigurationError } from "../errors.js";
import { isKind } from "../updates/accessors.js";
import type { UpdateKind } from "../updates/types.js";
import { BUILTIN_FILTERS } from "./builtin.js";
import type {
  CustomFilter,
  FilterContext,
  FilterFactory,
  FilterFunction,
  FilterPredicate,
  FilterSpec,
} from "./types.js";

function funcPredicate<K extends UpdateKind>(kind: K, fn: FilterFunction<K>): FilterPredicate {
  return {
    name: "func",
    evaluate: (update) => isKind(update, kind) && fn(update.payload, update),
  };
}

export class FilterRegistry {
  private factories: Map<string, FilterFactory> = new Map(Object.entries(BUILTIN_FILTERS));
  private readonly context: FilterContext = {};

  /**
   * Username used by the commands filter to ignore "/cmd@otherbot".
   * Applies to predicates already built.
   */
  setBotUsername(username: string | undefined): void {
    this.context.botUsername = username;
  }

  get botUsername(): string | undefined {
    return this.context.botUsername;
  }

  /**
   * Register (or replace) a custom filter under its key
   */
  addCustomFilter(filter: CustomFilter): void {
    if (filter.key === "func" || filter.key in BUILTIN_FILTERS) {
      throw new ConfigurationError(`'${filter.key}' is a built-in filter and cannot be replaced`);
    }
    this.factories.set(filter.key, (value, kind) => {
      filter.validate?.(value, kind);
      return {
        name: filter.key,
        evaluate: (update) => filter.check(update, value),
      };
    });
  }

  has(key: string): boolean {
    return key === "func" || this.factories.has(key);
  }

  /**
   * Build the predicates of one registration, in spec key order
   *
   * @throws ConfigurationError for unknown keys and invalid values
   */
  build<K extends UpdateKind>(kind: K, spec: FilterSpec<K>): FilterPredicate[] {
    const predicates: FilterPredicate[] = [];

    for (const [key, value] of Object.entries(spec)) {
      if (value === undefined) continue;

      if (key === "func") {
        const fn = spec.func;
        if (typeof fn !== "function") {
          throw new ConfigurationError("Filter 'func' expects a function");
        }
        predicates.push(funcPredicate(kind, fn));
        continue;
      }

      const factory = this.factories.get(key);
      if (!factory) {
        throw new ConfigurationError(`Unknown filter '${key}'`);
      }
      predicates.push(factory(value, kind, this.context));
    }

    return predicates;
  }
}

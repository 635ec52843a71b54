/**
 * Callback Data - structured callback_data strings
 *
 * A factory joins a prefix and named parts with a separator
 * ("vote:up:42"), parses them back, and builds callback_query filters
 * matching on part values.
 */

import { BotError, ConfigurationError } from "./errors.js";
import type { PayloadOf } from "./updates/types.js";

/** Platform limit for callback_data, in UTF-8 bytes */
export const MAX_CALLBACK_DATA_BYTES = 64;

export class CallbackDataError extends BotError {}

/** Parsed data: "@" holds the prefix, every part its raw string */
export type ParsedCallbackData = Readonly<Record<string, string>>;

export type CallbackDataMatch<P extends string> = {
  [K in P | "@"]?: string | readonly string[];
};

export class CallbackData<P extends string> {
  readonly parts: readonly P[];

  constructor(
    readonly prefix: string,
    parts: readonly P[],
    readonly sep = ":"
  ) {
    if (!prefix) throw new ConfigurationError("Callback data prefix can't be empty");
    if (!sep) throw new ConfigurationError("Callback data separator can't be empty");
    if (prefix.includes(sep)) {
      throw new ConfigurationError(`Separator '${sep}' can't be used in prefix '${prefix}'`);
    }
    this.parts = [...parts];
  }

  /**
   * Encode values for every part
   *
   * @throws CallbackDataError when a value contains the separator or the
   *   result exceeds 64 bytes
   */
  new(values: Record<P, string | number>): string {
    const encoded = [this.prefix];
    for (const part of this.parts) {
      const value = String(values[part]);
      if (value.includes(this.sep)) {
        throw new CallbackDataError(
          `Separator '${this.sep}' can't be used in the value of '${part}'`
        );
      }
      encoded.push(value);
    }

    const data = encoded.join(this.sep);
    if (Buffer.byteLength(data, "utf8") > MAX_CALLBACK_DATA_BYTES) {
      throw new CallbackDataError(`Callback data is longer than ${MAX_CALLBACK_DATA_BYTES} bytes: '${data}'`);
    }
    return data;
  }

  /**
   * @throws CallbackDataError on a foreign prefix or a wrong part count
   */
  parse(data: string): ParsedCallbackData {
    const [prefix, ...values] = data.split(this.sep);
    if (prefix !== this.prefix) {
      throw new CallbackDataError(`Callback data '${data}' does not start with prefix '${this.prefix}'`);
    }
    if (values.length !== this.parts.length) {
      throw new CallbackDataError(
        `Callback data '${data}' has ${values.length} parts, expected ${this.parts.length}`
      );
    }

    const parsed: Record<string, string> = { "@": prefix };
    this.parts.forEach((part, i) => {
      parsed[part] = values[i];
    });
    return parsed;
  }

  /**
   * Callback query predicate, usable as the `func` filter. Each configured
   * part must equal the value (or be one of the listed values).
   */
  filter(match: CallbackDataMatch<P> = {}): (query: PayloadOf<"callback_query">) => boolean {
    const checks = Object.entries(match).filter(
      (entry): entry is [string, string | readonly string[]] => entry[1] !== undefined
    );

    return (query) => {
      if (query.data === undefined) return false;
      let parsed: ParsedCallbackData;
      try {
        parsed = this.parse(query.data);
      } catch (err) {
        if (err instanceof CallbackDataError) return false;
        throw err;
      }
      return checks.every(([key, expected]) => {
        const actual = parsed[key];
        return typeof expected === "string" ? actual === expected : expected.includes(actual);
      });
    };
  }
}

/**
 * Custom filters
 *
 * Opt-in filters registered with bot.addCustomFilter(). Each reads one spec
 * key, e.g. `bot.onMessage({ text_contains: ["price"] }, handler)`.
 */

import { z } from "zod";
import { ConfigurationError } from "../errors.js";
import { chatOf, isMessageKind, messageOf, senderOf } from "../updates/accessors.js";
import type { Update } from "../updates/types.js";
import { StatesGroup } from "../state/states.js";
import type { StateStorage } from "../state/types.js";
import type { CustomFilter } from "./types.js";

/**
 * Filter keyed by a boolean: matches when check() equals the registered value
 *
 * @example
 * bot.addCustomFilter(simpleFilter("has_photo", (u) => messageOf(u)?.content_type === "photo"));
 * bot.onMessage({ has_photo: true }, handler);
 */
export function simpleFilter(
  key: string,
  check: (update: Update) => boolean | Promise<boolean>
): CustomFilter {
  return {
    key,
    validate(value) {
      if (typeof value !== "boolean") {
        throw new ConfigurationError(`Filter '${key}' expects true or false`);
      }
    },
    async check(update, value) {
      return (await check(update)) === value;
    },
  };
}

/**
 * Filter whose value is validated by a zod schema at registration
 */
export function typedFilter<T>(
  key: string,
  schema: z.ZodType<T>,
  check: (update: Update, value: T) => boolean | Promise<boolean>
): CustomFilter {
  return {
    key,
    validate(value) {
      const result = schema.safeParse(value);
      if (!result.success) {
        throw new ConfigurationError(
          `Filter '${key}' got an invalid value: ${result.error.issues[0]?.message ?? "invalid"}`
        );
      }
    },
    check(update, value) {
      const result = schema.safeParse(value);
      return result.success && check(update, result.data);
    },
  };
}

export interface TextFilterOptions {
  equals?: string;
  contains?: readonly string[];
  startsWith?: string | readonly string[];
  endsWith?: string | readonly string[];
  ignoreCase?: boolean;
}

function asList(value: string | readonly string[] | undefined): readonly string[] {
  if (value === undefined) return [];
  return typeof value === "string" ? [value] : value;
}

/**
 * Text matcher for the `text` filter. Matches when any configured check
 * passes.
 */
export class TextFilter {
  private equals?: string;
  private contains: readonly string[];
  private startsWith: readonly string[];
  private endsWith: readonly string[];
  private ignoreCase: boolean;

  constructor(options: TextFilterOptions) {
    if (
      options.equals === undefined &&
      options.contains === undefined &&
      options.startsWith === undefined &&
      options.endsWith === undefined
    ) {
      throw new ConfigurationError("TextFilter needs at least one of equals, contains, startsWith, endsWith");
    }
    this.equals = options.equals;
    this.contains = asList(options.contains);
    this.startsWith = asList(options.startsWith);
    this.endsWith = asList(options.endsWith);
    this.ignoreCase = options.ignoreCase ?? false;
  }

  check(text: string | undefined): boolean {
    if (text === undefined) return false;
    const prepare = (s: string) => (this.ignoreCase ? s.toLowerCase() : s);
    const subject = prepare(text);

    if (this.equals !== undefined && prepare(this.equals) === subject) return true;
    if (this.contains.some((s) => subject.includes(prepare(s)))) return true;
    if (this.startsWith.some((s) => subject.startsWith(prepare(s)))) return true;
    return this.endsWith.some((s) => subject.endsWith(prepare(s)));
  }
}

/**
 * Text a text filter inspects: message text or caption, callback data,
 * inline query, or poll question
 */
export function searchableText(update: Update): string | undefined {
  if (isMessageKind(update.kind)) {
    const message = messageOf(update);
    return message?.text ?? message?.caption;
  }
  switch (update.kind) {
    case "callback_query":
      return update.payload.data;
    case "inline_query":
      return update.payload.query;
    case "poll":
      return update.payload.question;
    default:
      return undefined;
  }
}

const StringOrList = z.union([z.string(), z.array(z.string())]);

function includesOrEquals(expected: string | string[], actual: string | undefined): boolean {
  if (actual === undefined) return false;
  return typeof expected === "string" ? expected === actual : expected.includes(actual);
}

/** `text: "hi" | ["hi", "hello"] | new TextFilter({...})` */
export const textFilter = typedFilter(
  "text",
  z.union([z.string(), z.array(z.string()), z.instanceof(TextFilter)]),
  (update, value) =>
    value instanceof TextFilter
      ? value.check(searchableText(update))
      : includesOrEquals(value, searchableText(update))
);

/** `text_contains: "price" | ["price", "cost"]` */
export const textContainsFilter = typedFilter("text_contains", StringOrList, (update, value) => {
  const text = messageOf(update)?.text;
  return text !== undefined && asList(value).some((s) => text.includes(s));
});

/** `text_startswith: "Sir"` */
export const textStartsWithFilter = typedFilter("text_startswith", z.string(), (update, value) => {
  return messageOf(update)?.text?.startsWith(value) ?? false;
});

/** `chat_id: [12345, -100987]` */
export const chatIdFilter = typedFilter("chat_id", z.array(z.number().int()), (update, value) => {
  const chat = chatOf(update);
  return chat !== undefined && value.includes(chat.id);
});

/** `language_code: "en" | ["en", "de"]` */
export const languageCodeFilter = typedFilter("language_code", StringOrList, (update, value) =>
  includesOrEquals(value, senderOf(update)?.language_code)
);

export const isForwardedFilter = simpleFilter("is_forwarded", (update) => {
  const message = messageOf(update);
  return message?.forward_origin !== undefined || message?.forward_from_chat !== undefined;
});

export const isReplyFilter = simpleFilter(
  "is_reply",
  (update) => messageOf(update)?.reply_to_message !== undefined
);

export const isDigitFilter = simpleFilter("is_digit", (update) =>
  /^\d+$/.test(messageOf(update)?.text ?? "")
);

/**
 * The one request is_chat_admin needs, so it can run against any client
 */
export interface ChatMemberLookup {
  getChatMember(chatId: number, userId: number): Promise<{ status: string }>;
}

const ADMIN_STATUSES = new Set(["creator", "administrator"]);

/** `is_chat_admin: true` (asks the API for the sender's membership) */
export function isChatAdminFilter(lookup: ChatMemberLookup): CustomFilter {
  return simpleFilter("is_chat_admin", async (update) => {
    const chat = chatOf(update);
    const user = senderOf(update);
    if (!chat || !user) return false;
    const member = await lookup.getChatMember(chat.id, user.id);
    return ADMIN_STATUSES.has(member.status);
  });
}

/**
 * `state: "Signup:name" | ["Signup:name", ...] | StatesGroup | "*"`
 *
 * Reads the state of the update's (chat, sender) pair; "*" matches any
 * update, with or without a state.
 */
export function stateFilter(storage: StateStorage): CustomFilter {
  return typedFilter(
    "state",
    z.union([z.string(), z.array(z.string()), z.instanceof(StatesGroup)]),
    async (update, value) => {
      if (value === "*") return true;
      const chat = chatOf(update);
      const user = senderOf(update);
      if (!chat || !user) return false;

      const state = await storage.getState(chat.id, user.id);
      if (state === null) return false;
      if (value instanceof StatesGroup) return value.has(state);
      return includesOrEquals(value, state);
    }
  );
}

/**
 * Filters that need nothing but the update
 */
export const STANDARD_CUSTOM_FILTERS: readonly CustomFilter[] = [
  textFilter,
  textContainsFilter,
  textStartsWithFilter,
  chatIdFilter,
  languageCodeFilter,
  isForwardedFilter,
  isReplyFilter,
  isDigitFilter,
];

/**
 * Built-in filters: content_types, commands, regexp, chat_types
 */

import { ConfigurationError } from "../errors.js";
import { extractCommand, extractCommandMention } from "../text/command.js";
import { chatOf, hasChat, isMessageKind, messageOf } from "../updates/accessors.js";
import { isContentType } from "../updates/content-type.js";
import type { ContentType } from "../updates/content-type.js";
import { CHAT_TYPES } from "../updates/types.js";
import type { UpdateKind } from "../updates/types.js";
import type { FilterFactory } from "./types.js";

function requireMessageKind(name: string, kind: UpdateKind): void {
  if (!isMessageKind(kind)) {
    throw new ConfigurationError(`Filter '${name}' does not apply to ${kind} updates`);
  }
}

function stringList(name: string, value: unknown): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new ConfigurationError(`Filter '${name}' expects a list of strings`);
  }
  return value;
}

export const contentTypesFilter: FilterFactory = (value, kind) => {
  requireMessageKind("content_types", kind);
  const list = stringList("content_types", value);
  const unknown = list.filter((t) => !isContentType(t));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown content type(s): ${unknown.join(", ")}`);
  }
  const allowed = new Set<ContentType>(list.length > 0 ? list.filter(isContentType) : ["text"]);

  return {
    name: "content_types",
    evaluate: (update) => {
      const message = messageOf(update);
      return message !== undefined && allowed.has(message.content_type);
    },
  };
};

export const commandsFilter: FilterFactory = (value, kind, context) => {
  requireMessageKind("commands", kind);
  const names = new Set(stringList("commands", value).map((c) => c.replace(/^\//, "")));

  return {
    name: "commands",
    evaluate: (update) => {
      const text = messageOf(update)?.text;
      const command = extractCommand(text);
      if (command === null || !names.has(command)) return false;

      const mention = extractCommandMention(text);
      const username = context.botUsername;
      return mention === null || username === undefined || mention.toLowerCase() === username.toLowerCase();
    },
  };
};

export const regexpFilter: FilterFactory = (value, kind) => {
  requireMessageKind("regexp", kind);

  let pattern: RegExp;
  if (value instanceof RegExp) {
    // g and y make test() resume from lastIndex
    pattern = new RegExp(value.source, value.flags.replace(/[gy]/g, ""));
  } else if (typeof value === "string") {
    try {
      pattern = new RegExp(value, "i");
    } catch (err) {
      throw new ConfigurationError(`Invalid regexp '${value}'`, { cause: err });
    }
  } else {
    throw new ConfigurationError("Filter 'regexp' expects a string or RegExp");
  }

  return {
    name: "regexp",
    evaluate: (update) => {
      const text = messageOf(update)?.text;
      return text !== undefined && pattern.test(text);
    },
  };
};

export const chatTypesFilter: FilterFactory = (value, kind) => {
  if (!hasChat(kind)) {
    throw new ConfigurationError(`Filter 'chat_types' does not apply to ${kind} updates`);
  }
  const list = stringList("chat_types", value);
  const unknown = list.filter((t) => !CHAT_TYPES.some((c) => c === t));
  if (unknown.length > 0) {
    throw new ConfigurationError(`Unknown chat type(s): ${unknown.join(", ")}`);
  }
  const allowed = new Set(list);

  return {
    name: "chat_types",
    evaluate: (update) => {
      const chat = chatOf(update);
      return chat !== undefined && allowed.has(chat.type);
    },
  };
};

export const BUILTIN_FILTERS: Readonly<Record<string, FilterFactory>> = {
  content_types: contentTypesFilter,
  commands: commandsFilter,
  regexp: regexpFilter,
  chat_types: chatTypesFilter,
};

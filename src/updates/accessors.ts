/**
 * Update accessors - uniform reads across update kinds
 */

import { MESSAGE_KINDS } from "./types.js";
import type { Chat, Message, MessageKind, Update, UpdateKind, UpdateOf, User } from "./types.js";

/** Kinds whose payload names an originating chat */
export const CHAT_KINDS = [
  ...MESSAGE_KINDS,
  "callback_query",
  "my_chat_member",
  "chat_member",
  "chat_join_request",
] as const satisfies readonly UpdateKind[];

export function isMessageKind(kind: UpdateKind): kind is MessageKind {
  return MESSAGE_KINDS.some((k) => k === kind);
}

export function hasChat(kind: UpdateKind): boolean {
  return CHAT_KINDS.some((k) => k === kind);
}

export function isKind<K extends UpdateKind>(update: Update, kind: K): update is UpdateOf<K> {
  return update.kind === kind;
}

/**
 * The message an update carries: the payload for message kinds, the
 * originating message for callback queries
 */
export function messageOf(update: Update): Message | undefined {
  switch (update.kind) {
    case "message":
    case "edited_message":
    case "channel_post":
    case "edited_channel_post":
      return update.payload;
    case "callback_query":
      return update.payload.message;
    default:
      return undefined;
  }
}

/**
 * Message text, or its caption for media messages
 */
export function textOf(update: Update): string | undefined {
  if (!isMessageKind(update.kind)) return undefined;
  const message = messageOf(update);
  return message?.text ?? message?.caption;
}

export function chatOf(update: Update): Chat | undefined {
  switch (update.kind) {
    case "my_chat_member":
    case "chat_member":
    case "chat_join_request":
      return update.payload.chat;
    default:
      return messageOf(update)?.chat;
  }
}

export function senderOf(update: Update): User | undefined {
  switch (update.kind) {
    case "message":
    case "edited_message":
    case "channel_post":
    case "edited_channel_post":
      return update.payload.from;
    case "poll":
      return undefined;
    case "poll_answer":
      return update.payload.user;
    default:
      return update.payload.from;
  }
}

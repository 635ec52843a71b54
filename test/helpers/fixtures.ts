/**
 * Raw update fixtures shared by unit and integration tests
 */

import { parseUpdate } from "../../src/updates/parse.js";
import { isKind } from "../../src/updates/accessors.js";
import type { UpdateKind, UpdateOf } from "../../src/updates/types.js";

export type RawRecord = Record<string, unknown>;

export const USER = {
  id: 42,
  is_bot: false,
  first_name: "Ada",
  username: "ada",
  language_code: "en",
};

export const PRIVATE_CHAT = { id: 42, type: "private", first_name: "Ada" };

export const GROUP_CHAT = { id: -100123, type: "supergroup", title: "Test group" };

export function rawMessage(updateId: number, fields: RawRecord = {}): RawRecord {
  return {
    update_id: updateId,
    message: {
      message_id: updateId,
      date: 1700000000,
      chat: PRIVATE_CHAT,
      from: USER,
      ...fields,
    },
  };
}

export function rawText(updateId: number, text: string, fields: RawRecord = {}): RawRecord {
  return rawMessage(updateId, { text, ...fields });
}

export function rawCallbackQuery(updateId: number, data: string, fields: RawRecord = {}): RawRecord {
  return {
    update_id: updateId,
    callback_query: {
      id: `cb-${updateId}`,
      from: USER,
      chat_instance: "instance-1",
      data,
      message: {
        message_id: 500,
        date: 1700000000,
        chat: PRIVATE_CHAT,
        text: "Pick one",
      },
      ...fields,
    },
  };
}

export function rawInlineQuery(updateId: number, query: string): RawRecord {
  return {
    update_id: updateId,
    inline_query: { id: `iq-${updateId}`, from: USER, query, offset: "" },
  };
}

export function rawPoll(updateId: number, question: string): RawRecord {
  return {
    update_id: updateId,
    poll: {
      id: `poll-${updateId}`,
      question,
      options: [
        { text: "Yes", voter_count: 1 },
        { text: "No", voter_count: 0 },
      ],
      total_voter_count: 1,
      is_closed: false,
      is_anonymous: true,
      type: "regular",
      allows_multiple_answers: false,
    },
  };
}

/**
 * Parse a raw record and assert its kind
 */
export function bind<K extends UpdateKind>(kind: K, raw: RawRecord): UpdateOf<K> {
  const update = parseUpdate(raw);
  if (!isKind(update, kind)) {
    throw new Error(`Expected a ${kind} update, got ${update.kind}`);
  }
  return update;
}

export function textUpdate(updateId: number, text: string, fields: RawRecord = {}): UpdateOf<"message"> {
  return bind("message", rawText(updateId, text, fields));
}

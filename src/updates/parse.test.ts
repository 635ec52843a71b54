/**
 * Tests for update binding
 */

import { describe, it, expect } from "vitest";
import { parseUpdate, readUpdateId } from "./parse.js";
import { MalformedUpdateError } from "../errors.js";
import { rawCallbackQuery, rawMessage, rawPoll, rawText } from "../../test/helpers/fixtures.js";

function malformed(raw: unknown): MalformedUpdateError {
  try {
    parseUpdate(raw);
  } catch (err) {
    if (err instanceof MalformedUpdateError) return err;
    throw err;
  }
  throw new Error("parseUpdate did not throw");
}

describe("parseUpdate", () => {
  it("binds a text message", () => {
    const update = parseUpdate(rawText(10, "hello"));

    expect(update.kind).toBe("message");
    expect(update.updateId).toBe(10);
    if (update.kind !== "message") throw new Error("unreachable");
    expect(update.payload.text).toBe("hello");
    expect(update.payload.content_type).toBe("text");
    expect(update.payload.chat.type).toBe("private");
  });

  it("derives the content type of media messages", () => {
    const update = parseUpdate(
      rawMessage(11, { photo: [{ file_id: "f1", file_unique_id: "u1", width: 1, height: 1 }], caption: "look" })
    );

    if (update.kind !== "message") throw new Error("unreachable");
    expect(update.payload.content_type).toBe("photo");
    expect(update.payload.caption).toBe("look");
  });

  it("tags service messages", () => {
    const update = parseUpdate(rawMessage(12, { new_chat_members: [{ id: 7, is_bot: false, first_name: "Bo" }] }));

    if (update.kind !== "message") throw new Error("unreachable");
    expect(update.payload.content_type).toBe("new_chat_members");
  });

  it("tags messages without a known field as unknown", () => {
    const update = parseUpdate(rawMessage(13, { brand_new_field: { x: 1 } }));

    if (update.kind !== "message") throw new Error("unreachable");
    expect(update.payload.content_type).toBe("unknown");
  });

  it("keeps unknown payload fields", () => {
    const update = parseUpdate(rawMessage(14, { text: "hi", has_protected_content: true }));

    if (update.kind !== "message") throw new Error("unreachable");
    expect(update.payload.has_protected_content).toBe(true);
  });

  it("keeps the raw record", () => {
    const raw = rawCallbackQuery(15, "vote:1");
    const update = parseUpdate(raw);

    expect(update.kind).toBe("callback_query");
    expect(update.raw).toEqual(raw);
  });

  it("binds polls", () => {
    const update = parseUpdate(rawPoll(16, "Lunch?"));

    if (update.kind !== "poll") throw new Error("unreachable");
    expect(update.payload.question).toBe("Lunch?");
    expect(update.payload.options).toHaveLength(2);
  });

  it("rejects non-objects", () => {
    expect(malformed("nope").message).toBe("Malformed update: update is not an object");
    expect(malformed([1, 2]).updateId).toBeNull();
  });

  it("rejects a missing update_id", () => {
    const err = malformed({ message: { message_id: 1 } });

    expect(err.message).toBe("Malformed update: missing or invalid update_id");
    expect(err.updateId).toBeNull();
  });

  it("rejects records without a supported kind", () => {
    const err = malformed({ update_id: 20, business_message: {} });

    expect(err.updateId).toBe(20);
    expect(err.message).toBe("Malformed update #20: no supported update kind (found: business_message)");
  });

  it("rejects records with only an id", () => {
    expect(malformed({ update_id: 21 }).message).toBe("Malformed update #21: no update kind present");
  });

  it("rejects records with two kinds", () => {
    const raw = { ...rawText(22, "a"), edited_message: { message_id: 1, date: 1, chat: { id: 1, type: "private" } } };

    expect(malformed(raw).message).toBe(
      "Malformed update #22: more than one update kind present (message, edited_message)"
    );
  });

  it("rejects mistyped payloads and names the field", () => {
    const err = malformed({ update_id: 23, message: { message_id: "x", date: 1, chat: { id: 1, type: "private" } } });

    expect(err.updateId).toBe(23);
    expect(err.message).toContain("message.message_id");
  });

  it("rejects a payload missing its chat", () => {
    const err = malformed({ update_id: 24, message: { message_id: 1, date: 1 } });

    expect(err.message).toContain("message.chat");
  });
});

describe("readUpdateId", () => {
  it("reads integer ids only", () => {
    expect(readUpdateId({ update_id: 5 })).toBe(5);
    expect(readUpdateId({ update_id: "5" })).toBeNull();
    expect(readUpdateId({ update_id: 1.5 })).toBeNull();
    expect(readUpdateId(null)).toBeNull();
  });
});

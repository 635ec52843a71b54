/**
 * Update Types - schemas for the update payloads the dispatcher reads
 *
 * Only the fields the library inspects are declared; every other field of
 * the platform's JSON is passed through untouched. The full platform schema
 * is available as types from grammY ("grammy/types") for callers that need it.
 */

import { z } from "zod";
import { detectContentType } from "./content-type.js";

export const UPDATE_KINDS = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
  "callback_query",
  "inline_query",
  "chosen_inline_result",
  "shipping_query",
  "pre_checkout_query",
  "poll",
  "poll_answer",
  "my_chat_member",
  "chat_member",
  "chat_join_request",
] as const;

export type UpdateKind = (typeof UPDATE_KINDS)[number];

/** Kinds whose payload is a Message */
export const MESSAGE_KINDS = [
  "message",
  "edited_message",
  "channel_post",
  "edited_channel_post",
] as const satisfies readonly UpdateKind[];

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export const CHAT_TYPES = ["private", "group", "supergroup", "channel"] as const;

export type ChatType = (typeof CHAT_TYPES)[number];

// === Shared objects ===

export const UserSchema = z
  .object({
    id: z.number().int(),
    is_bot: z.boolean(),
    first_name: z.string(),
    last_name: z.string().optional(),
    username: z.string().optional(),
    language_code: z.string().optional(),
  })
  .passthrough();

export const ChatSchema = z
  .object({
    id: z.number().int(),
    // Kept open: the platform adds chat types over time
    type: z.string(),
    title: z.string().optional(),
    username: z.string().optional(),
  })
  .passthrough();

export const MessageEntitySchema = z
  .object({
    type: z.string(),
    offset: z.number().int(),
    length: z.number().int(),
  })
  .passthrough();

export const MessageSchema = z
  .object({
    message_id: z.number().int(),
    date: z.number(),
    chat: ChatSchema,
    from: UserSchema.optional(),
    sender_chat: ChatSchema.optional(),
    message_thread_id: z.number().int().optional(),
    text: z.string().optional(),
    caption: z.string().optional(),
    entities: z.array(MessageEntitySchema).optional(),
    reply_to_message: z.object({ message_id: z.number().int() }).passthrough().optional(),
    forward_origin: z.record(z.unknown()).optional(),
    forward_from_chat: ChatSchema.optional(),
  })
  .passthrough()
  .transform((message) => ({
    ...message,
    content_type: detectContentType(message),
  }));

export const CallbackQuerySchema = z
  .object({
    id: z.string(),
    from: UserSchema,
    message: MessageSchema.optional(),
    inline_message_id: z.string().optional(),
    chat_instance: z.string(),
    data: z.string().optional(),
    game_short_name: z.string().optional(),
  })
  .passthrough();

export const InlineQuerySchema = z
  .object({
    id: z.string(),
    from: UserSchema,
    query: z.string(),
    offset: z.string(),
    chat_type: z.string().optional(),
  })
  .passthrough();

export const ChosenInlineResultSchema = z
  .object({
    result_id: z.string(),
    from: UserSchema,
    query: z.string(),
    inline_message_id: z.string().optional(),
  })
  .passthrough();

export const ShippingQuerySchema = z
  .object({
    id: z.string(),
    from: UserSchema,
    invoice_payload: z.string(),
    shipping_address: z.record(z.unknown()),
  })
  .passthrough();

export const PreCheckoutQuerySchema = z
  .object({
    id: z.string(),
    from: UserSchema,
    currency: z.string(),
    total_amount: z.number().int(),
    invoice_payload: z.string(),
    shipping_option_id: z.string().optional(),
  })
  .passthrough();

export const PollSchema = z
  .object({
    id: z.string(),
    question: z.string(),
    options: z.array(
      z.object({ text: z.string(), voter_count: z.number().int() }).passthrough()
    ),
    total_voter_count: z.number().int(),
    is_closed: z.boolean(),
    is_anonymous: z.boolean(),
    type: z.string(),
    allows_multiple_answers: z.boolean(),
  })
  .passthrough();

export const PollAnswerSchema = z
  .object({
    poll_id: z.string(),
    user: UserSchema.optional(),
    voter_chat: ChatSchema.optional(),
    option_ids: z.array(z.number().int()),
  })
  .passthrough();

const ChatMemberSchema = z
  .object({
    status: z.string(),
    user: UserSchema,
  })
  .passthrough();

export const ChatMemberUpdatedSchema = z
  .object({
    chat: ChatSchema,
    from: UserSchema,
    date: z.number(),
    old_chat_member: ChatMemberSchema,
    new_chat_member: ChatMemberSchema,
    invite_link: z.record(z.unknown()).optional(),
  })
  .passthrough();

export const ChatJoinRequestSchema = z
  .object({
    chat: ChatSchema,
    from: UserSchema,
    user_chat_id: z.number().int(),
    date: z.number(),
    bio: z.string().optional(),
    invite_link: z.record(z.unknown()).optional(),
  })
  .passthrough();

// === Update envelope ===

function variant<K extends UpdateKind, P extends z.ZodTypeAny>(kind: K, payload: P) {
  return z.object({
    kind: z.literal(kind),
    updateId: z.number().int(),
    payload,
    raw: z.record(z.unknown()),
  });
}

export const UpdateSchema = z.discriminatedUnion("kind", [
  variant("message", MessageSchema),
  variant("edited_message", MessageSchema),
  variant("channel_post", MessageSchema),
  variant("edited_channel_post", MessageSchema),
  variant("callback_query", CallbackQuerySchema),
  variant("inline_query", InlineQuerySchema),
  variant("chosen_inline_result", ChosenInlineResultSchema),
  variant("shipping_query", ShippingQuerySchema),
  variant("pre_checkout_query", PreCheckoutQuerySchema),
  variant("poll", PollSchema),
  variant("poll_answer", PollAnswerSchema),
  variant("my_chat_member", ChatMemberUpdatedSchema),
  variant("chat_member", ChatMemberUpdatedSchema),
  variant("chat_join_request", ChatJoinRequestSchema),
]);

export type Update = z.infer<typeof UpdateSchema>;
export type UpdateOf<K extends UpdateKind> = Extract<Update, { kind: K }>;
export type PayloadOf<K extends UpdateKind> = UpdateOf<K>["payload"];

export type User = z.infer<typeof UserSchema>;
export type Chat = z.infer<typeof ChatSchema>;
export type MessageEntity = z.infer<typeof MessageEntitySchema>;
export type Message = z.infer<typeof MessageSchema>;
export type CallbackQuery = z.infer<typeof CallbackQuerySchema>;
export type InlineQuery = z.infer<typeof InlineQuerySchema>;
export type ChosenInlineResult = z.infer<typeof ChosenInlineResultSchema>;
export type ShippingQuery = z.infer<typeof ShippingQuerySchema>;
export type PreCheckoutQuery = z.infer<typeof PreCheckoutQuerySchema>;
export type Poll = z.infer<typeof PollSchema>;
export type PollAnswer = z.infer<typeof PollAnswerSchema>;
export type ChatMemberUpdated = z.infer<typeof ChatMemberUpdatedSchema>;
export type ChatJoinRequest = z.infer<typeof ChatJoinRequestSchema>;

/**
 * Per-update mutable key/value map shared by middleware and handlers
 */
export type DispatchContext = Map<string, unknown>;

/**
 * Message content tags
 *
 * A message carries at most one content field (text, photo, ...) or one
 * service field (new_chat_members, pinned_message, ...). The first field
 * present, in the order below, names the message's content type.
 */

export const MEDIA_CONTENT_TYPES = [
  "text",
  "animation",
  "audio",
  "document",
  "photo",
  "sticker",
  "story",
  "video",
  "video_note",
  "voice",
  "contact",
  "dice",
  "game",
  "poll",
  "venue",
  "location",
  "invoice",
  "successful_payment",
  "connected_website",
  "passport_data",
  "web_app_data",
] as const;

export const SERVICE_CONTENT_TYPES = [
  "new_chat_members",
  "left_chat_member",
  "new_chat_title",
  "new_chat_photo",
  "delete_chat_photo",
  "group_chat_created",
  "supergroup_chat_created",
  "channel_chat_created",
  "migrate_to_chat_id",
  "migrate_from_chat_id",
  "pinned_message",
  "message_auto_delete_timer_changed",
  "forum_topic_created",
  "forum_topic_edited",
  "forum_topic_closed",
  "forum_topic_reopened",
  "general_forum_topic_hidden",
  "general_forum_topic_unhidden",
  "video_chat_scheduled",
  "video_chat_started",
  "video_chat_ended",
  "video_chat_participants_invited",
  "write_access_allowed",
  "users_shared",
  "chat_shared",
] as const;

export type ContentType =
  | (typeof MEDIA_CONTENT_TYPES)[number]
  | (typeof SERVICE_CONTENT_TYPES)[number]
  | "unknown";

const ALL_CONTENT_TYPES: readonly ContentType[] = [
  ...MEDIA_CONTENT_TYPES,
  ...SERVICE_CONTENT_TYPES,
];

export function isContentType(value: unknown): value is ContentType {
  return (
    typeof value === "string" &&
    (value === "unknown" || ALL_CONTENT_TYPES.some((t) => t === value))
  );
}

/**
 * Detect the content type of a raw message object
 */
export function detectContentType(message: Readonly<Record<string, unknown>>): ContentType {
  for (const type of ALL_CONTENT_TYPES) {
    const value = message[type];
    if (value !== undefined && value !== null) return type;
  }
  return "unknown";
}

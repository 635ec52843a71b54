/**
 * Updates module exports
 */

export { parseUpdate, readUpdateId } from "./parse.js";
export { textOf, chatOf, senderOf, messageOf, isKind, isMessageKind, hasChat, CHAT_KINDS } from "./accessors.js";
export {
  detectContentType,
  isContentType,
  MEDIA_CONTENT_TYPES,
  SERVICE_CONTENT_TYPES,
} from "./content-type.js";
export type { ContentType } from "./content-type.js";
export { UPDATE_KINDS, MESSAGE_KINDS, CHAT_TYPES, UpdateSchema } from "./types.js";
export type {
  Update,
  UpdateKind,
  UpdateOf,
  PayloadOf,
  MessageKind,
  ChatType,
  DispatchContext,
  User,
  Chat,
  Message,
  MessageEntity,
  CallbackQuery,
  InlineQuery,
  ChosenInlineResult,
  ShippingQuery,
  PreCheckoutQuery,
  Poll,
  PollAnswer,
  ChatMemberUpdated,
  ChatJoinRequest,
} from "./types.js";

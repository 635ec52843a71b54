/**
 * Bot Client - request methods over grammY's Api
 *
 * Every method maps onto one Bot API method. grammY errors are mapped to the
 * library's taxonomy: a platform answer with ok=false becomes RemoteError,
 * anything that never got an answer becomes TransportError.
 */

import { Api, GrammyError } from "grammy";
import type { ParseMode } from "grammy/types";
import { RemoteError, TransportError } from "./errors.js";
import { ConsoleLogger, scopedLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { FetchRequest, UpdateTransport } from "./polling.js";

export type ChatId = number | string;

/** Positional arguments of a grammY Api method */
type Args<M extends keyof Api> = Api[M] extends (...args: infer A) => unknown ? A : never;

export interface ClientOptions {
  /** Bot token; required unless an Api instance is given */
  token?: string;
  /** Pre-built grammY Api (tests, custom transformers) */
  api?: Api;
  apiRoot?: string;
  /** Applied to sendMessage and editMessageText when the caller gives none */
  parseMode?: ParseMode;
  /** Retries of a 429 answer, waiting retry_after seconds each time */
  rateLimitRetries?: number;
  logger?: Logger;
}

/**
 * Map a thrown grammY value onto RemoteError or TransportError
 */
export function toBotError(method: string, err: unknown): RemoteError | TransportError {
  if (err instanceof RemoteError || err instanceof TransportError) return err;
  if (err instanceof GrammyError) {
    return new RemoteError(method, err.error_code, err.description, err.parameters.retry_after);
  }
  return new TransportError(method, err);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export class BotClient implements UpdateTransport {
  readonly api: Api;
  private parseMode: ParseMode | undefined;
  private rateLimitRetries: number;
  private logger: Logger;

  constructor(options: ClientOptions) {
    if (options.api) {
      this.api = options.api;
    } else if (options.token) {
      this.api = new Api(options.token, options.apiRoot ? { apiRoot: options.apiRoot } : undefined);
    } else {
      throw new TypeError("BotClient needs a token or an Api instance");
    }
    this.parseMode = options.parseMode;
    this.rateLimitRetries = options.rateLimitRetries ?? 0;
    this.logger = scopedLogger(options.logger ?? new ConsoleLogger(), "Client");
  }

  /**
   * Run one request, mapping errors and retrying rate limits when enabled
   */
  private async call<T>(method: string, request: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await request();
      } catch (err) {
        const error = toBotError(method, err);
        if (!(error instanceof RemoteError && error.isRateLimit) || attempt > this.rateLimitRetries) {
          throw error;
        }
        const waitSeconds = error.retryAfter ?? 1;
        this.logger.warn(
          `${method} rate limited, retrying in ${waitSeconds}s (${attempt}/${this.rateLimitRetries})`
        );
        await delay(waitSeconds * 1000);
      }
    }
  }

  // === Updates ===

  async fetchUpdates(request: FetchRequest, signal?: AbortSignal): Promise<unknown[]> {
    return this.call("getUpdates", () =>
      this.api.getUpdates(
        {
          offset: request.offset,
          limit: request.limit,
          timeout: request.timeout,
          allowed_updates: request.allowedUpdates,
        },
        signal
      )
    );
  }

  // === Bot ===

  getMe() {
    return this.call("getMe", () => this.api.getMe());
  }

  logOut() {
    return this.call("logOut", () => this.api.logOut());
  }

  close() {
    return this.call("close", () => this.api.close());
  }

  setWebhook(url: string, other?: Args<"setWebhook">[1]) {
    return this.call("setWebhook", () => this.api.setWebhook(url, other));
  }

  deleteWebhook(other?: Args<"deleteWebhook">[0]) {
    return this.call("deleteWebhook", () => this.api.deleteWebhook(other));
  }

  getWebhookInfo() {
    return this.call("getWebhookInfo", () => this.api.getWebhookInfo());
  }

  setMyCommands(commands: Args<"setMyCommands">[0], other?: Args<"setMyCommands">[1]) {
    return this.call("setMyCommands", () => this.api.setMyCommands(commands, other));
  }

  getMyCommands(other?: Args<"getMyCommands">[0]) {
    return this.call("getMyCommands", () => this.api.getMyCommands(other));
  }

  deleteMyCommands(other?: Args<"deleteMyCommands">[0]) {
    return this.call("deleteMyCommands", () => this.api.deleteMyCommands(other));
  }

  // === Messages ===

  sendMessage(chatId: ChatId, text: string, other?: Args<"sendMessage">[2]) {
    const options =
      other?.parse_mode === undefined && this.parseMode ? { ...other, parse_mode: this.parseMode } : other;
    return this.call("sendMessage", () => this.api.sendMessage(chatId, text, options));
  }

  forwardMessage(chatId: ChatId, fromChatId: ChatId, messageId: number, other?: Args<"forwardMessage">[3]) {
    return this.call("forwardMessage", () => this.api.forwardMessage(chatId, fromChatId, messageId, other));
  }

  copyMessage(chatId: ChatId, fromChatId: ChatId, messageId: number, other?: Args<"copyMessage">[3]) {
    return this.call("copyMessage", () => this.api.copyMessage(chatId, fromChatId, messageId, other));
  }

  editMessageText(chatId: ChatId, messageId: number, text: string, other?: Args<"editMessageText">[3]) {
    const options =
      other?.parse_mode === undefined && this.parseMode ? { ...other, parse_mode: this.parseMode } : other;
    return this.call("editMessageText", () => this.api.editMessageText(chatId, messageId, text, options));
  }

  editMessageReplyMarkup(chatId: ChatId, messageId: number, other?: Args<"editMessageReplyMarkup">[2]) {
    return this.call("editMessageReplyMarkup", () =>
      this.api.editMessageReplyMarkup(chatId, messageId, other)
    );
  }

  deleteMessage(chatId: ChatId, messageId: number) {
    return this.call("deleteMessage", () => this.api.deleteMessage(chatId, messageId));
  }

  sendChatAction(chatId: ChatId, action: Args<"sendChatAction">[1], other?: Args<"sendChatAction">[2]) {
    return this.call("sendChatAction", () => this.api.sendChatAction(chatId, action, other));
  }

  sendPhoto(chatId: ChatId, photo: Args<"sendPhoto">[1], other?: Args<"sendPhoto">[2]) {
    return this.call("sendPhoto", () => this.api.sendPhoto(chatId, photo, other));
  }

  sendDocument(chatId: ChatId, document: Args<"sendDocument">[1], other?: Args<"sendDocument">[2]) {
    return this.call("sendDocument", () => this.api.sendDocument(chatId, document, other));
  }

  sendLocation(chatId: ChatId, latitude: number, longitude: number, other?: Args<"sendLocation">[3]) {
    return this.call("sendLocation", () => this.api.sendLocation(chatId, latitude, longitude, other));
  }

  sendContact(chatId: ChatId, phoneNumber: string, firstName: string, other?: Args<"sendContact">[3]) {
    return this.call("sendContact", () => this.api.sendContact(chatId, phoneNumber, firstName, other));
  }

  sendDice(chatId: ChatId, emoji: Args<"sendDice">[1], other?: Args<"sendDice">[2]) {
    return this.call("sendDice", () => this.api.sendDice(chatId, emoji, other));
  }

  stopPoll(chatId: ChatId, messageId: number, other?: Args<"stopPoll">[2]) {
    return this.call("stopPoll", () => this.api.stopPoll(chatId, messageId, other));
  }

  // === Queries ===

  answerCallbackQuery(callbackQueryId: string, other?: Args<"answerCallbackQuery">[1]) {
    return this.call("answerCallbackQuery", () => this.api.answerCallbackQuery(callbackQueryId, other));
  }

  answerInlineQuery(
    inlineQueryId: string,
    results: Args<"answerInlineQuery">[1],
    other?: Args<"answerInlineQuery">[2]
  ) {
    return this.call("answerInlineQuery", () => this.api.answerInlineQuery(inlineQueryId, results, other));
  }

  answerShippingQuery(shippingQueryId: string, ok: boolean, other?: Args<"answerShippingQuery">[2]) {
    return this.call("answerShippingQuery", () => this.api.answerShippingQuery(shippingQueryId, ok, other));
  }

  answerPreCheckoutQuery(preCheckoutQueryId: string, ok: boolean, other?: Args<"answerPreCheckoutQuery">[2]) {
    return this.call("answerPreCheckoutQuery", () =>
      this.api.answerPreCheckoutQuery(preCheckoutQueryId, ok, other)
    );
  }

  // === Chats ===

  getChat(chatId: ChatId) {
    return this.call("getChat", () => this.api.getChat(chatId));
  }

  getChatMember(chatId: ChatId, userId: number) {
    return this.call("getChatMember", () => this.api.getChatMember(chatId, userId));
  }

  getChatAdministrators(chatId: ChatId) {
    return this.call("getChatAdministrators", () => this.api.getChatAdministrators(chatId));
  }

  leaveChat(chatId: ChatId) {
    return this.call("leaveChat", () => this.api.leaveChat(chatId));
  }

  banChatMember(chatId: ChatId, userId: number, other?: Args<"banChatMember">[2]) {
    return this.call("banChatMember", () => this.api.banChatMember(chatId, userId, other));
  }

  unbanChatMember(chatId: ChatId, userId: number, other?: Args<"unbanChatMember">[2]) {
    return this.call("unbanChatMember", () => this.api.unbanChatMember(chatId, userId, other));
  }

  approveChatJoinRequest(chatId: ChatId, userId: number) {
    return this.call("approveChatJoinRequest", () => this.api.approveChatJoinRequest(chatId, userId));
  }

  declineChatJoinRequest(chatId: ChatId, userId: number) {
    return this.call("declineChatJoinRequest", () => this.api.declineChatJoinRequest(chatId, userId));
  }

  createChatInviteLink(chatId: ChatId, other?: Args<"createChatInviteLink">[1]) {
    return this.call("createChatInviteLink", () => this.api.createChatInviteLink(chatId, other));
  }

  getFile(fileId: string) {
    return this.call("getFile", () => this.api.getFile(fileId));
  }
}

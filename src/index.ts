/**
 * wirebot
 * Bot API update dispatcher: filters, handlers, middleware, polling and webhooks
 */

export { Bot } from "./bot.js";
export type { BotContext, BotHandler, BotOptions } from "./bot.js";
export { BotClient, toBotError } from "./client.js";
export type { ChatId, ClientOptions } from "./client.js";
export * from "./config.js";
export { Dispatcher } from "./dispatcher.js";
export type {
  ConcurrencyMode,
  DispatchResult,
  DispatcherOptions,
  ErrorSink,
  UpdateListener,
} from "./dispatcher.js";
export * from "./errors.js";
export { ConsoleLogger, scopedLogger } from "./logger.js";
export type { Logger } from "./logger.js";
export { MemoryLogger } from "./memory-logger.js";
export type { LogEntry } from "./memory-logger.js";
export { SKIP_HANDLER, CANCEL_UPDATE, acceptsKind, middlewareName } from "./middleware.js";
export type { Middleware, MiddlewareAction } from "./middleware.js";
export { WorkerPool, PoolClosedError } from "./worker-pool.js";
export type { Task } from "./worker-pool.js";
export { UpdatePoller, submitRecords, DEFAULT_POLLING_OPTIONS } from "./polling.js";
export type {
  FetchRequest,
  HandOffResult,
  PollingOptions,
  StopOptions,
  UpdateSink,
  UpdateTransport,
} from "./polling.js";
export { WebhookReceiver, SECRET_TOKEN_HEADER, isValidSecretToken, headerValue } from "./webhook.js";
export type { WebhookHeaders, WebhookOptions, WebhookResponse } from "./webhook.js";
export * from "./markup.js";
export * from "./callback-data.js";
export { ShutdownController } from "./shutdown.js";
export type { Stoppable } from "./shutdown.js";
export * from "./updates/index.js";
export * from "./filters/index.js";
export * from "./handlers/index.js";
export * from "./state/index.js";
export * from "./text/index.js";

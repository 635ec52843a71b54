/**
 * Bot - wires config, client, filters, handlers, dispatcher and update sources
 *
 * Handlers are registered per update kind with a filter spec and run in
 * registration order; the first whose filters all pass handles the update.
 *
 * @example
 * const bot = new Bot({ token: loadBotToken() });
 * bot.command("start", (message, { bot }) => bot.client.sendMessage(message.chat.id, "Hi!"));
 * await bot.startPolling();
 */

import type { UserFromGetMe } from "grammy/types";
import { BotClient } from "./client.js";
import { resolveConfig, validateToken } from "./config.js";
import type { BotConfig, BotConfigInput } from "./config.js";
import { Dispatcher } from "./dispatcher.js";
import type { ErrorSink, UpdateListener } from "./dispatcher.js";
import { BotError, ConfigurationError } from "./errors.js";
import { FilterRegistry } from "./filters/registry.js";
import { STANDARD_CUSTOM_FILTERS, isChatAdminFilter, stateFilter } from "./filters/custom.js";
import type { CustomFilter, FilterSpec } from "./filters/types.js";
import { HandlerRegistry } from "./handlers/registry.js";
import { StepHandlerStore } from "./handlers/steps.js";
import { createRegistration } from "./handlers/registration.js";
import type {
  Callback,
  Handler,
  HandlerContext,
  RegistrationHandle,
  RegistrationOptions,
} from "./handlers/registration.js";
import { ConsoleLogger, scopedLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import type { Middleware } from "./middleware.js";
import { UpdatePoller, submitRecords } from "./polling.js";
import type { PollingOptions, StopOptions, UpdateTransport } from "./polling.js";
import { MemoryStateStorage } from "./state/memory-storage.js";
import { SqliteStateStorage } from "./state/sqlite-storage.js";
import { StateContext } from "./state/states.js";
import type { StateStorage } from "./state/types.js";
import type { Message, UpdateKind } from "./updates/types.js";
import { WebhookReceiver } from "./webhook.js";

export interface BotContext<K extends UpdateKind> extends HandlerContext<K> {
  bot: Bot;
}

export type BotHandler<K extends UpdateKind> = Handler<K, BotContext<K>>;

export interface BotOptions {
  /** Bot token; required unless a client is given */
  token?: string;
  config?: BotConfigInput;
  client?: BotClient;
  /** Update source for polling; defaults to the client */
  transport?: UpdateTransport;
  /** Overrides the storage chosen by config.state */
  stateStorage?: StateStorage;
  logger?: Logger;
}

type SendOptions = Parameters<BotClient["sendMessage"]>[2];

export class Bot {
  readonly config: BotConfig;
  readonly client: BotClient;
  readonly states: StateStorage;

  private readonly filters = new FilterRegistry();
  private readonly handlers = new HandlerRegistry();
  private readonly steps = new StepHandlerStore();
  private readonly dispatcher: Dispatcher;
  private readonly transport: UpdateTransport;
  private readonly baseLogger: Logger;
  private readonly logger: Logger;
  private readonly ownsStorage: boolean;
  private poller: UpdatePoller | null = null;
  private receiver: WebhookReceiver | null = null;
  private me: UserFromGetMe | null = null;

  constructor(options: BotOptions) {
    this.config = resolveConfig(options.config ?? {});
    this.baseLogger = options.logger ?? new ConsoleLogger();
    this.logger = scopedLogger(this.baseLogger, "Bot");

    if (options.client) {
      this.client = options.client;
    } else if (options.token !== undefined) {
      validateToken(options.token);
      this.client = new BotClient({
        token: options.token,
        apiRoot: this.config.api.apiRoot,
        parseMode: this.config.api.parseMode,
        rateLimitRetries: this.config.api.rateLimitRetries,
        logger: this.baseLogger,
      });
    } else {
      throw new ConfigurationError("Bot needs a token or a client");
    }
    this.transport = options.transport ?? this.client;

    if (options.stateStorage) {
      this.states = options.stateStorage;
      this.ownsStorage = false;
    } else {
      this.states =
        this.config.state.storage === "sqlite"
          ? new SqliteStateStorage(this.config.state.path)
          : new MemoryStateStorage();
      this.ownsStorage = true;
    }

    this.dispatcher = new Dispatcher(this.handlers, {
      concurrency: this.config.concurrency,
      middlewareEnabled: this.config.middleware.enabled,
      strict: this.config.strict,
      steps: this.steps,
      logger: this.baseLogger,
    });

    for (const filter of STANDARD_CUSTOM_FILTERS) {
      this.filters.addCustomFilter(filter);
    }
    this.filters.addCustomFilter(stateFilter(this.states));
    this.filters.addCustomFilter(isChatAdminFilter(this.client));
    this.filters.setBotUsername(this.config.username);
  }

  /** Username from config or getMe, without the @ */
  get username(): string | undefined {
    return this.filters.botUsername;
  }

  /** Bot account from getMe, once init() ran */
  get info(): UserFromGetMe | null {
    return this.me;
  }

  get isPolling(): boolean {
    return this.poller?.isRunning ?? false;
  }

  // === Registration ===

  /**
   * Register a handler for one update kind
   *
   * @throws ConfigurationError when the filter spec is invalid for the kind
   */
  on<K extends UpdateKind>(
    kind: K,
    filters: FilterSpec<K>,
    handler: BotHandler<K>,
    options: RegistrationOptions = {}
  ): RegistrationHandle {
    const predicates = this.filters.build(kind, filters);
    const registration = createRegistration(
      kind,
      predicates,
      (payload, context) => handler(payload, { ...context, bot: this }),
      options,
      handler
    );
    this.handlers.register(registration);

    return {
      id: registration.id,
      kind,
      remove: () => this.handlers.unregister({ id: registration.id }) > 0,
    };
  }

  /** `/name` commands in messages */
  command(
    names: string | readonly string[],
    handler: BotHandler<"message">,
    filters: FilterSpec<"message"> = {},
    options?: RegistrationOptions
  ): RegistrationHandle {
    const commands = typeof names === "string" ? [names] : names;
    return this.on("message", { commands, ...filters }, handler, options);
  }

  /** Messages whose text matches a pattern */
  hears(
    pattern: string | RegExp,
    handler: BotHandler<"message">,
    filters: FilterSpec<"message"> = {},
    options?: RegistrationOptions
  ): RegistrationHandle {
    return this.on("message", { regexp: pattern, ...filters }, handler, options);
  }

  onMessage(
    filters: FilterSpec<"message">,
    handler: BotHandler<"message">,
    options?: RegistrationOptions
  ): RegistrationHandle {
    return this.on("message", filters, handler, options);
  }

  onCallbackQuery(
    filters: FilterSpec<"callback_query">,
    handler: BotHandler<"callback_query">,
    options?: RegistrationOptions
  ): RegistrationHandle {
    return this.on("callback_query", filters, handler, options);
  }

  /**
   * Remove every registration of a handler function, or the one behind a handle
   *
   * @returns number of registrations removed
   */
  unregister(target: Callback | RegistrationHandle): number {
    return this.handlers.unregister(typeof target === "function" ? target : { id: target.id });
  }

  addCustomFilter(filter: CustomFilter): void {
    this.filters.addCustomFilter(filter);
  }

  /**
   * @throws ConfigurationError when middleware is disabled in config
   */
  use(middleware: Middleware): void {
    if (!this.dispatcher.middlewareEnabled) {
      throw new ConfigurationError("Middleware is disabled (middleware.enabled is false)");
    }
    this.dispatcher.use(middleware);
  }

  /** Observe every bound update before dispatch */
  onUpdate(listener: UpdateListener): void {
    this.dispatcher.onUpdate(listener);
  }

  /** Receive handler errors; null restores the default (log, or rethrow when strict) */
  onError(sink: ErrorSink | null): void {
    this.dispatcher.setErrorSink(sink);
  }

  /**
   * Send the next message from a chat to this handler instead of the
   * registered ones. Handlers registered for the same chat run in order and
   * are dropped once they have seen a message.
   */
  registerNextStepHandler(chatId: number, handler: BotHandler<"message">): void {
    this.steps.register(
      chatId,
      (payload, context) => handler(payload, { ...context, bot: this }),
      handler.name || "nextStep"
    );
  }

  /**
   * @returns false when the chat had no pending next-step handlers
   */
  clearStepHandlers(chatId: number): boolean {
    return this.steps.clear(chatId);
  }

  // === State ===

  state(chatId: number, userId: number): StateContext {
    return new StateContext(this.states, chatId, userId);
  }

  // === Update sources ===

  /**
   * Learn the bot's username (getMe) unless config already names it
   */
  async init(): Promise<void> {
    if (this.filters.botUsername !== undefined) return;
    this.me = await this.client.getMe();
    this.filters.setBotUsername(this.me.username);
  }

  /**
   * Long poll until stop(). Rejects on a transport failure unless
   * polling.nonStop is set.
   */
  async startPolling(overrides: Partial<PollingOptions> = {}): Promise<void> {
    if (this.poller?.isRunning) {
      throw new BotError("Polling is already running");
    }
    await this.init();
    // A hard stop closes the pool; polling again needs a fresh one
    this.dispatcher.reopen();

    const poller = new UpdatePoller(
      this.transport,
      this.dispatcher,
      { ...this.config.polling, ...overrides },
      this.baseLogger
    );
    this.poller = poller;

    this.logger.log(`🤖 Polling as @${this.username ?? "unknown"}`);
    try {
      await poller.start();
    } finally {
      this.logger.log("Polling stopped");
    }
  }

  /**
   * Stop polling and wait for in-flight dispatches; hard drops queued ones
   */
  async stop(options: StopOptions = {}): Promise<void> {
    if (this.poller?.isRunning) {
      await this.poller.stop(options);
      return;
    }
    if (options.hard) this.dispatcher.abandon();
    else await this.dispatcher.drain();
  }

  /**
   * Dispatch raw update records received some other way. Resolves once
   * every update has been handed to the dispatcher.
   *
   * @throws PoolClosedError when the bot was hard-stopped before the batch was through
   */
  async processUpdates(records: readonly unknown[]): Promise<void> {
    const { closed } = await submitRecords(records, this.dispatcher, this.logger);
    if (closed) throw closed;
  }

  /** Wait for pooled dispatches in flight */
  async drain(): Promise<void> {
    await this.dispatcher.drain();
  }

  /** Receiver to plug into an HTTP server for webhook delivery */
  webhook(): WebhookReceiver {
    this.receiver ??= new WebhookReceiver(this.dispatcher, {
      secretToken: this.config.webhook.secretToken,
      logger: this.baseLogger,
    });
    return this.receiver;
  }

  /**
   * Point the platform at a webhook URL (config.webhook.url by default)
   */
  async setWebhook(url: string | undefined = this.config.webhook.url): Promise<true> {
    if (!url) {
      throw new ConfigurationError("No webhook URL given and webhook.url is not set");
    }
    return this.client.setWebhook(url, {
      secret_token: this.config.webhook.secretToken,
      drop_pending_updates: this.config.webhook.dropPendingUpdates,
      allowed_updates: this.config.polling.allowedUpdates,
    });
  }

  async deleteWebhook(): Promise<true> {
    return this.client.deleteWebhook({ drop_pending_updates: this.config.webhook.dropPendingUpdates });
  }

  // === Shortcuts ===

  /** Send text to the chat of a message, as a reply to it */
  replyTo(message: Message, text: string, other?: SendOptions) {
    return this.client.sendMessage(message.chat.id, text, {
      reply_parameters: { message_id: message.message_id },
      ...other,
    });
  }

  /**
   * Release resources the bot opened itself (the SQLite state file)
   */
  dispose(): void {
    if (this.ownsStorage && this.states instanceof SqliteStateStorage) {
      this.states.close();
    }
  }
}

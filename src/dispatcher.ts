/**
 * Dispatcher - routes each update to the first matching handler
 *
 * For one update:
 * 0. A message from a chat with pending next-step handlers goes to them
 *    instead, and nothing below runs
 * 1. Look up the registrations of the update's kind (none: nothing to do)
 * 2. Run middleware pre-process hooks in registration order
 * 3. Scan registrations in order; the first whose predicates all pass runs,
 *    and scanning stops unless it passes to the next
 * 4. Run middleware post-process hooks in reverse order
 *
 * Handler errors are wrapped in HandlerError and reported to the error sink;
 * they never escape into the update source.
 */

import { HandlerError, describeError } from "./errors.js";
import { CONTINUE_HANDLING } from "./handlers/registration.js";
import type { HandlerRegistration } from "./handlers/registration.js";
import type { HandlerRegistry } from "./handlers/registry.js";
import { ConsoleLogger, scopedLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { CANCEL_UPDATE, SKIP_HANDLER, acceptsKind, middlewareName } from "./middleware.js";
import type { Middleware } from "./middleware.js";
import type { StepHandlerStore } from "./handlers/steps.js";
import { isKind } from "./updates/accessors.js";
import type { DispatchContext, Update, UpdateKind, UpdateOf } from "./updates/types.js";
import { WorkerPool } from "./worker-pool.js";

export interface DispatchResult {
  kind: UpdateKind;
  /** Handlers invoked */
  matched: number;
  /** A pre-process hook returned CANCEL_UPDATE */
  cancelled: boolean;
  /** Handler matching was skipped by middleware or a pre-process error */
  skipped: boolean;
  /** First handler or pre-process error, if any */
  error: HandlerError | null;
}

export type ErrorSink = (error: HandlerError) => void | Promise<void>;
export type UpdateListener = (update: Update) => void | Promise<void>;

export type ConcurrencyMode = "inline" | "pooled";

export interface DispatcherOptions {
  concurrency?: { mode: ConcurrencyMode; poolSize: number };
  /** Run middleware hooks (use() is refused when false) */
  middlewareEnabled?: boolean;
  /** Rethrow handler errors from dispatch() when no error sink is set */
  strict?: boolean;
  /** Next-step handlers consulted for messages before the registry */
  steps?: StepHandlerStore;
  logger?: Logger;
}

export class Dispatcher {
  private middlewares: Middleware[] = [];
  private listeners: UpdateListener[] = [];
  private errorSink: ErrorSink | null = null;
  private pool: WorkerPool | null;
  private logger: Logger;
  readonly middlewareEnabled: boolean;
  private readonly strict: boolean;
  private readonly steps: StepHandlerStore | null;

  constructor(
    private readonly handlers: HandlerRegistry,
    options: DispatcherOptions = {}
  ) {
    this.logger = scopedLogger(options.logger ?? new ConsoleLogger(), "Dispatcher");
    this.middlewareEnabled = options.middlewareEnabled ?? true;
    this.strict = options.strict ?? false;
    this.steps = options.steps ?? null;
    const concurrency = options.concurrency ?? { mode: "inline", poolSize: 1 };
    this.pool =
      concurrency.mode === "pooled" ? new WorkerPool(concurrency.poolSize, this.logger) : null;
  }

  get mode(): ConcurrencyMode {
    return this.pool ? "pooled" : "inline";
  }

  use(middleware: Middleware): void {
    this.middlewares.push(middleware);
  }

  onUpdate(listener: UpdateListener): void {
    this.listeners.push(listener);
  }

  /** Replace the error sink; null restores the default (log, or rethrow when strict) */
  setErrorSink(sink: ErrorSink | null): void {
    this.errorSink = sink;
  }

  /**
   * Hand an update over for dispatch. Inline: resolves after dispatch.
   * Pooled: resolves once dispatch has started, waiting for a free slot.
   */
  submit(update: Update): Promise<void> {
    if (!this.pool) {
      return this.dispatch(update).then(() => undefined);
    }
    return this.pool.submit(async () => {
      await this.dispatch(update);
    }, `Dispatch of ${update.kind} #${update.updateId}`);
  }

  /** Wait for pooled dispatches in flight */
  async drain(): Promise<void> {
    await this.pool?.drain();
  }

  /** Refuse further pooled work and drop queued submissions */
  abandon(): void {
    this.pool?.abandon();
  }

  /**
   * Replace a pool closed by abandon() with a fresh one of the same size.
   * Dispatches still running in the old pool are not awaited by drain().
   */
  reopen(): void {
    if (this.pool?.isClosed) {
      this.pool = new WorkerPool(this.pool.size, this.logger);
    }
  }

  /** Dispatches currently running in the pool */
  get inFlight(): number {
    return this.pool?.active ?? 0;
  }

  async dispatch(update: Update): Promise<DispatchResult> {
    await this.notifyListeners(update);

    const result: DispatchResult = {
      kind: update.kind,
      matched: 0,
      cancelled: false,
      skipped: false,
      error: null,
    };

    if (isKind(update, "message") && this.steps?.has(update.payload.chat.id)) {
      return this.runSteps(update, result);
    }

    const registrations = this.handlers.lookup(update.kind);
    if (registrations.length === 0) return result;

    const data: DispatchContext = new Map();
    const middlewares = this.middlewareEnabled
      ? this.middlewares.filter((m) => acceptsKind(m, update.kind))
      : [];
    let rethrow: HandlerError | null = null;

    // Pre-process
    const entered: Array<{ middleware: Middleware; name: string }> = [];
    for (const [index, middleware] of middlewares.entries()) {
      const name = middlewareName(middleware, index);
      entered.push({ middleware, name });
      try {
        const action = await middleware.preProcess?.(update, data);
        if (action === CANCEL_UPDATE) {
          result.cancelled = true;
          return result;
        }
        if (action === SKIP_HANDLER) result.skipped = true;
      } catch (err) {
        const error = new HandlerError(update, `${name}.preProcess`, err);
        result.error = error;
        result.skipped = true;
        rethrow = await this.report(error);
        break;
      }
    }

    // Handlers
    if (!result.skipped) {
      for (const registration of registrations) {
        if (!(await this.matches(registration, update))) continue;

        result.matched++;
        let returned: unknown;
        try {
          returned = await registration.invoke(update, data);
        } catch (err) {
          const error = new HandlerError(update, registration.name, err);
          result.error = error;
          rethrow = await this.report(error);
          break;
        }
        if (!registration.passToNext && returned !== CONTINUE_HANDLING) break;
      }
    }

    // Post-process, reverse order
    for (const { middleware, name } of [...entered].reverse()) {
      if (!middleware.postProcess) continue;
      try {
        await middleware.postProcess(update, data, result.error);
      } catch (err) {
        const error = new HandlerError(update, `${name}.postProcess`, err);
        rethrow = rethrow ?? (await this.report(error));
      }
    }

    if (rethrow) throw rethrow;
    return result;
  }

  /**
   * Hand a message to its chat's pending steps, in order. Middleware and
   * registered handlers do not see it.
   */
  private async runSteps(update: UpdateOf<"message">, result: DispatchResult): Promise<DispatchResult> {
    const steps = this.steps?.take(update.payload.chat.id) ?? [];
    const data: DispatchContext = new Map();
    let rethrow: HandlerError | null = null;

    for (const step of steps) {
      result.matched++;
      try {
        await step.handler(update.payload, { update, data });
      } catch (err) {
        const error = new HandlerError(update, step.name, err);
        result.error = result.error ?? error;
        rethrow = rethrow ?? (await this.report(error));
      }
    }

    if (rethrow) throw rethrow;
    return result;
  }

  /**
   * All predicates pass (AND, stops at the first failure). A predicate that
   * throws counts as a failure.
   */
  private async matches(registration: HandlerRegistration, update: Update): Promise<boolean> {
    for (const predicate of registration.predicates) {
      try {
        if (!(await predicate.evaluate(update))) return false;
      } catch (err) {
        this.logger.warn(
          `Filter '${predicate.name}' of ${registration.name} failed on ${update.kind} #${update.updateId}: ${describeError(err)}`
        );
        return false;
      }
    }
    return true;
  }

  /**
   * Send an error to the sink. Returns the error when it must be rethrown
   * (strict mode without a sink).
   */
  private async report(error: HandlerError): Promise<HandlerError | null> {
    if (this.errorSink) {
      try {
        await this.errorSink(error);
      } catch (err) {
        this.logger.error(`Error sink failed: ${describeError(err)}`);
      }
      return null;
    }
    if (this.strict) return error;
    this.logger.error(error.message);
    return null;
  }

  private async notifyListeners(update: Update): Promise<void> {
    for (const listener of this.listeners) {
      try {
        await listener(update);
      } catch (err) {
        this.logger.error(`Update listener failed on ${update.kind} #${update.updateId}: ${describeError(err)}`);
      }
    }
  }
}

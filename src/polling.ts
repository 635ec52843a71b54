/**
 * Update Poller - long-polling update source loop
 *
 * Fetches batches from the transport, binds each record, and hands updates
 * to the dispatcher in arrival order. The offset moves past a batch only
 * after the whole batch has been handed off, so a crash mid-batch makes the
 * platform redeliver it.
 */

import { BotError, describeError } from "./errors.js";
import { ConsoleLogger, scopedLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { parseUpdate, readUpdateId } from "./updates/parse.js";
import type { Update, UpdateKind } from "./updates/types.js";
import { PoolClosedError } from "./worker-pool.js";

export interface FetchRequest {
  offset?: number;
  limit?: number;
  /** Long-poll timeout in seconds */
  timeout?: number;
  allowedUpdates?: readonly UpdateKind[];
}

/**
 * Source of raw update records (BotClient in production, fakes in tests)
 */
export interface UpdateTransport {
  fetchUpdates(request: FetchRequest, signal?: AbortSignal): Promise<unknown[]>;
}

/**
 * Where bound updates go (the Dispatcher)
 */
export interface UpdateSink {
  submit(update: Update): Promise<void>;
  drain(): Promise<void>;
  abandon(): void;
}

export interface PollingOptions {
  /** Long-poll timeout in seconds */
  timeoutSeconds: number;
  /** Max updates per batch (1-100) */
  limit: number;
  /** Pause between polls */
  intervalMs: number;
  /** Retry transport failures forever instead of failing */
  nonStop: boolean;
  /** First retry delay, doubled per consecutive failure */
  retryDelayMs: number;
  maxRetryDelayMs: number;
  /** Drop updates that arrived before start */
  skipPending: boolean;
  allowedUpdates?: readonly UpdateKind[];
  /** Starting offset, e.g. restored from storage */
  offset?: number;
}

export const DEFAULT_POLLING_OPTIONS: PollingOptions = {
  timeoutSeconds: 20,
  limit: 100,
  intervalMs: 0,
  nonStop: false,
  retryDelayMs: 3000,
  maxRetryDelayMs: 60000,
  skipPending: false,
};

export interface StopOptions {
  /** Abandon queued dispatches instead of draining them */
  hard?: boolean;
}

export interface HandOffResult {
  /**
   * Offset that excludes every record handed off (malformed ones included),
   * null when no record had a readable update_id
   */
  nextOffset: number | null;
  /** Set when the sink closed mid-batch; the rest of the batch was not handed off */
  closed: PoolClosedError | null;
}

/**
 * Bind each record and submit it in order. Malformed records are logged and
 * skipped; a failed submission is logged and the rest still go through.
 * A closed sink ends the walk: that record and the ones after it stay
 * ahead of the returned offset so the platform redelivers them.
 */
export async function submitRecords(
  records: readonly unknown[],
  sink: Pick<UpdateSink, "submit">,
  logger: Logger
): Promise<HandOffResult> {
  let maxId: number | null = null;

  for (const [index, raw] of records.entries()) {
    let update: Update;
    try {
      update = parseUpdate(raw);
    } catch (err) {
      const id = readUpdateId(raw);
      if (id !== null) maxId = maxId === null ? id : Math.max(maxId, id);
      logger.warn(`Skipped ${describeError(err)}`);
      continue;
    }

    try {
      await sink.submit(update);
    } catch (err) {
      if (err instanceof PoolClosedError) {
        const left = records.length - index;
        logger.warn(`Dispatcher closed at ${update.kind} #${update.updateId}; ${left} update(s) left for redelivery`);
        return { nextOffset: update.updateId, closed: err };
      }
      logger.error(`Dispatch of ${update.kind} #${update.updateId} failed: ${describeError(err)}`);
    }
    maxId = maxId === null ? update.updateId : Math.max(maxId, update.updateId);
  }

  return { nextOffset: maxId === null ? null : maxId + 1, closed: null };
}

export class UpdatePoller {
  private options: PollingOptions;
  private logger: Logger;
  private nextOffset: number | undefined;
  private confirmedOffset: number | undefined;
  private running = false;
  private stopRequested = false;
  private controller: AbortController | null = null;
  private wake: (() => void) | null = null;
  private finished: Promise<void> = Promise.resolve();
  private consecutiveFailures = 0;

  constructor(
    private readonly transport: UpdateTransport,
    private readonly sink: UpdateSink,
    options: Partial<PollingOptions> = {},
    logger?: Logger
  ) {
    this.options = { ...DEFAULT_POLLING_OPTIONS, ...options };
    this.logger = scopedLogger(logger ?? new ConsoleLogger(), "Polling");
    this.nextOffset = this.options.offset;
  }

  /** Offset the next fetch will send */
  get offset(): number | undefined {
    return this.nextOffset;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /**
   * Poll until stop() is called. Rejects with the transport error on the
   * first failure unless nonStop is set.
   */
  async start(): Promise<void> {
    if (this.running) {
      throw new BotError("Polling is already running");
    }
    this.running = true;
    this.stopRequested = false;
    this.consecutiveFailures = 0;

    let markFinished: () => void = () => {};
    this.finished = new Promise<void>((resolve) => {
      markFinished = resolve;
    });

    let needsSkip = this.options.skipPending;
    try {
      while (!this.stopRequested) {
        try {
          if (needsSkip) {
            await this.skipPendingUpdates();
            needsSkip = false;
          } else {
            await this.pollOnce();
          }
          this.consecutiveFailures = 0;
        } catch (err) {
          if (this.stopRequested) break;
          if (!this.options.nonStop) throw err;

          this.consecutiveFailures++;
          const delay = this.retryDelay();
          this.logger.error(`${describeError(err)} - retrying in ${delay}ms`);
          await this.sleep(delay);
          continue;
        }

        if (this.options.intervalMs > 0 && !this.stopRequested) {
          await this.sleep(this.options.intervalMs);
        }
      }
      await this.confirmOffset();
    } finally {
      this.running = false;
      markFinished();
    }
  }

  /**
   * Stop polling: abort the in-flight fetch, let the loop exit, then drain
   * the dispatcher (or abandon queued work when hard)
   */
  async stop(options: StopOptions = {}): Promise<void> {
    this.stopRequested = true;
    this.controller?.abort();
    this.wake?.();

    if (options.hard) this.sink.abandon();
    await this.finished;
    if (!options.hard) await this.sink.drain();
  }

  /** Delay before the next retry after consecutiveFailures failures */
  private retryDelay(): number {
    const { retryDelayMs, maxRetryDelayMs } = this.options;
    return Math.min(retryDelayMs * 2 ** (this.consecutiveFailures - 1), maxRetryDelayMs);
  }

  private async fetch(request: FetchRequest): Promise<unknown[]> {
    const controller = new AbortController();
    this.controller = controller;
    try {
      return await this.transport.fetchUpdates(request, controller.signal);
    } finally {
      this.controller = null;
    }
  }

  private async pollOnce(): Promise<void> {
    const records = await this.fetch({
      offset: this.nextOffset,
      limit: this.options.limit,
      timeout: this.options.timeoutSeconds,
      allowedUpdates: this.options.allowedUpdates,
    });
    this.confirmedOffset = this.nextOffset;
    await this.handOff(records);
  }

  /**
   * Bind and submit every record of a batch, then advance the offset past
   * what was handed off
   */
  private async handOff(records: readonly unknown[]): Promise<void> {
    const { nextOffset } = await submitRecords(records, this.sink, this.logger);
    if (nextOffset !== null) this.nextOffset = nextOffset;
  }

  /**
   * Ask for the newest pending update only and start after it
   */
  private async skipPendingUpdates(): Promise<void> {
    const records = await this.fetch({ offset: -1, limit: 1, timeout: 0 });
    const ids = records.map(readUpdateId).filter((id): id is number => id !== null);
    if (ids.length > 0) {
      this.nextOffset = Math.max(...ids) + 1;
      this.logger.log(`Skipped pending updates up to #${this.nextOffset - 1}`);
    }
  }

  /**
   * The platform forgets updates only when a fetch sends a higher offset;
   * send one last short fetch so the final batch is not redelivered.
   */
  private async confirmOffset(): Promise<void> {
    if (this.nextOffset === undefined || this.nextOffset === this.confirmedOffset) return;
    try {
      await this.transport.fetchUpdates({ offset: this.nextOffset, limit: 1, timeout: 0 });
      this.confirmedOffset = this.nextOffset;
    } catch (err) {
      this.logger.warn(`Could not confirm offset ${this.nextOffset}: ${describeError(err)}`);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise((resolve) => {
      let timer: ReturnType<typeof setTimeout> | undefined;
      const done = (): void => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
      this.wake = done;
      timer = setTimeout(done, ms);
    });
  }
}

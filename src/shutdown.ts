/**
 * Two-stage shutdown for long-running commands
 *
 * First request: stop polling and let in-flight updates finish.
 * Second request: drop queued updates and return at once.
 */

import type { StopOptions } from "./polling.js";
import type { Logger } from "./logger.js";

export interface Stoppable {
  stop(options?: StopOptions): Promise<void>;
}

export class ShutdownController {
  private requested = false;

  constructor(
    private readonly target: Stoppable,
    private readonly logger: Logger
  ) {}

  get isShuttingDown(): boolean {
    return this.requested;
  }

  async request(): Promise<void> {
    if (this.requested) {
      this.logger.log("\n⚠️  Force stopping (queued updates are dropped)...");
      await this.target.stop({ hard: true });
      return;
    }

    this.requested = true;
    this.logger.log("\n🛑 Graceful shutdown requested...");
    this.logger.log("   Finishing in-flight updates. Press Ctrl+C again to force stop.\n");
    await this.target.stop();
  }
}

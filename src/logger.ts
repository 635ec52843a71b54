/**
 * Logger - where the library's output goes
 *
 * Bot, BotClient, Dispatcher, UpdatePoller and WebhookReceiver take a Logger
 * at construction time. ConsoleLogger (the default) writes to stdout/stderr;
 * MemoryLogger keeps entries for tests.
 */

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export class ConsoleLogger implements Logger {
  log(message: string): void {
    console.log(message);
  }
  warn(message: string): void {
    console.warn(message);
  }
  error(message: string): void {
    console.error(message);
  }
}

/**
 * Logger that prepends an area tag, e.g. "[Polling] Received 3 updates"
 */
export function scopedLogger(base: Logger, area: string): Logger {
  const prefix = `[${area}] `;
  return {
    log: (message) => base.log(prefix + message),
    warn: (message) => base.warn(prefix + message),
    error: (message) => base.error(prefix + message),
  };
}

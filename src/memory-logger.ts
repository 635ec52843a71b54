/**
 * Memory Logger - captures log output instead of writing it
 *
 * Entries are pushed into a list that tests assert on.
 */

import type { Logger } from "./logger.js";

export interface LogEntry {
  id: number;
  text: string;
  level: "log" | "warn" | "error";
  timestamp: Date;
}

export class MemoryLogger implements Logger {
  private entries: LogEntry[] = [];
  private nextId = 0;

  log(message: string): void {
    this.push({ level: "log", text: message });
  }

  warn(message: string): void {
    this.push({ level: "warn", text: message });
  }

  error(message: string): void {
    this.push({ level: "error", text: message });
  }

  getEntries(): readonly LogEntry[] {
    return this.entries;
  }

  /** Texts logged at one level, in order */
  lines(level: LogEntry["level"]): string[] {
    return this.entries.filter((e) => e.level === level).map((e) => e.text);
  }

  clear(): void {
    this.entries = [];
  }

  private push(entry: Omit<LogEntry, "id" | "timestamp">): void {
    this.entries.push({ ...entry, id: this.nextId++, timestamp: new Date() });
  }
}

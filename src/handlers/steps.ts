/**
 * Next-step handlers - one-shot handlers waiting for a chat's next message
 *
 * A message from a chat with pending steps goes to those steps, in the
 * order they were registered, instead of the registered handlers. The steps
 * are removed before they run, so a step may register the next one.
 */

import type { Handler } from "./registration.js";

export interface PendingStep {
  readonly name: string;
  readonly handler: Handler<"message">;
}

export class StepHandlerStore {
  private byChat: Map<number, PendingStep[]> = new Map();

  register(chatId: number, handler: Handler<"message">, name: string = handler.name || "step"): void {
    const pending = this.byChat.get(chatId) ?? [];
    pending.push({ name, handler });
    this.byChat.set(chatId, pending);
  }

  /**
   * Drop every pending step of a chat
   *
   * @returns false when the chat had none
   */
  clear(chatId: number): boolean {
    return this.byChat.delete(chatId);
  }

  has(chatId: number): boolean {
    return this.byChat.has(chatId);
  }

  /** Remove and return the pending steps of a chat */
  take(chatId: number): readonly PendingStep[] {
    const pending = this.byChat.get(chatId) ?? [];
    this.byChat.delete(chatId);
    return pending;
  }

  /** Chats with pending steps */
  get size(): number {
    return this.byChat.size;
  }
}

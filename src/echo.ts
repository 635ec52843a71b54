/**
 * Echo bot handlers used by `wirebot echo`
 */

import type { Bot } from "./bot.js";
import { escapeHtml, escapeMarkdownV2 } from "./text/formatting.js";

export const START_TEXT = "Hi! Send me anything and I will send it back.";
export const HELP_TEXT = "Commands:\n/start - greeting\n/help - this message\n\nAny other text is echoed.";

/** Plain text must reach the user unchanged under the default parse mode */
function escapeFor(parseMode: string | undefined, text: string): string {
  if (parseMode === "HTML") return escapeHtml(text);
  if (parseMode === "MarkdownV2") return escapeMarkdownV2(text);
  return text;
}

export function registerEchoHandlers(bot: Bot): void {
  bot.command("start", (message, { bot }) => bot.replyTo(message, escapeFor(bot.config.api.parseMode, START_TEXT)));

  bot.command("help", (message, { bot }) => bot.replyTo(message, escapeFor(bot.config.api.parseMode, HELP_TEXT)));

  bot.onMessage({ content_types: ["text"] }, function echo(message, { bot }) {
    if (message.text === undefined) return;
    return bot.client.sendMessage(message.chat.id, escapeFor(bot.config.api.parseMode, message.text));
  });
}

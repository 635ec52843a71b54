/**
 * Command text helpers
 *
 * A command is a message whose text starts with "/", e.g. "/start",
 * "/search black cats" or "/help@SomeBot".
 */

export function isCommand(text: string | undefined): text is string {
  return text !== undefined && text.startsWith("/");
}

/**
 * Command name without "/" and without the "@bot" mention, or null
 *
 * extractCommand("/help@SomeBot now") === "help"
 */
export function extractCommand(text: string | undefined): string | null {
  if (!isCommand(text)) return null;
  return text.split(/\s+/)[0].split("@")[0].slice(1);
}

/**
 * Bot username a command is addressed to ("/help@SomeBot" -> "SomeBot"), or null
 */
export function extractCommandMention(text: string | undefined): string | null {
  if (!isCommand(text)) return null;
  const head = text.split(/\s+/)[0];
  const at = head.indexOf("@");
  return at === -1 || at === head.length - 1 ? null : head.slice(at + 1);
}

/**
 * Whitespace-separated words after the command
 *
 * @throws Error when the text is not a command
 */
export function extractArguments(text: string): string[] {
  if (!isCommand(text)) {
    throw new Error(`Not a command: "${text}"`);
  }
  return text.trim().split(/\s+/).slice(1);
}

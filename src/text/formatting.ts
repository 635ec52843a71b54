/**
 * Message formatting helpers for the MarkdownV2 and HTML parse modes
 */

/**
 * Escape special characters for MarkdownV2
 * https://core.telegram.org/bots/api#markdownv2-style
 */
export function escapeMarkdownV2(text: string): string {
  // Characters that must be escaped: _ * [ ] ( ) ~ ` > # + - = | { } . !
  return text.replace(/([_*\[\]()~`>#+\-=|{}.!\\])/g, "\\$1");
}

/** Inside code and pre entities only ` and \ are special */
function escapeMarkdownCode(text: string): string {
  return text.replace(/([`\\])/g, "\\$1");
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#x27;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/**
 * Join formatted fragments, one per line by default
 */
export function formatText(parts: readonly string[], separator = "\n"): string {
  return parts.join(separator);
}

/**
 * MarkdownV2 builders. Content is escaped unless `escape` is false.
 */
export const md = {
  bold: (text: string, escape = true) => `*${escape ? escapeMarkdownV2(text) : text}*`,
  italic: (text: string, escape = true) => `_${escape ? escapeMarkdownV2(text) : text}_`,
  underline: (text: string, escape = true) => `__${escape ? escapeMarkdownV2(text) : text}__`,
  strikethrough: (text: string, escape = true) => `~${escape ? escapeMarkdownV2(text) : text}~`,
  spoiler: (text: string, escape = true) => `||${escape ? escapeMarkdownV2(text) : text}||`,
  code: (text: string) => `\`${escapeMarkdownCode(text)}\``,
  pre: (text: string, language = "") => `\`\`\`${language}\n${escapeMarkdownCode(text)}\n\`\`\``,
  link: (text: string, url: string) =>
    `[${escapeMarkdownV2(text)}](${url.replace(/([)\\])/g, "\\$1")})`,
};

/**
 * HTML builders. Content is escaped unless `escape` is false.
 */
export const html = {
  bold: (text: string, escape = true) => `<b>${escape ? escapeHtml(text) : text}</b>`,
  italic: (text: string, escape = true) => `<i>${escape ? escapeHtml(text) : text}</i>`,
  underline: (text: string, escape = true) => `<u>${escape ? escapeHtml(text) : text}</u>`,
  strikethrough: (text: string, escape = true) => `<s>${escape ? escapeHtml(text) : text}</s>`,
  spoiler: (text: string, escape = true) =>
    `<tg-spoiler>${escape ? escapeHtml(text) : text}</tg-spoiler>`,
  code: (text: string) => `<code>${escapeHtml(text)}</code>`,
  pre: (text: string, language = "") =>
    language
      ? `<pre><code class="language-${escapeHtml(language)}">${escapeHtml(text)}</code></pre>`
      : `<pre>${escapeHtml(text)}</pre>`,
  link: (text: string, url: string) => `<a href="${escapeHtml(url)}">${escapeHtml(text)}</a>`,
};

/**
 * HTML mention link for a user (send with parse_mode HTML)
 */
export function userLink(user: { id: number; first_name: string }, includeId = false): string {
  const link = `<a href="tg://user?id=${user.id}">${escapeHtml(user.first_name)}</a>`;
  return includeId ? `${link} (<code>${user.id}</code>)` : link;
}

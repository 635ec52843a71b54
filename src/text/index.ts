/**
 * Text helpers exports
 */

export { isCommand, extractCommand, extractCommandMention, extractArguments } from "./command.js";
export { splitString, smartSplit, chunkText, MAX_MESSAGE_LENGTH } from "./split.js";
export { escapeMarkdownV2, escapeHtml, formatText, md, html, userLink } from "./formatting.js";

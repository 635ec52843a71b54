/**
 * Keyboard markup builders
 *
 * Buttons added with add() wrap into rows of rowWidth; row() always starts a
 * row of its own. build() returns plain Bot API objects usable as
 * reply_markup.
 */

import type {
  ForceReply,
  InlineKeyboardButton,
  InlineKeyboardMarkup,
  KeyboardButton,
  ReplyKeyboardMarkup,
  ReplyKeyboardRemove,
} from "grammy/types";

export const MAX_INLINE_ROW_WIDTH = 8;
export const MAX_REPLY_ROW_WIDTH = 12;

function checkRowWidth(rowWidth: number, max: number): void {
  if (!Number.isInteger(rowWidth) || rowWidth < 1 || rowWidth > max) {
    throw new RangeError(`Row width must be an integer from 1 to ${max}, got ${rowWidth}`);
  }
}

/**
 * Shared row layout of both builders
 */
class RowLayout<B> {
  protected rows: B[][] = [];

  constructor(protected readonly rowWidth: number) {}

  protected append(buttons: readonly B[]): void {
    for (let i = 0; i < buttons.length; i += this.rowWidth) {
      this.rows.push(buttons.slice(i, i + this.rowWidth));
    }
  }

  protected appendRow(buttons: readonly B[]): void {
    if (buttons.length > 0) this.rows.push([...buttons]);
  }

  protected snapshot(): B[][] {
    return this.rows.map((row) => [...row]);
  }
}

export class InlineKeyboardBuilder extends RowLayout<InlineKeyboardButton> {
  constructor(rowWidth = 3) {
    checkRowWidth(rowWidth, MAX_INLINE_ROW_WIDTH);
    super(rowWidth);
  }

  add(...buttons: InlineKeyboardButton[]): this {
    this.append(buttons);
    return this;
  }

  row(...buttons: InlineKeyboardButton[]): this {
    this.appendRow(buttons);
    return this;
  }

  /** Shortcut for a callback button */
  callback(text: string, data: string): this {
    return this.add({ text, callback_data: data });
  }

  /** Shortcut for a URL button */
  url(text: string, url: string): this {
    return this.add({ text, url });
  }

  build(): InlineKeyboardMarkup {
    return { inline_keyboard: this.snapshot() };
  }
}

export type QuickButtonAction =
  | { callback_data: string }
  | { url: string }
  | { switch_inline_query: string }
  | { switch_inline_query_current_chat: string };

/**
 * Inline keyboard from a { label: action } map, in insertion order
 *
 * @example
 * quickMarkup({ Docs: { url: "https://example.com" }, Back: { callback_data: "back" } })
 */
export function quickMarkup(
  values: Record<string, QuickButtonAction>,
  rowWidth = 2
): InlineKeyboardMarkup {
  const builder = new InlineKeyboardBuilder(rowWidth);
  const buttons: InlineKeyboardButton[] = Object.entries(values).map(([text, action]) => ({
    text,
    ...action,
  }));
  return builder.add(...buttons).build();
}

export interface ReplyKeyboardOptions {
  rowWidth?: number;
  resizeKeyboard?: boolean;
  oneTimeKeyboard?: boolean;
  inputFieldPlaceholder?: string;
  selective?: boolean;
  isPersistent?: boolean;
}

export class ReplyKeyboardBuilder extends RowLayout<KeyboardButton> {
  private options: ReplyKeyboardOptions;

  constructor(options: ReplyKeyboardOptions = {}) {
    const rowWidth = options.rowWidth ?? 3;
    checkRowWidth(rowWidth, MAX_REPLY_ROW_WIDTH);
    super(rowWidth);
    this.options = options;
  }

  add(...buttons: Array<string | KeyboardButton>): this {
    this.append(buttons.map(toKeyboardButton));
    return this;
  }

  row(...buttons: Array<string | KeyboardButton>): this {
    this.appendRow(buttons.map(toKeyboardButton));
    return this;
  }

  build(): ReplyKeyboardMarkup {
    const markup: ReplyKeyboardMarkup = { keyboard: this.snapshot() };
    if (this.options.resizeKeyboard !== undefined) markup.resize_keyboard = this.options.resizeKeyboard;
    if (this.options.oneTimeKeyboard !== undefined) markup.one_time_keyboard = this.options.oneTimeKeyboard;
    if (this.options.inputFieldPlaceholder !== undefined) {
      markup.input_field_placeholder = this.options.inputFieldPlaceholder;
    }
    if (this.options.selective !== undefined) markup.selective = this.options.selective;
    if (this.options.isPersistent !== undefined) markup.is_persistent = this.options.isPersistent;
    return markup;
  }
}

function toKeyboardButton(button: string | KeyboardButton): KeyboardButton {
  return typeof button === "string" ? { text: button } : button;
}

export function removeKeyboard(selective?: boolean): ReplyKeyboardRemove {
  return selective === undefined ? { remove_keyboard: true } : { remove_keyboard: true, selective };
}

export function forceReply(options: { placeholder?: string; selective?: boolean } = {}): ForceReply {
  const markup: ForceReply = { force_reply: true };
  if (options.placeholder !== undefined) markup.input_field_placeholder = options.placeholder;
  if (options.selective !== undefined) markup.selective = options.selective;
  return markup;
}

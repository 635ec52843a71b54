/**
 * Splitting long texts into message-sized chunks
 */

/** Longest text a single message may carry */
export const MAX_MESSAGE_LENGTH = 4096;

function checkSize(size: number): void {
  if (!Number.isInteger(size) || size <= 0) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
}

/**
 * Cut text every `size` characters
 */
export function splitString(text: string, size: number): string[] {
  checkSize(size);
  const chunks: string[] = [];
  for (let i = 0; i < text.length; i += size) {
    chunks.push(text.slice(i, i + size));
  }
  return chunks;
}

/** Text up to and including the last occurrence of `separator` */
function beforeLast(part: string, separator: string): string {
  return part.slice(0, part.lastIndexOf(separator) + separator.length);
}

function* smartChunks(text: string, size: number): Generator<string> {
  let rest = text;
  while (rest.length > 0) {
    if (rest.length <= size) {
      yield rest;
      return;
    }

    let part = rest.slice(0, size);
    if (part.includes("\n")) part = beforeLast(part, "\n");
    else if (part.includes(". ")) part = beforeLast(part, ". ");
    else if (part.includes(" ")) part = beforeLast(part, " ");

    yield part;
    rest = rest.slice(part.length);
  }
}

function clampSize(size: number): number {
  checkSize(size);
  return Math.min(size, MAX_MESSAGE_LENGTH);
}

/**
 * Split text into chunks of at most `size` characters (capped at 4096),
 * breaking after the last newline, else after the last ". ", else after the
 * last space, else mid-word.
 */
export function smartSplit(text: string, size: number = MAX_MESSAGE_LENGTH): string[] {
  return [...smartChunks(text, clampSize(size))];
}

/**
 * Same chunks as smartSplit, produced lazily; each iteration starts over
 */
export function chunkText(text: string, size: number = MAX_MESSAGE_LENGTH): Iterable<string> {
  const limit = clampSize(size);
  return {
    [Symbol.iterator]: () => smartChunks(text, limit),
  };
}

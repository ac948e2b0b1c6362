/**
 * Recursive Text Splitter
 *
 * Splits on the coarsest separator present in the text (paragraphs, then
 * lines, then sentences, then words, then characters), recursing into any
 * piece that is still too long, and greedily merges the pieces back into
 * chunks of at most `size` characters.
 *
 * Separators stay on the end of the piece they follow, so every chunk is a
 * contiguous slice of the input (trimmed of surrounding whitespace).
 */

import type { ChunkSettings } from './types.js';

export const DEFAULT_SEPARATORS: readonly string[] = ['\n\n', '\n', '. ', ' ', ''];

/**
 * Split `text` on `separator`, keeping each separator attached to the
 * piece before it. The empty separator splits into characters.
 */
function splitKeepingSeparator(text: string, separator: string): string[] {
  if (separator === '') {
    return Array.from(text);
  }

  const pieces: string[] = [];
  let start = 0;
  for (;;) {
    const at = text.indexOf(separator, start);
    if (at === -1) {
      break;
    }
    pieces.push(text.slice(start, at + separator.length));
    start = at + separator.length;
  }
  if (start < text.length) {
    pieces.push(text.slice(start));
  }
  return pieces;
}

export class RecursiveTextSplitter {
  private readonly size: number;
  private readonly overlap: number;

  constructor(
    settings: ChunkSettings,
    private readonly separators: readonly string[] = DEFAULT_SEPARATORS
  ) {
    if (settings.size <= 0) {
      throw new RangeError(`Chunk size must be positive, got ${settings.size}`);
    }
    if (settings.overlap < 0 || settings.overlap >= settings.size) {
      throw new RangeError(
        `Chunk overlap must be in [0, ${settings.size}), got ${settings.overlap}`
      );
    }
    this.size = settings.size;
    this.overlap = settings.overlap;
  }

  splitText(text: string): string[] {
    return this.split(text, this.separators);
  }

  private split(text: string, separators: readonly string[]): string[] {
    let separator = '';
    let finer: readonly string[] = [];
    for (let i = 0; i < separators.length; i++) {
      const candidate = separators[i] ?? '';
      if (candidate === '' || text.includes(candidate)) {
        separator = candidate;
        finer = separators.slice(i + 1);
        break;
      }
    }

    const chunks: string[] = [];
    let pending: string[] = [];

    for (const piece of splitKeepingSeparator(text, separator)) {
      if (piece.length < this.size) {
        pending.push(piece);
        continue;
      }

      if (pending.length > 0) {
        chunks.push(...this.merge(pending));
        pending = [];
      }
      if (finer.length === 0) {
        const trimmed = piece.trim();
        if (trimmed) chunks.push(trimmed);
      } else {
        chunks.push(...this.split(piece, finer));
      }
    }

    if (pending.length > 0) {
      chunks.push(...this.merge(pending));
    }
    return chunks;
  }

  /**
   * Greedily join pieces into chunks no longer than `size`, carrying the
   * trailing pieces (at most `overlap` characters) into the next chunk.
   */
  private merge(pieces: string[]): string[] {
    const chunks: string[] = [];
    let window: string[] = [];
    let total = 0;

    for (const piece of pieces) {
      if (total + piece.length > this.size && window.length > 0) {
        const chunk = window.join('').trim();
        if (chunk) chunks.push(chunk);

        while (total > this.overlap || (total + piece.length > this.size && total > 0)) {
          const dropped = window.shift();
          total -= dropped?.length ?? 0;
        }
      }
      window.push(piece);
      total += piece.length;
    }

    const last = window.join('').trim();
    if (last) chunks.push(last);
    return chunks;
  }
}

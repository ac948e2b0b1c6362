/**
 * Token Estimation
 *
 * A character-ratio heuristic that needs no tokenizer. It is deliberately
 * approximate; every budget in the pipeline is sized in these units, so
 * consistency matters more than accuracy.
 */

/** Average characters per token across English prose and source code */
export const CHARS_PER_TOKEN = 3.5;

/** Appended to text that was cut to fit a budget */
export const TRUNCATION_MARKER = '\n...(truncated)';

/**
 * Estimate the token count of a string.
 *
 * 0 for the empty string, at least 1 for anything else, and
 * non-decreasing in length.
 */
export function estimateTokens(text: string): number {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.floor(text.length / CHARS_PER_TOKEN));
}

/**
 * Cut text so that its estimate is at most `maxTokens`.
 *
 * Text already within budget is returned unchanged, which makes the
 * operation idempotent. Otherwise the cut backs up to the last newline when
 * that keeps more than half of the allowance, and the truncation marker is
 * appended. A budget too small to hold the marker gets a bare prefix.
 *
 * @example
 * truncateToTokens('a'.repeat(100), 10) // 'a'.repeat(20) + '\n...(truncated)'
 */
export function truncateToTokens(text: string, maxTokens: number): string {
  if (estimateTokens(text) <= maxTokens) {
    return text;
  }
  if (maxTokens <= 0) {
    return '';
  }

  // floor(n * 3.5) characters estimate to exactly n tokens
  const maxChars = Math.floor(maxTokens * CHARS_PER_TOKEN);
  const bodyChars = maxChars - TRUNCATION_MARKER.length;
  if (bodyChars <= 0) {
    return text.slice(0, maxChars);
  }

  let cut = text.slice(0, bodyChars);
  const lastNewline = cut.lastIndexOf('\n');
  if (lastNewline > Math.floor(bodyChars / 2)) {
    cut = cut.slice(0, lastNewline);
  }
  return cut + TRUNCATION_MARKER;
}

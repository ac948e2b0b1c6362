/**
 * Embedder
 *
 * Embeds a batch of texts with one client call, time-boxed. Any failure
 * fails the whole batch: a document is either fully embedded or not stored.
 */

import { TransientIOError } from '../../errors/index.js';
import type { EmbeddingClient } from '../../providers/types.js';

/**
 * The embedding service failed or returned vectors that do not line up
 * with the input.
 */
export class EmbeddingError extends TransientIOError {
  constructor(message: string, cause?: Error) {
    super(message, cause, 'Check that the embedding endpoint is running and the model is pulled');
    this.name = 'EmbeddingError';
  }
}

/**
 * Thrown when an embedding call does not finish in time.
 */
export class EmbeddingTimeoutError extends EmbeddingError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`Embedding operation timed out after ${timeoutMs}ms`);
    this.name = 'EmbeddingTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export interface EmbedOptions {
  /** Abort the call after this many milliseconds; no limit when unset */
  timeoutMs?: number;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number | undefined): Promise<T> {
  if (!timeoutMs) {
    return work;
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new EmbeddingTimeoutError(timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Embed `texts` in order.
 *
 * @throws EmbeddingTimeoutError when the call exceeds `timeoutMs`
 * @throws EmbeddingError when the call fails, or the result has the wrong
 *   count or ragged dimensions
 *
 * @example
 * ```typescript
 * const vectors = await embedTexts(chunks.map((c) => c.text), client, { timeoutMs: 120000 });
 * ```
 */
export async function embedTexts(
  texts: string[],
  client: EmbeddingClient,
  options: EmbedOptions = {}
): Promise<number[][]> {
  if (texts.length === 0) {
    return [];
  }

  let vectors: number[][];
  try {
    vectors = await withTimeout(client.embed(texts), options.timeoutMs);
  } catch (error) {
    if (error instanceof EmbeddingError) {
      throw error;
    }
    throw new EmbeddingError(
      `Embedding failed with ${client.model}: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }

  if (vectors.length !== texts.length) {
    throw new EmbeddingError(
      `Embedding returned ${vectors.length} vectors for ${texts.length} texts`
    );
  }

  const dimensions = vectors[0]?.length ?? 0;
  if (dimensions === 0) {
    throw new EmbeddingError('Embedding returned an empty vector');
  }
  const ragged = vectors.findIndex((vector) => vector.length !== dimensions);
  if (ragged !== -1) {
    throw new EmbeddingError(
      `Embedding ${ragged} has ${vectors[ragged]?.length ?? 0} dimensions, expected ${dimensions}`
    );
  }

  return vectors;
}

/**
 * Embed a single text, e.g. a search query.
 */
export async function embedText(
  text: string,
  client: EmbeddingClient,
  options: EmbedOptions = {}
): Promise<number[]> {
  const [vector] = await embedTexts([text], client, options);
  if (vector === undefined) {
    throw new EmbeddingError('Embedding returned no vector');
  }
  return vector;
}

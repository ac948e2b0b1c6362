/**
 * In-process stand-ins for the model endpoints.
 *
 * - ScriptedCompletionClient replays canned responses in order and records
 *   every request it was given.
 * - HashingEmbeddingClient turns text into a deterministic bag-of-words
 *   vector, so texts that share words really are closer together.
 */

import type { ProviderTag } from '../config/schema.js';
import type {
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  EmbeddingClient,
} from '../providers/types.js';
import { TransientIOError } from '../errors/index.js';

export type ScriptedReply = string | Error;

export class ScriptedCompletionClient implements CompletionClient {
  readonly provider: ProviderTag = 'ollama';
  readonly requests: CompletionRequest[] = [];
  private readonly replies: ScriptedReply[];

  constructor(replies: ScriptedReply[], readonly model: string = 'scripted-model') {
    this.replies = [...replies];
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    this.requests.push(request);
    const reply = this.replies.shift();
    if (reply === undefined) {
      throw new TransientIOError('ScriptedCompletionClient ran out of replies');
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return { content: reply, modelId: this.model };
  }

  /** User message of the n-th request */
  promptAt(index: number): string | undefined {
    return this.requests[index]?.messages.find((message) => message.role === 'user')?.content;
  }
}

export const FAKE_EMBEDDING_DIMENSIONS = 32;

function hashWord(word: string): number {
  let hash = 0;
  for (let i = 0; i < word.length; i++) {
    hash = (hash * 31 + word.charCodeAt(i)) >>> 0;
  }
  return hash % FAKE_EMBEDDING_DIMENSIONS;
}

export function hashingEmbedding(text: string): number[] {
  const vector = new Array<number>(FAKE_EMBEDDING_DIMENSIONS).fill(0);
  for (const word of text.toLowerCase().match(/[a-z0-9]+/g) ?? []) {
    const slot = hashWord(word);
    vector[slot] = (vector[slot] ?? 0) + 1;
  }
  if (vector.every((value): boolean => value === 0)) {
    vector[0] = 1;
  }
  return vector;
}

export class HashingEmbeddingClient implements EmbeddingClient {
  readonly model = 'hashing-test';
  readonly calls: string[][] = [];

  async embed(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    return texts.map(hashingEmbedding);
  }
}

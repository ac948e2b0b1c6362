/**
 * Model client contracts
 *
 * The core talks to text generation and embedding only through these two
 * interfaces. The OpenAI-compatible adapter implements both; tests use the
 * scripted fakes in test-utils.
 */

import type { ProviderTag } from '../config/schema.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionRequest {
  messages: ChatMessage[];
  temperature?: number;
  maxOutputTokens: number;
  /** Ask the server for JSON-only output where the provider supports it */
  constrainedJson?: boolean;
}

export interface CompletionUsage {
  promptTokens: number;
  completionTokens: number;
}

export interface CompletionResponse {
  content: string;
  modelId: string;
  usage?: CompletionUsage;
}

export interface CompletionClient {
  readonly provider: ProviderTag;
  readonly model: string;
  /**
   * @throws TransientIOError when the endpoint fails or is unreachable
   */
  complete(request: CompletionRequest): Promise<CompletionResponse>;
}

export interface EmbeddingClient {
  readonly model: string;
  /**
   * One vector per input, in input order.
   *
   * @throws TransientIOError when the endpoint fails or is unreachable
   */
  embed(texts: string[]): Promise<number[][]>;
}

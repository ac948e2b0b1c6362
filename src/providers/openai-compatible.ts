/**
 * OpenAI-compatible model clients
 *
 * One adapter for every provider tag: OpenAI itself, Anthropic's
 * compatibility endpoint, Ollama, mlx_lm.server, and any other server that
 * speaks the chat-completions and embeddings wire format.
 *
 * SDK retries are disabled; a failed call surfaces as TransientIOError and
 * the caller decides what to do.
 */

import OpenAI from 'openai';
import type { EmbeddingProviderTag, ProviderTag } from '../config/schema.js';
import { loadEnv, type EnvVars } from '../config/env.js';
import { TransientIOError } from '../errors/index.js';
import { resolveEndpoint, type ProviderEndpoint } from './endpoints.js';
import type {
  ChatMessage,
  CompletionClient,
  CompletionRequest,
  CompletionResponse,
  EmbeddingClient,
} from './types.js';

// ============================================================================
// SDK SURFACE
// ============================================================================

interface ChatCompletionBody {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' };
}

interface ChatCompletionResult {
  model: string;
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

interface EmbeddingResult {
  data: Array<{ embedding: number[]; index: number }>;
}

/**
 * The slice of the `openai` client this module calls. The real client
 * satisfies it; tests pass a stub.
 */
export interface OpenAIClientLike {
  chat: {
    completions: {
      create(body: ChatCompletionBody): Promise<ChatCompletionResult>;
    };
  };
  embeddings: {
    create(body: { model: string; input: string[] }): Promise<EmbeddingResult>;
  };
}

export type OpenAIClientFactory = (endpoint: ProviderEndpoint, timeoutMs: number) => OpenAIClientLike;

/** Default request timeout for completion calls */
export const DEFAULT_REQUEST_TIMEOUT_MS = 120000;

export const createSdkClient: OpenAIClientFactory = (endpoint, timeoutMs) =>
  new OpenAI({
    apiKey: endpoint.apiKey,
    baseURL: endpoint.baseURL,
    timeout: timeoutMs,
    maxRetries: 0,
  });

function describeFailure(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// ============================================================================
// COMPLETION
// ============================================================================

export class OpenAICompatibleCompletionClient implements CompletionClient {
  constructor(
    private readonly client: OpenAIClientLike,
    readonly provider: ProviderTag,
    readonly model: string,
    private readonly jsonMode: boolean
  ) {}

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const body: ChatCompletionBody = {
      model: this.model,
      messages: request.messages,
      temperature: request.temperature,
      max_tokens: request.maxOutputTokens,
    };
    if (request.constrainedJson && this.jsonMode) {
      body.response_format = { type: 'json_object' };
    }

    let result: ChatCompletionResult;
    try {
      result = await this.client.chat.completions.create(body);
    } catch (error) {
      throw new TransientIOError(
        `${this.provider} completion failed: ${describeFailure(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    return {
      content: result.choices[0]?.message.content ?? '',
      modelId: result.model,
      usage: result.usage
        ? {
            promptTokens: result.usage.prompt_tokens,
            completionTokens: result.usage.completion_tokens,
          }
        : undefined,
    };
  }
}

// ============================================================================
// EMBEDDING
// ============================================================================

export class OpenAICompatibleEmbeddingClient implements EmbeddingClient {
  constructor(
    private readonly client: OpenAIClientLike,
    readonly provider: EmbeddingProviderTag,
    readonly model: string
  ) {}

  async embed(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    let result: EmbeddingResult;
    try {
      result = await this.client.embeddings.create({ model: this.model, input: texts });
    } catch (error) {
      throw new TransientIOError(
        `${this.provider} embedding failed: ${describeFailure(error)}`,
        error instanceof Error ? error : undefined
      );
    }

    // Servers may return rows out of order; index is authoritative
    return [...result.data].sort((a, b) => a.index - b.index).map((row) => row.embedding);
  }
}

// ============================================================================
// FACTORIES
// ============================================================================

export interface ClientOptions {
  model: string;
  env?: EnvVars;
  timeoutMs?: number;
  clientFactory?: OpenAIClientFactory;
}

/**
 * Build the completion client for a provider tag.
 *
 * @example
 * const client = createCompletionClient('ollama', { model: 'qwen2.5:7b' });
 * const { content } = await client.complete({ messages, maxOutputTokens: 512 });
 */
export function createCompletionClient(
  provider: ProviderTag,
  options: ClientOptions
): CompletionClient {
  const endpoint = resolveEndpoint(provider, options.env ?? loadEnv());
  const factory = options.clientFactory ?? createSdkClient;
  const client = factory(endpoint, options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  return new OpenAICompatibleCompletionClient(client, provider, options.model, endpoint.jsonMode);
}

export function createEmbeddingClient(
  provider: EmbeddingProviderTag,
  options: ClientOptions
): EmbeddingClient {
  const endpoint = resolveEndpoint(provider, options.env ?? loadEnv());
  const factory = options.clientFactory ?? createSdkClient;
  const client = factory(endpoint, options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS);
  return new OpenAICompatibleEmbeddingClient(client, provider, options.model);
}

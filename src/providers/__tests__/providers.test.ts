/**
 * Provider Client Tests
 *
 * The SDK is replaced with a stub OpenAIClientLike; nothing leaves the process.
 */

import { describe, it, expect, vi } from 'vitest';
import {
  createCompletionClient,
  createEmbeddingClient,
  resolveEndpoint,
  ANTHROPIC_OPENAI_BASE_URL,
  type OpenAIClientLike,
  type ProviderEndpoint,
} from '../index.js';
import type { EnvVars } from '../../config/env.js';
import { APIKeyError, ConfigError, TransientIOError } from '../../errors/index.js';

// ============================================================================
// TEST HELPERS
// ============================================================================

const BASE_ENV: EnvVars = {
  OLLAMA_HOST: 'http://localhost:11434',
  MLX_BASE_URL: 'http://localhost:8080/',
};

function createStubClient(content: string | null = '{"ok":true}'): OpenAIClientLike & {
  chatCreate: ReturnType<typeof vi.fn>;
  embedCreate: ReturnType<typeof vi.fn>;
} {
  const chatCreate = vi.fn().mockResolvedValue({
    model: 'stub-model',
    choices: [{ message: { content } }],
    usage: { prompt_tokens: 12, completion_tokens: 3 },
  });
  const embedCreate = vi.fn().mockResolvedValue({
    data: [
      { index: 1, embedding: [0, 1] },
      { index: 0, embedding: [1, 0] },
    ],
  });
  return {
    chat: { completions: { create: chatCreate } },
    embeddings: { create: embedCreate },
    chatCreate,
    embedCreate,
  };
}

// ============================================================================
// ENDPOINTS
// ============================================================================

describe('resolveEndpoint', () => {
  it('uses the SDK default URL for openai', () => {
    const endpoint = resolveEndpoint('openai', { ...BASE_ENV, OPENAI_API_KEY: 'test-key' });
    expect(endpoint).toEqual({ baseURL: undefined, apiKey: 'test-key', jsonMode: true });
  });

  it('routes anthropic through its compatibility endpoint without JSON mode', () => {
    const endpoint = resolveEndpoint('anthropic', { ...BASE_ENV, ANTHROPIC_API_KEY: 'test-key' });
    expect(endpoint.baseURL).toBe(ANTHROPIC_OPENAI_BASE_URL);
    expect(endpoint.jsonMode).toBe(false);
  });

  it('appends /v1 to local hosts and strips trailing slashes', () => {
    expect(resolveEndpoint('ollama', BASE_ENV).baseURL).toBe('http://localhost:11434/v1');
    expect(resolveEndpoint('mlx', BASE_ENV).baseURL).toBe('http://localhost:8080/v1');
  });

  it('throws APIKeyError when a hosted key is missing', () => {
    expect(() => resolveEndpoint('openai', BASE_ENV)).toThrow(APIKeyError);
    expect(() => resolveEndpoint('anthropic', BASE_ENV)).toThrow(APIKeyError);
  });

  it('throws ConfigError when openai-compatible has no base URL', () => {
    expect(() =>
      resolveEndpoint('openai-compatible', { ...BASE_ENV, OPENAI_COMPATIBLE_API_KEY: 'test-key' })
    ).toThrow(ConfigError);
  });
});

// ============================================================================
// COMPLETION
// ============================================================================

describe('createCompletionClient', () => {
  it('passes endpoint and timeout to the client factory', () => {
    const stub = createStubClient();
    const factory = vi.fn((_endpoint: ProviderEndpoint, _timeout: number) => stub);

    createCompletionClient('ollama', { model: 'qwen2.5:7b', env: BASE_ENV, timeoutMs: 5000, clientFactory: factory });

    expect(factory).toHaveBeenCalledWith(
      { baseURL: 'http://localhost:11434/v1', apiKey: 'local', jsonMode: true },
      5000
    );
  });

  it('maps the request onto the chat-completions body', async () => {
    const stub = createStubClient();
    const client = createCompletionClient('ollama', {
      model: 'qwen2.5:7b',
      env: BASE_ENV,
      clientFactory: () => stub,
    });

    const response = await client.complete({
      messages: [
        { role: 'system', content: 'Be terse.' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0.2,
      maxOutputTokens: 256,
      constrainedJson: true,
    });

    expect(stub.chatCreate).toHaveBeenCalledWith({
      model: 'qwen2.5:7b',
      messages: [
        { role: 'system', content: 'Be terse.' },
        { role: 'user', content: 'Hi' },
      ],
      temperature: 0.2,
      max_tokens: 256,
      response_format: { type: 'json_object' },
    });
    expect(response).toEqual({
      content: '{"ok":true}',
      modelId: 'stub-model',
      usage: { promptTokens: 12, completionTokens: 3 },
    });
  });

  it('omits response_format when the provider has no JSON mode', async () => {
    const stub = createStubClient();
    const client = createCompletionClient('anthropic', {
      model: 'claude-sonnet-4-5',
      env: { ...BASE_ENV, ANTHROPIC_API_KEY: 'test-key' },
      clientFactory: () => stub,
    });

    await client.complete({
      messages: [{ role: 'user', content: 'Hi' }],
      maxOutputTokens: 64,
      constrainedJson: true,
    });

    expect(stub.chatCreate.mock.calls[0]?.[0]).not.toHaveProperty('response_format');
  });

  it('returns empty content for a null message', async () => {
    const stub = createStubClient(null);
    const client = createCompletionClient('mlx', { model: 'm', env: BASE_ENV, clientFactory: () => stub });

    const response = await client.complete({ messages: [], maxOutputTokens: 10 });

    expect(response.content).toBe('');
  });

  it('wraps SDK failures in TransientIOError', async () => {
    const stub = createStubClient();
    stub.chatCreate.mockRejectedValueOnce(new Error('connect ECONNREFUSED'));
    const client = createCompletionClient('ollama', { model: 'm', env: BASE_ENV, clientFactory: () => stub });

    await expect(client.complete({ messages: [], maxOutputTokens: 10 })).rejects.toThrow(
      'ollama completion failed: connect ECONNREFUSED'
    );
    await expect(client.complete({ messages: [], maxOutputTokens: 10 })).resolves.toBeDefined();
  });

  it('raises TransientIOError, not a plain Error', async () => {
    const stub = createStubClient();
    stub.chatCreate.mockRejectedValueOnce(new Error('503'));
    const client = createCompletionClient('ollama', { model: 'm', env: BASE_ENV, clientFactory: () => stub });

    await expect(client.complete({ messages: [], maxOutputTokens: 10 })).rejects.toBeInstanceOf(
      TransientIOError
    );
  });
});

// ============================================================================
// EMBEDDING
// ============================================================================

describe('createEmbeddingClient', () => {
  it('returns vectors in input order', async () => {
    const stub = createStubClient();
    const client = createEmbeddingClient('ollama', {
      model: 'all-minilm',
      env: BASE_ENV,
      clientFactory: () => stub,
    });

    const vectors = await client.embed(['first', 'second']);

    expect(stub.embedCreate).toHaveBeenCalledWith({ model: 'all-minilm', input: ['first', 'second'] });
    expect(vectors).toEqual([
      [1, 0],
      [0, 1],
    ]);
  });

  it('skips the call for an empty batch', async () => {
    const stub = createStubClient();
    const client = createEmbeddingClient('ollama', { model: 'm', env: BASE_ENV, clientFactory: () => stub });

    expect(await client.embed([])).toEqual([]);
    expect(stub.embedCreate).not.toHaveBeenCalled();
  });

  it('wraps SDK failures in TransientIOError', async () => {
    const stub = createStubClient();
    stub.embedCreate.mockRejectedValueOnce(new Error('model not found'));
    const client = createEmbeddingClient('ollama', { model: 'm', env: BASE_ENV, clientFactory: () => stub });

    await expect(client.embed(['x'])).rejects.toBeInstanceOf(TransientIOError);
  });
});

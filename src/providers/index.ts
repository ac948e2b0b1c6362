/**
 * Providers Module
 *
 * Completion and embedding clients keyed by provider tag.
 */

export type {
  ChatRole,
  ChatMessage,
  CompletionRequest,
  CompletionResponse,
  CompletionUsage,
  CompletionClient,
  EmbeddingClient,
} from './types.js';

export {
  resolveEndpoint,
  ANTHROPIC_OPENAI_BASE_URL,
  type ProviderEndpoint,
} from './endpoints.js';

export {
  OpenAICompatibleCompletionClient,
  OpenAICompatibleEmbeddingClient,
  createCompletionClient,
  createEmbeddingClient,
  createSdkClient,
  DEFAULT_REQUEST_TIMEOUT_MS,
  type OpenAIClientLike,
  type OpenAIClientFactory,
  type ClientOptions,
} from './openai-compatible.js';

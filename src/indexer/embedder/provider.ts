/**
 * Embedding Client Factory
 *
 * Chooses the embedding model for the active profile and builds the
 * client for the configured provider.
 */

import type { EnvVars } from '../../config/env.js';
import type { ModelProfile } from '../../config/profiles.js';
import type { Config } from '../../config/schema.js';
import { createEmbeddingClient, type OpenAIClientFactory } from '../../providers/index.js';
import type { EmbeddingClient } from '../../providers/types.js';

/**
 * The profile's embedding model when it names one, else the configured one.
 *
 * @example
 * resolveEmbeddingModel({ provider: 'ollama', model: 'nomic-embed-text', timeout_ms: 120000 }, qwen7b)
 * // 'all-minilm'
 */
export function resolveEmbeddingModel(
  embedding: Config['embedding'],
  profile: Pick<ModelProfile, 'embeddingModel'>
): string {
  return profile.embeddingModel || embedding.model;
}

export interface EmbeddingClientOptions {
  env?: EnvVars;
  clientFactory?: OpenAIClientFactory;
}

export function createEmbeddingClientForProfile(
  embedding: Config['embedding'],
  profile: Pick<ModelProfile, 'embeddingModel'>,
  options: EmbeddingClientOptions = {}
): EmbeddingClient {
  return createEmbeddingClient(embedding.provider, {
    model: resolveEmbeddingModel(embedding, profile),
    timeoutMs: embedding.timeout_ms,
    env: options.env,
    clientFactory: options.clientFactory,
  });
}

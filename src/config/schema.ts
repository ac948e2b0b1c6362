/**
 * Configuration Schema
 *
 * Defines the shape of ~/.warden/config.toml using Zod.
 * This provides both TypeScript types AND runtime validation.
 */

import { z } from 'zod';

/**
 * Completion provider tags. Every tag is served by the same
 * OpenAI-compatible adapter; the tag picks endpoint, key and JSON hint.
 */
export const ProviderTagSchema = z.enum([
  'openai',
  'anthropic',
  'ollama',
  'mlx',
  'openai-compatible',
]);
export type ProviderTag = z.infer<typeof ProviderTagSchema>;

/**
 * Embedding providers (Anthropic and MLX expose no embeddings endpoint)
 */
export const EmbeddingProviderTagSchema = z.enum(['openai', 'ollama', 'openai-compatible']);
export type EmbeddingProviderTag = z.infer<typeof EmbeddingProviderTagSchema>;

export const EmbeddingConfigSchema = z.object({
  provider: EmbeddingProviderTagSchema.describe('Embedding provider'),
  model: z.string().min(1).describe('Embedding model, unless the model profile names one'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .describe('Timeout for one ingest batch (1000-600000)'),
});

/**
 * Per-profile overrides from the [profiles.<name>] tables.
 * A name that matches a built-in profile patches it; a new name starts
 * from the default profile.
 */
export const ProfileOverrideSchema = z
  .object({
    effective_context_tokens: z.number().int().positive(),
    max_output_tokens: z.number().int().positive(),
    prompt_reserve_tokens: z.number().int().nonnegative(),
    chunk_token_limit: z.number().int().positive(),
    retrieval_top_k: z.number().int().min(1).max(100),
    embedding_model: z.string(),
    json_retries: z.number().int().min(0).max(10),
    use_constrained_json: z.boolean(),
    simplify_prompts: z.boolean(),
  })
  .partial();
export type ProfileOverride = z.infer<typeof ProfileOverrideSchema>;

export const StorageConfigSchema = z.object({
  path: z.string().min(1).optional().describe('SQLite file (defaults to ~/.warden/warden.db)'),
});

export const GitConfigSchema = z.object({
  timeout_ms: z.number().int().min(1000).max(600000).describe('Limit for one git invocation'),
});

/**
 * Root configuration schema
 */
export const ConfigSchema = z.object({
  default_provider: ProviderTagSchema.describe('Completion provider to use'),
  default_model: z.string().min(1).describe('Completion model identifier'),
  /** Explicit model profile; omit to auto-detect from default_model */
  profile: z.string().min(1).optional(),
  embedding: EmbeddingConfigSchema,
  storage: StorageConfigSchema,
  git: GitConfigSchema,
  profiles: z.record(z.string(), ProfileOverrideSchema).optional(),
});

export type Config = z.infer<typeof ConfigSchema>;

/**
 * Partial config for merging user overrides with defaults
 */
export const PartialConfigSchema = ConfigSchema.deepPartial();
export type PartialConfig = z.infer<typeof PartialConfigSchema>;

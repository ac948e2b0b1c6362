/**
 * Environment Variable Handler
 *
 * Loads provider credentials and endpoint URLs. Supports .env files for
 * local development via dotenv.
 *
 * Keys are never logged and never included in error messages; only their
 * presence is reported.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from '../errors/index.js';

// No-op if .env doesn't exist
dotenvConfig();

// ============================================================================
// SCHEMA DEFINITIONS
// ============================================================================

/**
 * Keys are optional at load time; a provider checks its own key when it is
 * constructed, so only the provider in use needs one.
 */
export const EnvSchema = z.object({
  WARDEN_HOME: z.string().min(1).optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  MLX_BASE_URL: z.string().url().default('http://localhost:8080'),
  // OpenAI-compatible provider (OpenRouter, vLLM, LM Studio, ...)
  OPENAI_COMPATIBLE_API_KEY: z.string().optional(),
  OPENAI_COMPATIBLE_BASE_URL: z.string().url().optional(),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type KeyedProvider = 'anthropic' | 'openai' | 'openai-compatible';

// ============================================================================
// PRIVATE STATE
// ============================================================================

/** Loaded once at first access; reset with _clearEnvCache() in tests. */
let _envCache: EnvVars | null = null;

/** Treats empty strings as unset so `FOO=` in .env behaves like no FOO. */
function readVar(name: keyof EnvVars): string | undefined {
  const value = process.env[name];
  return value === undefined || value.trim() === '' ? undefined : value;
}

// ============================================================================
// PUBLIC API
// ============================================================================

/**
 * Load environment variables (called once, then cached).
 *
 * @throws ConfigError when an endpoint URL is malformed
 */
export function loadEnv(): EnvVars {
  if (_envCache !== null) {
    return _envCache;
  }

  const result = EnvSchema.safeParse({
    WARDEN_HOME: readVar('WARDEN_HOME'),
    ANTHROPIC_API_KEY: readVar('ANTHROPIC_API_KEY'),
    OPENAI_API_KEY: readVar('OPENAI_API_KEY'),
    OLLAMA_HOST: readVar('OLLAMA_HOST'),
    MLX_BASE_URL: readVar('MLX_BASE_URL'),
    OPENAI_COMPATIBLE_API_KEY: readVar('OPENAI_COMPATIBLE_API_KEY'),
    OPENAI_COMPATIBLE_BASE_URL: readVar('OPENAI_COMPATIBLE_BASE_URL'),
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(
      `Invalid environment:\n${issues}`,
      'Fix the variables above in your shell or .env file'
    );
  }

  _envCache = result.data;
  return _envCache;
}

/**
 * Get a specific environment variable by key.
 */
export function getEnv<K extends keyof EnvVars>(key: K): EnvVars[K] {
  const env = loadEnv();
  return env[key];
}

/**
 * Check if an API key is configured (non-empty), without exposing it.
 */
export function hasApiKey(provider: KeyedProvider): boolean {
  const env = loadEnv();
  switch (provider) {
    case 'anthropic':
      return Boolean(env.ANTHROPIC_API_KEY);
    case 'openai':
      return Boolean(env.OPENAI_API_KEY);
    case 'openai-compatible':
      return Boolean(env.OPENAI_COMPATIBLE_API_KEY);
  }
}

/**
 * Clear the environment cache.
 * FOR TESTING ONLY - allows tests to stub different env values.
 *
 * @internal
 */
export function _clearEnvCache(): void {
  _envCache = null;
}

// ============================================================================
// SETUP INSTRUCTIONS
// ============================================================================

/**
 * Shown by the CLI when a provider's key or endpoint is missing.
 */
export const SETUP_INSTRUCTIONS: Record<'anthropic' | 'openai' | 'ollama' | 'mlx' | 'openai-compatible', string> = {
  anthropic: `
To use Anthropic (Claude) models:

1. Get your API key from https://console.anthropic.com/
2. export ANTHROPIC_API_KEY="your-key"
`.trim(),

  openai: `
To use OpenAI models:

1. Get your API key from https://platform.openai.com/api-keys
2. export OPENAI_API_KEY="your-key"
`.trim(),

  ollama: `
To use Ollama (local models):

1. Install Ollama from https://ollama.com/ and run: ollama serve
2. Pull a chat and an embedding model:

   ollama pull qwen2.5:7b
   ollama pull all-minilm

3. (Optional) export OLLAMA_HOST="http://localhost:11434"
`.trim(),

  mlx: `
To use an MLX server (Apple Silicon):

1. pip install mlx-lm
2. mlx_lm.server --model mlx-community/Qwen2.5-7B-Instruct-4bit
3. (Optional) export MLX_BASE_URL="http://localhost:8080"
`.trim(),

  'openai-compatible': `
To use an OpenAI-compatible endpoint (OpenRouter, vLLM, LM Studio, ...):

   OPENAI_COMPATIBLE_API_KEY="your-key"
   OPENAI_COMPATIBLE_BASE_URL="https://api.example.com/v1"
`.trim(),
};

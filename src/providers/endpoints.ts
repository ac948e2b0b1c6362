/**
 * Provider endpoints
 *
 * Every provider tag resolves to an OpenAI-compatible base URL, a key, and
 * whether the server honours `response_format: { type: "json_object" }`.
 * Adding a provider means adding a case here, nothing else.
 */

import type { ProviderTag } from '../config/schema.js';
import type { EnvVars } from '../config/env.js';
import { APIKeyError, ConfigError } from '../errors/index.js';

export interface ProviderEndpoint {
  /** undefined selects the SDK's default (api.openai.com) */
  baseURL: string | undefined;
  apiKey: string;
  /** Whether constrained JSON can be requested */
  jsonMode: boolean;
}

export const ANTHROPIC_OPENAI_BASE_URL = 'https://api.anthropic.com/v1/';

/** Local servers accept any bearer token but the SDK requires one */
const LOCAL_PLACEHOLDER_KEY = 'local';

function withV1(host: string): string {
  return `${host.replace(/\/+$/, '')}/v1`;
}

function requireKey(provider: string, key: string | undefined, envVar: string): string {
  if (key === undefined) {
    throw new APIKeyError(provider, envVar);
  }
  return key;
}

/**
 * @throws APIKeyError when a hosted provider has no key
 * @throws ConfigError when openai-compatible has no base URL
 */
export function resolveEndpoint(provider: ProviderTag, env: EnvVars): ProviderEndpoint {
  switch (provider) {
    case 'openai':
      return {
        baseURL: undefined,
        apiKey: requireKey('OpenAI', env.OPENAI_API_KEY, 'OPENAI_API_KEY'),
        jsonMode: true,
      };
    case 'anthropic':
      // The compatibility layer ignores response_format; rely on repair
      return {
        baseURL: ANTHROPIC_OPENAI_BASE_URL,
        apiKey: requireKey('Anthropic', env.ANTHROPIC_API_KEY, 'ANTHROPIC_API_KEY'),
        jsonMode: false,
      };
    case 'ollama':
      return { baseURL: withV1(env.OLLAMA_HOST), apiKey: LOCAL_PLACEHOLDER_KEY, jsonMode: true };
    case 'mlx':
      return { baseURL: withV1(env.MLX_BASE_URL), apiKey: LOCAL_PLACEHOLDER_KEY, jsonMode: true };
    case 'openai-compatible': {
      if (env.OPENAI_COMPATIBLE_BASE_URL === undefined) {
        throw new ConfigError(
          'openai-compatible provider needs OPENAI_COMPATIBLE_BASE_URL',
          'Set OPENAI_COMPATIBLE_BASE_URL to the server root, e.g. https://api.example.com/v1'
        );
      }
      return {
        baseURL: env.OPENAI_COMPATIBLE_BASE_URL,
        apiKey: requireKey(
          'openai-compatible',
          env.OPENAI_COMPATIBLE_API_KEY,
          'OPENAI_COMPATIBLE_API_KEY'
        ),
        jsonMode: true,
      };
    }
    default: {
      const exhaustiveCheck: never = provider;
      throw new ConfigError(`Unknown provider: ${String(exhaustiveCheck)}`);
    }
  }
}

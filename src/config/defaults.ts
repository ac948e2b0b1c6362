/**
 * Default Configuration Values
 *
 * Used when no config.toml exists, and as the base that a user's
 * config.toml is merged on top of.
 */

import type { Config } from './schema.js';

export const DEFAULT_CONFIG: Config = {
  default_provider: 'openai',
  default_model: 'gpt-4o',

  embedding: {
    provider: 'openai',
    model: 'text-embedding-3-small',
    timeout_ms: 120000,
  },

  storage: {},

  git: {
    timeout_ms: 30000,
  },
};

/**
 * Config file template (TOML format)
 * Written to ~/.warden/config.toml on first run
 */
export const CONFIG_TEMPLATE = `# context-warden configuration
# Location: ~/.warden/config.toml (or $WARDEN_HOME/config.toml)

# Completion model
# Providers: openai | anthropic | ollama | mlx | openai-compatible
default_provider = "${DEFAULT_CONFIG.default_provider}"
default_model = "${DEFAULT_CONFIG.default_model}"

# Model profile. Leave unset to auto-detect from default_model
# (qwen + 7b -> qwen-7b, llama + 8b -> llama-3-8b, else default)
# profile = "qwen-7b"

[embedding]
provider = "${DEFAULT_CONFIG.embedding.provider}"
model = "${DEFAULT_CONFIG.embedding.model}"
timeout_ms = ${DEFAULT_CONFIG.embedding.timeout_ms}

[storage]
# path = "/absolute/path/to/warden.db"

[git]
timeout_ms = ${DEFAULT_CONFIG.git.timeout_ms}

# Profile overrides. Patch a built-in profile or define a new one.
# [profiles.qwen-7b]
# json_retries = 3
`;

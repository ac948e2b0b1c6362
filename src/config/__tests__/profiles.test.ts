/**
 * Model Profile Tests
 */

import { describe, it, expect } from 'vitest';
import {
  BUILTIN_PROFILES,
  DEFAULT_PROFILE,
  ModelProfileSchema,
  buildProfileCatalog,
  detectProfileName,
  selectModelProfile,
} from '../profiles.js';
import { ConfigError } from '../../errors/index.js';

describe('detectProfileName', () => {
  it.each([
    ['qwen2.5:7b-instruct', 'qwen-7b'],
    ['mlx-community/Qwen2.5-7B-Instruct-4bit', 'qwen-7b'],
    ['llama3.1:8b', 'llama-3-8b'],
    ['Meta-Llama-3-8B-Instruct', 'llama-3-8b'],
    ['qwen2.5:14b', 'default'],
    ['gpt-4o', 'default'],
  ])('maps %s to %s', (model, expected) => {
    expect(detectProfileName(model)).toBe(expected);
  });
});

describe('built-in profiles', () => {
  it('all satisfy the schema', () => {
    for (const profile of Object.values(BUILTIN_PROFILES)) {
      expect(ModelProfileSchema.safeParse(profile).success).toBe(true);
    }
  });

  it('give small models a tight budget with JSON repair', () => {
    const qwen = BUILTIN_PROFILES['qwen-7b'];
    expect(qwen?.effectiveContextTokens).toBe(6144);
    expect(qwen?.maxOutputTokens).toBe(2048);
    expect(qwen?.chunkTokenLimit).toBe(256);
    expect(qwen?.retrievalTopK).toBe(3);
    expect(qwen?.jsonRetries).toBe(2);
    expect(qwen?.useConstrainedJson).toBe(true);
  });

  it('default profile makes no repair attempts', () => {
    expect(DEFAULT_PROFILE.jsonRetries).toBe(0);
    expect(DEFAULT_PROFILE.useConstrainedJson).toBe(false);
    expect(DEFAULT_PROFILE.effectiveContextTokens).toBe(128000);
  });
});

describe('ModelProfileSchema', () => {
  it('rejects a reserve larger than the effective context', () => {
    const result = ModelProfileSchema.safeParse({
      ...DEFAULT_PROFILE,
      effectiveContextTokens: 4000,
      promptReserveTokens: 5000,
    });
    expect(result.success).toBe(false);
  });
});

describe('selectModelProfile', () => {
  it('auto-detects from the model name', () => {
    expect(selectModelProfile({ model: 'qwen2.5:7b' }).name).toBe('qwen-7b');
  });

  it('prefers an explicit profile over detection', () => {
    expect(selectModelProfile({ model: 'qwen2.5:7b', profile: 'default' }).name).toBe('default');
  });

  it('returns a frozen profile', () => {
    const profile = selectModelProfile({ model: 'gpt-4o' });
    expect(Object.isFrozen(profile)).toBe(true);
  });

  it('throws ConfigError for an unknown explicit profile', () => {
    expect(() => selectModelProfile({ model: 'gpt-4o', profile: 'phi-3' })).toThrow(ConfigError);
    expect(() => selectModelProfile({ model: 'gpt-4o', profile: 'phi-3' })).toThrow(
      'Unknown model profile: phi-3'
    );
  });

  it('applies overrides to a built-in profile', () => {
    const profile = selectModelProfile({
      model: 'qwen2.5:7b',
      overrides: { 'qwen-7b': { json_retries: 4 } },
    });
    expect(profile.jsonRetries).toBe(4);
    expect(profile.chunkTokenLimit).toBe(256);
  });

  it('derives a new profile from the default', () => {
    const profile = selectModelProfile({
      model: 'phi-3-mini',
      profile: 'phi-3',
      overrides: { 'phi-3': { effective_context_tokens: 4096, prompt_reserve_tokens: 3072 } },
    });
    expect(profile.name).toBe('phi-3');
    expect(profile.effectiveContextTokens).toBe(4096);
    expect(profile.maxOutputTokens).toBe(4096);
  });
});

describe('buildProfileCatalog', () => {
  it('throws ConfigError when an override breaks the reserve invariant', () => {
    expect(() =>
      buildProfileCatalog({ default: { effective_context_tokens: 1000 } })
    ).toThrow(ConfigError);
  });
});

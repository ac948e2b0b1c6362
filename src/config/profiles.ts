/**
 * Model Profiles
 *
 * A profile sizes every budget in the pipeline for one class of model:
 * how much context it attends to well, how long its answers run, how big
 * retrieval chunks are, and how hard to push for JSON.
 *
 * Small 7-8B models get conservative budgets that keep prompts inside
 * their effective attention window; large hosted models get the default.
 */

import { z } from 'zod';
import { ConfigError } from '../errors/index.js';
import type { ProfileOverride } from './schema.js';

export const ModelProfileSchema = z
  .object({
    name: z.string().min(1),
    effectiveContextTokens: z.number().int().positive(),
    maxOutputTokens: z.number().int().positive(),
    promptReserveTokens: z.number().int().nonnegative(),
    chunkTokenLimit: z.number().int().positive(),
    retrievalTopK: z.number().int().positive(),
    /** Empty string means "use the configured embedding model" */
    embeddingModel: z.string(),
    jsonRetries: z.number().int().min(0),
    useConstrainedJson: z.boolean(),
    simplifyPrompts: z.boolean(),
  })
  .refine((profile) => profile.promptReserveTokens <= profile.effectiveContextTokens, {
    message: 'prompt reserve must not exceed the effective context',
    path: ['promptReserveTokens'],
  });

export type ModelProfile = Readonly<z.infer<typeof ModelProfileSchema>>;

const SMALL_MODEL_BUDGET = {
  effectiveContextTokens: 6144,
  maxOutputTokens: 2048,
  promptReserveTokens: 4096,
  chunkTokenLimit: 256,
  retrievalTopK: 3,
  embeddingModel: 'all-minilm',
  jsonRetries: 2,
  useConstrainedJson: true,
  simplifyPrompts: true,
};

export const DEFAULT_PROFILE: ModelProfile = {
  name: 'default',
  effectiveContextTokens: 128000,
  maxOutputTokens: 4096,
  promptReserveTokens: 120000,
  chunkTokenLimit: 512,
  retrievalTopK: 5,
  embeddingModel: '',
  jsonRetries: 0,
  useConstrainedJson: false,
  simplifyPrompts: false,
};

export const BUILTIN_PROFILES: Readonly<Record<string, ModelProfile>> = {
  'qwen-7b': { name: 'qwen-7b', ...SMALL_MODEL_BUDGET },
  'llama-3-8b': { name: 'llama-3-8b', ...SMALL_MODEL_BUDGET },
  default: DEFAULT_PROFILE,
};

/**
 * Pick a built-in profile name from a model identifier.
 *
 * @example
 * detectProfileName('qwen2.5:7b-instruct')          // 'qwen-7b'
 * detectProfileName('Meta-Llama-3-8B-Instruct-4bit') // 'llama-3-8b'
 * detectProfileName('gpt-4o')                       // 'default'
 */
export function detectProfileName(modelName: string): string {
  const model = modelName.toLowerCase();
  if (model.includes('qwen') && model.includes('7b')) {
    return 'qwen-7b';
  }
  if (model.includes('llama') && model.includes('8b')) {
    return 'llama-3-8b';
  }
  return 'default';
}

function applyOverride(base: ModelProfile, name: string, override: ProfileOverride): unknown {
  return {
    name,
    effectiveContextTokens: override.effective_context_tokens ?? base.effectiveContextTokens,
    maxOutputTokens: override.max_output_tokens ?? base.maxOutputTokens,
    promptReserveTokens: override.prompt_reserve_tokens ?? base.promptReserveTokens,
    chunkTokenLimit: override.chunk_token_limit ?? base.chunkTokenLimit,
    retrievalTopK: override.retrieval_top_k ?? base.retrievalTopK,
    embeddingModel: override.embedding_model ?? base.embeddingModel,
    jsonRetries: override.json_retries ?? base.jsonRetries,
    useConstrainedJson: override.use_constrained_json ?? base.useConstrainedJson,
    simplifyPrompts: override.simplify_prompts ?? base.simplifyPrompts,
  };
}

/**
 * Built-in profiles with the user's [profiles.*] overrides applied.
 *
 * @throws ConfigError if any resulting profile breaks its invariants
 */
export function buildProfileCatalog(
  overrides: Record<string, ProfileOverride> = {}
): Map<string, ModelProfile> {
  const catalog = new Map<string, ModelProfile>(Object.entries(BUILTIN_PROFILES));

  for (const [name, override] of Object.entries(overrides)) {
    const base = catalog.get(name) ?? DEFAULT_PROFILE;
    const result = ModelProfileSchema.safeParse(applyOverride(base, name, override));
    if (!result.success) {
      const issues = result.error.issues.map((issue) => issue.message).join('; ');
      throw new ConfigError(
        `Invalid model profile '${name}': ${issues}`,
        `Fix [profiles.${name}] in config.toml`
      );
    }
    catalog.set(name, result.data);
  }

  return catalog;
}

export interface ProfileSelection {
  /** Active completion model identifier */
  model: string;
  /** Explicit profile name from config; wins over auto-detection */
  profile?: string;
  overrides?: Record<string, ProfileOverride>;
}

/**
 * Select the model profile for a request. The result is frozen: a profile
 * never changes while a request is using it.
 *
 * @throws ConfigError for an unknown explicit profile name
 */
export function selectModelProfile(selection: ProfileSelection): ModelProfile {
  const catalog = buildProfileCatalog(selection.overrides);
  const name = selection.profile ?? detectProfileName(selection.model);
  const profile = catalog.get(name);

  if (profile === undefined) {
    throw new ConfigError(
      `Unknown model profile: ${name}`,
      `Available profiles: ${[...catalog.keys()].join(', ')}`
    );
  }

  return Object.freeze({ ...profile });
}

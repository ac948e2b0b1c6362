/**
 * Chunker Configuration
 *
 * Chunk sizes follow the active model profile: small models get small
 * chunks so a handful of retrieved chunks still fit their prompt budget.
 */

import type { ModelProfile } from '../../config/profiles.js';
import type { ChunkSettings } from './types.js';

/** Approximate characters per token when sizing chunks */
export const CHUNK_CHARS_PER_TOKEN = 4;

/** Lower bound on overlap so tiny chunks still share some context */
export const MIN_CHUNK_OVERLAP = 16;

/**
 * @example
 * chunkSettingsForProfile(qwen7b)   // { size: 1024, overlap: 128 }
 * chunkSettingsForProfile(default_) // { size: 2048, overlap: 256 }
 */
export function chunkSettingsForProfile(profile: Pick<ModelProfile, 'chunkTokenLimit'>): ChunkSettings {
  const size = profile.chunkTokenLimit * CHUNK_CHARS_PER_TOKEN;
  return {
    size,
    overlap: Math.max(MIN_CHUNK_OVERLAP, Math.floor(size / 8)),
  };
}

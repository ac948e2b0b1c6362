/**
 * Test Utilities Module
 *
 * @example
 * ```typescript
 * import { ScriptedCompletionClient, HashingEmbeddingClient } from '../../test-utils/index.js';
 *
 * const llm = new ScriptedCompletionClient(['not json', '{"ok": true}']);
 * const embedder = new HashingEmbeddingClient();
 * ```
 */

export {
  ScriptedCompletionClient,
  HashingEmbeddingClient,
  hashingEmbedding,
  FAKE_EMBEDDING_DIMENSIONS,
  type ScriptedReply,
} from './fakes.js';
export { openTestDatabase } from './database.js';

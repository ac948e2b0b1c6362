/**
 * Token accounting: estimation, truncation and per-request budgets.
 */

export {
  CHARS_PER_TOKEN,
  TRUNCATION_MARKER,
  estimateTokens,
  truncateToTokens,
} from './estimator.js';
export { TokenBudget, MIN_INPUT_TOKENS } from './budget.js';

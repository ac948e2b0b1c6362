/**
 * Token Budget
 *
 * Per-request allocator for the prompt's input tokens. Callers reserve
 * fixed overheads first, then fit variable sections (retrieved documents,
 * diffs, repository maps) into what remains, in priority order.
 *
 * A budget belongs to one request and is discarded after logSummary().
 */

import type { ModelProfile } from '../config/profiles.js';
import type { Logger } from '../utils/logger.js';
import { estimateTokens, truncateToTokens } from './estimator.js';

/** Floor for the input pool, however large the requested output */
export const MIN_INPUT_TOKENS = 512;

export class TokenBudget {
  readonly totalInputTokens: number;
  private readonly allocated = new Map<string, number>();

  constructor(totalInputTokens: number) {
    this.totalInputTokens = totalInputTokens;
  }

  /**
   * Size a budget from a model profile: the effective context minus the
   * output allowance. `outputTokens` defaults to the profile's maximum
   * output when omitted or non-positive.
   */
  static forProfile(profile: ModelProfile, outputTokens?: number): TokenBudget {
    const output =
      outputTokens !== undefined && outputTokens > 0 ? outputTokens : profile.maxOutputTokens;
    return new TokenBudget(Math.max(MIN_INPUT_TOKENS, profile.effectiveContextTokens - output));
  }

  /**
   * Record a fixed allocation. Reserving a section again replaces its
   * previous value.
   */
  reserve(section: string, tokens: number): void {
    this.allocated.set(section, Math.max(0, tokens));
  }

  /** Tokens not yet allocated, never negative */
  remaining(): number {
    return Math.max(0, this.totalInputTokens - this.used());
  }

  used(): number {
    let sum = 0;
    for (const tokens of this.allocated.values()) {
      sum += tokens;
    }
    return sum;
  }

  /**
   * Truncate `text` to the smaller of `maxTokens` and what remains, and
   * record its post-truncation size under `section` (replacing any
   * earlier allocation for that section).
   */
  fit(section: string, text: string, maxTokens?: number): string {
    const available = this.remaining();
    const pool = maxTokens !== undefined ? Math.min(maxTokens, available) : available;
    const fitted = truncateToTokens(text, pool);
    this.allocated.set(section, estimateTokens(fitted));
    return fitted;
  }

  allocations(): ReadonlyMap<string, number> {
    return new Map(this.allocated);
  }

  /**
   * One line per request, e.g.
   * `Token budget [scope-checker]: total=4096, used=3120, remaining=976 | template_chrome=500, diff=1620`
   */
  summary(label: string): string {
    const sections = [...this.allocated.entries()].map(([name, tokens]) => `${name}=${tokens}`);
    return (
      `Token budget [${label}]: total=${this.totalInputTokens}, used=${this.used()}, ` +
      `remaining=${this.remaining()} | ${sections.join(', ')}`
    );
  }

  logSummary(logger: Logger, label: string): void {
    const line = this.summary(label);
    if (logger.info) {
      logger.info(line);
    } else {
      logger.debug?.(line);
    }
  }
}

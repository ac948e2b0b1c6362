/**
 * Structured-Output Caller
 *
 * Gets a JSON object out of a model that does not always produce one.
 * Each call runs a small, bounded state machine:
 *
 *   parsing ──ok──────────────▶ succeeded
 *      │
 *      └─fail─▶ repairing(1) ──ok──▶ succeeded
 *                   │
 *                   └─fail─▶ repairing(k+1) … repairing(retries) ─fail─▶ exhausted
 *
 * With a retry budget of zero a parse failure goes straight to exhausted.
 * Transport failures (TransientIOError) are not repaired; they propagate.
 */

import type { ModelProfile } from '../config/profiles.js';
import type { ChatMessage, CompletionClient } from '../providers/types.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { parseModelJson, type JsonObject, type ParsedJson } from './json.js';

/** Characters of the original prompt echoed in a repair request */
export const REPAIR_EXCERPT_CHARS = 1500;

export type StructuredCallState =
  | { kind: 'parsing' }
  | { kind: 'repairing'; attempt: number }
  | { kind: 'succeeded'; value: JsonObject }
  | { kind: 'exhausted'; error: string; raw: string };

/** States that still issue a model call */
export type PendingCallState = Extract<StructuredCallState, { kind: 'parsing' | 'repairing' }>;

/** States reachable after a response has been parsed */
export type SettledCallState = Exclude<StructuredCallState, { kind: 'parsing' }>;

/**
 * Transition function for one parsed response. Pure, so the loop's
 * termination can be checked without a model.
 */
export function advanceStructuredCall(
  state: PendingCallState,
  parsed: ParsedJson,
  maxRetries: number
): SettledCallState {
  if (parsed.ok) {
    return { kind: 'succeeded', value: parsed.value };
  }
  const nextAttempt = state.kind === 'parsing' ? 1 : state.attempt + 1;
  if (nextAttempt > maxRetries) {
    return { kind: 'exhausted', error: parsed.error, raw: parsed.raw };
  }
  return { kind: 'repairing', attempt: nextAttempt };
}

export function buildRepairPrompt(originalPrompt: string): string {
  return (
    'Your previous response was not valid JSON. ' +
    'Please respond ONLY with a valid JSON object. ' +
    'No markdown, no explanation, just the JSON.\n\n' +
    `Original request (summarised):\n${originalPrompt.slice(0, REPAIR_EXCERPT_CHARS)}`
  );
}

export interface StructuredCallOptions {
  system?: string;
  temperature?: number;
  /** Defaults to the profile's maxOutputTokens */
  maxOutputTokens?: number;
  /** Label for log lines, usually the agent name */
  label?: string;
}

export type StructuredCallResult =
  | { ok: true; value: JsonObject; attempts: number }
  | { ok: false; error: string; raw: string; attempts: number };

export interface StructuredOutputCallerOptions {
  logger?: Logger;
}

export class StructuredOutputCaller {
  private readonly logger: Logger;

  constructor(
    private readonly client: CompletionClient,
    private readonly profile: ModelProfile,
    options: StructuredOutputCallerOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Send `prompt` and return the first response that parses as a JSON
   * object, repairing up to `profile.jsonRetries` times.
   *
   * @throws TransientIOError if the completion endpoint fails
   */
  async call(prompt: string, options: StructuredCallOptions = {}): Promise<StructuredCallResult> {
    const label = options.label ?? 'structured';
    const maxRetries = this.profile.jsonRetries;
    const maxOutputTokens = options.maxOutputTokens ?? this.profile.maxOutputTokens;

    let state: PendingCallState = { kind: 'parsing' };
    let attempts = 0;

    for (;;) {
      const messages: ChatMessage[] =
        state.kind === 'parsing'
          ? this.initialMessages(prompt, options.system)
          : [{ role: 'user', content: buildRepairPrompt(prompt) }];

      const response = await this.client.complete({
        messages,
        temperature: state.kind === 'parsing' ? options.temperature ?? 0 : 0,
        maxOutputTokens,
        constrainedJson: this.profile.useConstrainedJson,
      });
      attempts++;

      const next = advanceStructuredCall(state, parseModelJson(response.content), maxRetries);
      switch (next.kind) {
        case 'succeeded':
          this.logger.debug?.(`${label}: structured output after ${attempts} attempt(s) from ${response.modelId}`);
          return { ok: true, value: next.value, attempts };
        case 'exhausted':
          this.logger.warn(`${label}: no valid JSON after ${attempts} attempt(s)`);
          return { ok: false, error: next.error, raw: next.raw, attempts };
        case 'repairing':
          this.logger.warn(`${label}: JSON parse failed, repair attempt ${next.attempt}/${maxRetries}`);
          state = next;
          break;
      }
    }
  }

  private initialMessages(prompt: string, system: string | undefined): ChatMessage[] {
    const messages: ChatMessage[] = [];
    if (system) {
      messages.push({ role: 'system', content: system });
    }
    messages.push({ role: 'user', content: prompt });
    return messages;
  }
}

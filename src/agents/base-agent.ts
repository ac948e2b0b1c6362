/**
 * Base Agent
 *
 * Shared plumbing for the agents: model access through the structured
 * caller, per-request token budgets, compact-prompt selection, and
 * validation of the model's JSON against a zod schema.
 */

import type { z } from 'zod';
import type { ModelProfile } from '../config/profiles.js';
import type { KnowledgeGraph } from '../graph/knowledge-graph.js';
import { RAW_EXCERPT_CHARS } from '../llm/json.js';
import { StructuredOutputCaller } from '../llm/structured.js';
import type { CompletionClient } from '../providers/types.js';
import type { HybridRetriever } from '../search/retriever.js';
import { TokenBudget } from '../tokens/budget.js';
import { estimateTokens } from '../tokens/estimator.js';
import { silentLogger, type Logger } from '../utils/logger.js';

/**
 * Agents never throw for bad model output: they return a tagged failure
 * carrying an excerpt of what the model said.
 */
export type AgentResult<T> = { ok: true; report: T } | { ok: false; error: string; raw: string };

/** A project document handed to an agent by the caller */
export interface AgentDocument {
  id: string;
  title: string;
  docType: string;
  content: string;
}

/** Lower bound for each document's share when a budget is split per document */
export const MIN_TOKENS_PER_DOCUMENT = 200;

export const NO_DOCUMENTS_PLACEHOLDER = '(No project documents provided)';

export interface AgentDeps {
  client: CompletionClient;
  profile: ModelProfile;
  retriever: HybridRetriever;
  graph: KnowledgeGraph;
  logger?: Logger;
}

export abstract class BaseAgent {
  abstract readonly name: string;

  protected readonly client: CompletionClient;
  protected readonly profile: ModelProfile;
  protected readonly retriever: HybridRetriever;
  protected readonly graph: KnowledgeGraph;
  protected readonly logger: Logger;
  private readonly caller: StructuredOutputCaller;

  constructor(deps: AgentDeps) {
    this.client = deps.client;
    this.profile = deps.profile;
    this.retriever = deps.retriever;
    this.graph = deps.graph;
    this.logger = deps.logger ?? silentLogger;
    this.caller = new StructuredOutputCaller(deps.client, deps.profile, { logger: this.logger });
  }

  /** Whether to use the compact prompt variants */
  protected get compact(): boolean {
    return this.profile.simplifyPrompts;
  }

  protected selectPrompt(full: string, compact: string): string {
    return this.compact ? compact : full;
  }

  protected createBudget(outputTokens?: number): TokenBudget {
    return TokenBudget.forProfile(this.profile, outputTokens);
  }

  /**
   * Split what remains of `budget` evenly across `documents` (never less
   * than MIN_TOKENS_PER_DOCUMENT each) and fit each one, heading included,
   * under `doc_<id>`. Once the pool runs dry later documents are dropped.
   */
  protected fitDocuments(budget: TokenBudget, documents: readonly AgentDocument[]): string {
    const share = Math.max(
      MIN_TOKENS_PER_DOCUMENT,
      Math.floor(budget.remaining() / Math.max(documents.length, 1))
    );
    const blocks = documents
      .map((doc) => budget.fit(`doc_${doc.id}`, `### ${doc.title} [${doc.docType}]\n${doc.content}`, share))
      .filter((block) => block.length > 0);
    return blocks.length > 0 ? blocks.join('\n\n') : NO_DOCUMENTS_PLACEHOLDER;
  }

  /**
   * Run a structured call and validate the object against `schema`.
   *
   * @throws TransientIOError if the completion endpoint fails
   */
  protected async callStructured<S extends z.ZodTypeAny>(
    prompt: string,
    schema: S
  ): Promise<AgentResult<z.output<S>>> {
    this.logger.debug?.(
      `Agent ${this.name} LLM call: model=${this.client.model}, tokens_in≈${estimateTokens(prompt)}`
    );

    const result = await this.caller.call(prompt, { label: this.name });
    if (!result.ok) {
      return { ok: false, error: result.error, raw: result.raw };
    }

    const parsed = schema.safeParse(result.value);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      return {
        ok: false,
        error: `Unexpected ${this.name} output: ${issues}`,
        raw: JSON.stringify(result.value).slice(0, RAW_EXCERPT_CHARS),
      };
    }
    return { ok: true, report: parsed.data };
  }
}

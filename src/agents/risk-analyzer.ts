/**
 * Risk Analyzer
 *
 * Predicts launch risks for a PRD from its text, past launch events and
 * similar indexed documents. Dependencies the model names are recorded in
 * the knowledge graph.
 */

import { z } from 'zod';
import { BaseAgent, type AgentResult } from './base-agent.js';
import { list, optionalText, score, text } from './fields.js';
import { RISK_ANALYSIS_PROMPT, RISK_ANALYSIS_PROMPT_COMPACT, renderTemplate } from './prompts.js';
import { truncateToTokens } from '../tokens/estimator.js';

export const RISK_TEMPLATE_CHROME_TOKENS = 400;
export const MAX_HISTORICAL_TOKENS = 600;
export const SIMILARITY_QUERY_CHARS = 1000;
export const SIMILAR_DOC_EXCERPT_CHARS = 200;
export const DEFAULT_DEPENDENCY_TYPE = 'hard';

const MAX_EVENTS = 20;
const MAX_EVENTS_COMPACT = 10;

export interface HistoricalEvent {
  eventType: string;
  team?: string;
  durationDays?: number;
  outcome?: string;
  description?: string;
}

export interface RiskAnalysisInput {
  projectId: string;
  prdContent: string;
  historicalEvents?: HistoricalEvent[];
}

export const RiskSchema = z.object({
  title: text(''),
  description: text(''),
  severity: text('medium'),
  mitigation: optionalText(),
});

export const DependencySchema = z.object({
  target: z.string(),
  type: text(DEFAULT_DEPENDENCY_TYPE),
  description: text(''),
});

export const RiskReportSchema = z.object({
  overall_risk_score: score(0),
  risks: list(RiskSchema),
  dependencies: list(DependencySchema),
  summary: text(''),
});

export type Risk = z.infer<typeof RiskSchema>;
export type Dependency = z.infer<typeof DependencySchema>;
export type RiskReport = z.infer<typeof RiskReportSchema>;

export class RiskAnalyzer extends BaseAgent {
  readonly name = 'risk-analyzer';

  async analyze(input: RiskAnalysisInput): Promise<AgentResult<RiskReport>> {
    const events = (input.historicalEvents ?? []).slice(
      0,
      this.compact ? MAX_EVENTS_COMPACT : MAX_EVENTS
    );
    const eventsJson = JSON.stringify(events);

    const similar = await this.retriever.retrieveSimilar(
      input.prdContent.slice(0, SIMILARITY_QUERY_CHARS),
      {},
      this.profile.retrievalTopK
    );

    const budget = this.createBudget();
    budget.reserve('template_chrome', RISK_TEMPLATE_CHROME_TOKENS);
    const historicalTokens = Math.min(eventsJson.length, MAX_HISTORICAL_TOKENS);
    budget.reserve('historical', historicalTokens);
    const fittedPrd = budget.fit('prd_content', input.prdContent);
    budget.logSummary(this.logger, this.name);

    const similarText =
      similar.length > 0
        ? similar
            .map((doc) => {
              const title = typeof doc.metadata.title === 'string' ? doc.metadata.title : 'Untitled';
              return `- ${title}: ${doc.content.slice(0, SIMILAR_DOC_EXCERPT_CHARS)}`;
            })
            .join('\n')
        : '(none)';

    const prompt = renderTemplate(
      this.selectPrompt(RISK_ANALYSIS_PROMPT, RISK_ANALYSIS_PROMPT_COMPACT),
      {
        PRD: fittedPrd,
        HISTORICAL_EVENTS: events.length > 0 ? truncateToTokens(eventsJson, historicalTokens) : '(none)',
        SIMILAR_DOCS: similarText,
      }
    );

    const result = await this.callStructured(prompt, RiskReportSchema);
    if (result.ok) {
      await this.recordDependencies(input.projectId, result.report.dependencies);
    }
    return result;
  }

  /**
   * Best-effort: a graph failure is logged and the report is still returned.
   */
  private async recordDependencies(projectId: string, dependencies: Dependency[]): Promise<void> {
    for (const dependency of dependencies) {
      const target = dependency.target.trim();
      if (!target) {
        continue;
      }
      try {
        const stored = await this.graph.addDependency(
          projectId,
          target,
          dependency.type || DEFAULT_DEPENDENCY_TYPE,
          dependency.description
        );
        if (!stored) {
          this.logger.warn(`Project ${projectId} is not in the graph; dependency on ${target} not stored`);
        }
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn(`Failed to store dependency ${projectId} -> ${target}: ${message}`);
      }
    }
  }
}

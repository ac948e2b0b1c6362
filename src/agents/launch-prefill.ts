/**
 * Launch Prefill
 *
 * Drafts a launch checklist from a project's documents, its known risks
 * and CI/CD metrics. Every field carries the model's confidence and the
 * evidence it used, so a human can review the draft rather than start
 * from a blank form.
 */

import { z } from 'zod';
import { BaseAgent, type AgentDocument, type AgentResult } from './base-agent.js';
import { flag, list, score, stringList, text } from './fields.js';
import { LAUNCH_PREFILL_PROMPT, LAUNCH_PREFILL_PROMPT_COMPACT, renderTemplate } from './prompts.js';
import type { Risk } from './risk-analyzer.js';
import { truncateToTokens } from '../tokens/estimator.js';

export const LAUNCH_TEMPLATE_CHROME_TOKENS = 500;
export const MAX_RISK_TOKENS = 400;
export const METRICS_TOKENS = 200;

export type LaunchMetrics = Record<string, string | number>;

export interface LaunchPrefillInput {
  projectName: string;
  documents: AgentDocument[];
  /** Risks from earlier risk analyses, flattened */
  risks?: Risk[];
  metrics?: LaunchMetrics;
}

export const ChecklistFieldSchema = z.object({
  field_name: text(''),
  value: text(''),
  confidence: score(0),
  evidence: text(''),
  needs_human_review: flag(true),
});

export const LaunchChecklistSchema = z.object({
  fields: list(ChecklistFieldSchema),
  warnings: stringList(),
  missing_information: stringList(),
});

export type ChecklistField = z.infer<typeof ChecklistFieldSchema>;
export type LaunchChecklist = z.infer<typeof LaunchChecklistSchema>;

export class LaunchPrefill extends BaseAgent {
  readonly name = 'launch-prefill';

  async prefill(input: LaunchPrefillInput): Promise<AgentResult<LaunchChecklist>> {
    const risks = input.risks ?? [];
    const risksJson = JSON.stringify(risks);
    const metricsJson = JSON.stringify(input.metrics ?? {});

    const budget = this.createBudget();
    budget.reserve('template_chrome', LAUNCH_TEMPLATE_CHROME_TOKENS);
    const riskTokens = Math.min(risksJson.length, MAX_RISK_TOKENS);
    budget.reserve('risks', riskTokens);
    budget.reserve('metrics', METRICS_TOKENS);
    const documents = this.fitDocuments(budget, input.documents);
    budget.logSummary(this.logger, this.name);

    const prompt = renderTemplate(
      this.selectPrompt(LAUNCH_PREFILL_PROMPT, LAUNCH_PREFILL_PROMPT_COMPACT),
      {
        PROJECT_NAME: input.projectName,
        DOCUMENTS: documents,
        RISKS: risks.length > 0 ? truncateToTokens(risksJson, riskTokens) : '(none)',
        METRICS: input.metrics !== undefined ? truncateToTokens(metricsJson, METRICS_TOKENS) : '(none)',
      }
    );

    const result = await this.callStructured(prompt, LaunchChecklistSchema);
    if (result.ok) {
      this.logger.debug?.(
        `Launch checklist for ${input.projectName}: ${result.report.fields.length} fields, ` +
          `${result.report.warnings.length} warnings`
      );
    }
    return result;
  }
}

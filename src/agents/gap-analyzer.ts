/**
 * Gap Analyzer
 *
 * Compares a launched project's metrics with the targets its PRD promised
 * and asks the model for root causes and recommendations for each miss.
 * Metric values and documents are supplied by the caller.
 */

import { z } from 'zod';
import { BaseAgent, type AgentDocument, type AgentResult } from './base-agent.js';
import { list, numeric, optionalText, stringList, text } from './fields.js';
import { GAP_ANALYSIS_PROMPT, GAP_ANALYSIS_PROMPT_COMPACT, renderTemplate } from './prompts.js';
import { truncateToTokens } from '../tokens/estimator.js';

export const GAP_TEMPLATE_CHROME_TOKENS = 400;
export const MAX_TARGET_TOKENS = 500;
export const UNKNOWN_ACTUAL = 'Unknown';
export const NO_TARGETS_SUMMARY = 'No metric targets defined for this project.';

export interface MetricTarget {
  metricName: string;
  targetValue: string;
  /** Latest measured value; absent when monitoring has nothing yet */
  actualValue?: string;
  unit?: string;
}

export interface GapAnalysisInput {
  projectName: string;
  targets: MetricTarget[];
  documents: AgentDocument[];
  daysSinceLaunch: number;
}

/** One metric as the model sees it */
export interface TargetForPrompt {
  metric_name: string;
  target_value: string;
  actual_value: string;
  gap: string | null;
}

export const GapSchema = z.object({
  metric_name: text(''),
  target: text(''),
  actual: text(''),
  gap_percentage: numeric(0),
  root_causes: stringList(),
  recommendations: stringList(),
  effort_estimate: text('medium'),
  priority: text('p1'),
});

export const GapReportSchema = z.object({
  overall_status: text('unknown'),
  gaps: list(GapSchema),
  metrics_on_track: stringList(),
  executive_summary: text(''),
  next_review_date: optionalText(),
});

export type Gap = z.infer<typeof GapSchema>;
export type GapReport = z.infer<typeof GapReportSchema>;

function parseMetric(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

/**
 * Shortfall as a percentage of the target, e.g. target 20 and actual 15
 * give "25.0%". Null when either value is not numeric or the target is 0.
 */
export function computeGap(targetValue: string, actualValue?: string): string | null {
  const target = parseMetric(targetValue);
  const actual = parseMetric(actualValue);
  if (target === null || actual === null || target === 0) {
    return null;
  }
  return `${(((target - actual) / target) * 100).toFixed(1)}%`;
}

export function targetsForPrompt(targets: readonly MetricTarget[]): TargetForPrompt[] {
  return targets.map((target) => ({
    metric_name: target.metricName,
    target_value: target.unit ? `${target.targetValue} ${target.unit}` : target.targetValue,
    actual_value: target.actualValue || UNKNOWN_ACTUAL,
    gap: computeGap(target.targetValue, target.actualValue),
  }));
}

export class GapAnalyzer extends BaseAgent {
  readonly name = 'gap-analyzer';

  /**
   * Without targets there is nothing to measure: the model is not called
   * and the report's status is `no_targets`.
   */
  async analyze(input: GapAnalysisInput): Promise<AgentResult<GapReport>> {
    if (input.targets.length === 0) {
      return {
        ok: true,
        report: {
          overall_status: 'no_targets',
          gaps: [],
          metrics_on_track: [],
          executive_summary: NO_TARGETS_SUMMARY,
          next_review_date: null,
        },
      };
    }

    const targetsJson = JSON.stringify(targetsForPrompt(input.targets));

    const budget = this.createBudget();
    budget.reserve('template_chrome', GAP_TEMPLATE_CHROME_TOKENS);
    const targetTokens = Math.min(targetsJson.length, MAX_TARGET_TOKENS);
    budget.reserve('targets', targetTokens);
    const documents = this.fitDocuments(budget, input.documents);
    budget.logSummary(this.logger, this.name);

    const prompt = renderTemplate(this.selectPrompt(GAP_ANALYSIS_PROMPT, GAP_ANALYSIS_PROMPT_COMPACT), {
      PROJECT_NAME: input.projectName,
      DAYS_SINCE_LAUNCH: input.daysSinceLaunch,
      METRIC_TARGETS: truncateToTokens(targetsJson, targetTokens),
      DOCUMENTS: documents,
    });

    const result = await this.callStructured(prompt, GapReportSchema);
    if (result.ok) {
      this.logger.debug?.(
        `Gap analysis for ${input.projectName}: status=${result.report.overall_status}, ` +
          `gaps=${result.report.gaps.length}`
      );
    }
    return result;
  }
}

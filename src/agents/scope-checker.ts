/**
 * Scope Checker
 *
 * Compares a code change (title, description, diff) with the project's
 * design document and repository map, and reports scope creep and
 * architecture violations.
 */

import { z } from 'zod';
import { BaseAgent, type AgentResult } from './base-agent.js';
import { flag, list, optionalText, score, text } from './fields.js';
import { SCOPE_CHECK_PROMPT, SCOPE_CHECK_PROMPT_COMPACT, renderTemplate } from './prompts.js';

export const NO_DESIGN_DOC_PLACEHOLDER = '(No design document found for this project)';
export const NO_REPO_MAP_PLACEHOLDER = '(No repository map indexed)';

export const TEMPLATE_CHROME_TOKENS = 500;
export const PR_META_TOKENS = 200;

/** Shares of what remains after the fixed reservations */
export const SCOPE_BUDGET_SHARES = {
  design_doc: 0.4,
  repo_map: 0.1,
  diff: 0.5,
} as const;

export const ScopeViolationSchema = z.object({
  violation_type: text('other'),
  file: text('N/A'),
  description: text(''),
  severity: text('info'),
  recommendation: optionalText(),
});

export const ScopeReportSchema = z.object({
  alignment_score: score(1),
  violations: list(ScopeViolationSchema),
  summary: text(''),
  requires_tpm_approval: flag(false),
});

export type ScopeViolation = z.infer<typeof ScopeViolationSchema>;
export type ScopeReport = z.infer<typeof ScopeReportSchema>;

export interface ScopeCheckInput {
  projectId: string;
  /** Key the repository map was indexed under, e.g. "acme/checkout" */
  repoKey: string;
  /** "PR #42", or "feature/x against main" for local branches */
  changeLabel: string;
  title: string;
  description: string;
  diff: string;
}

export class ScopeChecker extends BaseAgent {
  readonly name = 'scope-checker';

  async check(input: ScopeCheckInput): Promise<AgentResult<ScopeReport>> {
    const [designDoc, repoMap] = await Promise.all([
      this.retriever.retrieveDesignDoc(input.projectId),
      this.retriever.retrieveRepoContext(input.repoKey),
    ]);

    const budget = this.createBudget();
    budget.reserve('template_chrome', TEMPLATE_CHROME_TOKENS);
    budget.reserve('pr_meta', PR_META_TOKENS);

    const remaining = budget.remaining();
    const fittedMeta = budget.fit(
      'pr_meta',
      formatChangeMetadata(input.title, input.description),
      PR_META_TOKENS
    );
    const fittedDesign = budget.fit(
      'design_doc',
      designDoc ?? NO_DESIGN_DOC_PLACEHOLDER,
      Math.floor(remaining * SCOPE_BUDGET_SHARES.design_doc)
    );
    const fittedRepoMap = budget.fit(
      'repo_map',
      repoMap ?? NO_REPO_MAP_PLACEHOLDER,
      Math.floor(remaining * SCOPE_BUDGET_SHARES.repo_map)
    );
    const fittedDiff = budget.fit(
      'diff',
      input.diff,
      Math.floor(remaining * SCOPE_BUDGET_SHARES.diff)
    );
    budget.logSummary(this.logger, this.name);

    const prompt = renderTemplate(this.selectPrompt(SCOPE_CHECK_PROMPT, SCOPE_CHECK_PROMPT_COMPACT), {
      DESIGN_DOC: fittedDesign,
      REPO_MAP: fittedRepoMap,
      CHANGE_LABEL: input.changeLabel,
      REPO_NAME: input.repoKey,
      PR_META: fittedMeta,
      DIFF: fittedDiff,
    });

    return this.callStructured(prompt, ScopeReportSchema);
  }
}

/**
 * Title and description as one block, so both share the `pr_meta` allowance.
 * Commit-derived descriptions can run to hundreds of lines.
 */
export function formatChangeMetadata(title: string, description: string): string {
  return `Title: ${title}\nDescription:\n${description || '(none)'}`;
}

const SEVERITY_ICONS: Record<string, string> = {
  critical: '🔴',
  warning: '🟡',
  info: '🔵',
};

/**
 * Render a report as a markdown comment suitable for a pull request.
 */
export function formatScopeComment(report: ScopeReport): string {
  const score = Math.round(report.alignment_score * 100);
  const lines = ['## Scope Check Report', '', `**Alignment score:** ${score}%`, ''];

  if (report.violations.length === 0) {
    lines.push('No scope violations found.', '');
  } else {
    lines.push(`### Violations (${report.violations.length})`, '');
    for (const violation of report.violations) {
      const icon = SEVERITY_ICONS[violation.severity] ?? '⚪';
      lines.push(
        `${icon} **${violation.violation_type}** in \`${violation.file}\` (${violation.severity})`,
        `> ${violation.description}`
      );
      if (violation.recommendation) {
        lines.push(`> *Recommendation:* ${violation.recommendation}`);
      }
      lines.push('');
    }
  }

  if (report.requires_tpm_approval) {
    lines.push('⚠️ **TPM approval is required before merging this PR.**', '');
  }

  if (report.summary) {
    lines.push('### Summary', '', report.summary);
  }

  return lines.join('\n').trimEnd() + '\n';
}

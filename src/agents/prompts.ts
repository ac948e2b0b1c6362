/**
 * Agent prompt templates.
 *
 * Each template has a full variant and a compact one for small models
 * (selected by the profile's `simplifyPrompts`). {{NAME}} placeholders are
 * filled by renderTemplate().
 */

export const SCOPE_CHECK_PROMPT = `You are a technical program manager reviewing a code change against its approved design.

Approved design document:
{{DESIGN_DOC}}

Repository map:
{{REPO_MAP}}

Change under review: {{CHANGE_LABEL}} in {{REPO_NAME}}
{{PR_META}}

Diff:
{{DIFF}}

Identify work that goes beyond the approved scope and changes that break the documented architecture.

Respond with JSON only (no markdown):
{
  "alignment_score": <0.0-1.0>,
  "violations": [
    {
      "violation_type": "<scope_creep|architecture|security|other>",
      "file": "<path>",
      "description": "<what is wrong>",
      "severity": "<critical|warning|info>",
      "recommendation": "<how to fix>"
    }
  ],
  "summary": "<one paragraph>",
  "requires_tpm_approval": <true|false>
}

Rules:
- An alignment_score of 1.0 means the change matches the design exactly
- Only report violations you can point to in the diff
- Set requires_tpm_approval when any violation is critical`;

export const SCOPE_CHECK_PROMPT_COMPACT = `Compare the change to the design. Report scope creep and architecture violations.

DESIGN:
{{DESIGN_DOC}}

REPO:
{{REPO_MAP}}

CHANGE: {{CHANGE_LABEL}} in {{REPO_NAME}}
{{PR_META}}

DIFF:
{{DIFF}}

Reply with one JSON object:
{"alignment_score": 0.0-1.0, "violations": [{"violation_type": "", "file": "", "description": "", "severity": "critical|warning|info", "recommendation": ""}], "summary": "", "requires_tpm_approval": false}`;

export const RISK_ANALYSIS_PROMPT = `You are a technical program manager assessing launch risk for a product requirements document.

PRD:
{{PRD}}

Historical events from past launches:
{{HISTORICAL_EVENTS}}

Similar documents:
{{SIMILAR_DOCS}}

Predict what is likely to block or delay this launch, based on the PRD and on what happened before.

Respond with JSON only (no markdown):
{
  "overall_risk_score": <0.0-1.0>,
  "risks": [
    {
      "title": "<short name>",
      "description": "<why this is a risk>",
      "severity": "<high|medium|low>",
      "mitigation": "<what to do>"
    }
  ],
  "dependencies": [
    {"target": "<team, service or API>", "type": "<hard|soft>", "description": "<why>"}
  ],
  "summary": "<one paragraph>"
}`;

export const RISK_ANALYSIS_PROMPT_COMPACT = `List launch risks and dependencies for this PRD.

PRD:
{{PRD}}

PAST EVENTS:
{{HISTORICAL_EVENTS}}

SIMILAR:
{{SIMILAR_DOCS}}

Reply with one JSON object:
{"overall_risk_score": 0.0-1.0, "risks": [{"title": "", "description": "", "severity": "high|medium|low", "mitigation": ""}], "dependencies": [{"target": "", "type": "hard|soft", "description": ""}], "summary": ""}`;

export const GAP_ANALYSIS_PROMPT = `You are a technical program manager reviewing a launched project against the targets its PRD promised.

Project: {{PROJECT_NAME}}
Days since launch: {{DAYS_SINCE_LAUNCH}}

Metric targets (gap = shortfall as a percentage of the target):
{{METRIC_TARGETS}}

Project documents:
{{DOCUMENTS}}

For every metric that misses its target, explain the likely root causes and what to do about it.

Respond with JSON only (no markdown):
{
  "overall_status": "<on_track|at_risk|off_track>",
  "gaps": [
    {
      "metric_name": "<metric>",
      "target": "<target value>",
      "actual": "<actual value>",
      "gap_percentage": <number>,
      "root_causes": ["<cause>"],
      "recommendations": ["<action>"],
      "effort_estimate": "<low|medium|high>",
      "priority": "<p0|p1|p2>"
    }
  ],
  "metrics_on_track": ["<metric>"],
  "executive_summary": "<one paragraph for leadership>",
  "next_review_date": "<YYYY-MM-DD>"
}

Rules:
- A metric with an unknown actual value is neither a gap nor on track; mention it in the summary
- Only cite root causes the documents support`;

export const GAP_ANALYSIS_PROMPT_COMPACT = `Compare launch metrics to their targets and explain the gaps.

PROJECT: {{PROJECT_NAME}} ({{DAYS_SINCE_LAUNCH}} days since launch)

TARGETS:
{{METRIC_TARGETS}}

DOCS:
{{DOCUMENTS}}

Reply with one JSON object:
{"overall_status": "on_track|at_risk|off_track", "gaps": [{"metric_name": "", "target": "", "actual": "", "gap_percentage": 0, "root_causes": [], "recommendations": [], "effort_estimate": "low|medium|high", "priority": "p0|p1|p2"}], "metrics_on_track": [], "executive_summary": "", "next_review_date": "YYYY-MM-DD"}`;

export const LAUNCH_PREFILL_PROMPT = `You are a technical program manager preparing the launch checklist for a project.

Project: {{PROJECT_NAME}}

Project documents:
{{DOCUMENTS}}

Known risks:
{{RISKS}}

CI/CD and production metrics:
{{METRICS}}

Fill in every checklist field you can support from the material above. Cite the evidence for each value. Flag anything that should block the launch as a warning, and list what you could not find.

Respond with JSON only (no markdown):
{
  "fields": [
    {
      "field_name": "<e.g. rollback_plan, on_call_owner, test_coverage>",
      "value": "<filled-in value>",
      "confidence": <0.0-1.0>,
      "evidence": "<document or metric the value comes from>",
      "needs_human_review": <true|false>
    }
  ],
  "warnings": ["<launch blocker or concern>"],
  "missing_information": ["<what a human must supply>"]
}`;

export const LAUNCH_PREFILL_PROMPT_COMPACT = `Pre-fill a launch checklist from these project materials.

PROJECT: {{PROJECT_NAME}}

DOCS:
{{DOCUMENTS}}

RISKS:
{{RISKS}}

METRICS:
{{METRICS}}

Reply with one JSON object:
{"fields": [{"field_name": "", "value": "", "confidence": 0.0-1.0, "evidence": "", "needs_human_review": true}], "warnings": [], "missing_information": []}`;

/**
 * Replace every {{NAME}} with `values[NAME]`; unknown names become empty.
 * Values are inserted literally (no `$&`-style replacement patterns).
 */
export function renderTemplate(template: string, values: Record<string, string | number>): string {
  return template.replace(/\{\{([A-Z_]+)\}\}/g, (_match, name: string) => {
    const value = values[name];
    return value === undefined ? '' : String(value);
  });
}

export {
  BaseAgent,
  MIN_TOKENS_PER_DOCUMENT,
  NO_DOCUMENTS_PLACEHOLDER,
  type AgentDeps,
  type AgentDocument,
  type AgentResult,
} from './base-agent.js';
export {
  GAP_ANALYSIS_PROMPT,
  GAP_ANALYSIS_PROMPT_COMPACT,
  LAUNCH_PREFILL_PROMPT,
  LAUNCH_PREFILL_PROMPT_COMPACT,
  RISK_ANALYSIS_PROMPT,
  RISK_ANALYSIS_PROMPT_COMPACT,
  SCOPE_CHECK_PROMPT,
  SCOPE_CHECK_PROMPT_COMPACT,
  renderTemplate,
} from './prompts.js';
export {
  NO_DESIGN_DOC_PLACEHOLDER,
  NO_REPO_MAP_PLACEHOLDER,
  ScopeChecker,
  ScopeReportSchema,
  formatChangeMetadata,
  formatScopeComment,
  type ScopeCheckInput,
  type ScopeReport,
  type ScopeViolation,
} from './scope-checker.js';
export {
  RiskAnalyzer,
  RiskReportSchema,
  type Dependency,
  type HistoricalEvent,
  type Risk,
  type RiskAnalysisInput,
  type RiskReport,
} from './risk-analyzer.js';
export {
  GapAnalyzer,
  GapReportSchema,
  computeGap,
  type Gap,
  type GapAnalysisInput,
  type GapReport,
  type MetricTarget,
} from './gap-analyzer.js';
export {
  LaunchPrefill,
  LaunchChecklistSchema,
  type ChecklistField,
  type LaunchChecklist,
  type LaunchMetrics,
  type LaunchPrefillInput,
} from './launch-prefill.js';
